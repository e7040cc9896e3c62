import { z } from "zod/v4";

import { runCheckpoint } from "./checkpoint/service";
import { createDistillModelFromSettings } from "./distill/model";
import type { DistillModel } from "./distill/model";
import { createEmbedderFromSettings, syncItemEmbedding } from "./embeddings/provider";
import type { Embedder, ProviderOptions } from "./embeddings/provider";
import { MemoryError } from "./errors";
import { agentPaths, appendEvent, validateAgentId } from "./journal/events";
import { logger as rootLogger } from "./logger";
import type { Logger } from "./logger";
import { runMaintenance } from "./maintenance/service";
import {
  embeddingStatsDocument,
  healthDocument,
  itemDocument,
  proposalDocument,
} from "./memory/documents";
import { recall } from "./memory/recall";
import { ItemStore } from "./memory/store";
import { loadSettings } from "./settings";
import type { Settings } from "./settings";
import { MEMORY_TOOL_NAMES } from "./types";
import type { Clock, MemoryItem, MemoryToolName } from "./types";

/** Caller capability check; throws a policy_denied MemoryError to refuse. */
export interface ToolPolicy {
  checkTool(agentId: string, tool: MemoryToolName): void;
}

export class AllowListPolicy implements ToolPolicy {
  private readonly allowed: ReadonlySet<string>;

  constructor(allowed: Iterable<string> = MEMORY_TOOL_NAMES) {
    this.allowed = new Set(allowed);
  }

  checkTool(agentId: string, tool: MemoryToolName): void {
    if (!this.allowed.has(tool)) {
      throw new MemoryError("policy_denied", `tool ${tool} is not allowed for agent ${agentId}`, {
        code: "tool_not_allowed",
      });
    }
  }
}

export interface ToolRequest {
  agentId: string;
  policy?: ToolPolicy | null;
  args?: unknown;
  signal?: AbortSignal;
}

export type ToolResult = Record<string, unknown>;

export function isMemoryToolName(name: string): name is MemoryToolName {
  return MEMORY_TOOL_NAMES.some((tool) => tool === name);
}

const optionalText = z.string().optional();
const optionalNumber = z.number().optional();

export const toolArgSchemas = {
  "memory.search": z.object({
    query: optionalText,
    limit: optionalNumber,
    min_importance: optionalNumber,
    status: optionalText,
  }),
  "memory.write": z.object({
    kind: z.string(),
    title: z.string(),
    content: z.string(),
    importance: optionalNumber,
    confidence: optionalNumber,
    status: optionalText,
  }),
  "memory.update": z.object({
    id: z.string(),
    kind: optionalText,
    title: optionalText,
    content: optionalText,
    importance: optionalNumber,
    confidence: optionalNumber,
    status: optionalText,
  }),
  "memory.forget": z.object({ id: z.string() }),
  "memory.health": z.object({}),
  "decision.log": z.object({
    title: z.string(),
    content: z.string(),
    importance: optionalNumber,
    confidence: optionalNumber,
    metadata: z.record(z.string(), z.unknown()).optional(),
  }),
  "memory.checkpoint": z.object({ max_events: optionalNumber }),
  "memory.maintenance": z.object({ stale_days: optionalNumber, dry_run: z.boolean().optional() }),
} satisfies Record<MemoryToolName, z.ZodType>;

function parseArgs<S extends z.ZodType>(tool: MemoryToolName, schema: S, raw: unknown): z.output<S> {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new MemoryError("invalid_input", `${tool}: ${z.prettifyError(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

interface OperationScope {
  agentId: string;
  settings: Settings;
  store: ItemStore;
  signal?: AbortSignal;
}

export interface MemoryFacadeOptions {
  agentsDir: string;
  settingsPath: string;
  clock?: Clock;
  logger?: Logger;
  provider?: ProviderOptions;
  createEmbedder?: (settings: Settings) => Embedder | null;
  createDistillModel?: (settings: Settings) => DistillModel | null;
}

/**
 * Tool-shaped entry point over one agent's memory. Every call reloads the
 * settings file, opens the agent's store and closes it before returning.
 */
export class MemoryFacade {
  private readonly agentsDir: string;
  private readonly settingsPath: string;
  private readonly clock: Clock | undefined;
  private readonly log: Logger;
  private readonly createEmbedder: (settings: Settings) => Embedder | null;
  private readonly createDistillModel: (settings: Settings) => DistillModel | null;
  private readonly sweeps = new Map<string, Promise<void>>();

  constructor(options: MemoryFacadeOptions) {
    this.agentsDir = options.agentsDir;
    this.settingsPath = options.settingsPath;
    this.clock = options.clock;
    this.log = (options.logger ?? rootLogger).child({ component: "facade" });
    this.createEmbedder =
      options.createEmbedder ?? ((settings) => createEmbedderFromSettings(settings, options.provider));
    this.createDistillModel =
      options.createDistillModel ?? ((settings) => createDistillModelFromSettings(settings, options.provider));
  }

  invoke(tool: MemoryToolName, request: ToolRequest): Promise<ToolResult> {
    switch (tool) {
      case "memory.search":
        return this.search(request);
      case "memory.write":
        return this.write(request);
      case "memory.update":
        return this.update(request);
      case "memory.forget":
        return this.forget(request);
      case "memory.health":
        return this.health(request);
      case "decision.log":
        return this.decisionLog(request);
      case "memory.checkpoint":
        return this.checkpoint(request);
      case "memory.maintenance":
        return this.maintenance(request);
    }
  }

  search(request: ToolRequest): Promise<ToolResult> {
    return this.run("memory.search", toolArgSchemas["memory.search"], request, async (scope, args) => {
      const result = await recall(
        scope.store,
        { query: args.query, limit: args.limit, minImportance: args.min_importance, status: args.status },
        {
          embedder: this.embedderFor(scope.settings),
          embeddingsEnabled: scope.settings.memory.embeddingsEnabled,
          signal: scope.signal,
          logger: this.log,
        },
      );
      return {
        items: result.items.map(itemDocument),
        count: result.items.length,
        query: result.params.query,
        limit: result.params.limit,
        status: result.params.status,
        mode: result.mode,
      };
    });
  }

  write(request: ToolRequest): Promise<ToolResult> {
    return this.run("memory.write", toolArgSchemas["memory.write"], request, async (scope, args) => {
      const kind = args.kind.trim();
      const title = args.title.trim();
      const content = args.content.trim();
      if (!kind || !title || !content) {
        throw new MemoryError("invalid_input", "kind, title, and content are required");
      }
      const saved = await scope.store.upsert(
        {
          kind,
          title,
          content,
          importance: args.importance ?? 3,
          confidence: args.confidence ?? 0.85,
          status: args.status,
        },
        scope.signal,
      );
      await syncItemEmbedding(scope.store, this.embedderFor(scope.settings), saved, {
        signal: scope.signal,
        logger: this.log,
      });
      return { item: itemDocument(saved), written: true };
    });
  }

  /** Partial update: only the fields present in the arguments change. */
  update(request: ToolRequest): Promise<ToolResult> {
    return this.run("memory.update", toolArgSchemas["memory.update"], request, async (scope, args) => {
      const id = args.id.trim();
      if (!id) throw new MemoryError("invalid_input", "id is required");

      const existing = await scope.store.get(id, scope.signal);
      if (!existing) return { id, updated: false, found: false };

      const next = {
        ...existing,
        kind: args.kind !== undefined ? args.kind.trim() : existing.kind,
        title: args.title !== undefined ? args.title.trim() : existing.title,
        content: args.content !== undefined ? args.content.trim() : existing.content,
        importance: args.importance ?? existing.importance,
        confidence: args.confidence ?? existing.confidence,
        status: args.status !== undefined ? args.status.trim() : existing.status,
      };
      if (!next.kind || !next.title || !next.content) {
        throw new MemoryError("invalid_input", "kind, title, and content cannot be empty");
      }

      let saved: MemoryItem;
      try {
        saved = await scope.store.update(next, scope.signal);
      } catch (error) {
        if (error instanceof MemoryError && error.kind === "not_found") return { id, updated: false, found: false };
        throw error;
      }
      await syncItemEmbedding(scope.store, this.embedderFor(scope.settings), saved, {
        signal: scope.signal,
        logger: this.log,
      });
      return { item: itemDocument(saved), updated: true, found: true };
    });
  }

  forget(request: ToolRequest): Promise<ToolResult> {
    return this.run("memory.forget", toolArgSchemas["memory.forget"], request, async (scope, args) => {
      const id = args.id.trim();
      if (!id) throw new MemoryError("invalid_input", "id is required");
      return { id, forgotten: await scope.store.forget(id, scope.signal) };
    });
  }

  health(request: ToolRequest): Promise<ToolResult> {
    return this.run("memory.health", toolArgSchemas["memory.health"], request, async (scope) => {
      const health = await scope.store.health(scope.signal);
      const embeddings = await scope.store.embeddingStats(scope.signal);
      return { health: healthDocument(health), embeddings: embeddingStatsDocument(embeddings) };
    });
  }

  decisionLog(request: ToolRequest): Promise<ToolResult> {
    return this.run("decision.log", toolArgSchemas["decision.log"], request, async (scope, args) => {
      const title = args.title.trim();
      const content = args.content.trim();
      if (!title || !content) throw new MemoryError("invalid_input", "title and content are required");

      const saved = await scope.store.upsert(
        {
          kind: "decision",
          title,
          content,
          importance: args.importance ?? 4,
          confidence: args.confidence ?? 0.9,
          status: "active",
        },
        scope.signal,
      );

      const metadata: Record<string, unknown> = { title };
      if (args.metadata && Object.keys(args.metadata).length > 0) metadata.metadata = args.metadata;
      await appendEvent(this.agentsDir, scope.agentId, {
        type: "decision_log",
        text: content,
        timestamp: this.now(),
        metadata,
      });

      return { logged: true, item: itemDocument(saved) };
    });
  }

  checkpoint(request: ToolRequest): Promise<ToolResult> {
    return this.exclusive(request.agentId, () =>
      this.run("memory.checkpoint", toolArgSchemas["memory.checkpoint"], request, async (scope, args) => {
        const result = await runCheckpoint(
          {
            agentsDir: this.agentsDir,
            agentId: scope.agentId,
            store: scope.store,
            model: this.createDistillModel(scope.settings),
            embedder: this.embedderFor(scope.settings),
            clock: this.clock,
            logger: this.log,
            signal: scope.signal,
          },
          args.max_events,
        );
        if (!result.checkpointCreated) {
          return { checkpoint_created: false, reason: result.reason, from_timestamp: result.fromTimestamp };
        }
        return {
          checkpoint_created: true,
          checkpoint_path: result.checkpointPath,
          event_count: result.eventCount,
          new_item_count: result.newItemCount,
          updated_item_count: result.updatedItemCount,
          distillation_mode: result.distillationMode,
          result: proposalDocument(result.proposal),
          items: result.items.map(itemDocument),
        };
      }),
    );
  }

  maintenance(request: ToolRequest): Promise<ToolResult> {
    return this.exclusive(request.agentId, () =>
      this.run("memory.maintenance", toolArgSchemas["memory.maintenance"], request, async (scope, args) => {
        const { dryRun, reportPath, report } = await runMaintenance(
          {
            agentsDir: this.agentsDir,
            agentId: scope.agentId,
            store: scope.store,
            clock: this.clock,
            logger: this.log,
            signal: scope.signal,
          },
          { staleDays: args.stale_days, dryRun: args.dry_run },
        );
        return {
          ok: true,
          dry_run: dryRun,
          report_path: reportPath,
          deduplicated_count: report.deduplicatedCount,
          archived_stale_count: report.archivedStaleCount,
          verification_count: report.verificationCount,
          archived_duplicate_ids: report.archivedDuplicateIds,
          archived_stale_ids: report.archivedStaleIds,
          verification_item_ids: report.verificationItemIds,
          before: healthDocument(report.before),
          after: healthDocument(report.after),
        };
      }),
    );
  }

  /**
   * Checkpoint and maintenance runs for one agent execute one at a time, in
   * call order, so each checkpoint starts from the record the previous one wrote.
   */
  private exclusive<T>(agentId: string, task: () => Promise<T>): Promise<T> {
    const key = agentId.trim();
    const previous = this.sweeps.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    this.sweeps.set(key, settled);
    void settled.then(() => {
      if (this.sweeps.get(key) === settled) this.sweeps.delete(key);
    });
    return current;
  }

  private embedderFor(settings: Settings): Embedder | null {
    return settings.memory.embeddingsEnabled ? this.createEmbedder(settings) : null;
  }

  private now(): Date {
    return this.clock ? this.clock() : new Date();
  }

  private async run<S extends z.ZodType>(
    tool: MemoryToolName,
    schema: S,
    request: ToolRequest,
    operation: (scope: OperationScope, args: z.output<S>) => Promise<ToolResult>,
  ): Promise<ToolResult> {
    if (!request.policy) {
      throw new MemoryError("invalid_input", "policy is required", { code: "policy_required" });
    }
    const agentId = validateAgentId(request.agentId);

    const settings = await loadSettings(this.settingsPath);
    if (!settings.memory.enabled) {
      throw new MemoryError("policy_denied", "memory is disabled (set memory.enabled=true)", {
        code: "memory_disabled",
      });
    }
    if (!settings.policy.allowedTools.includes(tool)) {
      throw new MemoryError("policy_denied", `tool ${tool} is not enabled in settings`, { code: "tool_not_allowed" });
    }
    request.policy.checkTool(agentId, tool);

    const args = parseArgs(tool, schema, request.args);
    const store = ItemStore.open(agentPaths(this.agentsDir, agentId).dbPath, agentId, { clock: this.clock });
    try {
      return await operation({ agentId, settings, store, signal: request.signal }, args);
    } finally {
      store.close();
    }
  }
}
