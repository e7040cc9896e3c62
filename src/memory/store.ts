import { randomUUID } from "node:crypto";
import { chmodSync, statSync } from "node:fs";

import { openDb } from "../db/client";
import type { Db } from "../db/client";
import { migrate } from "../db/migrate";
import { MemoryError, throwIfAborted, toMemoryError } from "../errors";
import { DEFAULT_FILE_MODE } from "../fsutil/atomic";
import type {
  Clock,
  EmbeddingStats,
  Health,
  MemoryItem,
  MemoryItemInput,
  MemoryStatus,
  SearchParams,
} from "../types";
import { buildFtsQuery, normalizeItem, normalizeSearchParams, normalizeStatus } from "./normalize";
import { cosineSimilarity, vectorNorm } from "./scoring";

const DEFAULT_LIST_LIMIT = 1000;
const MAX_LIST_LIMIT = 20_000;
const DEFAULT_EMBEDDING_LIMIT = 8;
const MAX_EMBEDDING_LIMIT = 100;

const ITEM_COLUMNS = "id, agent_id, kind, title, content, importance, confidence, status, created_at, updated_at";

interface ItemRow {
  id: string;
  agent_id: string;
  kind: string;
  title: string;
  content: string;
  importance: number;
  confidence: number;
  status: string;
  created_at: string;
  updated_at: string;
}

interface EmbeddingCandidateRow extends ItemRow {
  vector_json: string;
}

function toItem(row: ItemRow): MemoryItem {
  return {
    id: row.id,
    agentId: row.agent_id,
    kind: row.kind,
    title: row.title,
    content: row.content,
    importance: Number(row.importance),
    confidence: Number(row.confidence),
    status: normalizeStatus(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function parseVector(raw: string): number[] | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed) || parsed.length === 0) return null;
    const out: number[] = [];
    for (const value of parsed) {
      if (typeof value !== "number") return null;
      out.push(value);
    }
    return out;
  } catch {
    return null;
  }
}

/** A newly seeded database queried before its schema exists reads as empty. */
function isMissingTable(error: unknown): boolean {
  return error instanceof Error && /no such table/i.test(error.message);
}

function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toMemoryError(error);
  }
}

export function newItemId(): string {
  return `mem_${randomUUID().replaceAll("-", "")}`;
}

export interface ItemStoreOptions {
  clock?: Clock;
}

/**
 * Agent-scoped item store over one SQLite connection. It is the only writer of
 * memory_items, memory_fts and memory_embeddings; every mutation updates the
 * row and both indexes in a single transaction.
 */
export class ItemStore {
  readonly path: string;
  readonly agentId: string;
  private readonly db: Db;
  private readonly clock: Clock;

  private constructor(path: string, agentId: string, db: Db, clock: Clock) {
    this.path = path;
    this.agentId = agentId;
    this.db = db;
    this.clock = clock;
  }

  static open(path: string, agentId: string, options: ItemStoreOptions = {}): ItemStore {
    const dbPath = path.trim();
    const owner = agentId.trim();
    if (!dbPath) throw new MemoryError("invalid_input", "memory store: db path is required");
    if (!owner) throw new MemoryError("invalid_input", "memory store: agent id is required");

    const db = guard(() => openDb(dbPath));
    try {
      migrate(db);
      chmodSync(dbPath, DEFAULT_FILE_MODE);
    } catch (error) {
      db.close();
      throw toMemoryError(error);
    }
    return new ItemStore(dbPath, owner, db, options.clock ?? (() => new Date()));
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  async upsert(input: MemoryItemInput, signal?: AbortSignal): Promise<MemoryItem> {
    throwIfAborted(signal);
    const item = normalizeItem(input);
    const agentId = item.agentId || this.agentId;
    if (agentId !== this.agentId) {
      throw new MemoryError("policy_denied", "memory store: cross-agent write denied", {
        code: "cross_agent_write",
      });
    }
    const title = item.title || item.kind;
    if (item.status === "active" && !item.content) {
      throw new MemoryError("invalid_input", "memory store: content is required for active items");
    }

    return guard(() =>
      this.db.transaction((): MemoryItem => {
        const id = item.id || newItemId();
        const existing = this.db
          .prepare<[string], { agent_id: string; created_at: string }>(
            `SELECT agent_id, created_at FROM memory_items WHERE id = ?`,
          )
          .get(id);
        if (existing && existing.agent_id !== this.agentId) {
          throw new MemoryError("policy_denied", "memory store: cross-agent write denied", {
            code: "cross_agent_write",
          });
        }

        const now = this.clock().toISOString();
        const row: ItemRow = {
          id,
          agent_id: this.agentId,
          kind: item.kind,
          title,
          content: item.content,
          importance: item.importance,
          confidence: item.confidence,
          status: item.status,
          created_at: existing?.created_at ?? now,
          updated_at: now,
        };

        this.db
          .prepare(
            `
            INSERT INTO memory_items (${ITEM_COLUMNS})
            VALUES (@id, @agent_id, @kind, @title, @content, @importance, @confidence, @status, @created_at, @updated_at)
            ON CONFLICT(id) DO UPDATE SET
              kind = excluded.kind,
              title = excluded.title,
              content = excluded.content,
              importance = excluded.importance,
              confidence = excluded.confidence,
              status = excluded.status,
              updated_at = excluded.updated_at
          `,
          )
          .run(row);

        throwIfAborted(signal);
        this.db.prepare(`DELETE FROM memory_fts WHERE id = ?`).run(id);
        if (row.status === "active") {
          this.db
            .prepare(`INSERT INTO memory_fts (id, title, content) VALUES (?, ?, ?)`)
            .run(id, row.title, row.content);
        } else {
          this.db.prepare(`DELETE FROM memory_embeddings WHERE memory_id = ?`).run(id);
        }
        return toItem(row);
      })(),
    );
  }

  /** Like upsert, but the row must already exist for this agent. */
  async update(input: MemoryItemInput, signal?: AbortSignal): Promise<MemoryItem> {
    const id = (input.id ?? "").trim();
    if (!id) throw new MemoryError("invalid_input", "memory store: id is required");
    const existing = await this.get(id, signal);
    if (!existing) {
      throw new MemoryError("not_found", `memory store: item not found: ${id}`, { code: "item_not_found" });
    }
    return this.upsert({ ...input, id }, signal);
  }

  async get(id: string, signal?: AbortSignal): Promise<MemoryItem | null> {
    throwIfAborted(signal);
    const key = id.trim();
    if (!key) throw new MemoryError("invalid_input", "memory store: id is required");
    const row = guard(() =>
      this.db
        .prepare<[string, string], ItemRow>(
          `SELECT ${ITEM_COLUMNS} FROM memory_items WHERE id = ? AND agent_id = ? LIMIT 1`,
        )
        .get(key, this.agentId),
    );
    return row ? toItem(row) : null;
  }

  async forget(id: string, signal?: AbortSignal): Promise<boolean> {
    return this.deactivate(id, "forgotten", signal);
  }

  async archive(id: string, signal?: AbortSignal): Promise<boolean> {
    return this.deactivate(id, "archived", signal);
  }

  /** Only active items transition; a second forget or archive returns false. */
  private deactivate(id: string, status: Exclude<MemoryStatus, "active">, signal?: AbortSignal): boolean {
    throwIfAborted(signal);
    const key = id.trim();
    if (!key) throw new MemoryError("invalid_input", "memory store: id is required");

    return guard(() =>
      this.db.transaction((): boolean => {
        const result = this.db
          .prepare(
            `UPDATE memory_items SET status = ?, updated_at = ?
             WHERE id = ? AND agent_id = ? AND status = 'active'`,
          )
          .run(status, this.clock().toISOString(), key, this.agentId);
        if (result.changes === 0) return false;

        throwIfAborted(signal);
        this.db.prepare(`DELETE FROM memory_fts WHERE id = ?`).run(key);
        this.db.prepare(`DELETE FROM memory_embeddings WHERE memory_id = ?`).run(key);
        return true;
      })(),
    );
  }

  async list(status?: string, limit?: number, signal?: AbortSignal): Promise<MemoryItem[]> {
    throwIfAborted(signal);
    let cap = Math.trunc(limit ?? 0);
    if (!Number.isFinite(cap) || cap <= 0) cap = DEFAULT_LIST_LIMIT;
    if (cap > MAX_LIST_LIMIT) cap = MAX_LIST_LIMIT;

    const rows = guard(() =>
      this.db
        .prepare<[string, string, number], ItemRow>(
          `SELECT ${ITEM_COLUMNS} FROM memory_items
           WHERE agent_id = ? AND status = ?
           ORDER BY updated_at DESC
           LIMIT ?`,
        )
        .all(this.agentId, normalizeStatus(status), cap),
    );
    return rows.map(toItem);
  }

  /** Lexical search; an empty query lists by importance, then recency. */
  async search(params: SearchParams, signal?: AbortSignal): Promise<MemoryItem[]> {
    throwIfAborted(signal);
    const normalized = normalizeSearchParams(params);
    const match = buildFtsQuery(normalized.query);

    try {
      const rows = match
        ? this.db
            .prepare<[string, string, number, string, number], ItemRow>(
              `SELECT m.id, m.agent_id, m.kind, m.title, m.content, m.importance, m.confidence,
                      m.status, m.created_at, m.updated_at
               FROM memory_fts
               JOIN memory_items m ON m.id = memory_fts.id
               WHERE m.agent_id = ?
                 AND m.status = ?
                 AND m.importance >= ?
                 AND memory_fts MATCH ?
               ORDER BY bm25(memory_fts), m.importance DESC, m.updated_at DESC
               LIMIT ?`,
            )
            .all(this.agentId, normalized.status, normalized.minImportance, match, normalized.limit)
        : this.db
            .prepare<[string, string, number, number], ItemRow>(
              `SELECT ${ITEM_COLUMNS} FROM memory_items
               WHERE agent_id = ? AND status = ? AND importance >= ?
               ORDER BY importance DESC, updated_at DESC
               LIMIT ?`,
            )
            .all(this.agentId, normalized.status, normalized.minImportance, normalized.limit);
      return rows.map(toItem);
    } catch (error) {
      if (isMissingTable(error)) return [];
      throw toMemoryError(error);
    }
  }

  async upsertEmbedding(id: string, model: string, vector: readonly number[], signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const key = id.trim();
    const modelId = model.trim();
    if (!key) throw new MemoryError("invalid_input", "memory store: memory id is required");
    if (!modelId) throw new MemoryError("invalid_input", "memory store: embedding model is required");
    if (vector.length === 0) throw new MemoryError("invalid_input", "memory store: embedding vector is required");
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new MemoryError("invalid_input", "memory store: embedding vector must be finite");
    }

    guard(() =>
      this.db.transaction(() => {
        const row = this.db
          .prepare<[string, string], { status: string }>(
            `SELECT status FROM memory_items WHERE id = ? AND agent_id = ?`,
          )
          .get(key, this.agentId);
        if (!row) {
          throw new MemoryError("not_found", `memory store: item not found: ${key}`, { code: "item_not_found" });
        }
        if (row.status !== "active") {
          throw new MemoryError("invalid_input", `memory store: item is not active: ${key}`);
        }
        this.db
          .prepare(
            `INSERT INTO memory_embeddings (memory_id, agent_id, model, vector_json, updated_at)
             VALUES (?, ?, ?, ?, ?)
             ON CONFLICT(memory_id) DO UPDATE SET
               model = excluded.model,
               vector_json = excluded.vector_json,
               updated_at = excluded.updated_at`,
          )
          .run(key, this.agentId, modelId, JSON.stringify(vector), this.clock().toISOString());
      })(),
    );
  }

  /** Cosine ranking over stored vectors; non-positive and NaN scores are dropped. */
  async searchByEmbedding(
    queryVector: readonly number[],
    limit?: number,
    minImportance?: number,
    status?: string,
    signal?: AbortSignal,
  ): Promise<MemoryItem[]> {
    throwIfAborted(signal);
    if (queryVector.length === 0) return [];
    let cap = Math.trunc(limit ?? 0);
    if (!Number.isFinite(cap) || cap <= 0) cap = DEFAULT_EMBEDDING_LIMIT;
    if (cap > MAX_EMBEDDING_LIMIT) cap = MAX_EMBEDDING_LIMIT;
    let floor = Math.trunc(minImportance ?? 0);
    if (!Number.isFinite(floor) || floor <= 0) floor = 1;

    let rows: EmbeddingCandidateRow[];
    try {
      rows = this.db
        .prepare<[string, string, number], EmbeddingCandidateRow>(
          `SELECT m.id, m.agent_id, m.kind, m.title, m.content, m.importance, m.confidence,
                  m.status, m.created_at, m.updated_at, e.vector_json
           FROM memory_items m
           JOIN memory_embeddings e ON m.id = e.memory_id
           WHERE m.agent_id = ? AND m.status = ? AND m.importance >= ?`,
        )
        .all(this.agentId, normalizeStatus(status), floor);
    } catch (error) {
      if (isMissingTable(error)) return [];
      throw toMemoryError(error);
    }

    const queryNorm = vectorNorm(queryVector);
    const candidates: Array<{ item: MemoryItem; score: number }> = [];
    for (const row of rows) {
      const vector = parseVector(row.vector_json);
      if (!vector) continue;
      const score = queryNorm === 0 ? 0 : cosineSimilarity(vector, queryVector, queryNorm);
      if (Number.isNaN(score) || score <= 0) continue;
      candidates.push({ item: toItem(row), score });
    }

    candidates.sort((a, b) => {
      if (a.score !== b.score) return b.score - a.score;
      return b.item.updatedAt.localeCompare(a.item.updatedAt);
    });
    return candidates.slice(0, cap).map((candidate) => candidate.item);
  }

  async embeddingStats(signal?: AbortSignal): Promise<EmbeddingStats> {
    throwIfAborted(signal);
    try {
      const total = this.db
        .prepare<[string], { count: number }>(`SELECT COUNT(*) AS count FROM memory_embeddings WHERE agent_id = ?`)
        .get(this.agentId);
      const active = this.db
        .prepare<[string, string], { count: number }>(
          `SELECT COUNT(*) AS count
           FROM memory_embeddings e
           JOIN memory_items m ON m.id = e.memory_id
           WHERE e.agent_id = ? AND m.agent_id = ? AND m.status = 'active'`,
        )
        .get(this.agentId, this.agentId);
      const models = this.db
        .prepare<[string], { model: string; count: number }>(
          `SELECT model, COUNT(*) AS count FROM memory_embeddings WHERE agent_id = ? GROUP BY model`,
        )
        .all(this.agentId);
      return {
        vectorCount: total?.count ?? 0,
        activeVectorCount: active?.count ?? 0,
        models: Object.fromEntries(models.map((row) => [row.model.trim(), row.count])),
      };
    } catch (error) {
      if (isMissingTable(error)) return { vectorCount: 0, activeVectorCount: 0, models: {} };
      throw toMemoryError(error);
    }
  }

  async health(signal?: AbortSignal): Promise<Health> {
    throwIfAborted(signal);
    const rows = guard(() =>
      this.db
        .prepare<[string], { status: string; count: number }>(
          `SELECT status, COUNT(*) AS count FROM memory_items WHERE agent_id = ? GROUP BY status`,
        )
        .all(this.agentId),
    );
    const counts = new Map(rows.map((row) => [row.status, row.count]));
    const active = counts.get("active") ?? 0;
    const forgotten = counts.get("forgotten") ?? 0;
    const archived = counts.get("archived") ?? 0;

    let dbSizeBytes = 0;
    try {
      dbSizeBytes = statSync(this.path).size;
    } catch {
      dbSizeBytes = 0;
    }

    return {
      dbPath: this.path,
      dbSizeBytes,
      totalItems: active + forgotten + archived,
      activeItems: active,
      forgottenItems: forgotten,
      archivedItems: archived,
    };
  }

  async vacuum(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    guard(() => this.db.exec("VACUUM"));
  }
}
