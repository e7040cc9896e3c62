import { distill } from "../distill/distiller";
import type { DistillModel } from "../distill/model";
import { syncItemEmbedding } from "../embeddings/provider";
import type { Embedder } from "../embeddings/provider";
import { throwIfAborted } from "../errors";
import { appendEvent, readEventsSince } from "../journal/events";
import { logger as rootLogger } from "../logger";
import type { Logger } from "../logger";
import { proposalDocument } from "../memory/documents";
import type { ItemStore } from "../memory/store";
import type { CheckpointRecord, Clock, DistillationMode, DistillProposal, EventType, MemoryItem } from "../types";
import { fileStamp, loadLatestCheckpointRecord, writeCheckpointRecord } from "./records";

export const DEFAULT_CHECKPOINT_EVENTS = 250;

/** Events the engine writes about itself; they never feed a checkpoint. */
const BOOKKEEPING_EVENTS: readonly EventType[] = ["checkpoint", "maintenance"];

const EPOCH = new Date(0);

export interface CheckpointContext {
  agentsDir: string;
  agentId: string;
  store: ItemStore;
  model: DistillModel | null;
  embedder: Embedder | null;
  clock?: Clock;
  logger?: Logger;
  signal?: AbortSignal;
}

export type CheckpointResult =
  | { checkpointCreated: false; reason: string; fromTimestamp: string }
  | {
      checkpointCreated: true;
      checkpointPath: string;
      eventCount: number;
      newItemCount: number;
      updatedItemCount: number;
      distillationMode: DistillationMode;
      proposal: DistillProposal;
      items: MemoryItem[];
      record: CheckpointRecord;
    };

/**
 * Distills the events since the latest checkpoint into memory items. Item
 * writes are applied one transaction at a time; a failure part way through
 * leaves the earlier writes in place and no checkpoint record.
 */
export async function runCheckpoint(ctx: CheckpointContext, maxEvents = DEFAULT_CHECKPOINT_EVENTS): Promise<CheckpointResult> {
  const { agentsDir, agentId, store, signal } = ctx;
  const clock = ctx.clock ?? (() => new Date());
  const log = (ctx.logger ?? rootLogger).child({ component: "checkpoint", agentId });

  const latest = await loadLatestCheckpointRecord(agentsDir, agentId);
  const since = latest ? new Date(latest.toTimestamp) : EPOCH;
  const events = await readEventsSince(agentsDir, agentId, since, {
    max: maxEvents > 0 ? maxEvents : DEFAULT_CHECKPOINT_EVENTS,
    exclude: BOOKKEEPING_EVENTS,
  });
  if (events.length === 0) {
    return { checkpointCreated: false, reason: "no new events", fromTimestamp: since.toISOString() };
  }

  const { mode, proposal } = await distill(events, ctx.model, { signal, logger: log });

  const items: MemoryItem[] = [];
  for (const proposed of proposal.newItems) {
    throwIfAborted(signal);
    const saved = await store.upsert({ ...proposed, status: "active" }, signal);
    await syncItemEmbedding(store, ctx.embedder, saved, { signal, logger: log });
    items.push(saved);
  }

  let updatedItemCount = 0;
  for (const update of proposal.updates) {
    throwIfAborted(signal);
    const existing = await store.get(update.id, signal);
    if (!existing) continue;
    const saved = await store.update({ ...existing, content: update.newContent, confidence: update.confidence }, signal);
    await syncItemEmbedding(store, ctx.embedder, saved, { signal, logger: log });
    updatedItemCount += 1;
  }

  const createdAt = clock().toISOString();
  const lastEvent = events[events.length - 1];
  const record: CheckpointRecord = {
    id: `chk_${fileStamp(createdAt)}`,
    agentId,
    createdAt,
    fromTimestamp: since.toISOString(),
    toTimestamp: lastEvent.timestamp,
    eventCount: events.length,
    newItemCount: items.length,
    updatedItemCount,
    summary: `Distilled ${events.length} events into ${items.length} new and ${updatedItemCount} updated memory items`,
  };
  const checkpointPath = await writeCheckpointRecord(agentsDir, record);

  await appendEvent(agentsDir, agentId, {
    type: "checkpoint",
    text: JSON.stringify(proposalDocument(proposal)),
    timestamp: createdAt,
    metadata: {
      event_count: record.eventCount,
      new_item_count: record.newItemCount,
      updated_item_count: record.updatedItemCount,
      mode,
    },
  });

  log.info(
    { eventCount: record.eventCount, newItemCount: record.newItemCount, updatedItemCount, mode },
    "checkpoint created",
  );

  return {
    checkpointCreated: true,
    checkpointPath,
    eventCount: record.eventCount,
    newItemCount: record.newItemCount,
    updatedItemCount,
    distillationMode: mode,
    proposal,
    items,
    record,
  };
}
