import { appendEvent } from "../journal/events";
import { logger as rootLogger } from "../logger";
import type { Logger } from "../logger";
import type { ItemStore } from "../memory/store";
import { fileStamp, writeMaintenanceReport } from "../checkpoint/records";
import type { Clock, Health, MaintenanceReport, MemoryItem } from "../types";

export const DEFAULT_STALE_DAYS = 45;
export const MIN_STALE_DAYS = 7;
export const VERIFY_AFTER_DAYS = 30;
const MAINTENANCE_LIST_CAP = 10_000;
const DEDUPE_CONTENT_CHARS = 160;
const DAY_MS = 24 * 60 * 60 * 1000;

export function uniqueSorted(ids: readonly string[]): string[] {
  return [...new Set(ids.map((id) => id.trim()).filter(Boolean))].sort();
}

function dedupeKey(item: MemoryItem): string {
  const content = Array.from(item.content.trim().toLowerCase()).slice(0, DEDUPE_CONTENT_CHARS).join("");
  return `${item.kind}|${item.title}|${content}`.trim().toLowerCase();
}

/**
 * Ids to archive so that each (kind, title, content prefix) keeps one item:
 * the most important, then the most recently updated.
 */
export function duplicateItemIds(items: readonly MemoryItem[]): string[] {
  const kept = new Map<string, MemoryItem>();
  const duplicates: string[] = [];
  for (const item of items) {
    const key = dedupeKey(item);
    if (key === "||") continue;
    const current = kept.get(key);
    if (!current) {
      kept.set(key, item);
      continue;
    }
    const keepCurrent =
      current.importance > item.importance ||
      (current.importance === item.importance && current.updatedAt > item.updatedAt);
    if (keepCurrent) {
      duplicates.push(item.id);
    } else {
      duplicates.push(current.id);
      kept.set(key, item);
    }
  }
  return uniqueSorted(duplicates);
}

export function staleArchiveIds(items: readonly MemoryItem[], staleDays: number, now: Date): string[] {
  const threshold = now.getTime() - staleDays * DAY_MS;
  return uniqueSorted(
    items.filter((item) => item.importance <= 2 && Date.parse(item.updatedAt) < threshold).map((item) => item.id),
  );
}

/** Important items that are low-confidence or have not been touched for a month. Reported, never archived. */
export function verificationNeededIds(items: readonly MemoryItem[], now: Date): string[] {
  const threshold = now.getTime() - VERIFY_AFTER_DAYS * DAY_MS;
  return uniqueSorted(
    items
      .filter((item) => item.importance >= 3 && (item.confidence < 0.6 || Date.parse(item.updatedAt) < threshold))
      .map((item) => item.id),
  );
}

export interface MaintenanceContext {
  agentsDir: string;
  agentId: string;
  store: ItemStore;
  clock?: Clock;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface MaintenanceOptions {
  staleDays?: number;
  dryRun?: boolean;
}

export interface MaintenanceResult {
  dryRun: boolean;
  reportPath: string;
  report: MaintenanceReport;
}

export async function runMaintenance(ctx: MaintenanceContext, options: MaintenanceOptions = {}): Promise<MaintenanceResult> {
  const { agentsDir, agentId, store, signal } = ctx;
  const clock = ctx.clock ?? (() => new Date());
  const log = (ctx.logger ?? rootLogger).child({ component: "maintenance", agentId });
  const dryRun = options.dryRun ?? false;
  const staleDays = Math.max(Math.trunc(options.staleDays ?? DEFAULT_STALE_DAYS), MIN_STALE_DAYS);

  const before: Health = await store.health(signal);
  const items = await store.list("active", MAINTENANCE_LIST_CAP, signal);
  const now = clock();

  const duplicateIds = duplicateItemIds(items);
  const staleIds = staleArchiveIds(items, staleDays, now);
  const verifyIds = verificationNeededIds(items, now);

  let deduplicated = 0;
  let archivedStale = 0;
  if (!dryRun) {
    for (const id of duplicateIds) {
      if (await store.archive(id, signal)) deduplicated += 1;
    }
    for (const id of staleIds) {
      if (await store.archive(id, signal)) archivedStale += 1;
    }
    await store.vacuum(signal);
  }

  const after = await store.health(signal);
  const createdAt = clock().toISOString();
  const report: MaintenanceReport = {
    id: `maint_${fileStamp(createdAt)}`,
    agentId,
    createdAt,
    deduplicatedCount: deduplicated,
    archivedStaleCount: archivedStale,
    verificationCount: verifyIds.length,
    compacted: !dryRun,
    before,
    after,
    verificationItemIds: verifyIds,
    archivedDuplicateIds: duplicateIds,
    archivedStaleIds: staleIds,
    metadata: { dry_run: dryRun, stale_days: staleDays },
  };
  const reportPath = await writeMaintenanceReport(agentsDir, report);

  if (!dryRun) {
    await appendEvent(agentsDir, agentId, {
      type: "maintenance",
      text: `maintenance completed: deduped=${deduplicated} stale_archived=${archivedStale} verify=${verifyIds.length}`,
      timestamp: createdAt,
      metadata: { report_path: reportPath, dry_run: false },
    });
  }

  log.info({ dryRun, deduplicated, archivedStale, verify: verifyIds.length }, "maintenance completed");
  return { dryRun, reportPath, report };
}
