import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod/v4";

import { writeFileAtomic, isNotFound } from "../fsutil/atomic";
import { agentPaths } from "../journal/events";
import { checkpointRecordDocument, maintenanceReportDocument } from "../memory/documents";
import type { CheckpointRecord, MaintenanceReport } from "../types";

const checkpointFileSchema = z.object({
  id: z.string(),
  agent_id: z.string(),
  created_at: z.string(),
  from_timestamp: z.string(),
  to_timestamp: z.string(),
  event_count: z.number(),
  new_item_count: z.number(),
  updated_item_count: z.number(),
  summary: z.string(),
});

/** `2026-02-19T00:00:01.123Z` → `20260219T000001123Z`. */
export function fileStamp(iso: string): string {
  return new Date(iso).toISOString().replace(/[-:.]/g, "");
}

export async function writeCheckpointRecord(agentsDir: string, record: CheckpointRecord): Promise<string> {
  const { checkpointsDir } = agentPaths(agentsDir, record.agentId);
  const path = join(checkpointsDir, `checkpoint-${fileStamp(record.createdAt)}.json`);
  await writeFileAtomic(path, `${JSON.stringify(checkpointRecordDocument(record), null, 2)}\n`);
  return path;
}

/** The lexicographically last `checkpoint-*.json`, or null when there is none. */
export async function loadLatestCheckpointRecord(agentsDir: string, agentId: string): Promise<CheckpointRecord | null> {
  const { checkpointsDir } = agentPaths(agentsDir, agentId);
  let names: string[];
  try {
    names = await readdir(checkpointsDir);
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }

  const latest = names.filter((name) => /^checkpoint-.+\.json$/.test(name)).sort().at(-1);
  if (!latest) return null;

  const raw: unknown = JSON.parse(await readFile(join(checkpointsDir, latest), "utf8"));
  const doc = checkpointFileSchema.parse(raw);
  return {
    id: doc.id,
    agentId: doc.agent_id,
    createdAt: doc.created_at,
    fromTimestamp: doc.from_timestamp,
    toTimestamp: doc.to_timestamp,
    eventCount: doc.event_count,
    newItemCount: doc.new_item_count,
    updatedItemCount: doc.updated_item_count,
    summary: doc.summary,
  };
}

export async function writeMaintenanceReport(agentsDir: string, report: MaintenanceReport): Promise<string> {
  const { maintenanceDir } = agentPaths(agentsDir, report.agentId);
  const path = join(maintenanceDir, `maintenance-${fileStamp(report.createdAt)}.json`);
  await writeFileAtomic(path, `${JSON.stringify(maintenanceReportDocument(report), null, 2)}\n`);
  return path;
}
