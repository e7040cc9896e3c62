import { randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import { mkdir, open, readdir } from "node:fs/promises";
import { join } from "node:path";
import { createInterface } from "node:readline";
import { z } from "zod/v4";

import { MemoryError } from "../errors";
import { DEFAULT_DIR_MODE, DEFAULT_FILE_MODE, isNotFound } from "../fsutil/atomic";
import { EVENT_TYPES } from "../types";
import type { EventInput, EventType, MemoryEvent } from "../types";

export const DEFAULT_READ_MAX = 200;

export function validateAgentId(agentId: string): string {
  const id = agentId.trim();
  if (!id || id.includes("..") || id.includes("/") || id.includes("\\")) {
    throw new MemoryError("invalid_input", `invalid agent id: ${JSON.stringify(agentId)}`, {
      code: "invalid_agent_id",
    });
  }
  return id;
}

export interface AgentPaths {
  root: string;
  dbPath: string;
  eventsDir: string;
  checkpointsDir: string;
  maintenanceDir: string;
}

export function agentPaths(agentsDir: string, agentId: string): AgentPaths {
  const root = join(agentsDir, validateAgentId(agentId), "memory");
  return {
    root,
    dbPath: join(root, "memory.db"),
    eventsDir: join(root, "events"),
    checkpointsDir: join(root, "checkpoints"),
    maintenanceDir: join(root, "maintenance"),
  };
}

export function newEventId(): string {
  return `evt_${randomUUID().replaceAll("-", "")}`;
}

function toInstant(value: string | Date | undefined): Date | null {
  if (value === undefined || value === "") return null;
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new MemoryError("invalid_input", `invalid event timestamp: ${String(value)}`);
  }
  return date.getTime() === 0 ? null : date;
}

/** Assigns an id and a UTC timestamp where missing and trims the text fields. */
export function normalizeEvent(input: EventInput, now: Date = new Date()): MemoryEvent {
  const event: MemoryEvent = {
    id: (input.id ?? "").trim() || newEventId(),
    type: input.type,
    timestamp: (toInstant(input.timestamp) ?? now).toISOString(),
  };
  const text = (input.text ?? "").trim();
  const sessionId = (input.sessionId ?? "").trim();
  const runId = (input.runId ?? "").trim();
  if (text) event.text = text;
  if (sessionId) event.sessionId = sessionId;
  if (runId) event.runId = runId;
  if (input.metadata && Object.keys(input.metadata).length > 0) event.metadata = input.metadata;
  return event;
}

export const eventRecordSchema = z.object({
  id: z.string(),
  type: z.enum(EVENT_TYPES),
  text: z.string().optional(),
  session_id: z.string().optional(),
  run_id: z.string().optional(),
  timestamp: z.string(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export type EventRecord = z.infer<typeof eventRecordSchema>;

export function toEventRecord(event: MemoryEvent): EventRecord {
  return {
    id: event.id,
    type: event.type,
    ...(event.text ? { text: event.text } : {}),
    ...(event.sessionId ? { session_id: event.sessionId } : {}),
    ...(event.runId ? { run_id: event.runId } : {}),
    timestamp: event.timestamp,
    ...(event.metadata ? { metadata: event.metadata } : {}),
  };
}

export function fromEventRecord(record: EventRecord): MemoryEvent {
  return normalizeEvent({
    id: record.id,
    type: record.type,
    text: record.text,
    sessionId: record.session_id,
    runId: record.run_id,
    timestamp: record.timestamp,
    metadata: record.metadata,
  });
}

export function serializeEvent(event: MemoryEvent): string {
  return `${JSON.stringify(toEventRecord(event))}\n`;
}

/** `YYYY-MM-DD` of the event's UTC calendar day. */
export function dayKey(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/** Synchronous-order append: open, write, fsync, close. */
export async function appendEvent(agentsDir: string, agentId: string, input: EventInput): Promise<MemoryEvent> {
  const { eventsDir } = agentPaths(agentsDir, agentId);
  const event = normalizeEvent(input);
  await mkdir(eventsDir, { recursive: true, mode: DEFAULT_DIR_MODE });

  const handle = await open(join(eventsDir, `${dayKey(event.timestamp)}.jsonl`), "a", DEFAULT_FILE_MODE);
  try {
    await handle.write(serializeEvent(event));
    await handle.sync();
  } finally {
    await handle.close();
  }
  return event;
}

function parseLine(line: string): MemoryEvent | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  try {
    const parsed = eventRecordSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? fromEventRecord(parsed.data) : null;
  } catch {
    return null;
  }
}

/**
 * Streams events from the daily partitions on or after `sinceDay`, oldest
 * partition first, one line at a time. Unparseable lines are skipped.
 */
export async function* iterateEvents(agentsDir: string, agentId: string, sinceDay = ""): AsyncGenerator<MemoryEvent> {
  const { eventsDir } = agentPaths(agentsDir, agentId);
  let names: string[];
  try {
    names = await readdir(eventsDir);
  } catch (error) {
    if (isNotFound(error)) return;
    throw error;
  }

  const partitions = names
    .filter((name) => name.endsWith(".jsonl") && name.slice(0, -".jsonl".length) >= sinceDay)
    .sort();

  for (const name of partitions) {
    const lines = createInterface({
      input: createReadStream(join(eventsDir, name), { encoding: "utf8" }),
      crlfDelay: Infinity,
    });
    try {
      for await (const line of lines) {
        const event = parseLine(line);
        if (event) yield event;
      }
    } finally {
      lines.close();
    }
  }
}

export interface ReadEventsOptions {
  max?: number;
  exclude?: readonly EventType[];
}

/** Events strictly after `since`, keeping the most recent `max`, oldest first. */
export async function readEventsSince(
  agentsDir: string,
  agentId: string,
  since: Date,
  options: ReadEventsOptions = {},
): Promise<MemoryEvent[]> {
  const max = options.max && options.max > 0 ? Math.trunc(options.max) : DEFAULT_READ_MAX;
  const exclude = new Set<EventType>(options.exclude ?? []);
  const sinceMs = since.getTime();
  const sinceDay = sinceMs > 0 ? since.toISOString().slice(0, 10) : "";

  const out: MemoryEvent[] = [];
  for await (const event of iterateEvents(agentsDir, agentId, sinceDay)) {
    if (exclude.has(event.type)) continue;
    if (sinceMs > 0 && new Date(event.timestamp).getTime() <= sinceMs) continue;
    out.push(event);
    if (out.length > max) out.shift();
  }
  return out;
}
