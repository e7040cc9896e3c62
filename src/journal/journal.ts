import { mkdir, open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { join } from "node:path";

import { MemoryError } from "../errors";
import { DEFAULT_DIR_MODE, DEFAULT_FILE_MODE } from "../fsutil/atomic";
import { logger as rootLogger } from "../logger";
import type { Logger } from "../logger";
import type { Clock, EventInput, MemoryEvent } from "../types";
import { agentPaths, dayKey, normalizeEvent, serializeEvent, validateAgentId } from "./events";

export const DEFAULT_BUFFER_SIZE = 256;

export type IngestOutcome = "ok" | "queue_full" | "closed";

export interface JournalStats {
  droppedEvents: number;
}

export interface JournalOptions {
  enabled?: boolean;
  bufferSize?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Per-agent event journal. Producers enqueue without blocking; one writer
 * drains the bounded queue in arrival order into `<YYYY-MM-DD>.jsonl` files.
 */
export class Journal {
  readonly agentId: string;
  readonly enabled: boolean;
  private readonly eventsDir: string;
  private readonly bufferSize: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  private readonly queue: MemoryEvent[] = [];
  private dropped = 0;
  private closing = false;
  private wake: (() => void) | null = null;
  private writer: Promise<void> = Promise.resolve();
  private firstError: Error | null = null;

  private currentDay = "";
  private file: FileHandle | null = null;

  private constructor(agentId: string, eventsDir: string, options: JournalOptions) {
    this.agentId = agentId;
    this.eventsDir = eventsDir;
    this.enabled = options.enabled ?? true;
    this.bufferSize = options.bufferSize && options.bufferSize > 0 ? Math.trunc(options.bufferSize) : DEFAULT_BUFFER_SIZE;
    this.clock = options.clock ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ component: "journal", agentId });
  }

  static async open(agentsDir: string, agentId: string, options: JournalOptions = {}): Promise<Journal> {
    const id = validateAgentId(agentId);
    const { eventsDir } = agentPaths(agentsDir, id);
    const journal = new Journal(id, eventsDir, options);
    if (journal.enabled) {
      await mkdir(eventsDir, { recursive: true, mode: DEFAULT_DIR_MODE });
      journal.writer = journal.run();
    }
    return journal;
  }

  /**
   * Never blocks. Throws an `invalid_input` MemoryError for a timestamp that
   * does not parse; nothing is queued or counted in that case.
   */
  ingest(input: EventInput): IngestOutcome {
    if (!this.enabled) return "ok";
    if (this.closing) return "closed";

    const event = normalizeEvent(input, this.clock());
    if (this.queue.length >= this.bufferSize) {
      this.dropped += 1;
      this.log.debug({ dropped: this.dropped }, "journal queue full, event dropped");
      return "queue_full";
    }
    this.queue.push(event);
    this.signal();
    return "ok";
  }

  stats(): JournalStats {
    return { droppedEvents: this.dropped };
  }

  /** Drains the queue, flushes the open day file, and rejects with the first writer error. */
  async close(): Promise<void> {
    if (!this.enabled) return;
    this.closing = true;
    this.signal();
    await this.writer;
    if (this.firstError) throw this.firstError;
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async run(): Promise<void> {
    for (;;) {
      const event = this.queue.shift();
      if (!event) {
        if (this.closing) break;
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }
      await this.write(event);
    }
    await this.closeFile().catch((error: unknown) => this.capture(error));
  }

  private async write(event: MemoryEvent): Promise<void> {
    try {
      const day = dayKey(event.timestamp);
      let file = this.file;
      if (day !== this.currentDay || !file) {
        await this.closeFile().catch((error: unknown) => this.capture(error));
        file = await open(join(this.eventsDir, `${day}.jsonl`), "a", DEFAULT_FILE_MODE);
        this.file = file;
        this.currentDay = day;
      }
      await file.write(serializeEvent(event));
    } catch (error) {
      this.capture(error);
    }
  }

  private async closeFile(): Promise<void> {
    const file = this.file;
    this.file = null;
    this.currentDay = "";
    if (!file) return;
    try {
      await file.sync();
    } finally {
      await file.close();
    }
  }

  private capture(error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.log.warn({ err }, "journal write failed");
    if (!this.firstError) {
      this.firstError = new MemoryError("storage_failure", `journal write failed: ${err.message}`, { cause: err });
    }
  }
}
