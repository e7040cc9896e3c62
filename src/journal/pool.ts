import type { Logger } from "../logger";
import { loadSettings } from "../settings";
import type { JournalStats } from "./journal";
import { Journal } from "./journal";
import { validateAgentId } from "./events";

/** One lazily opened journal per agent, sized from the settings file at open time. */
export class JournalPool {
  private readonly journals = new Map<string, Promise<Journal>>();
  private readonly opened = new Map<string, Journal>();

  constructor(
    private readonly agentsDir: string,
    private readonly settingsPath: string,
    private readonly log: Logger,
  ) {}

  get(agentId: string): Promise<Journal> {
    const id = validateAgentId(agentId);
    let journal = this.journals.get(id);
    if (!journal) {
      journal = this.open(id);
      this.journals.set(id, journal);
      journal.catch(() => this.journals.delete(id));
    }
    return journal;
  }

  stats(): Record<string, JournalStats> {
    return Object.fromEntries([...this.opened].map(([agentId, journal]) => [agentId, journal.stats()]));
  }

  /** Closes every journal; rejects with the first close error after all have been attempted. */
  async closeAll(): Promise<void> {
    const pending = [...this.journals.values()];
    this.journals.clear();
    this.opened.clear();
    const results = await Promise.allSettled(pending.map(async (journal) => (await journal).close()));
    const failed = results.find((result) => result.status === "rejected");
    if (failed && failed.status === "rejected") throw failed.reason;
  }

  private async open(agentId: string): Promise<Journal> {
    const settings = await loadSettings(this.settingsPath);
    const journal = await Journal.open(this.agentsDir, agentId, {
      enabled: settings.memory.enabled,
      bufferSize: settings.memory.bufferSize,
      logger: this.log,
    });
    this.opened.set(agentId, journal);
    return journal;
  }
}
