import { appendFileSync, existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it } from "vitest";

import { appendEvent, normalizeEvent, readEventsSince, validateAgentId } from "../src/journal/events";
import { Journal } from "../src/journal/journal";
import { useTempDir } from "./helpers";

const tempDir = useTempDir("journal-");

function eventsDir(root: string, agentId: string): string {
  return join(root, agentId, "memory", "events");
}

function readLines(path: string): string[] {
  return readFileSync(path, "utf8").trim().split("\n");
}

describe("validateAgentId", () => {
  it("rejects empty ids, traversal and path separators", () => {
    for (const bad of ["", "  ", "..", "a/b", "a\\b", "x..y"]) {
      expect(() => validateAgentId(bad)).toThrowError(expect.objectContaining({ kind: "invalid_input" }));
    }
    expect(validateAgentId(" agent-a ")).toBe("agent-a");
  });
});

describe("normalizeEvent", () => {
  it("assigns an id, trims text and drops empty optional fields", () => {
    const now = new Date("2026-03-01T08:00:00.000Z");
    const event = normalizeEvent({ type: "user_message", text: "  hi  ", sessionId: " ", metadata: {} }, now);
    expect(event.id).toMatch(/^evt_[0-9a-f]{32}$/);
    expect(event).toEqual({ id: event.id, type: "user_message", text: "hi", timestamp: "2026-03-01T08:00:00.000Z" });
  });

  it("treats the epoch as an unset timestamp", () => {
    const now = new Date("2026-03-01T08:00:00.000Z");
    expect(normalizeEvent({ type: "error", timestamp: new Date(0) }, now).timestamp).toBe("2026-03-01T08:00:00.000Z");
  });

  it("rejects an unparseable timestamp", () => {
    expect(() => normalizeEvent({ type: "error", timestamp: "yesterday" })).toThrowError(
      expect.objectContaining({ kind: "invalid_input" }),
    );
  });
});

describe("Journal", () => {
  it("writes each UTC day to its own file", async () => {
    const root = tempDir();
    const journal = await Journal.open(root, "a", { bufferSize: 8 });
    expect(journal.ingest({ type: "user_message", text: "u1", timestamp: "2026-02-18T23:59:59Z" })).toBe("ok");
    expect(journal.ingest({ type: "assistant_output", text: "a1", timestamp: "2026-02-19T00:00:01Z" })).toBe("ok");
    await journal.close();

    const dir = eventsDir(root, "a");
    expect(readdirSync(dir).sort()).toEqual(["2026-02-18.jsonl", "2026-02-19.jsonl"]);

    const first = readLines(join(dir, "2026-02-18.jsonl"));
    expect(first).toHaveLength(1);
    expect(JSON.parse(first[0])).toMatchObject({
      type: "user_message",
      text: "u1",
      timestamp: "2026-02-18T23:59:59.000Z",
    });

    const second = readLines(join(dir, "2026-02-19.jsonl"));
    expect(second).toHaveLength(1);
    expect(JSON.parse(second[0])).toMatchObject({ type: "assistant_output", text: "a1" });
    expect(statSync(join(dir, "2026-02-19.jsonl")).mode & 0o777).toBe(0o600);
  });

  it("writes snake_case session and run ids", async () => {
    const root = tempDir();
    const journal = await Journal.open(root, "a");
    journal.ingest({ type: "tool_call", text: "ls", sessionId: "s1", runId: "r1", timestamp: "2026-02-18T10:00:00Z" });
    await journal.close();

    const [line] = readLines(join(eventsDir(root, "a"), "2026-02-18.jsonl"));
    expect(JSON.parse(line)).toMatchObject({ session_id: "s1", run_id: "r1" });
  });

  it("drops events instead of blocking when the buffer is full", async () => {
    const root = tempDir();
    const journal = await Journal.open(root, "a", { bufferSize: 1 });
    const outcomes = Array.from({ length: 5000 }, (_, i) =>
      journal.ingest({ type: "tool_result", text: `r${i}`, timestamp: "2026-02-18T10:00:00Z" }),
    );
    const dropped = outcomes.filter((outcome) => outcome === "queue_full").length;
    const accepted = outcomes.filter((outcome) => outcome === "ok").length;

    expect(dropped).toBeGreaterThanOrEqual(1);
    expect(journal.stats()).toEqual({ droppedEvents: dropped });
    await journal.close();

    const written = readLines(join(eventsDir(root, "a"), "2026-02-18.jsonl"));
    expect(written).toHaveLength(accepted);
    expect(accepted + dropped).toBe(5000);
  });

  it("keeps arrival order", async () => {
    const root = tempDir();
    const journal = await Journal.open(root, "a", { bufferSize: 64 });
    for (let i = 0; i < 20; i += 1) {
      journal.ingest({ type: "user_message", text: `m${i}`, timestamp: "2026-02-18T10:00:00Z" });
    }
    await journal.close();

    const events = await readEventsSince(root, "a", new Date(0), { max: 100 });
    expect(events.map((event) => event.text)).toEqual(Array.from({ length: 20 }, (_, i) => `m${i}`));
  });

  it("rejects an unparseable timestamp without queueing or counting it", async () => {
    const root = tempDir();
    const journal = await Journal.open(root, "a", { bufferSize: 1 });
    expect(() => journal.ingest({ type: "user_message", text: "bad", timestamp: "nope" })).toThrowError(
      expect.objectContaining({ kind: "invalid_input" }),
    );
    expect(journal.ingest({ type: "user_message", text: "good", timestamp: "2026-02-18T10:00:00Z" })).toBe("ok");
    expect(journal.stats()).toEqual({ droppedEvents: 0 });
    await journal.close();

    const events = await readEventsSince(root, "a", new Date(0));
    expect(events.map((event) => event.text)).toEqual(["good"]);
  });

  it("reports closed after close", async () => {
    const root = tempDir();
    const journal = await Journal.open(root, "a");
    await journal.close();
    expect(journal.ingest({ type: "user_message", text: "late" })).toBe("closed");
    await expect(journal.close()).resolves.toBeUndefined();
  });

  it("does nothing when disabled", async () => {
    const root = tempDir();
    const journal = await Journal.open(root, "a", { enabled: false });
    expect(journal.ingest({ type: "user_message", text: "ignored" })).toBe("ok");
    await journal.close();
    expect(existsSync(eventsDir(root, "a"))).toBe(false);
  });

  it("rejects an invalid agent id", async () => {
    await expect(Journal.open(tempDir(), "../escape")).rejects.toMatchObject({ kind: "invalid_input" });
  });
});

describe("readEventsSince", () => {
  it("returns events strictly after the boundary, oldest first", async () => {
    const root = tempDir();
    await appendEvent(root, "a", { type: "user_message", text: "one", timestamp: "2026-02-17T10:00:00Z" });
    await appendEvent(root, "a", { type: "user_message", text: "two", timestamp: "2026-02-18T10:00:00Z" });
    await appendEvent(root, "a", { type: "user_message", text: "three", timestamp: "2026-02-19T10:00:00Z" });

    const since = new Date("2026-02-17T10:00:00Z");
    expect((await readEventsSince(root, "a", since)).map((event) => event.text)).toEqual(["two", "three"]);
    expect((await readEventsSince(root, "a", since, { max: 1 })).map((event) => event.text)).toEqual(["three"]);
  });

  it("skips unparseable lines and excluded types", async () => {
    const root = tempDir();
    await appendEvent(root, "a", { type: "user_message", text: "kept", timestamp: "2026-02-18T10:00:00Z" });
    appendFileSync(join(eventsDir(root, "a"), "2026-02-18.jsonl"), "not json\n{\"type\":\"unknown\"}\n");
    await appendEvent(root, "a", { type: "checkpoint", text: "{}", timestamp: "2026-02-18T11:00:00Z" });

    const events = await readEventsSince(root, "a", new Date(0), { exclude: ["checkpoint"] });
    expect(events.map((event) => event.text)).toEqual(["kept"]);
  });

  it("returns nothing for an agent without events", async () => {
    expect(await readEventsSince(tempDir(), "nobody", new Date(0))).toEqual([]);
  });
});
