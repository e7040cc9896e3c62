import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach } from "vitest";

import type { Clock, MemoryItem } from "../src/types";

/** A fresh directory per test, removed after it. */
export function useTempDir(prefix = "memory-"): () => string {
  const dirs: string[] = [];
  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });
  return () => {
    const dir = mkdtempSync(join(tmpdir(), prefix));
    dirs.push(dir);
    return dir;
  };
}

/** Returns `start`, then advances by `stepMs` on every call. */
export function steppingClock(start: string, stepMs = 1000): Clock {
  let next = Date.parse(start);
  return () => {
    const now = new Date(next);
    next += stepMs;
    return now;
  };
}

export function fixedClock(at: string): Clock {
  return () => new Date(at);
}

export function makeItem(overrides: Partial<MemoryItem> = {}): MemoryItem {
  return {
    id: "mem_1",
    agentId: "agent-a",
    kind: "fact",
    title: "Title",
    content: "content",
    importance: 3,
    confidence: 0.8,
    status: "active",
    createdAt: "2026-03-01T00:00:00.000Z",
    updatedAt: "2026-03-01T00:00:00.000Z",
    ...overrides,
  };
}
