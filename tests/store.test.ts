import { join } from "node:path";
import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";

import type { Embedder } from "../src/embeddings/provider";
import { MemoryError } from "../src/errors";
import { recall } from "../src/memory/recall";
import { ItemStore } from "../src/memory/store";
import type { Clock } from "../src/types";
import { steppingClock, useTempDir } from "./helpers";

const tempDir = useTempDir("store-");
const open: ItemStore[] = [];

afterEach(() => {
  for (const store of open.splice(0)) store.close();
});

function openStore(agentId = "agent-a", clock?: Clock): ItemStore {
  const store = ItemStore.open(join(tempDir(), "memory.db"), agentId, { clock });
  open.push(store);
  return store;
}

function countRows(path: string, sql: string, id: string): number {
  const db = new Database(path, { readonly: true });
  try {
    const row = db.prepare<[string], { count: number }>(sql).get(id);
    return row?.count ?? 0;
  } finally {
    db.close();
  }
}

describe("ItemStore", () => {
  it("finds an item by full-text query and drops it once forgotten", async () => {
    const store = openStore();
    const saved = await store.upsert({
      kind: "preference",
      title: "Tone",
      content: "be concise and proactive",
      importance: 4,
      confidence: 0.9,
    });

    const first = await recall(store, { query: "proactive" });
    expect(first.mode).toBe("fts");
    expect(first.items.map((item) => item.id)).toEqual([saved.id]);

    expect(await store.forget(saved.id)).toBe(true);
    const second = await recall(store, { query: "proactive" });
    expect(second.items).toEqual([]);
  });

  it("returns the stored record from get", async () => {
    const store = openStore();
    const saved = await store.upsert({ kind: "fact", title: "Editor", content: "uses vim", importance: 2 });
    expect(saved.id).toMatch(/^mem_[0-9a-f]{32}$/);
    expect(await store.get(saved.id)).toEqual(saved);
    expect(await store.get("mem_missing")).toBeNull();
  });

  it("keeps created_at and advances updated_at on a second upsert", async () => {
    const store = openStore("agent-a", steppingClock("2026-03-01T00:00:00.000Z"));
    const first = await store.upsert({ kind: "fact", title: "Editor", content: "uses vim" });
    const second = await store.upsert({ id: first.id, kind: "fact", title: "Editor", content: "uses helix" });

    expect(second.createdAt).toBe("2026-03-01T00:00:00.000Z");
    expect(second.updatedAt).toBe("2026-03-01T00:00:01.000Z");
    expect(second.content).toBe("uses helix");
  });

  it("titles an untitled item after its kind", async () => {
    const store = openStore();
    const saved = await store.upsert({ content: "alpha" });
    expect(saved.kind).toBe("note");
    expect(saved.title).toBe("note");
  });

  it("refuses writes for another agent", async () => {
    const store = openStore("agent-a");
    await expect(store.upsert({ agentId: "agent-b", content: "x" })).rejects.toMatchObject({
      kind: "policy_denied",
    });
  });

  it("fails update for an unknown id", async () => {
    const store = openStore();
    await expect(store.update({ id: "mem_missing", content: "x" })).rejects.toMatchObject({ kind: "not_found" });
  });

  it("reports false when forgetting an archived item", async () => {
    const store = openStore();
    const saved = await store.upsert({ kind: "fact", title: "Editor", content: "uses vim" });
    expect(await store.archive(saved.id)).toBe(true);
    expect(await store.forget(saved.id)).toBe(false);
    expect((await store.get(saved.id))?.status).toBe("archived");
  });

  it("removes index and embedding rows when an item leaves the active state", async () => {
    const store = openStore();
    const saved = await store.upsert({ kind: "fact", title: "Editor", content: "uses vim" });
    await store.upsertEmbedding(saved.id, "test-model", [1, 0]);

    expect(countRows(store.path, "SELECT COUNT(*) AS count FROM memory_fts WHERE id = ?", saved.id)).toBe(1);
    expect(countRows(store.path, "SELECT COUNT(*) AS count FROM memory_embeddings WHERE memory_id = ?", saved.id)).toBe(1);

    await store.forget(saved.id);
    expect(countRows(store.path, "SELECT COUNT(*) AS count FROM memory_fts WHERE id = ?", saved.id)).toBe(0);
    expect(countRows(store.path, "SELECT COUNT(*) AS count FROM memory_embeddings WHERE memory_id = ?", saved.id)).toBe(0);
  });

  it("does not index items written with an inactive status", async () => {
    const store = openStore();
    const saved = await store.upsert({ kind: "fact", title: "Editor", content: "uses vim", status: "archived" });
    expect(countRows(store.path, "SELECT COUNT(*) AS count FROM memory_fts WHERE id = ?", saved.id)).toBe(0);
    await expect(store.upsertEmbedding(saved.id, "test-model", [1, 0])).rejects.toMatchObject({
      kind: "invalid_input",
    });
  });

  it("lists by importance when the query is empty", async () => {
    const store = openStore("agent-a", steppingClock("2026-03-01T00:00:00.000Z"));
    const low = await store.upsert({ title: "low", content: "a", importance: 2 });
    const high = await store.upsert({ title: "high", content: "b", importance: 5 });
    const mid = await store.upsert({ title: "mid", content: "c", importance: 3 });

    const all = await store.search({});
    expect(all.map((item) => item.id)).toEqual([high.id, mid.id, low.id]);

    const important = await store.search({ minImportance: 3 });
    expect(important.map((item) => item.id)).toEqual([high.id, mid.id]);
  });

  it("lists newest first within a status", async () => {
    const store = openStore("agent-a", steppingClock("2026-03-01T00:00:00.000Z"));
    const first = await store.upsert({ title: "one", content: "a" });
    const second = await store.upsert({ title: "two", content: "b" });
    expect((await store.list("active")).map((item) => item.id)).toEqual([second.id, first.id]);
    expect((await store.list("active", 1)).map((item) => item.id)).toEqual([second.id]);
  });

  it("ranks embedding candidates by cosine similarity", async () => {
    const store = openStore();
    const a = await store.upsert({ content: "alpha" });
    const b = await store.upsert({ content: "beta" });
    await store.upsertEmbedding(a.id, "test-model", [1, 0]);
    await store.upsertEmbedding(b.id, "test-model", [0, 1]);

    const ranked = await store.searchByEmbedding([0.9, 0.1], 5, 1, "active");
    expect(ranked.map((item) => item.id)).toEqual([a.id, b.id]);
  });

  it("drops candidates with a non-positive score", async () => {
    const store = openStore();
    const a = await store.upsert({ content: "alpha" });
    const b = await store.upsert({ content: "beta" });
    const c = await store.upsert({ content: "gamma" });
    await store.upsertEmbedding(a.id, "test-model", [1, 0]);
    await store.upsertEmbedding(b.id, "test-model", [0, 1]);
    await store.upsertEmbedding(c.id, "test-model", [-1, 0]);

    const ranked = await store.searchByEmbedding([1, 0]);
    expect(ranked.map((item) => item.id)).toEqual([a.id]);
  });

  it("validates embedding input", async () => {
    const store = openStore();
    const saved = await store.upsert({ content: "alpha" });
    await expect(store.upsertEmbedding(saved.id, "", [1])).rejects.toMatchObject({ kind: "invalid_input" });
    await expect(store.upsertEmbedding(saved.id, "m", [])).rejects.toMatchObject({ kind: "invalid_input" });
    await expect(store.upsertEmbedding(saved.id, "m", [Number.NaN])).rejects.toMatchObject({ kind: "invalid_input" });
    await expect(store.upsertEmbedding("mem_missing", "m", [1])).rejects.toMatchObject({ kind: "not_found" });
  });

  it("reports health counts and embedding statistics", async () => {
    const store = openStore();
    const a = await store.upsert({ content: "alpha" });
    const b = await store.upsert({ content: "beta" });
    const c = await store.upsert({ content: "gamma" });
    await store.upsertEmbedding(a.id, "test-model", [1, 0]);
    await store.upsertEmbedding(b.id, "test-model", [0, 1]);
    await store.forget(b.id);
    await store.archive(c.id);

    const health = await store.health();
    expect(health).toMatchObject({ totalItems: 3, activeItems: 1, forgottenItems: 1, archivedItems: 1 });
    expect(health.dbSizeBytes).toBeGreaterThan(0);

    expect(await store.embeddingStats()).toEqual({
      vectorCount: 1,
      activeVectorCount: 1,
      models: { "test-model": 1 },
    });
  });

  it("compacts without losing data", async () => {
    const store = openStore();
    const saved = await store.upsert({ content: "alpha" });
    await store.vacuum();
    expect((await store.get(saved.id))?.content).toBe("alpha");
  });

  it("stops before touching storage once the signal is aborted", async () => {
    const store = openStore();
    const controller = new AbortController();
    controller.abort();
    await expect(store.upsert({ content: "alpha" }, controller.signal)).rejects.toMatchObject({ kind: "timeout" });
    expect(await store.list("active")).toEqual([]);
  });
});

describe("recall fallbacks", () => {
  async function seeded(): Promise<ItemStore> {
    const store = openStore();
    const saved = await store.upsert({ kind: "preference", title: "Tone", content: "be concise", importance: 4 });
    await store.upsertEmbedding(saved.id, "test-model", [1, 0]);
    return store;
  }

  it("stays lexical when the embedder fails", async () => {
    const store = await seeded();
    const embedder: Embedder = {
      embed: async () => {
        throw new MemoryError("transport_failure", "embedding service unavailable");
      },
      modelId: () => "test-model",
    };

    const result = await recall(store, { query: "concise" }, { embedder, embeddingsEnabled: true });
    expect(result.mode).toBe("fts");
    expect(result.items.map((item) => item.title)).toEqual(["Tone"]);
  });

  it("stays lexical when the embedder returns no vector", async () => {
    const store = await seeded();
    const embedder: Embedder = { embed: async () => [], modelId: () => "test-model" };

    const result = await recall(store, { query: "concise" }, { embedder, embeddingsEnabled: true });
    expect(result.mode).toBe("fts");
    expect(result.items).toHaveLength(1);
  });
});

describe("missing indexes", () => {
  it("reads as empty when the FTS and embedding tables are gone", async () => {
    const store = openStore();
    const saved = await store.upsert({ content: "alpha" });
    await store.upsertEmbedding(saved.id, "test-model", [1, 0]);

    const db = new Database(store.path);
    try {
      db.exec("DROP TABLE memory_fts; DROP TABLE memory_embeddings;");
    } finally {
      db.close();
    }

    expect(await store.search({ query: "alpha" })).toEqual([]);
    expect(await store.searchByEmbedding([1, 0])).toEqual([]);
    expect(await store.embeddingStats()).toEqual({ vectorCount: 0, activeVectorCount: 0, models: {} });
    expect((await store.get(saved.id))?.content).toBe("alpha");
  });
});
