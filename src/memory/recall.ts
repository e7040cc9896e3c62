import type { Embedder } from "../embeddings/provider";
import { throwIfAborted, toMemoryError } from "../errors";
import { logger as rootLogger } from "../logger";
import type { Logger } from "../logger";
import type { RecallResult, SearchParams } from "../types";
import { normalizeSearchParams } from "./normalize";
import { mergeItems } from "./scoring";
import type { ItemStore } from "./store";

export interface RecallOptions {
  embedder?: Embedder | null;
  embeddingsEnabled?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Lexical search, with semantic candidates merged ahead of it when an
 * embedder is available. Any semantic failure degrades to the lexical result.
 */
export async function recall(store: ItemStore, params: SearchParams, options: RecallOptions = {}): Promise<RecallResult> {
  const normalized = normalizeSearchParams(params);
  const lexical = await store.search(normalized, options.signal);

  const embedder = options.embedder ?? null;
  if (!options.embeddingsEnabled || !embedder || !normalized.query) {
    return { items: lexical, mode: "fts", params: normalized };
  }

  try {
    const vector = await embedder.embed(normalized.query, options.signal);
    if (vector.length === 0) return { items: lexical, mode: "fts", params: normalized };

    const semantic = await store.searchByEmbedding(
      vector,
      normalized.limit,
      normalized.minImportance,
      normalized.status,
      options.signal,
    );
    if (semantic.length === 0) return { items: lexical, mode: "fts", params: normalized };

    return {
      items: mergeItems(semantic, lexical, normalized.limit),
      mode: "semantic_hybrid",
      params: normalized,
    };
  } catch (error) {
    throwIfAborted(options.signal);
    (options.logger ?? rootLogger).debug({ err: toMemoryError(error, "transport_failure") }, "semantic recall unavailable");
    return { items: lexical, mode: "fts", params: normalized };
  }
}
