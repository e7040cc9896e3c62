import { embed } from "ai";
import type { EmbeddingModel } from "ai";

import { MemoryError, toMemoryError } from "../errors";
import { logger as rootLogger } from "../logger";
import type { Logger } from "../logger";
import type { ItemStore } from "../memory/store";
import { createProvider, withTimeout } from "../providers/http";
import type { FetchLike } from "../providers/http";
import { resolveEndpoint } from "../settings";
import type { Settings } from "../settings";
import type { MemoryItem } from "../types";

export const EMBED_TIMEOUT_MS = 30_000;
export const EMBED_MAX_RESPONSE_BYTES = 1 << 20;

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  modelId(): string;
}

export interface ProviderOptions {
  fetch?: FetchLike;
  env?: NodeJS.ProcessEnv;
}

class OpenAICompatibleEmbedder implements Embedder {
  constructor(
    private readonly model: EmbeddingModel<string>,
    private readonly modelName: string,
  ) {}

  modelId(): string {
    return this.modelName;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const normalized = text.trim();
    if (!normalized) throw new MemoryError("invalid_input", "cannot embed empty text");

    try {
      const result = await withTimeout(EMBED_TIMEOUT_MS, signal, (abortSignal) =>
        embed({ model: this.model, value: normalized, maxRetries: 0, abortSignal }),
      );
      if (result.embedding.length === 0) {
        throw new MemoryError("transport_failure", "embedding response contained no vector");
      }
      return result.embedding;
    } catch (error) {
      throw toMemoryError(error, "transport_failure");
    }
  }
}

/**
 * Returns null when embeddings are disabled or the embedding provider has no
 * usable endpoint. The embedding provider defaults to the model provider.
 */
export function createEmbedderFromSettings(settings: Settings, options: ProviderOptions = {}): Embedder | null {
  if (!settings.memory.embeddingsEnabled) return null;
  const providerName = settings.memory.embeddingProvider || settings.model.provider;
  if (providerName === "none") return null;

  const endpoint = resolveEndpoint(settings, providerName, options.env);
  if (!endpoint) return null;

  const provider = createProvider(providerName, endpoint, EMBED_MAX_RESPONSE_BYTES, options.fetch);
  const modelId = settings.memory.embeddingModel;
  return new OpenAICompatibleEmbedder(provider.textEmbeddingModel(modelId), modelId);
}

export function embeddingText(item: Pick<MemoryItem, "title" | "content">): string {
  return `${item.title}\n${item.content}`.trim();
}

/** Best-effort: failures are logged and reported as false, never thrown. */
export async function syncItemEmbedding(
  store: ItemStore,
  embedder: Embedder | null,
  item: MemoryItem,
  options: { signal?: AbortSignal; logger?: Logger } = {},
): Promise<boolean> {
  if (!embedder || item.status !== "active") return false;
  try {
    const vector = await embedder.embed(embeddingText(item), options.signal);
    await store.upsertEmbedding(item.id, embedder.modelId(), vector, options.signal);
    return true;
  } catch (error) {
    (options.logger ?? rootLogger).warn(
      { err: toMemoryError(error, "transport_failure"), itemId: item.id },
      "embedding sync failed",
    );
    return false;
  }
}
