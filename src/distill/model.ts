import { generateText } from "ai";
import type { LanguageModel } from "ai";

import { toMemoryError } from "../errors";
import type { ProviderOptions } from "../embeddings/provider";
import { createProvider, withTimeout } from "../providers/http";
import { resolveEndpoint } from "../settings";
import type { Settings } from "../settings";

export const DISTILL_TIMEOUT_MS = 45_000;
export const DISTILL_MAX_RESPONSE_BYTES = 2 << 20;
export const DISTILL_MAX_OUTPUT_TOKENS = 1600;

export interface CompletionRequest {
  system: string;
  prompt: string;
}

/** One chat completion round trip; returns the assistant text. */
export interface DistillModel {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

class ChatCompletionModel implements DistillModel {
  constructor(private readonly model: LanguageModel) {}

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    try {
      const result = await withTimeout(DISTILL_TIMEOUT_MS, signal, (abortSignal) =>
        generateText({
          model: this.model,
          system: request.system,
          prompt: request.prompt,
          maxOutputTokens: DISTILL_MAX_OUTPUT_TOKENS,
          maxRetries: 0,
          abortSignal,
        }),
      );
      return result.text;
    } catch (error) {
      throw toMemoryError(error, "transport_failure");
    }
  }
}

/** Returns null when no model provider is configured or it has no usable endpoint. */
export function createDistillModelFromSettings(settings: Settings, options: ProviderOptions = {}): DistillModel | null {
  const providerName = settings.model.provider;
  if (providerName === "none" || !settings.model.name) return null;

  const endpoint = resolveEndpoint(settings, providerName, options.env);
  if (!endpoint) return null;

  const provider = createProvider(providerName, endpoint, DISTILL_MAX_RESPONSE_BYTES, options.fetch);
  return new ChatCompletionModel(provider.chatModel(settings.model.name));
}
