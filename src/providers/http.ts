import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { OpenAICompatibleProvider } from "@ai-sdk/openai-compatible";

import { MemoryError } from "../errors";
import type { ResolvedEndpoint } from "../settings";

export type FetchLike = typeof globalThis.fetch;

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

async function readLimited(response: Response, maxBytes: number): Promise<Uint8Array> {
  const declared = Number(response.headers.get("content-length") ?? "");
  if (Number.isFinite(declared) && declared > maxBytes) {
    await response.body?.cancel();
    throw new MemoryError("transport_failure", `response body exceeds ${maxBytes} bytes`, {
      code: "response_too_large",
    });
  }
  if (!response.body) return new Uint8Array();

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const chunk: Uint8Array = value;
    total += chunk.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new MemoryError("transport_failure", `response body exceeds ${maxBytes} bytes`, {
        code: "response_too_large",
      });
    }
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

/** Wraps fetch so that response bodies larger than `maxBytes` fail the call. */
export function limitedFetch(maxBytes: number, base: FetchLike = globalThis.fetch): FetchLike {
  return async (input, init) => {
    const response = await base(input, init);
    const body = await readLimited(response, maxBytes);
    return new Response(NULL_BODY_STATUSES.has(response.status) ? null : body, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  };
}

/**
 * Runs `task` with a signal that aborts after `timeoutMs` or when the caller's
 * signal aborts, whichever comes first.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  signal: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const forward = () => controller.abort(signal?.reason);
  if (signal?.aborted) controller.abort(signal.reason);
  signal?.addEventListener("abort", forward, { once: true });

  try {
    return await task(controller.signal);
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", forward);
  }
}

export function createProvider(
  name: string,
  endpoint: ResolvedEndpoint,
  maxResponseBytes: number,
  fetchImpl?: FetchLike,
): OpenAICompatibleProvider {
  return createOpenAICompatible({
    name,
    baseURL: endpoint.baseUrl,
    apiKey: endpoint.apiKey,
    headers: endpoint.headers,
    fetch: limitedFetch(maxResponseBytes, fetchImpl),
  });
}
