import { throwIfAborted, toMemoryError } from "../errors";
import { toEventRecord } from "../journal/events";
import { logger as rootLogger } from "../logger";
import type { Logger } from "../logger";
import type { DistillationMode, DistillProposal, MemoryEvent } from "../types";
import { fallbackProposal } from "./fallback";
import type { CompletionRequest, DistillModel } from "./model";
import { parseProposal } from "./parse";

export const MAX_DISTILL_EVENTS = 200;

export const DISTILL_SYSTEM_PROMPT =
  'You are a memory distillation engine. Return exactly one JSON object with this schema: {"new_items":[{"kind":string,"title":string,"content":string,"importance":1..5,"confidence":0..1}],"updates":[{"id":string,"new_content":string,"confidence":0..1}]}. Do not include markdown or commentary.';

export interface DistillOutcome {
  mode: DistillationMode;
  proposal: DistillProposal;
  /** Why the fallback ran, when it did. */
  reason?: string;
}

export function buildDistillRequest(events: readonly MemoryEvent[]): CompletionRequest {
  const window = events.slice(-MAX_DISTILL_EVENTS).map(toEventRecord);
  return {
    system: DISTILL_SYSTEM_PROMPT,
    prompt: `Distill the following memory events into strict JSON with keys new_items and updates only.\nEvents JSON:\n${JSON.stringify(window)}`,
  };
}

/**
 * Asks the model for a proposal and falls back to the rule-based one when the
 * model is missing, fails, or answers with something that does not validate.
 * Cancellation by the caller is not recovered.
 */
export async function distill(
  events: readonly MemoryEvent[],
  model: DistillModel | null,
  options: { signal?: AbortSignal; logger?: Logger } = {},
): Promise<DistillOutcome> {
  const log = options.logger ?? rootLogger;
  const window = events.slice(-MAX_DISTILL_EVENTS);

  if (!model) {
    return { mode: "deterministic_fallback", proposal: fallbackProposal(window), reason: "model not configured" };
  }

  try {
    const text = await model.complete(buildDistillRequest(window), options.signal);
    return { mode: "model", proposal: parseProposal(text) };
  } catch (error) {
    throwIfAborted(options.signal);
    const reason = toMemoryError(error, "transport_failure");
    log.warn({ kind: reason.kind, reason: reason.message }, "distillation fell back to deterministic rules");
    return { mode: "deterministic_fallback", proposal: fallbackProposal(window), reason: reason.message };
  }
}
