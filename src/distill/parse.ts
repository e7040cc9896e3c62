import { z } from "zod/v4";

import { MemoryError } from "../errors";
import type { DistillProposal } from "../types";

export const MAX_PROPOSAL_ENTRIES = 200;

const proposedItemSchema = z.strictObject({
  kind: z.string().trim().min(1),
  title: z.string().trim().min(1),
  content: z.string().trim().min(1),
  importance: z.number().int().min(1).max(5),
  confidence: z.number().min(0).max(1),
});

const proposedUpdateSchema = z.strictObject({
  id: z.string().trim().min(1),
  new_content: z.string().trim().min(1),
  confidence: z.number().min(0).max(1),
});

export const proposalSchema = z.strictObject({
  new_items: z.array(proposedItemSchema).max(MAX_PROPOSAL_ENTRIES).nullish(),
  updates: z.array(proposedUpdateSchema).max(MAX_PROPOSAL_ENTRIES).nullish(),
});

function stripFences(text: string): string {
  let out = text.trim();
  if (out.startsWith("```json")) out = out.slice("```json".length);
  else if (out.startsWith("```")) out = out.slice(3);
  out = out.trim();
  if (out.endsWith("```")) out = out.slice(0, -3);
  return out.trim();
}

/** First balanced `{...}` in the text, ignoring braces inside JSON strings. */
export function extractJsonObject(text: string): string {
  const source = stripFences(text);
  const start = source.indexOf("{");
  if (start < 0) throw new MemoryError("parse_failure", "model output contains no JSON object");

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < source.length; i += 1) {
    const ch = source[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth += 1;
    else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return source.slice(start, i + 1);
    }
  }
  throw new MemoryError("parse_failure", "model output contains an unterminated JSON object");
}

export function parseProposal(text: string): DistillProposal {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonObject(text));
  } catch (error) {
    if (error instanceof MemoryError) throw error;
    throw new MemoryError("parse_failure", "model output is not valid JSON", { cause: error });
  }

  const parsed = proposalSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MemoryError("parse_failure", `model output does not match the proposal schema: ${z.prettifyError(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return {
    newItems: parsed.data.new_items ?? [],
    updates: (parsed.data.updates ?? []).map((update) => ({
      id: update.id,
      newContent: update.new_content,
      confidence: update.confidence,
    })),
  };
}
