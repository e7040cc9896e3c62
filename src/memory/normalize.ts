import type { MemoryItemInput, MemoryStatus, NormalizedSearchParams, SearchParams } from "../types";
import { MEMORY_STATUSES } from "../types";

export const DEFAULT_SEARCH_LIMIT = 8;
export const MAX_SEARCH_LIMIT = 50;
export const MIN_IMPORTANCE = 1;
export const MAX_IMPORTANCE = 5;
export const DEFAULT_KIND = "note";
export const DEFAULT_CONFIDENCE = 0.7;

export interface NormalizedItemInput {
  id: string;
  agentId: string;
  kind: string;
  title: string;
  content: string;
  importance: number;
  confidence: number;
  status: MemoryStatus;
}

export function normalizeStatus(status: string | undefined): MemoryStatus {
  const value = (status ?? "").trim().toLowerCase();
  return MEMORY_STATUSES.find((candidate) => candidate === value) ?? "active";
}

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Trims text fields and clamps the numeric ones. Non-positive importance and
 * confidence fall back to their defaults rather than to the lower bound.
 */
export function normalizeItem(input: MemoryItemInput): NormalizedItemInput {
  let importance = Math.trunc(finiteOr(input.importance, 0));
  if (importance <= 0) importance = MIN_IMPORTANCE;
  if (importance > MAX_IMPORTANCE) importance = MAX_IMPORTANCE;

  let confidence = finiteOr(input.confidence, 0);
  if (confidence <= 0) confidence = DEFAULT_CONFIDENCE;
  if (confidence > 1) confidence = 1;

  return {
    id: (input.id ?? "").trim(),
    agentId: (input.agentId ?? "").trim(),
    kind: (input.kind ?? "").trim() || DEFAULT_KIND,
    title: (input.title ?? "").trim(),
    content: (input.content ?? "").trim(),
    importance,
    confidence,
    status: normalizeStatus(input.status),
  };
}

export function normalizeSearchParams(params: SearchParams): NormalizedSearchParams {
  let limit = Math.trunc(finiteOr(params.limit, 0));
  if (limit <= 0) limit = DEFAULT_SEARCH_LIMIT;
  if (limit > MAX_SEARCH_LIMIT) limit = MAX_SEARCH_LIMIT;

  let minImportance = Math.trunc(finiteOr(params.minImportance, 0));
  if (minImportance <= 0) minImportance = MIN_IMPORTANCE;
  if (minImportance > MAX_IMPORTANCE) minImportance = MAX_IMPORTANCE;

  return {
    query: (params.query ?? "").trim(),
    limit,
    minImportance,
    status: normalizeStatus(params.status),
  };
}

/**
 * Builds a conjunctive FTS5 query: every whitespace-separated token quoted,
 * embedded quotes removed, joined with AND.
 */
export function buildFtsQuery(raw: string): string {
  return raw
    .trim()
    .split(/\s+/)
    .map((token) => token.replaceAll('"', "").trim())
    .filter(Boolean)
    .map((token) => `"${token}"`)
    .join(" AND ");
}
