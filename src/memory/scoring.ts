import type { MemoryItem } from "../types";

export function vectorNorm(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) sum += value * value;
  return Math.sqrt(sum);
}

/** 0 for empty or mismatched vectors, or when either side has zero norm. */
export function cosineSimilarity(a: readonly number[], b: readonly number[], bNorm?: number): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  const aNorm = vectorNorm(a);
  const rightNorm = bNorm ?? vectorNorm(b);
  if (aNorm === 0 || rightNorm === 0) return 0;

  let dot = 0;
  for (let i = 0; i < a.length; i += 1) dot += a[i] * b[i];
  return dot / (aNorm * rightNorm);
}

/** Primary items first, then secondary, skipping ids already taken, up to `limit`. */
export function mergeItems(primary: MemoryItem[], secondary: MemoryItem[], limit: number): MemoryItem[] {
  const out: MemoryItem[] = [];
  const seen = new Set<string>();
  for (const item of [...primary, ...secondary]) {
    if (out.length >= limit) break;
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    out.push(item);
  }
  return out;
}
