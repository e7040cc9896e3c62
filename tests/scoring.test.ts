import { describe, expect, it } from "vitest";

import { cosineSimilarity, mergeItems, vectorNorm } from "../src/memory/scoring";
import { makeItem } from "./helpers";

describe("scoring utilities", () => {
  it("computes the vector norm", () => {
    expect(vectorNorm([3, 4])).toBe(5);
  });

  it("scores identical vectors as 1", () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBeCloseTo(1, 6);
  });

  it("scores orthogonal vectors as 0", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("returns 0 for empty, mismatched and zero-norm vectors", () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it("uses a precomputed norm for the right-hand side", () => {
    expect(cosineSimilarity([2, 0], [3, 0], 3)).toBeCloseTo(1, 6);
  });

  it("merges primary items first, skipping repeated ids, up to the limit", () => {
    const a = makeItem({ id: "a" });
    const b = makeItem({ id: "b" });
    const c = makeItem({ id: "c" });
    expect(mergeItems([b, a], [a, c], 8).map((item) => item.id)).toEqual(["b", "a", "c"]);
    expect(mergeItems([b, a], [c], 2).map((item) => item.id)).toEqual(["b", "a"]);
  });
});
