import { describe, it, expect } from "vitest";
import { selectTopFraction } from "../selection.js";
import type { ScoredItem } from "../types.js";
import { makeItem } from "../testing.js";

function withScores(scores: number[]): ScoredItem[] {
  return scores.map((score, i) => ({ ...makeItem(i), score, reason: "" }));
}

describe("selectTopFraction", () => {
  it("should return nothing for nothing", () => {
    expect(selectTopFraction([])).toEqual([]);
  });

  it("should keep at least three items", () => {
    const selected = selectTopFraction(withScores([10, 90, 40, 70, 20]));
    expect(selected.map((s) => s.score)).toEqual([90, 70, 40]);
  });

  it("should keep every item when there are fewer than three", () => {
    const selected = selectTopFraction(withScores([5, 60]));
    expect(selected.map((s) => s.score)).toEqual([60, 5]);
  });

  it("should keep five percent of a large input, rounded down", () => {
    const scores = Array.from({ length: 139 }, (_, i) => i % 100);
    const selected = selectTopFraction(withScores(scores));

    // floor(139 * 0.05) = 6
    expect(selected.map((s) => s.score)).toEqual([99, 98, 97, 96, 95, 94]);
  });

  it("should keep input order among equal scores", () => {
    const selected = selectTopFraction(withScores([50, 80, 50, 50]));
    expect(selected.map((s) => s.title)).toEqual(["Headline 1", "Headline 0", "Headline 2"]);
  });

  it("should not reorder its input", () => {
    const input = withScores([1, 2, 3]);
    selectTopFraction(input);
    expect(input.map((s) => s.score)).toEqual([1, 2, 3]);
  });
});
