import { describe, it, expect } from "vitest";
import { selectDiverse } from "../src/generation/diverse.js";
import { createCandidateOrThrow } from "../src/candidate/index.js";
import type { Candidate } from "../src/types.js";

const paris = createCandidateOrThrow({
  id: "paris",
  content: "Paris is the capital of France",
  score: 0.9,
});
// Near-duplicate of `paris`
const parisAgain = createCandidateOrThrow({
  id: "paris-again",
  content: "Paris is the capital of France.",
  score: 0.85,
});
const lyon = createCandidateOrThrow({
  id: "lyon",
  content: "Lyon is a large city in France",
  score: 0.6,
});

const ids = (candidates: Candidate[]) => candidates.map((c) => c.id);

describe("selectDiverse", () => {
  it("pushes near-duplicates behind distinct answers", () => {
    const result = selectDiverse([parisAgain, lyon, paris]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(ids(result.value)).toEqual(["paris", "lyon", "paris-again"]);
  });

  it("orders purely by score when lambda is 1", () => {
    const result = selectDiverse([lyon, parisAgain, paris], { lambda: 1 });
    expect(result.ok && ids(result.value)).toEqual(["paris", "paris-again", "lyon"]);
  });

  it("stops at the limit", () => {
    const result = selectDiverse([paris, parisAgain, lyon], { limit: 2 });
    expect(result.ok && ids(result.value)).toEqual(["paris", "lyon"]);
  });

  it("treats a missing score as 0.5", () => {
    const unscored = createCandidateOrThrow({ id: "unscored", content: "Maybe Marseille" });
    const scored = createCandidateOrThrow({ id: "scored", content: "Paris", score: 0.6 });

    const result = selectDiverse([unscored, scored], { lambda: 1 });
    expect(result.ok && ids(result.value)).toEqual(["scored", "unscored"]);
  });

  it("returns an empty list for no candidates", () => {
    expect(selectDiverse([])).toEqual({ ok: true, value: [] });
  });

  it("validates lambda and threshold", () => {
    expect(selectDiverse([paris], { lambda: 1.5 })).toEqual({ ok: false, error: "invalid_lambda" });
    expect(selectDiverse([paris], { threshold: -0.1 })).toEqual({
      ok: false,
      error: "invalid_threshold",
    });
  });
});
