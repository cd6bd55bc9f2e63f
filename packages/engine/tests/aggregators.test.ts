import { describe, it, expect } from "vitest";
import {
  BestOfNAggregator,
  MajorityVoteAggregator,
  WeightedAggregator,
  answerDistribution,
  extractAnswer,
  normalizeAnswer,
} from "../src/aggregators/index.js";
import { createCandidateOrThrow } from "../src/candidate/index.js";
import { GenerationResult } from "../src/generation/result.js";
import type { Candidate } from "../src/types.js";

/**
 * Tests for the candidate aggregators: answer-extracting majority vote,
 * best-of-N and the weighted mix of the two.
 */

function makeCandidate(id: string, content: string | null, score: number | null = null): Candidate {
  return createCandidateOrThrow({ id, content, score });
}

describe("extractAnswer", () => {
  it("reads the text after an answer label", () => {
    expect(extractAnswer("Let me think...\n\nThe answer is: 42")).toBe("42");
    expect(extractAnswer("Step 1: add\nTherefore: 100")).toBe("100");
    expect(extractAnswer("ANSWER: yes")).toBe("yes");
    expect(extractAnswer("Answer:\n7")).toBe("7");
  });

  it("prefers quoted text", () => {
    expect(extractAnswer('The colour is "blue", I think\nAnswer: red')).toBe("blue");
  });

  it("falls back to the last non-blank line", () => {
    expect(extractAnswer("First line\n\n  last line  \n")).toBe("last line");
    expect(extractAnswer("")).toBe("");
    expect(extractAnswer(null)).toBe("");
  });
});

describe("normalizeAnswer", () => {
  it("folds case and drops trailing punctuation", () => {
    expect(normalizeAnswer("  Paris. ")).toBe("paris");
    expect(normalizeAnswer("42!?")).toBe("42");
  });
});

describe("MajorityVoteAggregator", () => {
  const aggregator = new MajorityVoteAggregator();

  it("votes on extracted answers rather than raw content", () => {
    const candidates = [
      makeCandidate("a", "Answer: 41"),
      makeCandidate("b", "Working it out.\n\nThe answer is: 42"),
      makeCandidate("c", "Answer: 42."),
    ];

    const result = aggregator.aggregate(candidates);
    expect(result).toEqual({
      ok: true,
      value: {
        winner: candidates[1],
        confidence: 2 / 3,
        metadata: {
          answer: "42",
          vote_distribution: { "41": 1, "42": 2 },
          total_votes: 3,
          winning_votes: 2,
        },
      },
    });

    // Exact-content voting sees three different answers and keeps the first
    expect(GenerationResult.createOrThrow(candidates).selectByStrategy("vote")?.id).toBe("a");
  });

  it("breaks ties in favour of the answer seen first", () => {
    const result = aggregator.aggregate([makeCandidate("a", "Answer: x"), makeCandidate("b", "Answer: y")]);
    expect(result.ok && result.value.winner.id).toBe("a");
    expect(result.ok && result.value.confidence).toBe(0.5);
  });

  it("returns a lone candidate with full confidence", () => {
    const result = aggregator.aggregate([makeCandidate("a", "Answer: x")]);
    expect(result.ok && result.value.confidence).toBe(1);
  });

  it("fails on an empty list", () => {
    expect(aggregator.aggregate([])).toEqual({ ok: false, error: "no_candidates" });
  });

  it("reports the vote distribution", () => {
    expect(
      answerDistribution([
        makeCandidate("a", "Answer: 42"),
        makeCandidate("b", "Answer: 42"),
        makeCandidate("c", "Answer: 41"),
      ])
    ).toEqual({ "42": 2, "41": 1 });
  });
});

describe("BestOfNAggregator", () => {
  const aggregator = new BestOfNAggregator();

  it("picks the highest score, first on ties", () => {
    const result = aggregator.aggregate([
      makeCandidate("a", "x", 0.7),
      makeCandidate("b", "y", 0.9),
      makeCandidate("c", "z", 0.9),
    ]);

    expect(result).toEqual({
      ok: true,
      value: {
        winner: expect.objectContaining({ id: "b" }),
        confidence: 0.9,
        metadata: {
          score_distribution: { "0.7": 1, "0.9": 2 },
          total_candidates: 3,
          scored_candidates: 3,
        },
      },
    });
  });

  it("skips unscored candidates", () => {
    const result = aggregator.aggregate([makeCandidate("a", "x"), makeCandidate("b", "y", 0.4)]);
    expect(result.ok && result.value.winner.id).toBe("b");
  });

  it("fails when nothing is scored", () => {
    expect(aggregator.aggregate([makeCandidate("a", "x"), makeCandidate("b", "y")])).toEqual({
      ok: false,
      error: "no_scores",
    });
  });
});

describe("WeightedAggregator", () => {
  // Majority vote picks b ("42" twice); best-of-N picks a (0.95)
  const split = [
    makeCandidate("a", "Answer: 41", 0.95),
    makeCandidate("b", "Answer: 42", 0.8),
    makeCandidate("c", "Answer: 42", 0.7),
  ];

  it("gives the earliest candidate an even split", () => {
    const result = WeightedAggregator.createOrThrow().aggregate(split);

    expect(result.ok && result.value.winner.id).toBe("a");
    expect(result.ok && result.value.confidence).toBe(0.5);
    expect(result.ok && result.value.metadata.weighted_scores).toEqual([0.5, 0.5, 0]);
  });

  it("follows the heavier strategy", () => {
    const aggregator = WeightedAggregator.createOrThrow([
      { aggregator: new MajorityVoteAggregator(), weight: 0.6 },
      { aggregator: new BestOfNAggregator(), weight: 0.4 },
    ]);

    const result = aggregator.aggregate(split);
    expect(result.ok && result.value.winner.id).toBe("b");
    expect(result.ok && result.value.confidence).toBe(0.6);
  });

  it("normalizes weights", () => {
    const aggregator = WeightedAggregator.createOrThrow([
      { aggregator: new MajorityVoteAggregator(), weight: 2 },
      { aggregator: new BestOfNAggregator(), weight: 1 },
    ]);

    expect(aggregator.weights).toEqual({ majority_vote: 2 / 3, best_of_n: 1 / 3 });
    const result = aggregator.aggregate(split);
    expect(result.ok && result.value.confidence).toBe(2 / 3);
  });

  it("treats all-zero weights as equal", () => {
    const aggregator = WeightedAggregator.createOrThrow([
      { aggregator: new MajorityVoteAggregator(), weight: 0 },
      { aggregator: new BestOfNAggregator(), weight: 0 },
    ]);
    expect(aggregator.weights).toEqual({ majority_vote: 0.5, best_of_n: 0.5 });
  });

  it("lets a failing strategy abstain", () => {
    const unscored = [
      makeCandidate("a", "Answer: 1"),
      makeCandidate("b", "Answer: 2"),
      makeCandidate("c", "Answer: 2"),
    ];

    const result = WeightedAggregator.createOrThrow().aggregate(unscored);
    expect(result.ok && result.value.winner.id).toBe("b");
    expect(result.ok && result.value.confidence).toBe(0.5);
    expect(result.ok && result.value.metadata.strategy_results).toEqual([
      { strategy: "majority_vote", weight: 0.5, selected: "b" },
      { strategy: "best_of_n", weight: 0.5, selected: null },
    ]);
  });

  it("fails when every strategy fails", () => {
    const aggregator = WeightedAggregator.createOrThrow([
      { aggregator: new BestOfNAggregator(), weight: 1 },
    ]);
    expect(aggregator.aggregate([makeCandidate("a", "x"), makeCandidate("b", "y")])).toEqual({
      ok: false,
      error: "aggregation_failed",
    });
  });

  it("validates its strategies", () => {
    expect(WeightedAggregator.create([])).toEqual({ ok: false, error: "no_strategies" });
    expect(
      WeightedAggregator.create([{ aggregator: new BestOfNAggregator(), weight: -1 }])
    ).toEqual({ ok: false, error: "invalid_weights" });
  });
});
