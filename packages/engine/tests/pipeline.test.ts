import { describe, it, expect } from "vitest";
import { runDecision } from "../src/pipeline/index.js";
import type { DecisionConfig, DecisionStage } from "../src/pipeline/index.js";
import { CalibrationGate } from "../src/routing/gate.js";
import { GenerationResult } from "../src/generation/result.js";
import { HeuristicDifficultyEstimator } from "../src/estimators/heuristic.js";
import { AgreementConfidence, FixedConfidence } from "../src/estimators/confidence.js";
import { createCandidateOrThrow } from "../src/candidate/index.js";
import { AccuracyError } from "../src/errors.js";
import { BestOfNAggregator, MajorityVoteAggregator } from "../src/aggregators/index.js";

/**
 * Integration tests for the decision pipeline. Estimators are the real
 * in-process ones, so no stubs are needed.
 */

const query = "What is the capital of France?";

const generation = GenerationResult.createOrThrow([
  createCandidateOrThrow({ id: "a", content: "Paris", score: 0.6, tokensUsed: 3 }),
  createCandidateOrThrow({ id: "b", content: "Paris", score: 0.9, tokensUsed: 3 }),
  createCandidateOrThrow({ id: "c", content: "Lyon", score: 0.3, tokensUsed: 3 }),
]);

function buildConfig(overrides: Partial<DecisionConfig> = {}): DecisionConfig {
  return {
    gate: CalibrationGate.createOrThrow({ emitTelemetry: false }),
    confidenceEstimator: new FixedConfidence(0.9),
    ...overrides,
  };
}

describe("runDecision", () => {
  it("answers directly at high confidence", async () => {
    const transcript = await runDecision(query, generation, buildConfig());

    expect(transcript.query).toBe(query);
    expect(transcript.difficulty).toBeNull();
    expect(transcript.selected?.id).toBe("b");
    expect(transcript.confidence.score).toBe(0.9);
    expect(transcript.routing.action).toBe("direct");
    expect(transcript.routing.candidate).toBe(transcript.selected);
    expect(transcript.executedAt).toBeInstanceOf(Date);
    expect(transcript.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("uses the configured selection strategy", async () => {
    const transcript = await runDecision(query, generation, buildConfig({ strategy: "first" }));
    expect(transcript.selected?.id).toBe("a");
  });

  it("selects with an aggregator in place of the strategy", async () => {
    const stages: string[] = [];
    const transcript = await runDecision(
      query,
      generation,
      buildConfig({
        strategy: "best",
        aggregator: new MajorityVoteAggregator(),
        onProgress: (stage, detail) => stages.push(`${stage}: ${detail}`),
      })
    );

    expect(transcript.selected?.id).toBe("a");
    expect(stages[0]).toBe('selection: Selecting from 3 candidate(s) by "majority_vote"...');
  });

  it("fails with AccuracyError when the aggregator fails", async () => {
    const unscored = GenerationResult.createOrThrow([
      createCandidateOrThrow({ id: "x", content: "Paris" }),
      createCandidateOrThrow({ id: "y", content: "Lyon" }),
    ]);
    const run = runDecision(query, unscored, buildConfig({ aggregator: new BestOfNAggregator() }));

    await expect(run).rejects.toThrow("Invalid aggregation: no_scores");
  });

  it("gates on agreement between candidates", async () => {
    // "Paris" matches "Paris" (1.0) and shares no token or letter with "Lyon" (0.0)
    const transcript = await runDecision(
      query,
      generation,
      buildConfig({ strategy: "vote", confidenceEstimator: new AgreementConfidence() })
    );

    expect(transcript.selected?.id).toBe("a");
    expect(transcript.confidence.score).toBe(0.5);
    expect(transcript.routing.action).toBe("with_verification");
  });

  it("records the difficulty when an estimator is configured", async () => {
    const transcript = await runDecision(
      query,
      generation,
      buildConfig({ difficultyEstimator: HeuristicDifficultyEstimator.createOrThrow() })
    );

    expect(transcript.difficulty?.level).toBe("easy");
  });

  it("abstains when there is no candidate", async () => {
    const transcript = await runDecision(query, GenerationResult.createOrThrow(), buildConfig());

    expect(transcript.selected).toBeNull();
    expect(transcript.confidence.score).toBe(0);
    expect(transcript.confidence.method).toBe("no_candidate");
    expect(transcript.routing.action).toBe("abstain");
    expect(transcript.routing.candidate?.metadata).toEqual({
      abstained: true,
      original_confidence: 0,
    });
  });

  it("reports every stage in order", async () => {
    const stages: DecisionStage[] = [];
    await runDecision(
      query,
      generation,
      buildConfig({
        difficultyEstimator: HeuristicDifficultyEstimator.createOrThrow(),
        onProgress: (stage) => stages.push(stage),
      })
    );

    expect([...new Set(stages)]).toEqual([
      "difficulty",
      "selection",
      "confidence",
      "routing",
      "complete",
    ]);
  });

  it("fails with AccuracyError when an estimator fails", async () => {
    const run = runDecision(
      "   ",
      generation,
      buildConfig({ difficultyEstimator: HeuristicDifficultyEstimator.createOrThrow() })
    );

    await expect(run).rejects.toThrow(AccuracyError);
    await expect(run).rejects.toThrow("Invalid difficulty estimate: invalid_query");
  });

  it("fails when the confidence estimate is invalid", async () => {
    const run = runDecision(query, generation, buildConfig({ confidenceEstimator: new FixedConfidence(3) }));
    await expect(run).rejects.toThrow("Invalid confidence estimate: invalid_score");
  });
});
