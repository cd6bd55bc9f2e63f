import type {
  Candidate,
  ConfidenceEstimate,
  DifficultyEstimate,
  RoutingResult,
  SelectionStrategy,
} from "../types.js";
import { unwrap } from "../errors.js";
import { logger } from "../logger.js";
import type { CalibrationGate } from "../routing/gate.js";
import type { GenerationResult } from "../generation/result.js";
import type { DifficultyEstimator } from "../difficulty/estimator.js";
import type { ConfidenceEstimator } from "../estimators/confidence.js";
import type { Aggregator } from "../aggregators/index.js";
import { createCandidateOrThrow } from "../candidate/index.js";
import { createConfidenceEstimateOrThrow } from "../confidence/index.js";

export type DecisionStage = "difficulty" | "selection" | "confidence" | "routing" | "complete";

/**
 * Collaborators for one decision run. Estimators are injected so tests
 * and callers can swap heuristic, fixed or model-backed implementations.
 */
export interface DecisionConfig {
  gate: CalibrationGate;

  confidenceEstimator: ConfidenceEstimator;

  /** Optional; the transcript records `difficulty: null` without one. */
  difficultyEstimator?: DifficultyEstimator;

  /** Defaults to "best". */
  strategy?: SelectionStrategy;

  /** Replaces `strategy` when set, e.g. a MajorityVoteAggregator. */
  aggregator?: Aggregator;

  /** Called at each stage; display is left to the caller. */
  onProgress?: (stage: DecisionStage, detail: string) => void;
}

export interface DecisionTranscript {
  query: string;
  difficulty: DifficultyEstimate | null;
  generation: GenerationResult;
  selected: Candidate | null;
  confidence: ConfidenceEstimate;
  routing: RoutingResult;
  executedAt: Date;
  durationMs: number;
}

/**
 * Decides what to hand back for a query given its generated candidates.
 *
 * Stage 1: DIFFICULTY (optional)
 *   Classify the query. Informational: the caller owns any budget policy.
 *
 * Stage 2: SELECTION
 *   Pick one candidate with the configured aggregator or strategy.
 *
 * Stage 3: CONFIDENCE
 *   Score the selected candidate. With nothing selected an empty
 *   candidate goes forward at confidence 0.
 *
 * Stage 4: ROUTING
 *   The calibration gate answers, annotates, abstains or escalates.
 *
 * An estimator that returns an error aborts the run with an AccuracyError.
 */
export async function runDecision(
  query: string,
  generation: GenerationResult,
  config: DecisionConfig
): Promise<DecisionTranscript> {
  const start = Date.now();
  const progress = (stage: DecisionStage, detail: string): void => {
    logger.debug(`[decision] ${stage}: ${detail}`);
    config.onProgress?.(stage, detail);
  };

  // Stage 1: Difficulty
  let difficulty: DifficultyEstimate | null = null;
  if (config.difficultyEstimator) {
    progress("difficulty", `Estimating difficulty with "${config.difficultyEstimator.name}"...`);
    difficulty = unwrap(await config.difficultyEstimator.estimate(query), "difficulty estimate");
    progress("difficulty", `Difficulty: ${difficulty.level} (${difficulty.score ?? "no score"})`);
  }

  // Stage 2: Selection
  const strategy = config.aggregator?.name ?? config.strategy ?? "best";
  progress("selection", `Selecting from ${generation.length} candidate(s) by "${strategy}"...`);
  let selected: Candidate | null;
  if (config.aggregator && generation.length > 0) {
    selected = unwrap(config.aggregator.aggregate(generation.candidates), "aggregation").winner;
  } else {
    selected = generation.selectByStrategy(config.strategy ?? "best");
  }
  progress("selection", selected ? `Selected ${selected.id}` : "No candidate to select");

  // Stage 3: Confidence
  let confidence: ConfidenceEstimate;
  if (selected) {
    progress("confidence", `Estimating confidence with "${config.confidenceEstimator.name}"...`);
    const estimate = await config.confidenceEstimator.estimate(selected, {
      query,
      candidates: generation.candidates,
    });
    confidence = unwrap(estimate, "confidence estimate");
  } else {
    confidence = createConfidenceEstimateOrThrow({
      score: 0,
      method: "no_candidate",
      reasoning: "No candidate was available",
    });
  }
  progress("confidence", `Confidence: ${confidence.score.toFixed(3)} (${confidence.method})`);

  // Stage 4: Routing
  const routing = config.gate.route(selected ?? createCandidateOrThrow(), confidence);
  progress("routing", routing.reasoning ?? routing.action);

  const transcript: DecisionTranscript = {
    query,
    difficulty,
    generation,
    selected,
    confidence,
    routing,
    executedAt: new Date(),
    durationMs: Date.now() - start,
  };

  progress("complete", `Decision complete in ${transcript.durationMs}ms: ${routing.action}`);

  return transcript;
}
