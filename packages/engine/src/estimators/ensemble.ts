import type { DifficultyEstimate, DifficultyLevel, Metadata } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import { logger } from "../logger.js";
import type { DifficultyEstimator } from "../difficulty/estimator.js";
import { createDifficultyEstimate, toLevel } from "../difficulty/index.js";

export const ENSEMBLE_COMBINATIONS = [
  "weighted_average",
  "majority_vote",
  "max_confidence",
  "average",
] as const;
export type EnsembleCombination = (typeof ENSEMBLE_COMBINATIONS)[number];

export interface EnsembleDifficultyOptions {
  estimators: readonly DifficultyEstimator[];
  /** One per estimator; normalized over the estimators that succeed. */
  weights?: readonly number[];
  combination?: EnsembleCombination;
  /** Consulted only when every estimator fails. */
  fallback?: DifficultyEstimator;
  /** Per estimator, in ms. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

// Stand-in for an estimate that carries no score or confidence
const NEUTRAL = 0.5;

const clamp = (value: number): number => Math.min(Math.max(value, 0), 1);
const percent = (value: number): string => `${(value * 100).toFixed(1)}%`;
const mean = (values: readonly number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

interface Weighted {
  estimate: DifficultyEstimate;
  weight: number;
}

function withTimeout<T>(work: Promise<Result<T>>, ms: number): Promise<Result<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<Result<T>>((resolve) => {
    timer = setTimeout(() => resolve(err("estimator_timeout")), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Runs several difficulty estimators in parallel and merges what they say.
 *
 * | combination      | level                | score                    | confidence            |
 * |------------------|----------------------|--------------------------|-----------------------|
 * | weighted_average | from score           | Σ weight·score           | Σ weight·confidence   |
 * | majority_vote    | most votes           | mean of the winners      | winning share of votes|
 * | max_confidence   | that estimate's      | that estimate's          | highest confidence    |
 * | average          | from score           | mean score               | mean confidence       |
 *
 * Estimators that fail or time out are logged and left out. When none
 * succeed the result is `invalid_query` if every one rejected the query,
 * otherwise the fallback's estimate or `all_estimators_failed`.
 */
export class EnsembleDifficultyEstimator implements DifficultyEstimator {
  readonly name = "ensemble";
  readonly combination: EnsembleCombination;
  private estimators: readonly DifficultyEstimator[];
  private weights: readonly number[];
  private fallback: DifficultyEstimator | null;
  private timeoutMs: number;

  private constructor(options: EnsembleDifficultyOptions) {
    this.estimators = options.estimators;
    this.weights = options.weights ?? options.estimators.map(() => 1);
    this.combination = options.combination ?? "weighted_average";
    this.fallback = options.fallback ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  static create(options: EnsembleDifficultyOptions): Result<EnsembleDifficultyEstimator> {
    if (options.estimators.length === 0) return err("estimators_required");

    const { weights } = options;
    if (weights !== undefined) {
      if (weights.length !== options.estimators.length) return err("weights_length_mismatch");
      if (weights.some((w) => !Number.isFinite(w) || w < 0)) return err("invalid_weights");
    }

    const combination = options.combination ?? "weighted_average";
    if (!ENSEMBLE_COMBINATIONS.includes(combination)) return err("invalid_combination");

    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) return err("invalid_timeout");

    return ok(new EnsembleDifficultyEstimator(options));
  }

  static createOrThrow(options: EnsembleDifficultyOptions): EnsembleDifficultyEstimator {
    return unwrap(EnsembleDifficultyEstimator.create(options), "EnsembleDifficultyEstimator");
  }

  async estimate(query: string, context: Metadata = {}): Promise<Result<DifficultyEstimate>> {
    const settled = await Promise.allSettled(
      this.estimators.map((estimator) =>
        withTimeout(estimator.estimate(query, context), this.timeoutMs)
      )
    );

    const succeeded: Weighted[] = [];
    let allRejectedQuery = true;

    settled.forEach((outcome, index) => {
      const name = this.estimators[index]?.name ?? String(index);
      if (outcome.status === "rejected") {
        allRejectedQuery = false;
        logger.warn(`[difficulty] Ensemble member "${name}" threw: ${String(outcome.reason)}`);
      } else if (!outcome.value.ok) {
        if (outcome.value.error !== "invalid_query") allRejectedQuery = false;
        logger.warn(`[difficulty] Ensemble member "${name}" failed: ${outcome.value.error}`);
      } else {
        succeeded.push({ estimate: outcome.value.value, weight: this.weights[index] ?? 1 });
      }
    });

    if (succeeded.length === 0) {
      if (allRejectedQuery) return err("invalid_query");
      return this.tryFallback(query, context);
    }

    switch (this.combination) {
      case "weighted_average":
        return combineWeighted(succeeded);
      case "majority_vote":
        return combineVote(succeeded.map(({ estimate }) => estimate));
      case "max_confidence":
        return combineMaxConfidence(succeeded.map(({ estimate }) => estimate));
      case "average":
        return combineAverage(succeeded.map(({ estimate }) => estimate));
    }
  }

  /** One query at a time; stops at the first failure. */
  async estimateBatch(
    queries: readonly string[],
    context: Metadata = {}
  ): Promise<Result<DifficultyEstimate[]>> {
    const estimates: DifficultyEstimate[] = [];
    for (const query of queries) {
      const result = await this.estimate(query, context);
      if (!result.ok) return result;
      estimates.push(result.value);
    }
    return ok(estimates);
  }

  private async tryFallback(query: string, context: Metadata): Promise<Result<DifficultyEstimate>> {
    if (this.fallback === null) return err("all_estimators_failed");

    const result = await this.fallback.estimate(query, context);
    if (!result.ok) return err("all_estimators_failed");
    return ok({
      ...result.value,
      metadata: { ...result.value.metadata, ensemble_fallback: true },
    });
  }
}

function combineWeighted(members: readonly Weighted[]): Result<DifficultyEstimate> {
  const total = members.reduce((sum, { weight }) => sum + weight, 0);
  const normalized = members.map(({ estimate, weight }) => ({
    estimate,
    weight: total === 0 ? 1 / members.length : weight / total,
  }));

  let score = 0;
  let confidence = 0;
  for (const { estimate, weight } of normalized) {
    score += (estimate.score ?? NEUTRAL) * weight;
    confidence += (estimate.confidence ?? NEUTRAL) * weight;
  }
  score = clamp(score);

  const contributions = normalized
    .map(
      ({ estimate, weight }) =>
        `${estimate.level} (${percent(estimate.confidence ?? NEUTRAL)}, weight: ${weight.toFixed(2)})`
    )
    .join(", ");

  return createDifficultyEstimate({
    level: toLevel(score),
    score,
    confidence: clamp(confidence),
    reasoning: `Ensemble of ${members.length} estimators: ${contributions}`,
    features: { levels: normalized.map(({ estimate }) => estimate.level) },
    metadata: {
      ensemble: true,
      combination: "weighted_average",
      num_estimators: members.length,
      individual_scores: normalized.map(({ estimate }) => estimate.score),
      individual_confidences: normalized.map(({ estimate }) => estimate.confidence),
    },
  });
}

function combineVote(estimates: readonly DifficultyEstimate[]): Result<DifficultyEstimate> {
  const votes: Record<DifficultyLevel, number> = { easy: 0, medium: 0, hard: 0 };
  let winner: DifficultyLevel | null = null;

  // Walk in estimator order so a tie goes to the level voted first
  for (const { level } of estimates) {
    votes[level]++;
    if (winner === null || votes[level] > votes[winner]) winner = level;
  }
  if (winner === null) return err("all_estimators_failed");

  const count = votes[winner];
  const agreement = count / estimates.length;
  const scores = estimates
    .filter((estimate) => estimate.level === winner)
    .map((estimate) => estimate.score)
    .filter((score): score is number => score !== null);

  return createDifficultyEstimate({
    level: winner,
    score: scores.length > 0 ? clamp(mean(scores)) : null,
    confidence: agreement,
    reasoning: `Majority vote: ${winner} (${count}/${estimates.length} = ${percent(agreement)})`,
    features: { vote_distribution: { ...votes }, agreement },
    metadata: {
      ensemble: true,
      combination: "majority_vote",
      num_estimators: estimates.length,
    },
  });
}

function combineMaxConfidence(estimates: readonly DifficultyEstimate[]): Result<DifficultyEstimate> {
  let best: DifficultyEstimate | null = null;
  for (const estimate of estimates) {
    if (best === null || (estimate.confidence ?? 0) > (best.confidence ?? 0)) best = estimate;
  }
  if (best === null) return err("all_estimators_failed");

  return ok({
    ...best,
    reasoning: `Selected estimate with highest confidence (${percent(best.confidence ?? 0)}).`,
    metadata: { ...best.metadata, ensemble: true },
  });
}

function combineAverage(estimates: readonly DifficultyEstimate[]): Result<DifficultyEstimate> {
  const scores = estimates.map((estimate) => estimate.score ?? NEUTRAL);
  const score = clamp(mean(scores));

  return createDifficultyEstimate({
    level: toLevel(score),
    score,
    confidence: clamp(mean(estimates.map((estimate) => estimate.confidence ?? NEUTRAL))),
    reasoning: `Average of ${estimates.length} difficulty estimates.`,
    features: {
      num_estimators: estimates.length,
      score_range: [Math.min(...scores), Math.max(...scores)],
    },
    metadata: { ensemble: true, combination: "average", num_estimators: estimates.length },
  });
}
