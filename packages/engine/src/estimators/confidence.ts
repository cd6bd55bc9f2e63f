import type { Candidate, ConfidenceEstimate } from "../types.js";
import type { Result } from "../errors.js";
import { createConfidenceEstimate } from "../confidence/index.js";
import { combinedSimilarity } from "../similarity/index.js";

export interface ConfidenceContext {
  query: string;
  /** Every candidate generated for the query, the scored one included. */
  candidates: readonly Candidate[];
}

/**
 * Produces a confidence estimate for one candidate. The gate only
 * consumes the result, so a model-backed scorer can implement this too.
 */
export interface ConfidenceEstimator {
  name: string;
  estimate(candidate: Candidate, context: ConfidenceContext): Promise<Result<ConfidenceEstimate>>;
}

const NEUTRAL_CONFIDENCE = 0.5;

const clamp = (value: number): number => Math.min(Math.max(value, 0), 1);

/** Trusts the generator's own score. */
export class CandidateScoreConfidence implements ConfidenceEstimator {
  readonly name = "candidate_score";
  private fallback: number;

  /** @param fallback - used when the candidate carries no score */
  constructor(fallback: number = NEUTRAL_CONFIDENCE) {
    this.fallback = fallback;
  }

  async estimate(candidate: Candidate): Promise<Result<ConfidenceEstimate>> {
    const { score } = candidate;
    const hasScore = score !== null && Number.isFinite(score);
    return createConfidenceEstimate({
      score: hasScore ? clamp(score) : this.fallback,
      method: this.name,
      reasoning: hasScore ? null : "Candidate has no score",
    });
  }
}

/**
 * Self-consistency signal: the mean similarity between the candidate and
 * every other candidate for the same query. With nothing to compare
 * against the estimate is neutral.
 */
export class AgreementConfidence implements ConfidenceEstimator {
  readonly name = "agreement";

  async estimate(
    candidate: Candidate,
    context: ConfidenceContext
  ): Promise<Result<ConfidenceEstimate>> {
    const others = context.candidates.filter((other) => other.id !== candidate.id);

    if (others.length === 0) {
      return createConfidenceEstimate({
        score: NEUTRAL_CONFIDENCE,
        method: this.name,
        reasoning: "No other candidates to compare against",
        metadata: { compared: 0 },
      });
    }

    const total = others.reduce(
      (sum, other) =>
        sum + combinedSimilarity(candidate.content ?? "", other.content ?? "", 0.5, 0.5),
      0
    );
    const score = clamp(total / others.length);

    return createConfidenceEstimate({
      score,
      method: this.name,
      reasoning: `Mean similarity ${score.toFixed(3)} across ${others.length} other candidate(s)`,
      metadata: { compared: others.length },
    });
  }
}

/** A score supplied from outside, e.g. by a reviewer or a request file. */
export class FixedConfidence implements ConfidenceEstimator {
  readonly name = "fixed";
  private score: number;

  constructor(score: number) {
    this.score = score;
  }

  async estimate(): Promise<Result<ConfidenceEstimate>> {
    return createConfidenceEstimate({ score: this.score, method: this.name });
  }
}
