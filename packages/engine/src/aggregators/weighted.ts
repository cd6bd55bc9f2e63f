import type { Candidate } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import { logger } from "../logger.js";
import type { Aggregation, Aggregator } from "./index.js";
import { BestOfNAggregator } from "./best-of-n.js";
import { MajorityVoteAggregator } from "./majority-vote.js";

export interface WeightedStrategy {
  aggregator: Aggregator;
  weight: number;
}

/**
 * Mixes several aggregators. Each one picks a winner; every candidate
 * then scores the summed weight of the aggregators that picked it, and
 * the top score wins (earliest candidate on ties). Confidence is that
 * score.
 *
 * Weights are normalized to sum to 1; all-zero weights count as equal.
 * A strategy that fails simply casts no vote. Candidates are matched by
 * id, so a strategy may return a copy of the candidate it picked.
 */
export class WeightedAggregator implements Aggregator {
  readonly name = "weighted";
  private strategies: WeightedStrategy[];

  private constructor(strategies: WeightedStrategy[]) {
    this.strategies = strategies;
  }

  /** Defaults to majority vote and best-of-N at equal weight. */
  static create(strategies?: readonly WeightedStrategy[]): Result<WeightedAggregator> {
    const chosen = strategies ?? [
      { aggregator: new MajorityVoteAggregator(), weight: 0.5 },
      { aggregator: new BestOfNAggregator(), weight: 0.5 },
    ];

    if (chosen.length === 0) return err("no_strategies");
    if (chosen.some(({ weight }) => !Number.isFinite(weight) || weight < 0)) {
      return err("invalid_weights");
    }

    const total = chosen.reduce((sum, { weight }) => sum + weight, 0);
    return ok(
      new WeightedAggregator(
        chosen.map(({ aggregator, weight }) => ({
          aggregator,
          weight: total === 0 ? 1 / chosen.length : weight / total,
        }))
      )
    );
  }

  static createOrThrow(strategies?: readonly WeightedStrategy[]): WeightedAggregator {
    return unwrap(WeightedAggregator.create(strategies), "WeightedAggregator");
  }

  /** Normalized weight per strategy name. */
  get weights(): Record<string, number> {
    return Object.fromEntries(this.strategies.map(({ aggregator, weight }) => [aggregator.name, weight]));
  }

  aggregate(candidates: readonly Candidate[]): Result<Aggregation> {
    const [first] = candidates;
    if (first === undefined) return err("no_candidates");
    if (candidates.length === 1) return ok({ winner: first, confidence: 1, metadata: {} });

    const picks = this.strategies.map(({ aggregator, weight }) => {
      const result = aggregator.aggregate(candidates);
      if (!result.ok) {
        logger.debug(`[aggregate] Strategy "${aggregator.name}" cast no vote: ${result.error}`);
        return { strategy: aggregator.name, weight, selected: null };
      }
      return { strategy: aggregator.name, weight, selected: result.value.winner.id };
    });

    if (picks.every(({ selected }) => selected === null)) return err("aggregation_failed");

    const scores = candidates.map((candidate) =>
      picks.reduce((sum, pick) => (pick.selected === candidate.id ? sum + pick.weight : sum), 0)
    );

    let winnerIndex = 0;
    scores.forEach((score, index) => {
      if (score > (scores[winnerIndex] ?? 0)) winnerIndex = index;
    });

    return ok({
      winner: candidates[winnerIndex] ?? first,
      confidence: scores[winnerIndex] ?? 0,
      metadata: {
        weighted_scores: scores,
        strategy_weights: this.weights,
        strategy_results: picks,
        total_strategies: picks.length,
      },
    });
  }
}
