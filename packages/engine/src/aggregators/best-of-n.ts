import type { Candidate } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok } from "../errors.js";
import type { Aggregation, Aggregator } from "./index.js";

const clamp = (value: number): number => Math.min(Math.max(value, 0), 1);

/**
 * Highest score wins; the earliest candidate keeps a tie. Unscored
 * candidates never win, and a list with no scores at all fails with
 * `no_scores`. Confidence is the winner's score.
 */
export class BestOfNAggregator implements Aggregator {
  readonly name = "best_of_n";

  aggregate(candidates: readonly Candidate[]): Result<Aggregation> {
    const [first] = candidates;
    if (first === undefined) return err("no_candidates");
    if (candidates.length === 1) {
      return ok({ winner: first, confidence: clamp(first.score ?? 1), metadata: {} });
    }

    let best: { candidate: Candidate; score: number } | null = null;
    const distribution: Record<string, number> = {};
    let scored = 0;

    for (const candidate of candidates) {
      const { score } = candidate;
      if (score === null) continue;
      scored++;
      distribution[String(score)] = (distribution[String(score)] ?? 0) + 1;
      if (best === null || score > best.score) best = { candidate, score };
    }

    if (best === null) return err("no_scores");

    return ok({
      winner: best.candidate,
      confidence: clamp(best.score),
      metadata: {
        score_distribution: distribution,
        total_candidates: candidates.length,
        scored_candidates: scored,
      },
    });
  }
}
