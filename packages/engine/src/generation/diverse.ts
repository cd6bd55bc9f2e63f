import type { Candidate } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok } from "../errors.js";
import { isUnitInterval } from "../confidence/index.js";
import { combinedSimilarity } from "../similarity/index.js";

export interface DiverseSelectionOptions {
  /** Relevance vs diversity trade-off: 1 = score only, 0 = diversity only. */
  lambda?: number;
  /** Similarity above which a candidate is treated as a near-duplicate. */
  threshold?: number;
  limit?: number;
}

const DEFAULT_RELEVANCE = 0.5;

const relevance = (candidate: Candidate): number => candidate.score ?? DEFAULT_RELEVANCE;

/**
 * Orders candidates by maximal marginal relevance.
 *
 * Each round picks the remaining candidate maximising
 *
 *   lambda · relevance − (1 − lambda) · penalty
 *
 * where penalty is the highest similarity to anything already picked, at
 * full weight above `threshold` and half weight below it. Ties keep the
 * higher-scored candidate.
 *
 * Every pick compares against every earlier pick, so the cost grows with
 * the square of the candidate count.
 */
export function selectDiverse(
  candidates: readonly Candidate[],
  options: DiverseSelectionOptions = {}
): Result<Candidate[]> {
  const lambda = options.lambda ?? 0.5;
  const threshold = options.threshold ?? 0.7;
  if (!isUnitInterval(lambda)) return err("invalid_lambda");
  if (!isUnitInterval(threshold)) return err("invalid_threshold");

  const limit = Math.min(options.limit ?? candidates.length, candidates.length);

  // Array.prototype.sort is stable, so equal scores keep insertion order
  const remaining = [...candidates].sort((a, b) => relevance(b) - relevance(a));
  const selected: Candidate[] = [];

  while (selected.length < limit && remaining.length > 0) {
    let bestIndex = 0;
    let bestValue = -Infinity;

    remaining.forEach((candidate, index) => {
      const value =
        lambda * relevance(candidate) - (1 - lambda) * penalty(candidate, selected, threshold);
      if (value > bestValue) {
        bestValue = value;
        bestIndex = index;
      }
    });

    selected.push(...remaining.splice(bestIndex, 1));
  }

  return ok(selected);
}

function penalty(candidate: Candidate, selected: readonly Candidate[], threshold: number): number {
  let maxSimilarity = 0;
  for (const other of selected) {
    const similarity = combinedSimilarity(candidate.content ?? "", other.content ?? "", 0.5, 0.5);
    if (similarity > maxSimilarity) maxSimilarity = similarity;
  }
  return maxSimilarity > threshold ? maxSimilarity : maxSimilarity * 0.5;
}
