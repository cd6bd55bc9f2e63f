import type { Candidate, Metadata } from "../types.js";
import type { Result } from "../errors.js";

/** The winning candidate and how strongly the aggregation backs it. */
export interface Aggregation {
  winner: Candidate;
  /** 0-1 */
  confidence: number;
  metadata: Metadata;
}

/**
 * Picks one candidate out of many. Every aggregator fails with
 * `no_candidates` on an empty list and returns a lone candidate as is.
 *
 * Adding a new rule (e.g. verifier-weighted) means implementing this
 * interface; `WeightedAggregator` can then mix it with the others.
 */
export interface Aggregator {
  name: string;
  aggregate(candidates: readonly Candidate[]): Result<Aggregation>;
}

export { BestOfNAggregator } from "./best-of-n.js";
export { MajorityVoteAggregator, answerDistribution, extractAnswer, normalizeAnswer } from "./majority-vote.js";
export { WeightedAggregator } from "./weighted.js";
export type { WeightedStrategy } from "./weighted.js";
