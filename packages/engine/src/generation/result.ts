import type { AggregationMethod, Candidate, Metadata } from "../types.js";
import { isAggregationMethod, isPlainRecord } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import {
  candidateFromMap,
  candidateToMap,
  freezeCandidate,
  isCandidate,
} from "../candidate/index.js";

export interface GenerationResultOptions {
  aggregationMethod?: AggregationMethod;
  metadata?: Metadata;
}

// Newest candidate at the head
type CandidateList = { readonly head: Candidate; readonly tail: CandidateList } | null;

interface GenerationState {
  reversed: CandidateList;
  size: number;
  first: Candidate | null;
  totalTokens: number;
  bestCandidate: Candidate | null;
  aggregationMethod: AggregationMethod;
  metadata: Metadata;
}

/** Strict `>` keeps the earlier candidate on ties. */
function pickBest(current: Candidate | null, next: Candidate): Candidate | null {
  if (next.score === null) return current;
  if (current === null || current.score === null) return next;
  return next.score > current.score ? next : current;
}

/**
 * The candidates produced for one query, plus aggregates derived from them.
 *
 * Values are immutable: `addCandidate` returns a new result that shares
 * the existing candidates. Appending is O(1); reading `candidates` is O(n)
 * and always yields insertion order.
 */
export class GenerationResult {
  readonly totalTokens: number;
  readonly bestCandidate: Candidate | null;
  readonly aggregationMethod: AggregationMethod;
  readonly metadata: Metadata;

  private readonly reversed: CandidateList;
  private readonly size: number;
  private readonly first: Candidate | null;

  private constructor(state: GenerationState) {
    this.reversed = state.reversed;
    this.size = state.size;
    this.first = state.first;
    this.totalTokens = state.totalTokens;
    this.bestCandidate = state.bestCandidate;
    this.aggregationMethod = state.aggregationMethod;
    this.metadata = state.metadata;
    Object.freeze(this);
  }

  /** Fails with `invalid_candidates` if any element is not a valid candidate. */
  static create(
    candidates: readonly unknown[] = [],
    options: GenerationResultOptions = {}
  ): Result<GenerationResult> {
    let result = new GenerationResult({
      reversed: null,
      size: 0,
      first: null,
      totalTokens: 0,
      bestCandidate: null,
      aggregationMethod: options.aggregationMethod ?? "none",
      metadata: options.metadata ?? {},
    });

    for (const candidate of candidates) {
      if (!isCandidate(candidate)) return err("invalid_candidates");
      result = result.addCandidate(candidate);
    }

    return ok(result);
  }

  static createOrThrow(
    candidates: readonly unknown[] = [],
    options: GenerationResultOptions = {}
  ): GenerationResult {
    return unwrap(GenerationResult.create(candidates, options), "GenerationResult");
  }

  static fromMap(map: unknown): Result<GenerationResult> {
    if (!isPlainRecord(map)) return err("invalid_map");

    const { candidates, aggregation_method, metadata } = map;
    if (candidates !== undefined && candidates !== null && !Array.isArray(candidates)) {
      return err("invalid_map");
    }
    if (metadata !== undefined && metadata !== null && !isPlainRecord(metadata)) {
      return err("invalid_map");
    }

    const entries: unknown[] = Array.isArray(candidates) ? candidates : [];
    const decoded: Candidate[] = [];
    for (const entry of entries) {
      const candidate = candidateFromMap(entry);
      if (!candidate.ok) return err("invalid_candidate");
      decoded.push(candidate.value);
    }

    // total_tokens and best_candidate are recomputed, never read back
    return GenerationResult.create(decoded, {
      aggregationMethod: isAggregationMethod(aggregation_method) ? aggregation_method : "none",
      metadata: isPlainRecord(metadata) ? metadata : {},
    });
  }

  get candidates(): Candidate[] {
    const ordered = new Array<Candidate>(this.size);
    let node = this.reversed;
    for (let i = this.size - 1; node !== null; i--) {
      ordered[i] = node.head;
      node = node.tail;
    }
    return ordered;
  }

  get length(): number {
    return this.size;
  }

  /** Unfrozen candidates are copied, so later edits by the caller cannot skew the aggregates. */
  addCandidate(added: Candidate): GenerationResult {
    const candidate = freezeCandidate(added);
    return new GenerationResult({
      reversed: { head: candidate, tail: this.reversed },
      size: this.size + 1,
      first: this.first ?? candidate,
      totalTokens: this.totalTokens + (candidate.tokensUsed ?? 0),
      bestCandidate: pickBest(this.bestCandidate, candidate),
      aggregationMethod: this.aggregationMethod,
      metadata: this.metadata,
    });
  }

  /**
   * Picks one candidate.
   *
   * - `best`: highest score, first occurrence on ties
   * - `first` / `last`: by insertion order
   * - `vote`: most common exact content; ties go to the group seen first
   *
   * Anything else falls back to `best`. Voting does not merge near-duplicate
   * answers; "Paris" and "Paris." are separate groups.
   */
  selectByStrategy(strategy: string): Candidate | null {
    switch (strategy) {
      case "first":
        return this.first;
      case "last":
        return this.reversed?.head ?? null;
      case "vote":
        return this.majorityVote();
      default:
        return this.bestCandidate;
    }
  }

  toMap(): Record<string, unknown> {
    return {
      candidates: this.candidates.map(candidateToMap),
      total_tokens: this.totalTokens,
      best_candidate: this.bestCandidate ? candidateToMap(this.bestCandidate) : null,
      aggregation_method: this.aggregationMethod,
      metadata: this.metadata,
    };
  }

  private majorityVote(): Candidate | null {
    const groups = new Map<string | null, { first: Candidate; count: number }>();
    for (const candidate of this.candidates) {
      const group = groups.get(candidate.content);
      if (group) {
        group.count++;
      } else {
        groups.set(candidate.content, { first: candidate, count: 1 });
      }
    }

    let winner: { first: Candidate; count: number } | null = null;
    for (const group of groups.values()) {
      if (winner === null || group.count > winner.count) winner = group;
    }
    return winner?.first ?? null;
  }
}
