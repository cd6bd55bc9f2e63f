import type { Candidate } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok } from "../errors.js";
import type { Aggregation, Aggregator } from "./index.js";

// Tried in this order; each takes the rest of its line
const ANSWER_MARKERS = ["Answer", "Therefore", "Thus", "So", "The answer is", "Result"].map(
  (label) => new RegExp(`(?:^|\\n)${label}:\\s*([^\\n]*)`, "i")
);

const QUOTED = /"([^"]+)"/;

const TRAILING_PUNCTUATION = /[.,!?;:()[\]{}"']+$/;

/**
 * Pulls the final answer out of free-form model output.
 *
 * 1. the first double-quoted span
 * 2. the text after an `Answer:`, `Therefore:`, `Thus:`, `So:`,
 *    `The answer is:` or `Result:` label at the start of a line
 * 3. the last non-blank line
 *
 * Missing content yields "".
 */
export function extractAnswer(content: string | null): string {
  if (content === null) return "";

  const quoted = QUOTED.exec(content);
  if (quoted?.[1] !== undefined) return quoted[1].trim();

  for (const marker of ANSWER_MARKERS) {
    const answer = marker.exec(content)?.[1]?.trim();
    if (answer) return answer;
  }

  const lines = content.split("\n").filter((line) => line.trim() !== "");
  return lines[lines.length - 1]?.trim() ?? "";
}

/** Case-folds and drops trailing punctuation, so "Paris." and "paris" agree. */
export function normalizeAnswer(answer: string): string {
  return answer.toLowerCase().trim().replace(TRAILING_PUNCTUATION, "").trim();
}

/** Votes per normalized answer. */
export function answerDistribution(candidates: readonly Candidate[]): Record<string, number> {
  const votes: Record<string, number> = {};
  for (const candidate of candidates) {
    const answer = normalizeAnswer(extractAnswer(candidate.content));
    votes[answer] = (votes[answer] ?? 0) + 1;
  }
  return votes;
}

/**
 * Self-consistency vote over extracted, normalized answers. Unlike the
 * exact-content `vote` strategy on GenerationResult, "The answer is: 42"
 * and "Answer: 42." count as the same answer.
 *
 * The most common answer wins, ties going to the answer that appears
 * first; its first candidate is returned. Confidence is the winning
 * share of the votes.
 */
export class MajorityVoteAggregator implements Aggregator {
  readonly name = "majority_vote";

  aggregate(candidates: readonly Candidate[]): Result<Aggregation> {
    const [first] = candidates;
    if (first === undefined) return err("no_candidates");

    const groups = new Map<string, { first: Candidate; votes: number }>();
    for (const candidate of candidates) {
      const answer = normalizeAnswer(extractAnswer(candidate.content));
      const group = groups.get(answer);
      if (group) group.votes++;
      else groups.set(answer, { first: candidate, votes: 1 });
    }

    let winner: { answer: string; first: Candidate; votes: number } | null = null;
    for (const [answer, group] of groups) {
      if (winner === null || group.votes > winner.votes) winner = { answer, ...group };
    }
    if (winner === null) return err("no_candidates");

    return ok({
      winner: winner.first,
      confidence: winner.votes / candidates.length,
      metadata: {
        answer: winner.answer,
        vote_distribution: Object.fromEntries(
          [...groups].map(([answer, group]) => [answer, group.votes])
        ),
        total_votes: candidates.length,
        winning_votes: winner.votes,
      },
    });
  }
}
