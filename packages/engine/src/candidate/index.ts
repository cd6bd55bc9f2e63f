import { randomUUID } from "node:crypto";
import type { Candidate, Metadata } from "../types.js";
import { CandidateMapSchema, CandidateSchema, isPlainRecord } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";

export interface CandidateAttrs {
  id?: string;
  content?: string | null;
  reasoning?: string | null;
  score?: number | null;
  tokensUsed?: number | null;
  model?: string | null;
  timestamp?: Date;
  metadata?: Metadata;
}

/**
 * Builds a candidate, filling in a generated id and the current time
 * when they are not supplied.
 */
export function createCandidate(attrs: CandidateAttrs = {}): Result<Candidate> {
  const parsed = CandidateSchema.safeParse({
    id: attrs.id ?? `candidate_${randomUUID()}`,
    content: attrs.content ?? null,
    reasoning: attrs.reasoning ?? null,
    score: attrs.score ?? null,
    tokensUsed: attrs.tokensUsed ?? null,
    model: attrs.model ?? null,
    timestamp: attrs.timestamp ?? new Date(),
    metadata: attrs.metadata ?? {},
  });

  return parsed.success ? ok(Object.freeze(parsed.data)) : err("invalid_candidate");
}

export function createCandidateOrThrow(attrs: CandidateAttrs = {}): Candidate {
  return unwrap(createCandidate(attrs), "candidate");
}

export function isCandidate(value: unknown): value is Candidate {
  return CandidateSchema.safeParse(value).success;
}

/** Returns a copy with the score replaced. Any number is accepted. */
export function updateScore(candidate: Candidate, score: number | null): Candidate {
  return Object.freeze({ ...candidate, score });
}

/**
 * Returns the candidate itself when already frozen, otherwise a frozen
 * shallow copy. Holders of cached aggregates store only frozen values.
 */
export function freezeCandidate(candidate: Candidate): Candidate {
  return Object.isFrozen(candidate) ? candidate : Object.freeze({ ...candidate });
}

export function candidateToMap(candidate: Candidate): Record<string, unknown> {
  return {
    id: candidate.id,
    content: candidate.content,
    reasoning: candidate.reasoning,
    score: candidate.score,
    tokens_used: candidate.tokensUsed,
    model: candidate.model,
    timestamp: candidate.timestamp.toISOString(),
    metadata: candidate.metadata,
  };
}

export function candidateFromMap(map: unknown): Result<Candidate> {
  if (!isPlainRecord(map)) {
    return err("invalid_candidate");
  }

  const parsed = CandidateMapSchema.safeParse(map);
  if (!parsed.success) {
    return err("invalid_candidate");
  }

  const fields = parsed.data;
  return createCandidate({
    id: fields.id ?? undefined,
    content: fields.content,
    reasoning: fields.reasoning,
    score: fields.score,
    tokensUsed: fields.tokens_used,
    model: fields.model,
    timestamp: fields.timestamp ? new Date(fields.timestamp) : undefined,
    metadata: fields.metadata ?? undefined,
  });
}
