import { z } from "zod";

/** Open, free-form extension bag carried by every entity. */
export type Metadata = Record<string, unknown>;

// ── Candidate ────────────────────────────────────────────────────

/** Frozen once built; derive a new one with `updateScore` or a spread. */
export interface Candidate {
  readonly id: string;
  readonly content: string | null;
  readonly reasoning: string | null;
  readonly score: number | null;
  readonly tokensUsed: number | null; // non-negative integer
  readonly model: string | null;
  readonly timestamp: Date;
  readonly metadata: Metadata;
}

// ── Confidence ───────────────────────────────────────────────────

export interface ConfidenceEstimate {
  score: number; // 0-1
  method: string;
  calibration: number | null;
  reasoning: string | null;
  tokenLevelConfidence: number[] | null;
  metadata: Metadata;
}

export const CONFIDENCE_LEVELS = ["high", "medium", "low"] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

// ── Difficulty ───────────────────────────────────────────────────

export const DIFFICULTY_LEVELS = ["easy", "medium", "hard"] as const;
export type DifficultyLevel = (typeof DIFFICULTY_LEVELS)[number];

export interface DifficultyEstimate {
  level: DifficultyLevel;
  score: number | null; // 0-1
  confidence: number | null; // 0-1
  reasoning: string | null;
  features: Record<string, unknown>;
  metadata: Metadata;
}

// ── Routing ──────────────────────────────────────────────────────

export const ROUTING_ACTIONS = [
  "direct",
  "with_verification",
  "with_citations",
  "abstain",
  "escalate",
] as const;
export type RoutingAction = (typeof ROUTING_ACTIONS)[number];

export interface RoutingResult {
  action: RoutingAction;
  candidate: Candidate | null; // may be a synthesized replacement
  originalScore: number | null;
  confidenceLevel: ConfidenceLevel | null;
  reasoning: string | null;
  metadata: Metadata;
}

// ── Generation ───────────────────────────────────────────────────

export const SELECTION_STRATEGIES = ["best", "first", "last", "vote"] as const;
export type SelectionStrategy = (typeof SELECTION_STRATEGIES)[number];

export const AGGREGATION_METHODS = [
  "none",
  "best_of_n",
  "majority_vote",
  "weighted",
  "self_consistency",
  "diverse_decoding",
] as const;
export type AggregationMethod = (typeof AGGREGATION_METHODS)[number];

// ── Selective generation ─────────────────────────────────────────

export const DECISIONS = ["answer", "abstain"] as const;
export type Decision = (typeof DECISIONS)[number];

/** Outcome of an expected-value answer/abstain decision. */
export interface DecisionResult {
  decision: Decision;
  candidate: Candidate | null; // the abstention notice when abstaining
  confidence: number | null;
  evAnswer: number;
  evAbstain: number; // always 0
  reasoning: string | null;
  metadata: Metadata;
}

// ── Critique ─────────────────────────────────────────────────────

export interface CritiqueResult {
  issues: string[];
  suggestions: string[];
  severity: number; // 0-1
  feedback: string | null;
  actionable: boolean;
  metadata: Metadata;
}

// ── Closed-set guards ────────────────────────────────────────────

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && (values as readonly string[]).includes(value);
}

export const isRoutingAction = (value: unknown): value is RoutingAction =>
  isOneOf(ROUTING_ACTIONS, value);

export const isConfidenceLevel = (value: unknown): value is ConfidenceLevel =>
  isOneOf(CONFIDENCE_LEVELS, value);

export const isDifficultyLevel = (value: unknown): value is DifficultyLevel =>
  isOneOf(DIFFICULTY_LEVELS, value);

export const isDecision = (value: unknown): value is Decision => isOneOf(DECISIONS, value);

export const isAggregationMethod = (value: unknown): value is AggregationMethod =>
  isOneOf(AGGREGATION_METHODS, value);

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── Zod Schemas (runtime validation of untrusted input) ──────────

const MetadataSchema = z.record(z.unknown());

export const CandidateSchema = z.object({
  id: z.string().min(1),
  content: z.string().nullable(),
  reasoning: z.string().nullable(),
  score: z.number().nullable(),
  tokensUsed: z.number().int().nonnegative().nullable(),
  model: z.string().nullable(),
  timestamp: z.date(),
  metadata: MetadataSchema,
});

/** Wire shape of a candidate (snake_case keys, ISO timestamp). */
export const CandidateMapSchema = z.object({
  id: z.string().min(1).nullish(),
  content: z.string().nullish(),
  reasoning: z.string().nullish(),
  score: z.number().nullish(),
  tokens_used: z.number().int().nonnegative().nullish(),
  model: z.string().nullish(),
  timestamp: z.string().datetime({ offset: true }).nullish(),
  metadata: MetadataSchema.nullish(),
});

export const ConfidenceEstimateMapSchema = z.object({
  score: z.unknown(),
  method: z.unknown(),
  calibration: z.number().nullish(),
  reasoning: z.string().nullish(),
  token_level_confidence: z.array(z.number()).nullish(),
  metadata: MetadataSchema.nullish(),
});

export const CritiqueResultSchema = z.object({
  issues: z.array(z.string()).default([]),
  suggestions: z.array(z.string()).default([]),
  severity: z.number().min(0).max(1),
  feedback: z.string().nullish(),
  metadata: MetadataSchema.optional(),
});

/** Request file accepted by the CLI. */
export const DecisionRequestSchema = z.object({
  query: z.string().min(1),
  candidates: z.array(z.record(z.unknown())),
  strategy: z.enum(SELECTION_STRATEGIES).optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export type DecisionRequest = z.infer<typeof DecisionRequestSchema>;
