import type { DifficultyEstimate, DifficultyLevel, Metadata } from "../types.js";
import { isDifficultyLevel, isPlainRecord } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import { isUnitInterval } from "../confidence/index.js";
import { EASY_THRESHOLD, HARD_THRESHOLD } from "../thresholds.js";

export interface DifficultyEstimateAttrs {
  level?: DifficultyLevel | null;
  score?: number | null;
  confidence?: number | null;
  reasoning?: string | null;
  features?: Record<string, unknown>;
  metadata?: Metadata;
}

/**
 * Canonical score → level classifier.
 *
 *   score < 0.35         → easy
 *   0.35 ≤ score ≤ 0.65  → medium
 *   score > 0.65         → hard
 *
 * A missing (or NaN) score is "medium". Exposed on its own so estimators
 * can classify without building a full estimate.
 */
export function toLevel(score: number | null | undefined): DifficultyLevel {
  if (typeof score !== "number" || Number.isNaN(score)) return "medium";
  if (score < EASY_THRESHOLD) return "easy";
  if (score <= HARD_THRESHOLD) return "medium";
  return "hard";
}

const isOptionalUnit = (value: unknown): boolean =>
  value === null || value === undefined || isUnitInterval(value);

/**
 * Builds a validated difficulty estimate.
 *
 * When `level` is omitted it is derived from `score`. When both are given
 * the level is kept as supplied, even if the score would classify it
 * differently, so a reviewer can override the classifier.
 */
export function createDifficultyEstimate(
  attrs: DifficultyEstimateAttrs = {}
): Result<DifficultyEstimate> {
  if (!isOptionalUnit(attrs.score)) return err("invalid_score");
  if (!isOptionalUnit(attrs.confidence)) return err("invalid_confidence");

  const given = attrs.level ?? null;
  if (given !== null && !isDifficultyLevel(given)) return err("invalid_level");

  return ok({
    level: given ?? toLevel(attrs.score),
    score: attrs.score ?? null,
    confidence: attrs.confidence ?? null,
    reasoning: attrs.reasoning ?? null,
    features: attrs.features ?? {},
    metadata: attrs.metadata ?? {},
  });
}

export function createDifficultyEstimateOrThrow(
  attrs: DifficultyEstimateAttrs = {}
): DifficultyEstimate {
  return unwrap(createDifficultyEstimate(attrs), "DifficultyEstimate");
}

export const isEasy = (estimate: DifficultyEstimate): boolean => estimate.level === "easy";
export const isMedium = (estimate: DifficultyEstimate): boolean => estimate.level === "medium";
export const isHard = (estimate: DifficultyEstimate): boolean => estimate.level === "hard";

/** Serializes to string keys, omitting null fields and empty records. */
export function difficultyEstimateToMap(
  estimate: DifficultyEstimate
): Record<string, unknown> {
  const map: Record<string, unknown> = { level: estimate.level };
  if (estimate.score !== null) map.score = estimate.score;
  if (estimate.confidence !== null) map.confidence = estimate.confidence;
  if (estimate.reasoning !== null) map.reasoning = estimate.reasoning;
  if (Object.keys(estimate.features).length > 0) map.features = estimate.features;
  if (Object.keys(estimate.metadata).length > 0) map.metadata = estimate.metadata;
  return map;
}

/**
 * Inverse of `difficultyEstimateToMap`.
 *
 * The level label is checked against the closed set before anything else
 * is read; an unknown label fails with `invalid_level` and nothing is
 * built.
 */
export function difficultyEstimateFromMap(map: unknown): Result<DifficultyEstimate> {
  if (!isPlainRecord(map)) return err("invalid_map");

  const rawLevel = map.level;
  if (rawLevel !== undefined && rawLevel !== null && !isDifficultyLevel(rawLevel)) {
    return err("invalid_level");
  }

  const { score, confidence, reasoning, features, metadata } = map;
  if (!isOptionalUnit(score)) return err("invalid_score");
  if (!isOptionalUnit(confidence)) return err("invalid_confidence");
  if (reasoning !== undefined && reasoning !== null && typeof reasoning !== "string") {
    return err("invalid_map");
  }
  if (features !== undefined && features !== null && !isPlainRecord(features)) {
    return err("invalid_map");
  }
  if (metadata !== undefined && metadata !== null && !isPlainRecord(metadata)) {
    return err("invalid_map");
  }

  return createDifficultyEstimate({
    level: isDifficultyLevel(rawLevel) ? rawLevel : null,
    score: typeof score === "number" ? score : null,
    confidence: typeof confidence === "number" ? confidence : null,
    reasoning: typeof reasoning === "string" ? reasoning : null,
    features: isPlainRecord(features) ? features : undefined,
    metadata: isPlainRecord(metadata) ? metadata : undefined,
  });
}
