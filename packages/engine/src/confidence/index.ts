import type { ConfidenceEstimate, ConfidenceLevel, Metadata } from "../types.js";
import { ConfidenceEstimateMapSchema, isPlainRecord } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import {
  CALIBRATION_HIGH_CONFIDENCE,
  CALIBRATION_LOW_CONFIDENCE,
} from "../thresholds.js";

export interface ConfidenceEstimateAttrs {
  score: number;
  method: string;
  calibration?: number | null;
  reasoning?: string | null;
  tokenLevelConfidence?: number[] | null;
  metadata?: Metadata;
}

export function isUnitInterval(value: unknown): value is number {
  return typeof value === "number" && value >= 0 && value <= 1;
}

/**
 * Validates a confidence estimate produced by an external scorer.
 * `score` must lie in [0, 1] and `method` must be a non-empty string.
 */
export function createConfidenceEstimate(
  attrs: ConfidenceEstimateAttrs
): Result<ConfidenceEstimate> {
  if (!isUnitInterval(attrs.score)) {
    return err("invalid_score");
  }
  if (typeof attrs.method !== "string" || attrs.method.length === 0) {
    return err("invalid_method");
  }

  return ok({
    score: attrs.score,
    method: attrs.method,
    calibration: attrs.calibration ?? null,
    reasoning: attrs.reasoning ?? null,
    tokenLevelConfidence: attrs.tokenLevelConfidence
      ? [...attrs.tokenLevelConfidence]
      : null,
    metadata: attrs.metadata ?? {},
  });
}

export function createConfidenceEstimateOrThrow(
  attrs: ConfidenceEstimateAttrs
): ConfidenceEstimate {
  return unwrap(createConfidenceEstimate(attrs), "ConfidenceEstimate");
}

// Fixed bands, independent of any gate configuration

export const isHighConfidence = (estimate: ConfidenceEstimate): boolean =>
  estimate.score >= CALIBRATION_HIGH_CONFIDENCE;

export const isMediumConfidence = (estimate: ConfidenceEstimate): boolean =>
  estimate.score >= CALIBRATION_LOW_CONFIDENCE &&
  estimate.score < CALIBRATION_HIGH_CONFIDENCE;

export const isLowConfidence = (estimate: ConfidenceEstimate): boolean =>
  estimate.score < CALIBRATION_LOW_CONFIDENCE;

export function confidenceLevelOf(estimate: ConfidenceEstimate): ConfidenceLevel {
  if (isHighConfidence(estimate)) return "high";
  if (isMediumConfidence(estimate)) return "medium";
  return "low";
}

export function confidenceEstimateToMap(
  estimate: ConfidenceEstimate
): Record<string, unknown> {
  const map: Record<string, unknown> = {
    score: estimate.score,
    method: estimate.method,
  };
  if (estimate.calibration !== null) map.calibration = estimate.calibration;
  if (estimate.reasoning !== null) map.reasoning = estimate.reasoning;
  if (estimate.tokenLevelConfidence !== null) {
    map.token_level_confidence = estimate.tokenLevelConfidence;
  }
  if (Object.keys(estimate.metadata).length > 0) map.metadata = estimate.metadata;
  return map;
}

export function confidenceEstimateFromMap(map: unknown): Result<ConfidenceEstimate> {
  if (!isPlainRecord(map)) {
    return err("invalid_map");
  }

  const parsed = ConfidenceEstimateMapSchema.safeParse(map);
  if (!parsed.success) {
    return err("invalid_map");
  }

  const { score, method, calibration, reasoning, token_level_confidence, metadata } =
    parsed.data;
  if (!isUnitInterval(score)) {
    return err("invalid_score");
  }
  if (typeof method !== "string") {
    return err("invalid_method");
  }

  return createConfidenceEstimate({
    score,
    method,
    calibration,
    reasoning,
    tokenLevelConfidence: token_level_confidence,
    metadata: metadata ?? undefined,
  });
}
