import type {
  Candidate,
  ConfidenceLevel,
  Metadata,
  RoutingAction,
  RoutingResult,
} from "../types.js";
import { isConfidenceLevel, isPlainRecord, isRoutingAction } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import { isUnitInterval } from "../confidence/index.js";
import { candidateFromMap, candidateToMap } from "../candidate/index.js";

export interface RoutingResultAttrs {
  action: RoutingAction;
  candidate?: Candidate | null;
  originalScore?: number | null;
  confidenceLevel?: ConfidenceLevel | null;
  reasoning?: string | null;
  metadata?: Metadata;
}

export function createRoutingResult(attrs: RoutingResultAttrs): Result<RoutingResult> {
  if (!isRoutingAction(attrs.action)) {
    return err("invalid_action");
  }

  const originalScore = attrs.originalScore ?? null;
  if (originalScore !== null && !isUnitInterval(originalScore)) {
    return err("invalid_score");
  }

  const confidenceLevel = attrs.confidenceLevel ?? null;
  if (confidenceLevel !== null && !isConfidenceLevel(confidenceLevel)) {
    return err("invalid_confidence_level");
  }

  return ok({
    action: attrs.action,
    candidate: attrs.candidate ?? null,
    originalScore,
    confidenceLevel,
    reasoning: attrs.reasoning ?? null,
    metadata: attrs.metadata ?? {},
  });
}

export function createRoutingResultOrThrow(attrs: RoutingResultAttrs): RoutingResult {
  return unwrap(createRoutingResult(attrs), "RoutingResult");
}

export const isDirect = (result: RoutingResult): boolean => result.action === "direct";

export const isWithVerification = (result: RoutingResult): boolean =>
  result.action === "with_verification";

export const isWithCitations = (result: RoutingResult): boolean =>
  result.action === "with_citations";

export const isAbstained = (result: RoutingResult): boolean => result.action === "abstain";

export const isEscalated = (result: RoutingResult): boolean => result.action === "escalate";

/** Only a direct route hands back the candidate as it came in. */
export const isUnmodified = (result: RoutingResult): boolean => isDirect(result);

export const isModified = (result: RoutingResult): boolean => !isUnmodified(result);

export function routingResultToMap(result: RoutingResult): Record<string, unknown> {
  const map: Record<string, unknown> = { action: result.action };
  if (result.candidate !== null) map.candidate = candidateToMap(result.candidate);
  if (result.originalScore !== null) map.original_score = result.originalScore;
  if (result.confidenceLevel !== null) map.confidence_level = result.confidenceLevel;
  if (result.reasoning !== null) map.reasoning = result.reasoning;
  if (Object.keys(result.metadata).length > 0) map.metadata = result.metadata;
  return map;
}

/**
 * Inverse of `routingResultToMap`.
 *
 * `action` and `confidence_level` are only accepted from their closed
 * string sets; anything else is rejected by the constructor with
 * `invalid_action` / `invalid_confidence_level`.
 */
export function routingResultFromMap(map: unknown): Result<RoutingResult> {
  if (!isPlainRecord(map)) return err("invalid_map");

  const { action, candidate, original_score, confidence_level, reasoning, metadata } = map;

  if (!isRoutingAction(action)) return err("invalid_action");

  let parsedCandidate: Candidate | null = null;
  if (candidate !== undefined && candidate !== null) {
    const decoded = candidateFromMap(candidate);
    if (!decoded.ok) return err("invalid_candidate");
    parsedCandidate = decoded.value;
  }

  if (original_score !== undefined && original_score !== null && !isUnitInterval(original_score)) {
    return err("invalid_score");
  }
  if (
    confidence_level !== undefined &&
    confidence_level !== null &&
    !isConfidenceLevel(confidence_level)
  ) {
    return err("invalid_confidence_level");
  }
  if (reasoning !== undefined && reasoning !== null && typeof reasoning !== "string") {
    return err("invalid_map");
  }
  if (metadata !== undefined && metadata !== null && !isPlainRecord(metadata)) {
    return err("invalid_map");
  }

  return createRoutingResult({
    action,
    candidate: parsedCandidate,
    originalScore: typeof original_score === "number" ? original_score : null,
    confidenceLevel: isConfidenceLevel(confidence_level) ? confidence_level : null,
    reasoning: typeof reasoning === "string" ? reasoning : null,
    metadata: isPlainRecord(metadata) ? metadata : undefined,
  });
}
