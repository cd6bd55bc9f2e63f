/**
 * Failure taxonomy shared by every constructor and deserializer.
 *
 * Failable operations return a `Result` instead of throwing. The
 * `...OrThrow` wrappers exist for call sites that treat invalid input
 * as a programmer error; they raise `AccuracyError` via `unwrap`.
 */
export type AccuracyErrorCode =
  | "invalid_score"
  | "invalid_confidence"
  | "invalid_thresholds"
  | "invalid_action"
  | "invalid_level"
  | "invalid_candidates"
  | "invalid_candidate"
  | "invalid_map"
  | "invalid_method"
  | "invalid_confidence_level"
  | "invalid_severity"
  | "invalid_weights"
  | "weights_dont_sum_to_1"
  | "invalid_query"
  | "query_too_long"
  | "invalid_lambda"
  | "invalid_threshold"
  | "batch_estimation_failed"
  | "invalid_reward"
  | "invalid_penalty"
  | "invalid_decision"
  | "no_candidates"
  | "no_scores"
  | "no_strategies"
  | "aggregation_failed"
  | "estimators_required"
  | "weights_length_mismatch"
  | "invalid_combination"
  | "invalid_timeout"
  | "estimator_timeout"
  | "all_estimators_failed";

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: AccuracyErrorCode };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const err = <T = never>(error: AccuracyErrorCode): Result<T> => ({
  ok: false,
  error,
});

export class AccuracyError extends Error {
  readonly code: AccuracyErrorCode;

  constructor(code: AccuracyErrorCode, subject: string) {
    super(`Invalid ${subject}: ${code}`);
    this.name = "AccuracyError";
    this.code = code;
  }
}

export function unwrap<T>(result: Result<T>, subject: string): T {
  if (!result.ok) {
    throw new AccuracyError(result.error, subject);
  }
  return result.value;
}
