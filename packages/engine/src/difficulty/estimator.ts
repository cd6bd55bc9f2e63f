import type { DifficultyEstimate, Metadata } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok } from "../errors.js";
import { logger } from "../logger.js";

/**
 * Anything that can judge how hard a query is.
 *
 * Implementations only need `estimate`. `estimateBatch` is optional; when
 * absent, `estimateDifficultyBatch` runs the queries one at a time.
 */
export interface DifficultyEstimator {
  name: string;
  estimate(query: string, context?: Metadata): Promise<Result<DifficultyEstimate>>;
  estimateBatch?(
    queries: readonly string[],
    context?: Metadata
  ): Promise<Result<DifficultyEstimate[]>>;
}

/**
 * Estimates every query in order. Stops at the first failure and reports
 * it as `batch_estimation_failed`.
 */
export async function estimateDifficultyBatch(
  estimator: DifficultyEstimator,
  queries: readonly string[],
  context: Metadata = {}
): Promise<Result<DifficultyEstimate[]>> {
  if (estimator.estimateBatch) {
    return estimator.estimateBatch(queries, context);
  }

  const estimates: DifficultyEstimate[] = [];
  for (const [index, query] of queries.entries()) {
    const result = await estimator.estimate(query, context);
    if (!result.ok) {
      logger.warn(
        `[difficulty] Estimator "${estimator.name}" failed on query ${index}: ${result.error}`
      );
      return err("batch_estimation_failed");
    }
    estimates.push(result.value);
  }

  return ok(estimates);
}
