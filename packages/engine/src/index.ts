export * from "./types.js";
export * from "./errors.js";
export * from "./thresholds.js";
export { loadConfig } from "./config.js";
export type { EngineConfig } from "./config.js";
export { logger } from "./logger.js";
export * from "./telemetry.js";

export * from "./similarity/index.js";
export * from "./candidate/index.js";
export * from "./confidence/index.js";
export * from "./difficulty/index.js";
export * from "./difficulty/estimator.js";
export * from "./critique/index.js";
export * from "./routing/result.js";
export * from "./routing/gate.js";
export * from "./generation/result.js";
export * from "./generation/diverse.js";
export * from "./estimators/heuristic.js";
export * from "./estimators/confidence.js";
export * from "./estimators/ensemble.js";
export * from "./aggregators/index.js";
export * from "./selective/index.js";
export * from "./pipeline/index.js";
