/**
 * Numeric constants shared across the engine. Environment overrides for
 * the calibration gate are applied in config.ts, not here.
 */

/** Difficulty scores below this are "easy". */
export const EASY_THRESHOLD = 0.35;

/** Difficulty scores above this are "hard". */
export const HARD_THRESHOLD = 0.65;

export const CALIBRATION_HIGH_CONFIDENCE = 0.7;
export const CALIBRATION_LOW_CONFIDENCE = 0.4;

// Tolerance when comparing the gate's two thresholds
export const FLOAT_EPSILON = 0.0001;
