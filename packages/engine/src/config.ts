import { z } from "zod";
import { ROUTING_ACTIONS, SELECTION_STRATEGIES } from "./types.js";
import type { RoutingAction, SelectionStrategy } from "./types.js";
import {
  CALIBRATION_HIGH_CONFIDENCE,
  CALIBRATION_LOW_CONFIDENCE,
} from "./thresholds.js";

const booleanString = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

// A blank value (`KEY=` in .env) counts as unset, not as 0
const unitInterval = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().min(0).max(1).default(fallback)
  );

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
  CALIBRATION_HIGH_THRESHOLD: unitInterval(CALIBRATION_HIGH_CONFIDENCE),
  CALIBRATION_LOW_THRESHOLD: unitInterval(CALIBRATION_LOW_CONFIDENCE),
  CALIBRATION_MEDIUM_ACTION: z.enum(ROUTING_ACTIONS).default("with_verification"),
  CALIBRATION_LOW_ACTION: z.enum(ROUTING_ACTIONS).default("abstain"),
  CALIBRATION_EMIT_TELEMETRY: booleanString.default("true"),
  SELECTION_STRATEGY: z.enum(SELECTION_STRATEGIES).default("best"),
});

export interface EngineConfig {
  nodeEnv: "development" | "production" | "test";
  logLevel?: string;
  calibration: {
    highThreshold: number;
    lowThreshold: number;
    mediumAction: RoutingAction;
    lowAction: RoutingAction;
    emitTelemetry: boolean;
  };
  selectionStrategy: SelectionStrategy;
}

/**
 * Reads engine settings from the environment.
 *
 * Entry points load `.env` first (`import "dotenv/config"`); this
 * function only reads what it is given, so tests pass a plain object.
 * Threshold ordering is checked by CalibrationGate.create, not here.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => issue.path.join("."))
      .join(", ");
    throw new Error(`Invalid configuration: ${fields}`);
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    calibration: {
      highThreshold: vars.CALIBRATION_HIGH_THRESHOLD,
      lowThreshold: vars.CALIBRATION_LOW_THRESHOLD,
      mediumAction: vars.CALIBRATION_MEDIUM_ACTION,
      lowAction: vars.CALIBRATION_LOW_ACTION,
      emitTelemetry: vars.CALIBRATION_EMIT_TELEMETRY,
    },
    selectionStrategy: vars.SELECTION_STRATEGY,
  };
}
