import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";
import { CalibrationGate } from "../src/routing/gate.js";

describe("loadConfig", () => {
  it("falls back to the built-in defaults", () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: "development",
      logLevel: undefined,
      calibration: {
        highThreshold: 0.7,
        lowThreshold: 0.4,
        mediumAction: "with_verification",
        lowAction: "abstain",
        emitTelemetry: true,
      },
      selectionStrategy: "best",
    });
  });

  it("reads gate settings from the environment", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      LOG_LEVEL: "warn",
      CALIBRATION_HIGH_THRESHOLD: "0.8",
      CALIBRATION_LOW_THRESHOLD: "0.3",
      CALIBRATION_MEDIUM_ACTION: "with_citations",
      CALIBRATION_LOW_ACTION: "escalate",
      CALIBRATION_EMIT_TELEMETRY: "false",
      SELECTION_STRATEGY: "vote",
    });

    expect(config.nodeEnv).toBe("production");
    expect(config.logLevel).toBe("warn");
    expect(config.calibration).toEqual({
      highThreshold: 0.8,
      lowThreshold: 0.3,
      mediumAction: "with_citations",
      lowAction: "escalate",
      emitTelemetry: false,
    });
    expect(config.selectionStrategy).toBe("vote");
  });

  it("names every invalid variable", () => {
    expect(() =>
      loadConfig({ CALIBRATION_HIGH_THRESHOLD: "1.5", CALIBRATION_LOW_ACTION: "panic" })
    ).toThrow("Invalid configuration: CALIBRATION_HIGH_THRESHOLD, CALIBRATION_LOW_ACTION");
  });

  it("treats blank thresholds as unset", () => {
    const config = loadConfig({ CALIBRATION_LOW_THRESHOLD: "", CALIBRATION_HIGH_THRESHOLD: "  " });

    expect(config.calibration.lowThreshold).toBe(0.4);
    expect(config.calibration.highThreshold).toBe(0.7);

    const gate = CalibrationGate.createOrThrow({ ...config.calibration, emitTelemetry: false });
    expect(gate.shouldRoute(0.01)).toBe("abstain");
  });

  it("rejects thresholds that are not numbers", () => {
    expect(() => loadConfig({ CALIBRATION_LOW_THRESHOLD: "low" })).toThrow(
      "Invalid configuration: CALIBRATION_LOW_THRESHOLD"
    );
  });

  it("only accepts true or false for the telemetry flag", () => {
    expect(() => loadConfig({ CALIBRATION_EMIT_TELEMETRY: "yes" })).toThrow(
      "Invalid configuration: CALIBRATION_EMIT_TELEMETRY"
    );
  });
});
