import { describe, it, expect, vi, afterEach } from "vitest";
import { attachTelemetry, detachTelemetry, emitTelemetry } from "../src/telemetry.js";
import type { TelemetryEvent } from "../src/telemetry.js";
import { logger } from "../src/logger.js";

const event: TelemetryEvent = {
  name: "test.event",
  measurements: { duration: 1 },
  tags: { action: "direct" },
};

describe("telemetry", () => {
  afterEach(() => {
    detachTelemetry("first");
    detachTelemetry("second");
    detachTelemetry("broken");
    vi.restoreAllMocks();
  });

  it("delivers events to handlers in attach order", () => {
    const seen: string[] = [];
    attachTelemetry("first", () => {
      seen.push("first");
    });
    attachTelemetry("second", () => {
      seen.push("second");
    });

    emitTelemetry(event);

    expect(seen).toEqual(["first", "second"]);
  });

  it("detaches through the returned function", () => {
    const handler = vi.fn();
    const detach = attachTelemetry("first", handler);

    detach();
    emitTelemetry(event);

    expect(handler).not.toHaveBeenCalled();
    expect(detachTelemetry("first")).toBe(false);
  });

  it("logs a throwing handler and keeps delivering", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    const after = vi.fn();
    attachTelemetry("broken", () => {
      throw new Error("boom");
    });
    attachTelemetry("second", after);

    expect(() => emitTelemetry(event)).not.toThrow();
    expect(after).toHaveBeenCalledWith(event);
    expect(warn).toHaveBeenCalledWith('[telemetry] Handler "broken" failed for test.event', {
      error: "boom",
    });
  });

  it("logs a rejected async handler", async () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    attachTelemetry("broken", async () => {
      throw new Error("late boom");
    });

    emitTelemetry(event);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(warn).toHaveBeenCalledWith('[telemetry] Handler "broken" failed for test.event', {
      error: "late boom",
    });
  });
});
