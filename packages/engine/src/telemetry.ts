import { logger } from "./logger.js";

export interface TelemetryEvent {
  name: string;
  measurements: Record<string, number>;
  tags: Record<string, unknown>;
}

export type TelemetryHandler = (event: TelemetryEvent) => void | Promise<void>;

export const CALIBRATION_ROUTE_EVENT = "accuracy.calibration.route";

const handlers = new Map<string, TelemetryHandler>();

/**
 * Registers a handler under `id`, replacing any previous handler with the
 * same id. Returns a function that detaches it.
 */
export function attachTelemetry(id: string, handler: TelemetryHandler): () => void {
  handlers.set(id, handler);
  return () => detachTelemetry(id);
}

export function detachTelemetry(id: string): boolean {
  return handlers.delete(id);
}

/**
 * Fire-and-forget delivery to every attached handler.
 *
 * Handlers run synchronously in attach order. A handler that throws, or
 * returns a promise that rejects, is logged and skipped. Emission never
 * fails the caller.
 */
export function emitTelemetry(event: TelemetryEvent): void {
  for (const [id, handler] of handlers) {
    try {
      const pending = handler(event);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => reportFailure(id, event, error));
      }
    } catch (error) {
      reportFailure(id, event, error);
    }
  }
}

function reportFailure(id: string, event: TelemetryEvent, error: unknown): void {
  logger.warn(`[telemetry] Handler "${id}" failed for ${event.name}`, {
    error: error instanceof Error ? error.message : String(error),
  });
}
