import type {
  Candidate,
  ConfidenceEstimate,
  ConfidenceLevel,
  RoutingAction,
  RoutingResult,
} from "../types.js";
import { isRoutingAction } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import { createCandidateOrThrow } from "../candidate/index.js";
import { createRoutingResultOrThrow } from "./result.js";
import { CALIBRATION_ROUTE_EVENT, emitTelemetry } from "../telemetry.js";
import {
  CALIBRATION_HIGH_CONFIDENCE,
  CALIBRATION_LOW_CONFIDENCE,
  FLOAT_EPSILON,
} from "../thresholds.js";

export interface CalibrationGateOptions {
  highThreshold?: number;
  lowThreshold?: number;
  mediumAction?: RoutingAction;
  lowAction?: RoutingAction;
  emitTelemetry?: boolean;
}

const VERIFICATION_SUFFIX =
  "\n\n[Confidence: Medium] Please verify this information independently.";

const CITATION_SUFFIX =
  "\n\n[Confidence: Medium] Consider verifying this with additional sources.";

const ACTION_SUMMARY: Record<RoutingAction, string> = {
  direct: "returning answer directly",
  with_verification: "adding verification suggestion",
  with_citations: "adding citations",
  abstain: "abstaining from answer",
  escalate: "escalating for review",
};

const LEVEL_LABEL: Record<ConfidenceLevel, string> = {
  high: "High",
  medium: "Medium",
  low: "Low",
};

/**
 * Routes a candidate answer according to how confident we are in it.
 *
 * The score axis is split into three bands by two thresholds. A boundary
 * value always belongs to the higher band:
 *
 *   score ≥ high          → HIGH   → direct (fixed)
 *   low ≤ score < high    → MEDIUM → mediumAction (default with_verification)
 *   score < low           → LOW    → lowAction (default abstain)
 *
 * The action then decides what happens to the candidate:
 *
 * - direct: returned unchanged.
 * - with_verification / with_citations: a fixed disclaimer is appended
 *   to the content. Candidates without text content pass through.
 * - abstain / escalate: the original answer is dropped and replaced by a
 *   canned message with no score, stamped with the original confidence.
 *
 * A gate holds only immutable settings, so one instance can serve any
 * number of concurrent callers.
 */
export class CalibrationGate {
  readonly highThreshold: number;
  readonly lowThreshold: number;
  readonly mediumAction: RoutingAction;
  readonly lowAction: RoutingAction;
  readonly emitTelemetry: boolean;

  private constructor(options: Required<CalibrationGateOptions>) {
    this.highThreshold = options.highThreshold;
    this.lowThreshold = options.lowThreshold;
    this.mediumAction = options.mediumAction;
    this.lowAction = options.lowAction;
    this.emitTelemetry = options.emitTelemetry;
    Object.freeze(this);
  }

  /**
   * Fails with `invalid_thresholds` unless high exceeds low by more than
   * 1e-4, and with `invalid_action` for an action outside the known set.
   */
  static create(options: CalibrationGateOptions = {}): Result<CalibrationGate> {
    const settings: Required<CalibrationGateOptions> = {
      highThreshold: options.highThreshold ?? CALIBRATION_HIGH_CONFIDENCE,
      lowThreshold: options.lowThreshold ?? CALIBRATION_LOW_CONFIDENCE,
      mediumAction: options.mediumAction ?? "with_verification",
      lowAction: options.lowAction ?? "abstain",
      emitTelemetry: options.emitTelemetry ?? true,
    };

    if (
      !Number.isFinite(settings.highThreshold) ||
      !Number.isFinite(settings.lowThreshold) ||
      !(settings.highThreshold - settings.lowThreshold > FLOAT_EPSILON)
    ) {
      return err("invalid_thresholds");
    }
    if (!isRoutingAction(settings.mediumAction) || !isRoutingAction(settings.lowAction)) {
      return err("invalid_action");
    }

    return ok(new CalibrationGate(settings));
  }

  static createOrThrow(options: CalibrationGateOptions = {}): CalibrationGate {
    return unwrap(CalibrationGate.create(options), "CalibrationGate");
  }

  /** Band for a score. Pure: no candidate, no telemetry. */
  confidenceLevel(score: number): ConfidenceLevel {
    if (score >= this.highThreshold) return "high";
    if (score >= this.lowThreshold) return "medium";
    return "low";
  }

  /** Pre-flight check: the action `route` would take for this score. */
  shouldRoute(score: number): RoutingAction {
    return this.actionFor(this.confidenceLevel(score));
  }

  route(candidate: Candidate, estimate: ConfidenceEstimate): RoutingResult {
    const startedAt = this.emitTelemetry ? performance.now() : 0;

    const result = this.decide(candidate, estimate.score);

    if (this.emitTelemetry) {
      emitTelemetry({
        name: CALIBRATION_ROUTE_EVENT,
        measurements: { duration: performance.now() - startedAt },
        tags: {
          action: result.action,
          confidence_level: result.confidenceLevel,
          score: result.originalScore,
        },
      });
    }

    return result;
  }

  private actionFor(level: ConfidenceLevel): RoutingAction {
    switch (level) {
      case "high":
        return "direct";
      case "medium":
        return this.mediumAction;
      case "low":
        return this.lowAction;
    }
  }

  private decide(candidate: Candidate, score: number): RoutingResult {
    const level = this.confidenceLevel(score);
    const action = this.actionFor(level);

    return createRoutingResultOrThrow({
      action,
      candidate: applyAction(action, candidate, score),
      originalScore: score,
      confidenceLevel: level,
      reasoning: `${LEVEL_LABEL[level]} confidence (${score.toFixed(3)}), ${ACTION_SUMMARY[action]}`,
      metadata: {
        high_threshold: this.highThreshold,
        low_threshold: this.lowThreshold,
      },
    });
  }
}

function applyAction(action: RoutingAction, candidate: Candidate, score: number): Candidate {
  switch (action) {
    case "direct":
      return candidate;
    case "with_verification":
      return appendSuffix(candidate, VERIFICATION_SUFFIX);
    case "with_citations":
      return appendSuffix(candidate, CITATION_SUFFIX);
    case "abstain":
      return buildAbstention(score);
    case "escalate":
      return buildEscalation(score);
  }
}

function appendSuffix(candidate: Candidate, suffix: string): Candidate {
  if (typeof candidate.content !== "string") return candidate;
  return Object.freeze({ ...candidate, content: candidate.content + suffix });
}

function buildAbstention(score: number): Candidate {
  const content = [
    `I'm not confident enough to provide a definitive answer to this question (confidence: ${score.toFixed(2)}).`,
    "",
    "This could be because:",
    "- The question is ambiguous or unclear",
    "- I don't have sufficient information to answer accurately",
    "- There are multiple valid interpretations",
    "",
    "Suggestions:",
    "- Try rephrasing your question with more specific details",
    "- Break the question into smaller parts",
    "- Provide additional context",
  ].join("\n");

  return createCandidateOrThrow({
    content,
    score: null,
    metadata: { abstained: true, original_confidence: score },
  });
}

function buildEscalation(score: number): Candidate {
  const content = [
    `I'm not confident enough to provide a definitive answer (confidence: ${score.toFixed(2)}).`,
    "",
    "This question has been escalated for human review. Someone will provide assistance shortly.",
  ].join("\n");

  return createCandidateOrThrow({
    content,
    score: null,
    metadata: { escalated: true, original_confidence: score },
  });
}
