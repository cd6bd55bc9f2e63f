import type { Candidate, ConfidenceEstimate, Decision, DecisionResult, Metadata } from "../types.js";
import { isDecision, isPlainRecord } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import { candidateFromMap, candidateToMap, createCandidateOrThrow } from "../candidate/index.js";
import { isUnitInterval } from "../confidence/index.js";

export interface SelectiveGenerationOptions {
  reward?: number;
  penalty?: number;
  /** Plain cut-off, consulted only when `useEv` is false. */
  confidenceThreshold?: number | null;
  useEv?: boolean;
}

const MAX_REWARD = 1000;
const MAX_PENALTY = 1000;

const fixed3 = (value: number): string => value.toFixed(3);

/**
 * Answers or abstains by weighing what a right answer earns against what
 * a wrong one costs:
 *
 *   EV(answer)  = confidence · reward − (1 − confidence) · penalty
 *   EV(abstain) = 0
 *
 * The candidate is returned only when EV(answer) > 0. With the default
 * reward and penalty of 1 that means confidence above 0.5; raising the
 * penalty raises the bar (penalty 4 needs confidence above 0.8).
 *
 * With `useEv: false` and a `confidenceThreshold`, the decision is a plain
 * `confidence ≥ threshold` check; the EV figures are still reported.
 */
export class SelectiveGeneration {
  readonly reward: number;
  readonly penalty: number;
  readonly confidenceThreshold: number | null;
  readonly useEv: boolean;

  private constructor(options: Required<SelectiveGenerationOptions>) {
    this.reward = options.reward;
    this.penalty = options.penalty;
    this.confidenceThreshold = options.confidenceThreshold;
    this.useEv = options.useEv;
    Object.freeze(this);
  }

  /**
   * Reward must lie in (0, 1000], penalty in [0, 1000] and the threshold,
   * when given, in [0, 1].
   */
  static create(options: SelectiveGenerationOptions = {}): Result<SelectiveGeneration> {
    const settings: Required<SelectiveGenerationOptions> = {
      reward: options.reward ?? 1,
      penalty: options.penalty ?? 1,
      confidenceThreshold: options.confidenceThreshold ?? null,
      useEv: options.useEv ?? true,
    };

    if (!Number.isFinite(settings.reward) || settings.reward <= 0 || settings.reward > MAX_REWARD) {
      return err("invalid_reward");
    }
    if (
      !Number.isFinite(settings.penalty) ||
      settings.penalty < 0 ||
      settings.penalty > MAX_PENALTY
    ) {
      return err("invalid_penalty");
    }
    if (settings.confidenceThreshold !== null && !isUnitInterval(settings.confidenceThreshold)) {
      return err("invalid_threshold");
    }

    return ok(new SelectiveGeneration(settings));
  }

  static createOrThrow(options: SelectiveGenerationOptions = {}): SelectiveGeneration {
    return unwrap(SelectiveGeneration.create(options), "SelectiveGeneration");
  }

  calculateEv(confidence: number): { evAnswer: number; evAbstain: number } {
    return {
      evAnswer: confidence * this.reward - (1 - confidence) * this.penalty,
      evAbstain: 0,
    };
  }

  answerOrAbstain(candidate: Candidate, estimate: ConfidenceEstimate): DecisionResult {
    const confidence = estimate.score;
    const { evAnswer, evAbstain } = this.calculateEv(confidence);
    const decision = this.decide(evAnswer, confidence);
    const terms = `at confidence ${fixed3(confidence)} (reward: ${fixed3(this.reward)}, penalty: ${fixed3(this.penalty)})`;

    return {
      decision,
      candidate: decision === "answer" ? candidate : this.abstention(confidence, evAnswer),
      confidence,
      evAnswer,
      evAbstain,
      reasoning:
        decision === "answer"
          ? `Positive expected value (${fixed3(evAnswer)}) ${terms}. Answering is optimal.`
          : `Non-positive expected value (${fixed3(evAnswer)}) ${terms}. Abstaining to avoid potential error.`,
      metadata: { reward: this.reward, penalty: this.penalty, use_ev: this.useEv },
    };
  }

  private decide(evAnswer: number, confidence: number): Decision {
    if (!this.useEv && this.confidenceThreshold !== null) {
      return confidence >= this.confidenceThreshold ? "answer" : "abstain";
    }
    return evAnswer > 0 ? "answer" : "abstain";
  }

  private abstention(confidence: number, evAnswer: number): Candidate {
    const content = [
      "I'm not confident enough to provide a reliable answer.",
      "",
      `Confidence: ${fixed3(confidence)}`,
      `Expected value: ${fixed3(evAnswer)}`,
      "",
      "The risk of providing incorrect information outweighs the potential benefit.",
      "Please consider:",
      "- Rephrasing your question with more specific details",
      "- Providing additional context",
      "- Consulting a more specialized source",
    ].join("\n");

    return createCandidateOrThrow({
      content,
      score: null,
      metadata: {
        abstained: true,
        original_confidence: confidence,
        ev_answer: evAnswer,
        reward: this.reward,
        penalty: this.penalty,
      },
    });
  }
}

export const isAnswered = (result: DecisionResult): boolean => result.decision === "answer";

export const isDeclined = (result: DecisionResult): boolean => result.decision === "abstain";

export interface DecisionResultAttrs {
  decision: Decision;
  candidate?: Candidate | null;
  confidence?: number | null;
  evAnswer?: number;
  evAbstain?: number;
  reasoning?: string | null;
  metadata?: Metadata;
}

export function createDecisionResult(attrs: DecisionResultAttrs): Result<DecisionResult> {
  if (!isDecision(attrs.decision)) return err("invalid_decision");

  const confidence = attrs.confidence ?? null;
  if (confidence !== null && !isUnitInterval(confidence)) return err("invalid_confidence");

  return ok({
    decision: attrs.decision,
    candidate: attrs.candidate ?? null,
    confidence,
    evAnswer: attrs.evAnswer ?? 0,
    evAbstain: attrs.evAbstain ?? 0,
    reasoning: attrs.reasoning ?? null,
    metadata: attrs.metadata ?? {},
  });
}

export function decisionResultToMap(result: DecisionResult): Record<string, unknown> {
  const map: Record<string, unknown> = {
    decision: result.decision,
    ev_answer: result.evAnswer,
    ev_abstain: result.evAbstain,
  };
  if (result.candidate !== null) map.candidate = candidateToMap(result.candidate);
  if (result.confidence !== null) map.confidence = result.confidence;
  if (result.reasoning !== null) map.reasoning = result.reasoning;
  if (Object.keys(result.metadata).length > 0) map.metadata = result.metadata;
  return map;
}

export function decisionResultFromMap(map: unknown): Result<DecisionResult> {
  if (!isPlainRecord(map)) return err("invalid_map");

  const { decision, candidate, confidence, ev_answer, ev_abstain, reasoning, metadata } = map;
  if (!isDecision(decision)) return err("invalid_decision");

  let parsedCandidate: Candidate | null = null;
  if (candidate !== undefined && candidate !== null) {
    const decoded = candidateFromMap(candidate);
    if (!decoded.ok) return err("invalid_candidate");
    parsedCandidate = decoded.value;
  }

  const isOptionalNumber = (value: unknown) =>
    value === undefined || value === null || typeof value === "number";
  if (!isOptionalNumber(confidence) || !isOptionalNumber(ev_answer) || !isOptionalNumber(ev_abstain)) {
    return err("invalid_map");
  }
  if (reasoning !== undefined && reasoning !== null && typeof reasoning !== "string") {
    return err("invalid_map");
  }
  if (metadata !== undefined && metadata !== null && !isPlainRecord(metadata)) {
    return err("invalid_map");
  }

  return createDecisionResult({
    decision,
    candidate: parsedCandidate,
    confidence: typeof confidence === "number" ? confidence : null,
    evAnswer: typeof ev_answer === "number" ? ev_answer : undefined,
    evAbstain: typeof ev_abstain === "number" ? ev_abstain : undefined,
    reasoning: typeof reasoning === "string" ? reasoning : null,
    metadata: isPlainRecord(metadata) ? metadata : undefined,
  });
}
