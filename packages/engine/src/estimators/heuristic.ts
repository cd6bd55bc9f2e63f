import { readFileSync } from "node:fs";
import { z } from "zod";
import type { DifficultyEstimate, DifficultyLevel, Metadata } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import type { DifficultyEstimator } from "../difficulty/estimator.js";
import { createDifficultyEstimate, toLevel } from "../difficulty/index.js";
import { graphemes } from "../similarity/index.js";

const IndicatorsSchema = z.object({
  math: z.array(z.string()),
  code: z.array(z.string()),
  reasoning: z.array(z.string()),
  creative: z.array(z.string()),
  simpleQuestion: z.array(z.string()),
});

const INDICATORS = IndicatorsSchema.parse(
  JSON.parse(readFileSync(new URL("../../data/indicators.json", import.meta.url), "utf8"))
);

const MAX_QUERY_BYTES = 50_000;
const WEIGHT_SUM_TOLERANCE = 0.01;

export interface HeuristicWeights {
  lengthWeight: number;
  complexityWeight: number;
  domainWeight: number;
  questionWeight: number;
}

export interface HeuristicDifficultyOptions extends Partial<HeuristicWeights> {
  /** Extra domains to count, e.g. `{ legal: ["statute", "tort"] }`. Reported only. */
  customIndicators?: Record<string, string[]>;
}

export const DEFAULT_HEURISTIC_WEIGHTS: HeuristicWeights = {
  lengthWeight: 0.25,
  complexityWeight: 0.3,
  domainWeight: 0.25,
  questionWeight: 0.2,
};

export interface HeuristicFeatures {
  length: { score: number; char_count: number; word_count: number };
  complexity: {
    score: number;
    avg_word_length: number;
    special_char_count: number;
    number_count: number;
  };
  domain: { score: number; domains: string[]; custom: Record<string, number> };
  question_type: {
    score: number;
    has_question_mark: boolean;
    simple_indicator_count: number;
    reasoning_indicator_count: number;
  };
}

const countIndicators = (text: string, indicators: readonly string[]): number =>
  indicators.filter((indicator) => text.includes(indicator)).length;

const countMatches = (text: string, pattern: RegExp): number =>
  text.match(pattern)?.length ?? 0;

/**
 * Rule-based difficulty estimate from surface features of the query.
 *
 * Four features each score 0–1 and are blended with the configured weights:
 * - length: character count, bucketed at 50/100/200/300
 * - complexity: average word length and punctuation count
 * - domain: how many math/code/reasoning/creative indicators appear
 * - question type: reasoning words push up, simple question words down
 *
 * Confidence reflects how much the four features agree. No model calls;
 * results are deterministic.
 */
export class HeuristicDifficultyEstimator implements DifficultyEstimator {
  readonly name = "heuristic";
  readonly weights: HeuristicWeights;
  readonly customIndicators: Record<string, string[]>;

  private constructor(weights: HeuristicWeights, customIndicators: Record<string, string[]>) {
    this.weights = weights;
    this.customIndicators = customIndicators;
  }

  static create(options: HeuristicDifficultyOptions = {}): Result<HeuristicDifficultyEstimator> {
    const weights: HeuristicWeights = {
      lengthWeight: options.lengthWeight ?? DEFAULT_HEURISTIC_WEIGHTS.lengthWeight,
      complexityWeight: options.complexityWeight ?? DEFAULT_HEURISTIC_WEIGHTS.complexityWeight,
      domainWeight: options.domainWeight ?? DEFAULT_HEURISTIC_WEIGHTS.domainWeight,
      questionWeight: options.questionWeight ?? DEFAULT_HEURISTIC_WEIGHTS.questionWeight,
    };

    const values = [
      weights.lengthWeight,
      weights.complexityWeight,
      weights.domainWeight,
      weights.questionWeight,
    ];
    if (!values.every((w) => Number.isFinite(w) && w >= 0 && w <= 1)) {
      return err("invalid_weights");
    }
    const sum = values.reduce((total, w) => total + w, 0);
    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      return err("weights_dont_sum_to_1");
    }

    return ok(new HeuristicDifficultyEstimator(weights, options.customIndicators ?? {}));
  }

  static createOrThrow(options: HeuristicDifficultyOptions = {}): HeuristicDifficultyEstimator {
    return unwrap(HeuristicDifficultyEstimator.create(options), "HeuristicDifficultyEstimator");
  }

  async estimate(query: string, _context: Metadata = {}): Promise<Result<DifficultyEstimate>> {
    const trimmed = query.trim();
    if (trimmed === "") return err("invalid_query");
    if (Buffer.byteLength(trimmed, "utf8") > MAX_QUERY_BYTES) return err("query_too_long");

    const features = this.extractFeatures(trimmed);
    const score = this.score(features);
    const level = toLevel(score);

    return createDifficultyEstimate({
      level,
      score,
      confidence: featureAgreement(features),
      reasoning: describe(features, level),
      features: { ...features },
      metadata: { method: "heuristic" },
    });
  }

  extractFeatures(query: string): HeuristicFeatures {
    const lower = query.toLowerCase();
    return {
      length: lengthFeature(query),
      complexity: complexityFeature(query),
      domain: this.domainFeature(lower),
      question_type: questionTypeFeature(query, lower),
    };
  }

  private score(features: HeuristicFeatures): number {
    const total =
      features.length.score * this.weights.lengthWeight +
      features.complexity.score * this.weights.complexityWeight +
      features.domain.score * this.weights.domainWeight +
      features.question_type.score * this.weights.questionWeight;
    return Math.min(Math.max(total, 0), 1);
  }

  private domainFeature(lower: string): HeuristicFeatures["domain"] {
    const counts: Array<[string, number]> = [
      ["math", countIndicators(lower, INDICATORS.math)],
      ["code", countIndicators(lower, INDICATORS.code)],
      ["reasoning", countIndicators(lower, INDICATORS.reasoning)],
      ["creative", countIndicators(lower, INDICATORS.creative)],
    ];

    const custom: Record<string, number> = {};
    for (const [domain, indicators] of Object.entries(this.customIndicators)) {
      custom[domain] = countIndicators(lower, indicators);
    }

    const max = Math.max(...counts.map(([, count]) => count));
    let score = 0;
    if (max >= 3) score = 1;
    else if (max >= 2) score = 0.7;
    else if (max >= 1) score = 0.4;

    return {
      score,
      domains: counts.filter(([, count]) => count > 0).map(([domain]) => domain),
      custom,
    };
  }
}

function lengthFeature(query: string): HeuristicFeatures["length"] {
  const charCount = graphemes(query).length;
  const wordCount = query.split(/\s+/).length;

  let score = 1;
  if (charCount < 50) score = 0;
  else if (charCount < 100) score = 0.2;
  else if (charCount < 200) score = 0.5;
  else if (charCount < 300) score = 0.7;

  return { score, char_count: charCount, word_count: wordCount };
}

function complexityFeature(query: string): HeuristicFeatures["complexity"] {
  const words = query.split(/\s+/);
  const avgWordLength =
    words.reduce((total, word) => total + graphemes(word).length, 0) / words.length;
  const specialCount = countMatches(query, /[^\w\s]/g);
  const numberCount = countMatches(query, /\b\d+\b/g);

  let score = 1;
  if (avgWordLength < 4 && specialCount < 2) score = 0;
  else if (avgWordLength < 5 && specialCount < 5) score = 0.3;
  else if (avgWordLength < 6 && specialCount < 10) score = 0.5;
  else if (avgWordLength < 7 || specialCount < 15) score = 0.7;

  return {
    score,
    avg_word_length: Math.round(avgWordLength * 100) / 100,
    special_char_count: specialCount,
    number_count: numberCount,
  };
}

function questionTypeFeature(query: string, lower: string): HeuristicFeatures["question_type"] {
  const simpleCount = countIndicators(lower, INDICATORS.simpleQuestion);
  const reasoningCount = countIndicators(lower, INDICATORS.reasoning);
  const hasQuestionMark = query.endsWith("?");

  let score = 0.5;
  if (reasoningCount >= 2) score = 1;
  else if (reasoningCount >= 1) score = 0.6;
  else if (simpleCount >= 2) score = 0.2;
  else if (hasQuestionMark) score = 0.3;

  return {
    score,
    has_question_mark: hasQuestionMark,
    simple_indicator_count: simpleCount,
    reasoning_indicator_count: reasoningCount,
  };
}

/** Population variance of the feature scores, bucketed into a confidence. */
function featureAgreement(features: HeuristicFeatures): number {
  const scores = [
    features.length.score,
    features.complexity.score,
    features.domain.score,
    features.question_type.score,
  ];
  const mean = scores.reduce((total, s) => total + s, 0) / scores.length;
  const variance = scores.reduce((total, s) => total + (s - mean) ** 2, 0) / scores.length;

  if (variance < 0.05) return 0.95;
  if (variance < 0.1) return 0.85;
  if (variance < 0.2) return 0.7;
  return 0.6;
}

function describe(features: HeuristicFeatures, level: DifficultyLevel): string {
  const domains = features.domain.domains;
  const domainPart = domains.length > 0 ? `${domains.join("/")} domain` : "general domain";

  const lengthScore = features.length.score;
  const lengthPart =
    lengthScore < 0.3 ? "short query" : lengthScore < 0.7 ? "medium-length query" : "long query";

  const questionScore = features.question_type.score;
  const questionPart =
    questionScore < 0.3
      ? "simple question"
      : questionScore < 0.7
        ? "moderate question"
        : "complex question";

  const base = `${domainPart}, ${lengthPart}, ${questionPart}`;
  switch (level) {
    case "easy":
      return `Simple: ${base}`;
    case "medium":
      return `Moderate difficulty: ${base}`;
    case "hard":
      return `Complex: ${base} with multiple factors`;
  }
}
