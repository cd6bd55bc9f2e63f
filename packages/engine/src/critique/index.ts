import type { Candidate, CritiqueResult, Metadata } from "../types.js";
import { CritiqueResultSchema, isPlainRecord } from "../types.js";
import type { Result } from "../errors.js";
import { err, ok, unwrap } from "../errors.js";
import { isUnitInterval } from "../confidence/index.js";

export type SeverityLevel = "low" | "medium" | "high";

export interface CritiqueResultAttrs {
  severity: number;
  issues?: string[];
  suggestions?: string[];
  feedback?: string | null;
  metadata?: Metadata;
}

const ACTIONABLE_SEVERITY = 0.3;

/**
 * A critique is actionable when it names at least one issue or its
 * severity exceeds 0.3; callers do not set the flag themselves.
 */
export function createCritiqueResult(attrs: CritiqueResultAttrs): Result<CritiqueResult> {
  if (!isUnitInterval(attrs.severity)) return err("invalid_severity");

  const issues = [...(attrs.issues ?? [])];
  return ok({
    issues,
    suggestions: [...(attrs.suggestions ?? [])],
    severity: attrs.severity,
    feedback: attrs.feedback ?? null,
    actionable: issues.length > 0 || attrs.severity > ACTIONABLE_SEVERITY,
    metadata: attrs.metadata ?? {},
  });
}

export function createCritiqueResultOrThrow(attrs: CritiqueResultAttrs): CritiqueResult {
  return unwrap(createCritiqueResult(attrs), "CritiqueResult");
}

/** Accepts critiquer output in wire form (e.g. parsed model JSON). */
export function critiqueResultFromMap(map: unknown): Result<CritiqueResult> {
  if (!isPlainRecord(map)) return err("invalid_map");
  if (!isUnitInterval(map.severity)) return err("invalid_severity");

  const parsed = CritiqueResultSchema.safeParse(map);
  if (!parsed.success) return err("invalid_map");

  return createCritiqueResult({
    severity: parsed.data.severity,
    issues: parsed.data.issues,
    suggestions: parsed.data.suggestions,
    feedback: parsed.data.feedback,
    metadata: parsed.data.metadata,
  });
}

export const noIssues = (): CritiqueResult =>
  createCritiqueResultOrThrow({ severity: 0, feedback: "No issues found" });

export const hasIssues = (result: CritiqueResult): boolean => result.issues.length > 0;

export const shouldRefine = (result: CritiqueResult, threshold = 0.3): boolean =>
  result.severity > threshold;

export function severityLevel(result: CritiqueResult): SeverityLevel {
  if (result.severity < 0.3) return "low";
  if (result.severity < 0.7) return "medium";
  return "high";
}

export function addIssue(result: CritiqueResult, issue: string): CritiqueResult {
  return { ...result, issues: [...result.issues, issue] };
}

/** Concatenates findings and keeps the worse severity. */
export function mergeCritiques(a: CritiqueResult, b: CritiqueResult): CritiqueResult {
  let feedback = a.feedback ?? b.feedback;
  if (a.feedback !== null && b.feedback !== null) feedback = `${a.feedback}\n${b.feedback}`;

  return {
    issues: [...a.issues, ...b.issues],
    suggestions: [...a.suggestions, ...b.suggestions],
    severity: Math.max(a.severity, b.severity),
    feedback,
    actionable: a.actionable || b.actionable,
    metadata: { ...a.metadata, ...b.metadata },
  };
}

/**
 * Anything that can review a candidate answer. `critiqueBatch` is optional;
 * without it the free function of the same name reviews one at a time.
 */
export interface Critiquer {
  name: string;
  critique(candidate: Candidate, context?: Metadata): Promise<Result<CritiqueResult>>;
  critiqueBatch?(
    candidates: readonly Candidate[],
    context?: Metadata
  ): Promise<Result<CritiqueResult[]>>;
}

/** Sequential, stops at and returns the first failure. */
export async function critiqueBatch(
  critiquer: Critiquer,
  candidates: readonly Candidate[],
  context: Metadata = {}
): Promise<Result<CritiqueResult[]>> {
  if (critiquer.critiqueBatch) {
    return critiquer.critiqueBatch(candidates, context);
  }

  const results: CritiqueResult[] = [];
  for (const candidate of candidates) {
    const result = await critiquer.critique(candidate, context);
    if (!result.ok) return err(result.error);
    results.push(result.value);
  }
  return ok(results);
}
