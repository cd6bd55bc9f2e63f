import { describe, it, expect } from "vitest";
import {
  addIssue,
  createCritiqueResult,
  createCritiqueResultOrThrow,
  critiqueBatch,
  critiqueResultFromMap,
  hasIssues,
  mergeCritiques,
  noIssues,
  severityLevel,
  shouldRefine,
} from "../src/critique/index.js";
import type { Critiquer } from "../src/critique/index.js";
import { createCandidateOrThrow } from "../src/candidate/index.js";
import { err } from "../src/errors.js";

describe("createCritiqueResult", () => {
  it("marks critiques with issues as actionable", () => {
    const result = createCritiqueResultOrThrow({ severity: 0.1, issues: ["Calculation error"] });
    expect(result.actionable).toBe(true);
    expect(hasIssues(result)).toBe(true);
  });

  it("marks severe critiques as actionable even without issues", () => {
    expect(createCritiqueResultOrThrow({ severity: 0.4 }).actionable).toBe(true);
    expect(createCritiqueResultOrThrow({ severity: 0.2 }).actionable).toBe(false);
  });

  it("rejects a severity outside [0, 1]", () => {
    expect(createCritiqueResult({ severity: 1.2 })).toEqual({ ok: false, error: "invalid_severity" });
  });
});

describe("critique helpers", () => {
  it("buckets severity into levels", () => {
    expect(severityLevel(createCritiqueResultOrThrow({ severity: 0.29 }))).toBe("low");
    expect(severityLevel(createCritiqueResultOrThrow({ severity: 0.3 }))).toBe("medium");
    expect(severityLevel(createCritiqueResultOrThrow({ severity: 0.7 }))).toBe("high");
  });

  it("suggests refinement above the threshold", () => {
    expect(shouldRefine(createCritiqueResultOrThrow({ severity: 0.3 }))).toBe(false);
    expect(shouldRefine(createCritiqueResultOrThrow({ severity: 0.31 }))).toBe(true);
    expect(shouldRefine(createCritiqueResultOrThrow({ severity: 0.4 }), 0.5)).toBe(false);
  });

  it("appends issues without mutating", () => {
    const original = noIssues();
    const updated = addIssue(original, "Missing units");

    expect(updated.issues).toEqual(["Missing units"]);
    expect(original.issues).toEqual([]);
  });

  it("builds an empty critique", () => {
    expect(noIssues()).toEqual({
      issues: [],
      suggestions: [],
      severity: 0,
      feedback: "No issues found",
      actionable: false,
      metadata: {},
    });
  });

  it("merges findings and keeps the worse severity", () => {
    const first = createCritiqueResultOrThrow({ severity: 0.3, issues: ["a"], feedback: "first" });
    const second = createCritiqueResultOrThrow({ severity: 0.7, issues: ["b"] });

    const merged = mergeCritiques(first, second);
    expect(merged.issues).toEqual(["a", "b"]);
    expect(merged.severity).toBe(0.7);
    expect(merged.feedback).toBe("first");
    expect(merged.actionable).toBe(true);

    const both = mergeCritiques(first, createCritiqueResultOrThrow({ severity: 0, feedback: "second" }));
    expect(both.feedback).toBe("first\nsecond");
  });
});

describe("critiqueResultFromMap", () => {
  it("accepts wire-form critiques", () => {
    const result = critiqueResultFromMap({ severity: 0.6, issues: ["x"], feedback: "f" });
    expect(result).toEqual({
      ok: true,
      value: {
        issues: ["x"],
        suggestions: [],
        severity: 0.6,
        feedback: "f",
        actionable: true,
        metadata: {},
      },
    });
  });

  it("derives actionable from issues and severity, not from the map", () => {
    const result = critiqueResultFromMap({ severity: 0.1, issues: [], actionable: true });
    expect(result.ok && result.value.actionable).toBe(false);
  });

  it("rejects missing severity and malformed fields", () => {
    expect(critiqueResultFromMap({ issues: [] })).toEqual({ ok: false, error: "invalid_severity" });
    expect(critiqueResultFromMap({ severity: 0.5, issues: "x" })).toEqual({
      ok: false,
      error: "invalid_map",
    });
    expect(critiqueResultFromMap("bad")).toEqual({ ok: false, error: "invalid_map" });
  });
});

describe("critiqueBatch", () => {
  const lengthCritiquer: Critiquer = {
    name: "length",
    critique: async (candidate) => {
      if (candidate.content === null) return err("invalid_candidate");
      return createCritiqueResult({
        severity: candidate.content.length < 5 ? 0.8 : 0,
        issues: candidate.content.length < 5 ? ["Too short"] : [],
      });
    },
  };

  it("critiques each candidate in order", async () => {
    const result = await critiqueBatch(lengthCritiquer, [
      createCandidateOrThrow({ content: "No" }),
      createCandidateOrThrow({ content: "Canberra is the capital" }),
    ]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((c) => c.severity)).toEqual([0.8, 0]);
  });

  it("returns the first failure", async () => {
    const result = await critiqueBatch(lengthCritiquer, [
      createCandidateOrThrow({ content: "Fine answer" }),
      createCandidateOrThrow({ content: null }),
    ]);
    expect(result).toEqual({ ok: false, error: "invalid_candidate" });
  });
});
