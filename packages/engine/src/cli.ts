#!/usr/bin/env node

/**
 * CLI entry point for the decision engine.
 *
 * Usage:
 *   npx tsx src/cli.ts                          # bundled sample request
 *   npx tsx src/cli.ts path/to/request.json
 *
 * The request file holds the query, its generated candidates (wire form)
 * and optionally a selection strategy and a fixed confidence score.
 * Without a fixed score, confidence comes from agreement between the
 * candidates. Gate thresholds and actions are read from the environment
 * (see .env.example).
 */

import "dotenv/config";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { DecisionRequestSchema } from "./types.js";
import type { Candidate, DecisionRequest } from "./types.js";
import { loadConfig } from "./config.js";
import { candidateFromMap } from "./candidate/index.js";
import { GenerationResult } from "./generation/result.js";
import { CalibrationGate } from "./routing/gate.js";
import { HeuristicDifficultyEstimator } from "./estimators/heuristic.js";
import { AgreementConfidence, FixedConfidence } from "./estimators/confidence.js";
import { runDecision } from "./pipeline/index.js";
import type { DecisionConfig, DecisionTranscript } from "./pipeline/index.js";

const SAMPLE_REQUEST = fileURLToPath(new URL("../examples/sample-request.json", import.meta.url));

// ── Load and validate the request ────────────────────────────────

async function loadRequest(path: string): Promise<DecisionRequest> {
  const text = await readFile(path, "utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error(`Request file is not valid JSON: ${path}`);
  }

  return DecisionRequestSchema.parse(parsed);
}

function decodeCandidates(request: DecisionRequest): Candidate[] {
  return request.candidates.map((entry, index) => {
    const decoded = candidateFromMap(entry);
    if (!decoded.ok) {
      throw new Error(`Candidate ${index} is invalid: ${decoded.error}`);
    }
    return decoded.value;
  });
}

// ── Run the decision ─────────────────────────────────────────────

/**
 * Runs one decision. Configuration is read here, not at import, so a bad
 * variable rejects like any other failure.
 */
export async function main(
  args: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env
): Promise<DecisionTranscript> {
  const engineConfig = loadConfig(env);
  const requestPath = args[0] ? resolve(args[0]) : SAMPLE_REQUEST;
  const request = await loadRequest(requestPath);
  const strategy = request.strategy ?? engineConfig.selectionStrategy;

  const generation = GenerationResult.createOrThrow(decodeCandidates(request), {
    aggregationMethod: strategy === "vote" ? "majority_vote" : "best_of_n",
  });

  const config: DecisionConfig = {
    gate: CalibrationGate.createOrThrow(engineConfig.calibration),
    difficultyEstimator: HeuristicDifficultyEstimator.createOrThrow(),
    confidenceEstimator:
      request.confidence !== undefined
        ? new FixedConfidence(request.confidence)
        : new AgreementConfidence(),
    strategy,

    onProgress: (stage, detail) => {
      const labels: Record<string, string> = {
        difficulty: "[DIFFICULTY]",
        selection: "[SELECTION]",
        confidence: "[CONFIDENCE]",
        routing: "[ROUTING]",
        complete: "[COMPLETE]",
      };
      console.log(`\n${labels[stage] ?? "[...]"} ${detail}`);
    },
  };

  console.log("=".repeat(70));
  console.log("  ANSWER GATE: Confidence-Gated Answer Routing");
  console.log("=".repeat(70));
  console.log(`\nQuery: ${request.query}`);
  console.log(`Candidates: ${generation.length} | Strategy: ${strategy}`);
  console.log(
    `Thresholds: high ${engineConfig.calibration.highThreshold} / low ${engineConfig.calibration.lowThreshold}`
  );

  return runDecision(request.query, generation, config);
}

function printTranscript(transcript: DecisionTranscript): void {
  console.log("\n" + "=".repeat(70));
  console.log("  DECISION TRANSCRIPT");
  console.log("=".repeat(70));

  if (transcript.difficulty) {
    console.log("\n--- DIFFICULTY ---");
    console.log(`Level: ${transcript.difficulty.level} (score ${transcript.difficulty.score})`);
    console.log(`Reasoning: ${transcript.difficulty.reasoning}`);
  }

  console.log(`\n--- CANDIDATES (${transcript.generation.length}) ---`);
  for (const candidate of transcript.generation.candidates) {
    const marker = candidate.id === transcript.selected?.id ? "*" : " ";
    console.log(`${marker} [${candidate.id}] score ${candidate.score ?? "n/a"}: ${candidate.content ?? ""}`);
  }
  console.log(`Total tokens: ${transcript.generation.totalTokens}`);

  console.log("\n--- CONFIDENCE ---");
  console.log(`Score: ${transcript.confidence.score.toFixed(3)} (${transcript.confidence.method})`);
  if (transcript.confidence.reasoning) {
    console.log(`Reasoning: ${transcript.confidence.reasoning}`);
  }

  console.log("\n--- ROUTING DECISION ---");
  console.log(`Action: ${transcript.routing.action}`);
  console.log(`Reason: ${transcript.routing.reasoning}`);
  console.log(`\nAnswer:\n${transcript.routing.candidate?.content ?? "(none)"}`);
  console.log(`\nDecision duration: ${transcript.durationMs}ms`);
  console.log("=".repeat(70));
}

// ── Entry point ──────────────────────────────────────────────────

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(resolve(entry)).href) {
  main()
    .then(printTranscript)
    .catch((error) => {
      console.error("\nDecision failed:", error);
      process.exit(1);
    });
}
