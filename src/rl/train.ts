/**
 * Training Script
 *
 * Main entry point for running shop-floor RL experiments.
 * Run with: npx tsx src/rl/train.ts [command] [options]
 */

// Load environment variables from .env.local
import { config } from "dotenv";
config({ path: ".env.local" });

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { DEMO_FACILITY_PARAMS, loadFacilityParams, numActionsFor, type FacilityParams } from "./config";
import { createEnvironment, type FacilityEnv } from "./environment/gym-wrapper";
import { QLearner } from "./learners/qlearning";
import type { BaseLearner } from "./learners/base";
import { createFreshLearner, createLearnerFromState } from "./learners/factory";
import { createSeededRandom, defaultRandom, type RandomSource } from "./random";
import {
  DEFAULT_TRAINING_CONFIG,
  TrainingConfig,
  TrainingResult,
  runBaseline,
  saveResultsToDb,
  trainAndEvaluate,
} from "./evaluation/runner";
import { compareMetrics, formatMetrics } from "./evaluation/metrics";
import { saveNativeValueTable } from "./persistence/native";
import { loadPortableValueTable, savePortableValueTable } from "./persistence/portable";
import { loadSettings, type Settings } from "./settings";
import * as db from "../lib/db";

// ============ Configuration ============

const QUICK_TRAINING_CONFIG: TrainingConfig = {
  numEpisodes: 100,
  evalInterval: 25,
  evalEpisodes: 5,
  logInterval: 25,
  historyInterval: 25,
  rollingWindow: 25,
};

// Seed for evaluation runs when none is given
const EVALUATION_SEED = 123;

const DEFAULT_BASELINE_EPISODES = 100;

export interface CliOptions {
  command: string;
  quick: boolean;
  episodes?: number;
  evalEpisodes?: number;
  skipEval: boolean;
  alpha?: number;
  seed?: number;
  configPath?: string;
  tablePath?: string;
  continueFrom?: string;
}

// ============ Setup ============

function loadParams(options: CliOptions, settings: Settings): FacilityParams {
  const path = options.configPath ?? settings.facilityConfigPath;
  if (!path) {
    return DEMO_FACILITY_PARAMS;
  }
  console.log(`Using facility parameters from ${path}`);
  return loadFacilityParams(path);
}

function makeRunId(name: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  return `${name}-${timestamp}`;
}

function writeJson(path: string, data: unknown): void {
  writeFileSync(path, JSON.stringify(data, null, 2), "utf-8");
  console.log(`Wrote ${path}`);
}

/**
 * Learner-side random source. Offset from the simulator's seed so the two
 * streams differ; unseeded runs use Math.random.
 */
export function learnerRandom(seed?: number): RandomSource {
  return seed !== undefined ? createSeededRandom(seed + 1) : defaultRandom;
}

/**
 * Random and heuristic baselines, each with its own seeded source.
 */
export function createBaselinePolicies(
  numActions: number,
  seed?: number
): Array<[name: "random" | "heuristic", title: string, policy: BaseLearner]> {
  return [
    ["random", "Random Policy", createFreshLearner("random", { numActions, random: learnerRandom(seed) })],
    ["heuristic", "Heuristic Policy", createFreshLearner("heuristic", { numActions })],
  ];
}

// ============ Continued Training ============

/**
 * Load a Q-learner from a previous experiment.
 */
function loadLearnerFromExperiment(experimentId: string, numActions: number, seed?: number): QLearner {
  const experiment = db.getExperiment(experimentId);
  if (!experiment) {
    throw new Error(`Experiment not found: ${experimentId}`);
  }
  if (!experiment.learner_state) {
    throw new Error(`Experiment has no saved learner state: ${experimentId}`);
  }
  if (experiment.learner_type !== "qlearning") {
    throw new Error(`Cannot continue from ${experiment.learner_type ?? "unknown"} policy: ${experimentId}`);
  }

  const learner = createLearnerFromState("qlearning", experiment.learner_state, {
    numActions,
    random: learnerRandom(seed),
  });
  if (!(learner instanceof QLearner)) {
    throw new Error(`Experiment ${experimentId} did not restore a Q-learner`);
  }
  if (learner.numActions !== numActions) {
    throw new Error(`Experiment ${experimentId} has ${learner.numActions} actions, facility has ${numActions}`);
  }

  const size = learner.getTableSize();
  console.log(`Loaded qlearning from ${experimentId}`);
  console.log(`  Episodes previously trained: ${learner.getEpisodesTrained()}`);
  console.log(`  Q-table size: ${size.states} states, ${size.pairs} pairs`);
  return learner;
}

const storedMetricsSchema = z.object({ targetHitRate: z.number(), avgProduced: z.number() }).partial();
const storedConfigSchema = z.object({ numEpisodes: z.number() }).partial();

function parseStored<T>(schema: z.ZodType<T>, json: string | null): T | null {
  if (!json) return null;
  const parsed = schema.safeParse(JSON.parse(json));
  return parsed.success ? parsed.data : null;
}

/**
 * List stored experiments.
 */
export function listAvailableExperiments(): void {
  const experiments = db.listExperiments();
  if (experiments.length === 0) {
    console.log("No experiments found.");
    return;
  }

  console.log("\nStored experiments:\n");
  console.log("ID                                          Type        Learner     Episodes    Target Hit  Avg Return");
  console.log("-".repeat(107));

  for (const exp of experiments.slice(0, 20)) {
    const metrics = parseStored(storedMetricsSchema, exp.final_metrics_json);
    const config = parseStored(storedConfigSchema, exp.config_json);
    const episodes = config?.numEpisodes ?? "?";
    const hitRate =
      metrics?.targetHitRate !== undefined ? `${(metrics.targetHitRate * 100).toFixed(1)}%` : "N/A";
    // Stored training episodes, when the run kept any
    const stats = db.getExperimentStats(exp.id);
    const avgReturn = stats.totalEpisodes > 0 ? stats.avgReturn.toFixed(2) : "N/A";

    console.log(
      `${exp.id.padEnd(44)} ${exp.type.padEnd(11)} ${(exp.learner_type ?? "?").padEnd(11)} ` +
      `${String(episodes).padEnd(11)} ${hitRate.padEnd(11)} ${avgReturn}`
    );
  }

  if (experiments.length > 20) {
    console.log(`\n... and ${experiments.length - 20} more`);
  }
}

// ============ Experiment Runners ============

/**
 * Train a Q-learner, write its tables and series, and store the run.
 */
function runTraining(
  env: FacilityEnv,
  config: TrainingConfig,
  options: CliOptions,
  settings: Settings
): TrainingResult {
  console.log("\n" + "=".repeat(60));
  console.log(options.continueFrom ? "Q-LEARNING TRAINING (CONTINUED)" : "Q-LEARNING TRAINING");
  console.log("=".repeat(60));

  const seed = options.seed ?? settings.seed;
  let learner: QLearner;
  if (options.continueFrom) {
    learner = loadLearnerFromExperiment(options.continueFrom, env.numActions, seed);
  } else {
    learner = new QLearner(
      { numActions: env.numActions, ...(options.alpha !== undefined && { learningRate: options.alpha }) },
      learnerRandom(seed)
    );
  }
  const qConfig = learner.getConfig();
  console.log(
    `Using alpha=${qConfig.learningRate}, gamma=${qConfig.discountFactor}, ` +
    `epsilon=${qConfig.epsilonStart}->${qConfig.epsilonEnd} over ${qConfig.epsilonDecayEpisodes} episodes`
  );

  const previousEpisodes = learner.getEpisodesTrained();
  const result = trainAndEvaluate(env, learner, { ...config, startEpisode: previousEpisodes });

  console.log("\n--- Final Results ---");
  console.log(formatMetrics(result.finalMetrics));
  console.log(`Training time: ${(result.trainTimeMs / 1000).toFixed(1)}s`);
  const size = learner.getTableSize();
  console.log(`Q-table size: ${size.states} states, ${size.pairs} pairs`);
  if (options.continueFrom) {
    console.log(`Total episodes trained: ${learner.getEpisodesTrained()}`);
  }

  // Record the run before writing files
  const experimentId = makeRunId("qlearning");
  saveResultsToDb(experimentId, "qlearning", result, learner.save(), config);
  if (options.continueFrom) {
    console.log(`Continued from: ${options.continueFrom}`);
  }

  const outputDir = settings.outputDir;
  mkdirSync(outputDir, { recursive: true });
  saveNativeValueTable(join(outputDir, "q_table.json"), learner);
  savePortableValueTable(join(outputDir, "q_table.sqlite"), learner);
  console.log(`Wrote value tables to ${outputDir}`);

  writeJson(join(outputDir, "returns.json"), {
    returns: result.trainEpisodes.map((ep) => ep.return_),
    producedGoodParts: result.trainEpisodes.map((ep) => ep.producedGoodParts),
  });
  if (result.bestEpisode) {
    writeJson(join(outputDir, "best-episode-history.json"), result.bestEpisode);
  }

  return result;
}

/**
 * Evaluate a portable value table greedily.
 */
function runTableEvaluation(env: FacilityEnv, numEpisodes: number, tablePath: string, seed: number): void {
  console.log("\n" + "=".repeat(60));
  console.log("GREEDY EVALUATION");
  console.log("=".repeat(60));

  const learner = new QLearner({ numActions: env.numActions }, learnerRandom(seed));
  loadPortableValueTable(tablePath, learner);
  const size = learner.getTableSize();
  console.log(`Loaded ${tablePath}: ${size.states} states, ${size.pairs} pairs`);

  const result = runBaseline(env, learner, numEpisodes);
  console.log(formatMetrics(result.metrics));

  const randomPolicy = createFreshLearner("random", { numActions: env.numActions, random: learnerRandom(seed) });
  const random = runBaseline(env, randomPolicy, numEpisodes);
  const comparison = compareMetrics(random.metrics, result.metrics);
  console.log("\n--- Comparison with Random Baseline ---");
  console.log(`  Return improvement: ${comparison.avgReturn.improvement.toFixed(1)}%`);
  console.log(`  Production improvement: ${comparison.avgProduced.improvement.toFixed(1)}%`);

  db.createExperiment({
    id: makeRunId("evaluation"),
    type: "evaluation",
    learnerType: "qlearning",
    config: { numEpisodes, tablePath },
    finalMetrics: result.metrics,
  });
}

/**
 * Run baseline experiments (random and heuristic).
 */
function runBaselineExperiments(env: FacilityEnv, numEpisodes: number, seed?: number): void {
  console.log("\n" + "=".repeat(60));
  console.log("BASELINE EXPERIMENTS");
  console.log("=".repeat(60));

  for (const [name, title, policy] of createBaselinePolicies(env.numActions, seed)) {
    console.log(`\n--- ${title} ---`);
    const result = runBaseline(env, policy, numEpisodes);
    console.log(formatMetrics(result.metrics));

    db.createExperiment({
      id: makeRunId(name),
      type: "baseline",
      learnerType: name,
      config: { numEpisodes },
      finalMetrics: result.metrics,
    });
  }
}

// ============ CLI Interface ============

function printUsage(): void {
  console.log(`
Shop-floor Q-learning training script

Usage: npx tsx src/rl/train.ts [command] [options]

Commands:
  train         Train a Q-learner (default)
  evaluate      Greedy evaluation of a portable value table
  baseline      Run random and heuristic baselines
  list          List stored experiments

Options:
  --quick            Use reduced episode count for faster iteration
  --episodes N       Override number of training episodes
  --eval-episodes N  Override number of evaluation episodes (final eval runs 2x)
  --no-eval          Skip evaluation entirely (just train and save)
  --alpha N          Initial learning rate (default: 0.1)
  --seed N           Seed the simulator and learner
  --config PATH      Facility parameter JSON (default: built-in demo facility)
  --table PATH       Portable value table for evaluate (default: <output>/q_table.sqlite)
  --continue ID      Continue training from a stored experiment
  --help             Show this help message

Examples:
  npx tsx src/rl/train.ts train --quick --seed 7
  npx tsx src/rl/train.ts train --episodes 2000 --config config/demo-facility.json
  npx tsx src/rl/train.ts evaluate --eval-episodes 50
  npx tsx src/rl/train.ts train --continue <experiment-id> --episodes 500
`);
}

function parseNumber(args: string[], flag: string, parse: (raw: string) => number): number | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || args[idx + 1] === undefined) {
    return undefined;
  }
  const value = parse(args[idx + 1]);
  if (Number.isNaN(value)) {
    throw new Error(`${flag} expects a number, got "${args[idx + 1]}"`);
  }
  return value;
}

function parseString(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 ? args[idx + 1] : undefined;
}

const VALUE_FLAGS = ["--episodes", "--eval-episodes", "--alpha", "--seed", "--config", "--table", "--continue"];

export function parseArgs(args: string[]): CliOptions {
  const int = (raw: string) => parseInt(raw, 10);

  // Command is the first bare word that is not a flag's value
  const command =
    args.find((a, i) => !a.startsWith("--") && !(i > 0 && VALUE_FLAGS.includes(args[i - 1]))) ?? "train";

  return {
    command,
    quick: args.includes("--quick"),
    episodes: parseNumber(args, "--episodes", int),
    evalEpisodes: parseNumber(args, "--eval-episodes", int),
    skipEval: args.includes("--no-eval"),
    alpha: parseNumber(args, "--alpha", parseFloat),
    seed: parseNumber(args, "--seed", int),
    configPath: parseString(args, "--config"),
    tablePath: parseString(args, "--table"),
    continueFrom: parseString(args, "--continue"),
  };
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    printUsage();
    return;
  }

  const options = parseArgs(args);
  const settings = loadSettings();
  db.configureDb(settings.dbPath);

  try {
    // Handle list command (doesn't need environment)
    if (options.command === "list") {
      listAvailableExperiments();
      return;
    }

    const params = loadParams(options, settings);
    const seed = options.seed ?? settings.seed;
    console.log(
      `Facility: ${params.numMachines} machines, ${params.numWorkers} workers, ` +
      `${params.numShifts}x${params.shiftLengthMinutes} min shifts, target ${params.dailyTarget} (${numActionsFor(params)} actions)`
    );

    const baseConfig = options.quick ? QUICK_TRAINING_CONFIG : DEFAULT_TRAINING_CONFIG;
    const trainingConfig: TrainingConfig = {
      ...baseConfig,
      ...(options.episodes !== undefined && { numEpisodes: options.episodes }),
      ...(options.evalEpisodes !== undefined && { evalEpisodes: options.evalEpisodes }),
      ...(options.skipEval && { evalEpisodes: 0 }),
    };

    switch (options.command) {
      case "train":
        runTraining(createEnvironment(params, seed), trainingConfig, options, settings);
        break;

      case "evaluate":
        runTableEvaluation(
          createEnvironment(params, seed ?? EVALUATION_SEED),
          Math.max(1, trainingConfig.evalEpisodes * 2),
          options.tablePath ?? join(settings.outputDir, "q_table.sqlite"),
          seed ?? EVALUATION_SEED
        );
        break;

      case "baseline":
        if (options.continueFrom) {
          throw new Error("Cannot continue from baseline policies.");
        }
        runBaselineExperiments(
          createEnvironment(params, seed),
          options.episodes ?? DEFAULT_BASELINE_EPISODES,
          seed
        );
        break;

      default:
        console.error(`Unknown command: ${options.command}`);
        printUsage();
        process.exitCode = 1;
    }
  } finally {
    db.closeDb();
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((err) => {
    console.error("Error:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
