/**
 * Episode Runner
 *
 * Runs episodes, collects returns, and manages training loops.
 */

import type {
  AggregateMetrics,
  EpisodeMetrics,
  HistoryFrame,
  Learner,
  LearningCurvePoint,
  LearnerType,
} from "../types";
import type { FacilityEnv } from "../environment/gym-wrapper";
import { computeMetrics, createLearningCurve } from "./metrics";
import * as db from "../../lib/db";

// Safety bound on steps in one episode
export const DEFAULT_MAX_STEPS = 10_000;

export interface EpisodeOptions {
  train?: boolean;
  episode?: number;
  recordHistory?: boolean;
  maxSteps?: number;
}

export interface EpisodeResult {
  metrics: EpisodeMetrics;
  history: HistoryFrame[];
}

/**
 * Run a single episode. Training episodes update the learner after every step.
 */
export function runEpisode(
  env: FacilityEnv,
  learner: Learner,
  options: EpisodeOptions = {}
): EpisodeResult {
  const {
    train = true,
    episode = 0,
    recordHistory = false,
    maxSteps = DEFAULT_MAX_STEPS,
  } = options;

  let state = env.reset(recordHistory);
  let totalReturn = 0;
  let steps = 0;

  while (!env.isDone() && steps < maxSteps) {
    const action = learner.selectAction(state, episode, !train);
    const result = env.step(action);

    if (train) {
      learner.update(state, action, result.reward, result.state, result.done, episode);
    }

    totalReturn += result.reward;
    state = result.state;
    steps++;
  }

  const produced = env.producedGoodParts;
  return {
    metrics: {
      episode,
      return_: totalReturn,
      producedGoodParts: produced,
      steps,
      finalTime: env.currentTime,
      targetMet: produced >= env.getParams().dailyTarget,
      timestamp: new Date(),
    },
    history: env.getHistory(),
  };
}

/**
 * Run multiple greedy episodes for evaluation (no training).
 */
export function runEvaluation(
  env: FacilityEnv,
  learner: Learner,
  numEpisodes: number
): { episodes: EpisodeMetrics[]; metrics: AggregateMetrics } {
  const episodes: EpisodeMetrics[] = [];

  for (let i = 0; i < numEpisodes; i++) {
    episodes.push(runEpisode(env, learner, { train: false, episode: i }).metrics);
  }

  return { episodes, metrics: computeMetrics(episodes) };
}

/**
 * Training configuration.
 */
export interface TrainingConfig {
  numEpisodes: number;
  evalInterval: number;
  evalEpisodes: number;
  logInterval: number;
  historyInterval: number;
  rollingWindow?: number;
  startEpisode?: number; // First episode index, for continued runs
}

export const DEFAULT_TRAINING_CONFIG: TrainingConfig = {
  numEpisodes: 500,
  evalInterval: 100,
  evalEpisodes: 10,
  logInterval: 50,
  historyInterval: 100,
  rollingWindow: 100,
};

/**
 * Training result.
 */
export interface TrainingResult {
  trainEpisodes: EpisodeMetrics[];
  evalResults: Array<{ episode: number; metrics: AggregateMetrics }>;
  learningCurve: LearningCurvePoint[];
  finalMetrics: AggregateMetrics;
  bestEpisode: { episode: number; return_: number; history: HistoryFrame[] } | null;
  trainTimeMs: number;
}

/**
 * Callback for training progress.
 */
export type TrainingCallback = (
  episode: number,
  metrics: EpisodeMetrics,
  evalMetrics?: AggregateMetrics
) => void;

/**
 * Train a learner and evaluate periodically.
 */
export function trainAndEvaluate(
  env: FacilityEnv,
  learner: Learner,
  config: TrainingConfig,
  callback?: TrainingCallback
): TrainingResult {
  const startTime = Date.now();
  const startEpisode = config.startEpisode ?? 0;
  const trainEpisodes: EpisodeMetrics[] = [];
  const evalResults: Array<{ episode: number; metrics: AggregateMetrics }> = [];
  let bestEpisode: TrainingResult["bestEpisode"] = null;

  console.log(`Starting training: ${config.numEpisodes} episodes`);
  for (let i = 0; i < config.numEpisodes; i++) {
    const ep = startEpisode + i;
    const recordHistory = config.historyInterval > 0 && i % config.historyInterval === 0;

    const { metrics: episode, history } = runEpisode(env, learner, {
      train: true,
      episode: ep,
      recordHistory,
    });
    trainEpisodes.push(episode);

    // Keep the best recorded episode for replay
    if (recordHistory && (bestEpisode === null || episode.return_ > bestEpisode.return_)) {
      bestEpisode = { episode: ep, return_: episode.return_, history };
    }

    // Log progress
    if (config.logInterval > 0 && (i + 1) % config.logInterval === 0) {
      const recentMetrics = computeMetrics(trainEpisodes.slice(-config.logInterval));
      console.log(
        `${progressBar(i + 1, config.numEpisodes)} Episode ${i + 1}/${config.numEpisodes} | ` +
        `Avg Return: ${recentMetrics.avgReturn.toFixed(3)} | ` +
        `Avg Produced: ${recentMetrics.avgProduced.toFixed(1)} | ` +
        `Target Hit: ${(recentMetrics.targetHitRate * 100).toFixed(1)}%`
      );
    }

    // Evaluate periodically
    let evalMetrics: AggregateMetrics | undefined;
    if (config.evalInterval > 0 && config.evalEpisodes > 0 && (i + 1) % config.evalInterval === 0) {
      evalMetrics = runEvaluation(env, learner, config.evalEpisodes).metrics;
      evalResults.push({ episode: ep, metrics: evalMetrics });

      console.log(
        `  Eval @ ${i + 1}: Return ${evalMetrics.avgReturn.toFixed(3)} | ` +
        `Target Hit ${(evalMetrics.targetHitRate * 100).toFixed(1)}%`
      );
    }

    if (callback) {
      callback(ep, episode, evalMetrics);
    }
  }

  // Final evaluation (skip if evalEpisodes is 0)
  let finalMetrics: AggregateMetrics;
  if (config.evalEpisodes > 0) {
    finalMetrics = runEvaluation(env, learner, config.evalEpisodes * 2).metrics;
  } else {
    finalMetrics = computeMetrics(trainEpisodes);
    console.log("Skipping final evaluation (--no-eval or evalEpisodes=0)");
  }

  return {
    trainEpisodes,
    evalResults,
    learningCurve: createLearningCurve(trainEpisodes, evalResults, config.rollingWindow),
    finalMetrics,
    bestEpisode,
    trainTimeMs: Date.now() - startTime,
  };
}

/**
 * Run baseline evaluation (no training).
 */
export function runBaseline(
  env: FacilityEnv,
  learner: Learner,
  numEpisodes: number
): { episodes: EpisodeMetrics[]; metrics: AggregateMetrics } {
  console.log(`Running baseline (${numEpisodes} episodes)...`);
  const result = runEvaluation(env, learner, numEpisodes);
  console.log(
    `Baseline: Return ${result.metrics.avgReturn.toFixed(3)} | ` +
    `Target Hit ${(result.metrics.targetHitRate * 100).toFixed(1)}%`
  );
  return result;
}

/**
 * Save training results to SQLite database.
 */
export function saveResultsToDb(
  experimentId: string,
  learnerType: LearnerType,
  results: TrainingResult,
  learnerState: string,
  config?: TrainingConfig
): void {
  db.createExperiment({
    id: experimentId,
    type: "training",
    learnerType,
    config,
    finalMetrics: results.finalMetrics,
    learnerState,
    trainTimeMs: results.trainTimeMs,
  });

  db.addLearningCurvePoints(
    results.learningCurve.map((point) => ({
      experimentId,
      episodeNum: point.episode,
      trainReturn: point.trainReturn,
      producedParts: point.producedGoodParts,
      rollingReturn: point.rollingReturn,
      evalReturn: point.evalReturn,
      evalTargetHitRate: point.evalTargetHitRate,
    }))
  );

  db.createEpisodesBatch(
    results.trainEpisodes.map((ep) => ({
      id: `${experimentId}-ep-${ep.episode}`,
      experimentId,
      episodeNum: ep.episode,
      totalReturn: ep.return_,
      producedParts: ep.producedGoodParts,
      steps: ep.steps,
      finalTime: ep.finalTime,
      targetMet: ep.targetMet,
    }))
  );

  console.log(`Saved ${results.trainEpisodes.length} episodes to database (experiment: ${experimentId})`);
}

/**
 * Simple progress bar for console output.
 */
export function progressBar(current: number, total: number, width: number = 30): string {
  const percent = total > 0 ? current / total : 1;
  const filled = Math.round(width * percent);
  const empty = width - filled;
  return `[${"=".repeat(filled)}${" ".repeat(empty)}] ${(percent * 100).toFixed(1)}%`;
}
