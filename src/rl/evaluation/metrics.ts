/**
 * Evaluation Metrics
 *
 * Compute aggregate metrics from episode results.
 */

import type { AggregateMetrics, EpisodeMetrics, LearningCurvePoint } from "../types";

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

// Population standard deviation
function std(values: number[], avg: number): number {
  return Math.sqrt(values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length);
}

/**
 * Compute aggregate metrics from a list of episodes.
 */
export function computeMetrics(episodes: EpisodeMetrics[]): AggregateMetrics {
  if (episodes.length === 0) {
    return {
      numEpisodes: 0,
      avgReturn: 0,
      stdReturn: 0,
      avgProduced: 0,
      stdProduced: 0,
      minProduced: 0,
      maxProduced: 0,
      targetHitRate: 0,
      avgSteps: 0,
    };
  }

  const returns = episodes.map((e) => e.return_);
  const produced = episodes.map((e) => e.producedGoodParts);
  const avgReturn = mean(returns);
  const avgProduced = mean(produced);

  return {
    numEpisodes: episodes.length,
    avgReturn,
    stdReturn: std(returns, avgReturn),
    avgProduced,
    stdProduced: std(produced, avgProduced),
    minProduced: Math.min(...produced),
    maxProduced: Math.max(...produced),
    targetHitRate: episodes.filter((e) => e.targetMet).length / episodes.length,
    avgSteps: mean(episodes.map((e) => e.steps)),
  };
}

/**
 * Compute rolling average for learning curve smoothing.
 */
export function computeRollingAverage(values: number[], windowSize: number): number[] {
  const result: number[] = [];

  for (let i = 0; i < values.length; i++) {
    const start = Math.max(0, i - windowSize + 1);
    result.push(mean(values.slice(start, i + 1)));
  }

  return result;
}

/**
 * Create learning curve data from training episodes, attaching the greedy
 * evaluation taken after an episode where there was one.
 */
export function createLearningCurve(
  episodes: EpisodeMetrics[],
  evalResults: Array<{ episode: number; metrics: AggregateMetrics }> = [],
  rollingWindow: number = 100
): LearningCurvePoint[] {
  const rolling = computeRollingAverage(
    episodes.map((e) => e.return_),
    rollingWindow
  );
  const evalByEpisode = new Map(evalResults.map((r) => [r.episode, r.metrics]));

  return episodes.map((ep, i) => {
    const point: LearningCurvePoint = {
      episode: ep.episode,
      trainReturn: ep.return_,
      producedGoodParts: ep.producedGoodParts,
      rollingReturn: rolling[i],
    };

    const evalMetrics = evalByEpisode.get(ep.episode);
    if (evalMetrics) {
      point.evalReturn = evalMetrics.avgReturn;
      point.evalTargetHitRate = evalMetrics.targetHitRate;
    }

    return point;
  });
}

/**
 * Format metrics for display.
 */
export function formatMetrics(metrics: AggregateMetrics): string {
  return [
    `Episodes: ${metrics.numEpisodes}`,
    `Avg Return: ${metrics.avgReturn.toFixed(3)} ± ${metrics.stdReturn.toFixed(3)}`,
    `Avg Produced: ${metrics.avgProduced.toFixed(1)} ± ${metrics.stdProduced.toFixed(1)} (min ${metrics.minProduced}, max ${metrics.maxProduced})`,
    `Target Hit Rate: ${(metrics.targetHitRate * 100).toFixed(1)}%`,
    `Avg Steps: ${metrics.avgSteps.toFixed(1)}`,
  ].join("\n");
}

/**
 * Compare two sets of metrics.
 */
export function compareMetrics(
  baseline: AggregateMetrics,
  learned: AggregateMetrics
): Record<string, { baseline: number; learned: number; improvement: number }> {
  const compare = (b: number, l: number) => ({
    baseline: b,
    learned: l,
    improvement: b !== 0 ? ((l - b) / Math.abs(b)) * 100 : l > 0 ? 100 : 0,
  });

  return {
    avgReturn: compare(baseline.avgReturn, learned.avgReturn),
    avgProduced: compare(baseline.avgProduced, learned.avgProduced),
    targetHitRate: compare(baseline.targetHitRate, learned.targetHitRate),
    avgSteps: compare(baseline.avgSteps, learned.avgSteps),
  };
}
