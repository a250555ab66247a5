/**
 * Metrics Tests
 */

import {
  compareMetrics,
  computeMetrics,
  computeRollingAverage,
  createLearningCurve,
  formatMetrics,
} from "../metrics";
import type { EpisodeMetrics } from "../../types";

function episode(n: number, return_: number, produced: number, targetMet: boolean, steps: number): EpisodeMetrics {
  return {
    episode: n,
    return_,
    producedGoodParts: produced,
    steps,
    finalTime: 1440,
    targetMet,
    timestamp: new Date(0),
  };
}

const EPISODES = [episode(0, 10, 80, false, 100), episode(1, 20, 100, true, 300)];

describe("computeMetrics", () => {
  it("should aggregate returns, production and target hits", () => {
    expect(computeMetrics(EPISODES)).toEqual({
      numEpisodes: 2,
      avgReturn: 15,
      stdReturn: 5,
      avgProduced: 90,
      stdProduced: 10,
      minProduced: 80,
      maxProduced: 100,
      targetHitRate: 0.5,
      avgSteps: 200,
    });
  });

  it("should return zeros for no episodes", () => {
    const metrics = computeMetrics([]);
    expect(metrics.numEpisodes).toBe(0);
    expect(metrics.avgReturn).toBe(0);
    expect(metrics.minProduced).toBe(0);
  });
});

describe("computeRollingAverage", () => {
  it("should average over a trailing window", () => {
    expect(computeRollingAverage([1, 2, 3, 4], 2)).toEqual([1, 1.5, 2.5, 3.5]);
  });
});

describe("createLearningCurve", () => {
  it("should attach evaluations to their episode", () => {
    const curve = createLearningCurve(EPISODES, [{ episode: 1, metrics: computeMetrics(EPISODES) }], 2);

    expect(curve).toHaveLength(2);
    expect(curve[0]).toEqual({ episode: 0, trainReturn: 10, producedGoodParts: 80, rollingReturn: 10 });
    expect(curve[1].rollingReturn).toBe(15);
    expect(curve[1].evalReturn).toBe(15);
    expect(curve[1].evalTargetHitRate).toBe(0.5);
  });
});

describe("formatMetrics", () => {
  it("should render one line per figure", () => {
    expect(formatMetrics(computeMetrics(EPISODES)).split("\n")).toEqual([
      "Episodes: 2",
      "Avg Return: 15.000 ± 5.000",
      "Avg Produced: 90.0 ± 10.0 (min 80, max 100)",
      "Target Hit Rate: 50.0%",
      "Avg Steps: 200.0",
    ]);
  });
});

describe("compareMetrics", () => {
  it("should report relative improvement", () => {
    const baseline = computeMetrics([episode(0, 10, 80, false, 100)]);
    const learned = computeMetrics([episode(0, 15, 100, true, 100)]);

    const comparison = compareMetrics(baseline, learned);
    expect(comparison.avgReturn).toEqual({ baseline: 10, learned: 15, improvement: 50 });
    expect(comparison.avgProduced.improvement).toBe(25);
    expect(comparison.targetHitRate.improvement).toBe(100);
    expect(comparison.avgSteps.improvement).toBe(0);
  });
});
