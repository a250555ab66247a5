/**
 * Exploration and learning-rate schedules, indexed by training episode.
 */

import type { QLearningConfig } from "../types";

type EpsilonSchedule = Pick<QLearningConfig, "epsilonStart" | "epsilonEnd" | "epsilonDecayEpisodes">;
type LearningRateSchedule = Pick<QLearningConfig, "learningRate" | "epsilonDecayEpisodes">;

// Fraction of the decay horizon spent on the fast first phase
const EPSILON_SPLIT_FRACTION = 0.3;

// Exploration level reached at the end of the first phase
const EPSILON_MID_FLOOR = 0.3;

// Final learning rate as a fraction of the initial one
const LEARNING_RATE_END_FRACTION = 0.1;

function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * t;
}

/**
 * Two-phase piecewise-linear epsilon: start down to max(0.3, end) over the
 * first 30% of the horizon, then down to end. Clamped to [end, start].
 */
export function epsilonAt(config: EpsilonSchedule, episode: number): number {
  const { epsilonStart: start, epsilonEnd: end, epsilonDecayEpisodes: decay } = config;
  if (episode >= decay) {
    return end;
  }

  const split = Math.max(1, Math.floor(EPSILON_SPLIT_FRACTION * decay));
  const mid = Math.max(EPSILON_MID_FLOOR, end);
  const value =
    episode <= split
      ? lerp(start, mid, episode / split)
      : lerp(mid, end, (episode - split) / (decay - split));

  return Math.min(Math.max(value, end), start);
}

export function learningRateEnd(config: Pick<QLearningConfig, "learningRate">): number {
  return LEARNING_RATE_END_FRACTION * config.learningRate;
}

/**
 * Linear decay from learningRate to 10% of it over the decay horizon.
 */
export function learningRateAt(config: LearningRateSchedule, episode: number): number {
  const end = learningRateEnd(config);
  if (episode >= config.epsilonDecayEpisodes) {
    return end;
  }
  const t = Math.max(0, episode) / config.epsilonDecayEpisodes;
  return lerp(config.learningRate, end, t);
}
