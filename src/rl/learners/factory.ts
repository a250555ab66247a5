/**
 * Learner Factory
 *
 * Creates learner instances by type, fresh or from saved state.
 */

import type { LearnerType, QLearningConfig } from "../types";
import { BaseLearner } from "./base";
import { QLearner } from "./qlearning";
import { HeuristicPolicy, RandomPolicy } from "./baselines";
import type { RandomSource } from "../random";

export interface LearnerOptions {
  numActions: number;
  random?: RandomSource;
  qlearning?: Partial<Omit<QLearningConfig, "numActions">>;
}

/**
 * Create a fresh (untrained) learner of the specified type.
 */
export function createFreshLearner(type: LearnerType, options: LearnerOptions): BaseLearner {
  const { numActions, random } = options;

  switch (type) {
    case "qlearning":
      return new QLearner({ ...options.qlearning, numActions }, random);
    case "random":
      return new RandomPolicy(numActions, random);
    case "heuristic":
      return new HeuristicPolicy(numActions);
  }
}

/**
 * Create a learner from saved state (for continuing or evaluating a run).
 */
export function createLearnerFromState(
  type: LearnerType,
  savedState: string,
  options: LearnerOptions
): BaseLearner {
  const learner = createFreshLearner(type, options);
  learner.load(savedState);
  return learner;
}
