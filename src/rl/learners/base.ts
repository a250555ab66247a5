/**
 * Base Learner Interface and Utilities
 *
 * Common base class that all learners extend, plus shared action-selection helpers.
 */

import type { Learner, RLAction, StateKey } from "../types";
import { pick, randomInt, type RandomSource } from "../random";

/**
 * All actions whose value equals the maximum.
 */
export function argmaxActions(values: readonly number[]): RLAction[] {
  let best = -Infinity;
  let actions: RLAction[] = [];

  values.forEach((value, action) => {
    if (value > best) {
      best = value;
      actions = [action];
    } else if (value === best) {
      actions.push(action);
    }
  });

  return actions;
}

/**
 * Epsilon-greedy action selection over a dense row of action values.
 * With probability epsilon, pick random. Otherwise pick best, ties at random.
 */
export function epsilonGreedy(
  values: readonly number[],
  epsilon: number,
  random: RandomSource
): RLAction {
  if (epsilon > 0 && random.next() < epsilon) {
    // Random exploration
    return randomInt(random, values.length);
  }

  // Greedy exploitation
  return pick(random, argmaxActions(values));
}

/**
 * Abstract base class providing common functionality.
 */
export abstract class BaseLearner implements Learner {
  protected episodesTrained: number = 0;
  protected lastUpdated: Date = new Date();

  abstract selectAction(state: StateKey, episode: number, greedy?: boolean): RLAction;

  abstract update(
    state: StateKey,
    action: RLAction,
    reward: number,
    nextState: StateKey,
    done: boolean,
    episode?: number
  ): void;

  abstract save(): string;

  abstract load(data: string): void;

  abstract reset(): void;

  getEpisodesTrained(): number {
    return this.episodesTrained;
  }

  /**
   * Increment episode counter.
   */
  protected incrementEpisode(): void {
    this.episodesTrained++;
    this.lastUpdated = new Date();
  }

  protected getBaseMetadata(): { episodesTrained: number; lastUpdated: string } {
    return {
      episodesTrained: this.episodesTrained,
      lastUpdated: this.lastUpdated.toISOString(),
    };
  }
}
