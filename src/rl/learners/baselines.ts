/**
 * Baseline Policies
 *
 * Non-learning policies for comparison:
 * - RandomPolicy: Uniform random action selection
 * - HeuristicPolicy: Most skilled idle worker, read from the state key
 */

import type { RLAction, StateKey } from "../types";
import { BaseLearner } from "./base";
import { defaultRandom, randomInt, type RandomSource } from "../random";

/**
 * Shared bookkeeping for policies that do not learn.
 */
abstract class FixedPolicy extends BaseLearner {
  protected abstract readonly type: "random" | "heuristic";

  constructor(readonly numActions: number) {
    super();
  }

  update(
    _state: StateKey,
    _action: RLAction,
    _reward: number,
    _nextState: StateKey,
    done: boolean
  ): void {
    // No learning - just track episodes
    if (done) {
      this.incrementEpisode();
    }
  }

  save(): string {
    return JSON.stringify({ type: this.type, numActions: this.numActions, ...this.getBaseMetadata() });
  }

  load(jsonData: string): void {
    const data: unknown = JSON.parse(jsonData);
    if (
      typeof data === "object" &&
      data !== null &&
      "episodesTrained" in data &&
      typeof data.episodesTrained === "number"
    ) {
      this.episodesTrained = data.episodesTrained;
    }
    this.lastUpdated = new Date();
  }

  reset(): void {
    this.episodesTrained = 0;
    this.lastUpdated = new Date();
  }
}

/**
 * Random policy - uniform random action selection.
 * Establishes floor performance.
 */
export class RandomPolicy extends FixedPolicy {
  protected readonly type = "random";

  constructor(numActions: number, private readonly random: RandomSource = defaultRandom) {
    super(numActions);
  }

  selectAction(): RLAction {
    return randomInt(this.random, this.numActions);
  }
}

/**
 * Greedy skill heuristic - assigns the idle worker with the highest skill
 * bucket for the machine in question, lowest id on ties. Leaves the machine
 * idle when nobody is free.
 */
export class HeuristicPolicy extends FixedPolicy {
  protected readonly type = "heuristic";

  selectAction(state: StateKey): RLAction {
    const [, , , , , workerIdle, skillBuckets] = state;

    let best: RLAction = this.numActions - 1;
    let bestBucket = -1;
    workerIdle.forEach((idle, worker) => {
      if (idle === 1 && skillBuckets[worker] > bestBucket) {
        bestBucket = skillBuckets[worker];
        best = worker;
      }
    });

    return best;
  }
}
