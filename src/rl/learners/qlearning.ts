/**
 * Tabular Q-Learning Learner
 *
 * Learns Q(state, action) values using temporal difference learning.
 * Uses the textual state key for tabular lookup.
 */

import { z } from "zod";
import type {
  DiscreteStateKey,
  PortableValueTable,
  QLearningConfig,
  RLAction,
  StateKey,
} from "../types";
import { BaseLearner, epsilonGreedy } from "./base";
import { epsilonAt, learningRateAt } from "./schedules";
import { discretizeState, parseStateKey } from "../environment/state-extractor";
import { PersistenceError } from "../errors";
import { defaultRandom, type RandomSource } from "../random";

/**
 * Default Q-learning configuration (numActions comes from the environment).
 */
export const DEFAULT_QLEARNING_CONFIG: Omit<QLearningConfig, "numActions"> = {
  learningRate: 0.1,
  discountFactor: 0.99,
  epsilonStart: 1.0,
  epsilonEnd: 0.05,
  epsilonDecayEpisodes: 500,
};

export type QLearningOptions = Pick<QLearningConfig, "numActions"> & Partial<QLearningConfig>;

const configSchema = z.object({
  numActions: z.number().int().positive(),
  learningRate: z.number().positive(),
  discountFactor: z.number().min(0).max(1),
  epsilonStart: z.number().min(0).max(1),
  epsilonEnd: z.number().min(0).max(1),
  epsilonDecayEpisodes: z.number().int().nonnegative(),
});

const dumpSchema = z.object({
  type: z.literal("qlearning"),
  config: configSchema,
  currentLearningRate: z.number(),
  qTable: z.record(z.string(), z.record(z.string().regex(/^\d+$/), z.number())),
  episodesTrained: z.number().int().nonnegative(),
  lastUpdated: z.string(),
});

/**
 * Tabular Q-Learning learner.
 */
export class QLearner extends BaseLearner {
  private config: QLearningConfig;
  private qTable: Map<DiscreteStateKey, Map<RLAction, number>>;
  private currentLearningRate: number;
  private readonly random: RandomSource;

  constructor(options: QLearningOptions, random: RandomSource = defaultRandom) {
    super();
    this.config = { ...DEFAULT_QLEARNING_CONFIG, ...options };
    this.qTable = new Map();
    this.currentLearningRate = this.config.learningRate;
    this.random = random;
  }

  getConfig(): Readonly<QLearningConfig> {
    return this.config;
  }

  get numActions(): number {
    return this.config.numActions;
  }

  getEpsilon(episode: number): number {
    return epsilonAt(this.config, episode);
  }

  /**
   * Learning rate for an episode. Also becomes the rate used by updates
   * that do not name an episode.
   */
  getLearningRate(episode: number): number {
    this.currentLearningRate = learningRateAt(this.config, episode);
    return this.currentLearningRate;
  }

  getCurrentLearningRate(): number {
    return this.currentLearningRate;
  }

  /**
   * Dense row of values for a state key, 0 where absent.
   */
  private row(stateKey: DiscreteStateKey): number[] {
    const stateQ = this.qTable.get(stateKey);
    return Array.from({ length: this.config.numActions }, (_, a) => stateQ?.get(a) ?? 0);
  }

  private setQ(stateKey: DiscreteStateKey, action: RLAction, value: number): void {
    let stateQ = this.qTable.get(stateKey);
    if (!stateQ) {
      stateQ = new Map();
      this.qTable.set(stateKey, stateQ);
    }
    stateQ.set(action, value);
  }

  /**
   * Max Q-value over all actions for a state; 0 for an unseen state.
   */
  private getMaxQ(stateKey: DiscreteStateKey): number {
    if (!this.qTable.has(stateKey)) {
      return 0;
    }
    return Math.max(...this.row(stateKey));
  }

  /**
   * Select action using epsilon-greedy. `greedy` forces epsilon to 0.
   */
  selectAction(state: StateKey, episode: number, greedy: boolean = false): RLAction {
    const epsilon = greedy ? 0 : this.getEpsilon(episode);
    return epsilonGreedy(this.row(discretizeState(state)), epsilon, this.random);
  }

  /**
   * Update Q-value using TD learning.
   * Q(s,a) <- Q(s,a) + alpha * [r + gamma * max_a' Q(s',a') - Q(s,a)]
   */
  update(
    state: StateKey,
    action: RLAction,
    reward: number,
    nextState: StateKey,
    done: boolean,
    episode?: number
  ): void {
    if (!Number.isInteger(action) || action < 0 || action >= this.config.numActions) {
      throw new RangeError(`Action ${action} outside [0, ${this.config.numActions})`);
    }

    const alpha = episode !== undefined ? this.getLearningRate(episode) : this.currentLearningRate;
    const stateKey = discretizeState(state);
    const currentQ = this.qTable.get(stateKey)?.get(action) ?? 0;

    const targetQ = done
      ? reward
      : reward + this.config.discountFactor * this.getMaxQ(discretizeState(nextState));

    this.setQ(stateKey, action, currentQ + alpha * (targetQ - currentQ));

    if (done) {
      this.incrementEpisode();
    }
  }

  getValue(state: StateKey, action: RLAction): number {
    return this.qTable.get(discretizeState(state))?.get(action) ?? 0;
  }

  /**
   * Get Q-values recorded for a specific state.
   */
  getQValues(state: StateKey): Map<RLAction, number> {
    const stateQ = this.qTable.get(discretizeState(state));
    if (!stateQ) return new Map();
    return new Map(stateQ);
  }

  /**
   * Recorded entries in insertion order.
   */
  entries(): Array<[DiscreteStateKey, ReadonlyMap<RLAction, number>]> {
    return Array.from(this.qTable.entries());
  }

  /**
   * Get Q-table size (number of states and state-action pairs).
   */
  getTableSize(): { states: number; pairs: number } {
    let pairs = 0;
    this.qTable.forEach((actionValues) => {
      pairs += actionValues.size;
    });
    return { states: this.qTable.size, pairs };
  }

  /**
   * Save learner state to JSON.
   */
  save(): string {
    const qTableObj: Record<string, Record<string, number>> = {};
    this.qTable.forEach((actionValues, stateKey) => {
      qTableObj[stateKey] = Object.fromEntries(actionValues);
    });

    return JSON.stringify({
      type: "qlearning",
      config: this.config,
      currentLearningRate: this.currentLearningRate,
      qTable: qTableObj,
      ...this.getBaseMetadata(),
    });
  }

  /**
   * Load learner state from JSON produced by save(). Nothing changes on failure.
   */
  load(jsonData: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(jsonData);
    } catch (err) {
      throw new PersistenceError("Value table dump is not valid JSON", { cause: err });
    }

    const parsed = dumpSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Malformed value table dump: ${parsed.error.issues[0].message}`, {
        cause: parsed.error,
      });
    }
    const data = parsed.data;

    const qTable = new Map<DiscreteStateKey, Map<RLAction, number>>();
    for (const [stateKey, actionValues] of Object.entries(data.qTable)) {
      const stateQ = new Map<RLAction, number>();
      for (const [action, value] of Object.entries(actionValues)) {
        const index = Number(action);
        if (index >= data.config.numActions) {
          throw new PersistenceError(`Action ${index} out of range for state ${stateKey}`);
        }
        stateQ.set(index, value);
      }
      qTable.set(stateKey, stateQ);
    }

    this.config = data.config;
    this.currentLearningRate = data.currentLearningRate;
    this.qTable = qTable;
    this.episodesTrained = data.episodesTrained;
    this.lastUpdated = new Date(data.lastUpdated);
  }

  /**
   * Replace the table with the non-zero entries of a portable table.
   * Every key is parsed back to its structured form; nothing changes on failure.
   */
  loadPortable(table: PortableValueTable): void {
    if (table.numActions !== this.config.numActions) {
      throw new PersistenceError(
        `Portable table has ${table.numActions} actions, learner expects ${this.config.numActions}`
      );
    }
    if (table.stateKeys.length !== table.qValues.length) {
      throw new PersistenceError(
        `Portable table has ${table.stateKeys.length} keys but ${table.qValues.length} rows`
      );
    }

    const qTable = new Map<DiscreteStateKey, Map<RLAction, number>>();
    table.stateKeys.forEach((text, rowIndex) => {
      let key: DiscreteStateKey;
      try {
        key = discretizeState(parseStateKey(text));
      } catch (err) {
        throw new PersistenceError(`Unparsable state key in row ${rowIndex}`, { cause: err });
      }

      const values = table.qValues[rowIndex];
      if (values.length !== table.numActions) {
        throw new PersistenceError(
          `Row ${rowIndex} has ${values.length} values, expected ${table.numActions}`
        );
      }

      values.forEach((value, action) => {
        if (value !== 0) {
          let stateQ = qTable.get(key);
          if (!stateQ) {
            stateQ = new Map();
            qTable.set(key, stateQ);
          }
          stateQ.set(action, value);
        }
      });
    });

    this.qTable = qTable;
  }

  /**
   * Reset learner to initial state.
   */
  reset(): void {
    this.qTable = new Map();
    this.currentLearningRate = this.config.learningRate;
    this.episodesTrained = 0;
    this.lastUpdated = new Date();
  }
}
