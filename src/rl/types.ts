/**
 * Core RL types for the shop-floor assignment environment.
 *
 * These types define the state/action/reward interface that learners
 * interact with, plus the facility entities the simulator owns.
 */

// ============ Facility Entities ============

export type MachineStatus = "idle" | "busy" | "broken" | "maintenance";

export type WorkerStatus = "idle" | "busy";

/**
 * Task currently being processed on a machine.
 */
export interface ActiveTask {
  minutes: number; // Full processing duration
  remaining: number; // Countdown until completion
}

/**
 * A physical machine. `currentWorker` is set iff `status === "busy"`.
 */
export interface Machine {
  id: number;
  typeIndex: number;
  priority: number; // Higher is serviced first
  status: MachineStatus;
  currentWorker: number | null;
  task: ActiveTask | null;
}

/**
 * A labor unit. The link to `currentMachine` mirrors the machine's `currentWorker`.
 */
export interface Worker {
  id: number;
  status: WorkerStatus;
  currentMachine: number | null;
}

// ============ State Representation ============

/**
 * Discretized decision context:
 * [machineId, priority, shift, timeBucket, gapBucket, workerIdle, skillBuckets, machineStatuses]
 */
export type StateKey = readonly [
  machineId: number,
  priority: number,
  shift: number,
  timeBucket: number,
  gapBucket: number,
  workerIdle: readonly number[],
  skillBuckets: readonly number[],
  machineStatuses: readonly number[],
];

/**
 * Textual form of a StateKey, used as the value-table map key.
 */
export type DiscreteStateKey = string;

/**
 * Action index: 0..numWorkers-1 assigns that worker, numWorkers leaves the machine idle.
 */
export type RLAction = number;

// ============ Environment Interface ============

/**
 * Breakdown of reward components for analysis.
 */
export interface RewardBreakdown {
  assignment: number; // Busy-worker no-op and worker-switch penalties
  skill: number; // Skill-tier terms on completed tasks
  quality: number; // Good-part rewards, defect penalties, milestone bonuses
  fatigue: number;
  overCapacity: number;
  utilization: number; // Idle-machine penalty and prevent-idle bonus
  terminal: number; // Goal bonus or shortfall penalty
  total: number;
}

export interface StepInfo {
  producedGoodParts: number;
  currentTime: number;
  currentShift: number;
  rewardBreakdown: RewardBreakdown;
}

/**
 * Result of taking a step in the environment.
 */
export interface StepResult {
  state: StateKey;
  reward: number;
  done: boolean;
  info: StepInfo;
}

/**
 * Snapshot of the floor for timeline rendering.
 */
export interface HistoryFrame {
  time: number;
  shiftIndex: number;
  machineAssignments: (number | null)[];
  workerSkills: (number | null)[];
  machineStatuses: MachineStatus[];
  producedGoodParts: number;
}

// ============ Learner Interface ============

/**
 * Common interface for the Q-learner and the baseline policies.
 */
export interface Learner {
  /**
   * Select an action for the given state. `greedy` disables exploration.
   */
  selectAction(state: StateKey, episode: number, greedy?: boolean): RLAction;

  /**
   * Update from an observed transition. Baselines only count episodes.
   */
  update(
    state: StateKey,
    action: RLAction,
    reward: number,
    nextState: StateKey,
    done: boolean,
    episode?: number
  ): void;

  /**
   * Serialize learner state to JSON.
   */
  save(): string;

  /**
   * Restore learner state from JSON produced by save().
   */
  load(data: string): void;

  /**
   * Reset learner to initial state.
   */
  reset(): void;
}

export type LearnerType = "qlearning" | "random" | "heuristic";

// ============ Learner Configuration ============

/**
 * Configuration for Q-learning.
 */
export interface QLearningConfig {
  numActions: number;
  learningRate: number; // Initial alpha; decays to 10% of this
  discountFactor: number;
  epsilonStart: number;
  epsilonEnd: number;
  epsilonDecayEpisodes: number;
}

/**
 * Columnar form of a value table: one textual key per row, one dense row of
 * `numActions` values per key (0 where absent).
 */
export interface PortableValueTable {
  numActions: number;
  stateKeys: DiscreteStateKey[];
  qValues: Float64Array[];
}

// ============ Evaluation Metrics ============

/**
 * Metrics for a single episode.
 */
export interface EpisodeMetrics {
  episode: number;
  return_: number; // Total reward (return is reserved word)
  producedGoodParts: number;
  steps: number;
  finalTime: number;
  targetMet: boolean;
  timestamp: Date;
}

/**
 * Aggregate metrics over multiple episodes.
 */
export interface AggregateMetrics {
  numEpisodes: number;
  avgReturn: number;
  stdReturn: number;
  avgProduced: number;
  stdProduced: number;
  minProduced: number;
  maxProduced: number;
  targetHitRate: number;
  avgSteps: number;
}

/**
 * Learning curve data point.
 */
export interface LearningCurvePoint {
  episode: number;
  trainReturn: number;
  producedGoodParts: number;
  rollingReturn: number;
  evalReturn?: number;
  evalTargetHitRate?: number;
}
