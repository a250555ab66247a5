/**
 * Gym-style Environment Wrapper
 *
 * Provides reset() / step() over a discrete-event model of the shop floor.
 * Several machines process tasks at once; each step resolves one assignment
 * decision and then advances time to the next task completion.
 */

import type {
  ActiveTask,
  HistoryFrame,
  Machine,
  MachineStatus,
  RLAction,
  RewardBreakdown,
  StateKey,
  StepResult,
  Worker,
} from "../types";
import {
  DEMO_FACILITY_PARAMS,
  dayDurationMinutes,
  numActionsFor,
  parseFacilityParams,
  type FacilityParams,
} from "../config";
import { createSeededRandom, defaultRandom, uniform, type RandomSource } from "../random";
import { extractState } from "./state-extractor";
import { RewardCalculator, computeFatigue, createBreakdown } from "./reward";

// Countdowns at or below this are complete
const COMPLETION_EPSILON = 1e-4;

// Minimum spacing between periodic history frames
const HISTORY_INTERVAL_MINUTES = 0.5;

// Skill floor used when dividing base processing time
const MIN_SKILL_DIVISOR = 0.1;

// Time step when nothing is in flight
const IDLE_TICK_MINUTES = 1;

type Downtime = FacilityParams["breakdown"];

/**
 * Gym-style RL environment for worker-to-machine assignment.
 */
export class FacilityEnv {
  private readonly params: FacilityParams;
  private readonly random: RandomSource;
  private readonly rewardCalc: RewardCalculator;
  private readonly dayDuration: number;

  private machines: Machine[] = [];
  private workers: Worker[] = [];
  private downUntil: (number | null)[] = [];
  private lastWorkerPerMachine: (number | null)[] = [];
  private workedMinutes: number[][] = [];
  private fatigueLevels: number[] = [];
  private time = 0;
  private produced = 0;
  private decisionMachine: number | null = null;
  private done = false;

  private recordHistory = false;
  private history: HistoryFrame[] = [];
  private lastHistoryTime = 0;

  constructor(params: FacilityParams, random: RandomSource = defaultRandom) {
    this.params = parseFacilityParams(params);
    this.random = random;
    this.dayDuration = dayDurationMinutes(this.params);
    this.rewardCalc = new RewardCalculator(
      this.params.rewards,
      this.params.dailyTarget,
      this.params.fatiguePenaltyScale
    );
    this.reset();
  }

  /**
   * Reset environment for a new episode.
   */
  reset(recordHistory: boolean = false): StateKey {
    const { numMachines, numWorkers, numShifts, machineTypes, machinePriorities } = this.params;

    this.time = 0;
    this.produced = 0;
    this.done = false;

    this.machines = Array.from({ length: numMachines }, (_, id) => ({
      id,
      typeIndex: id % machineTypes.length,
      priority: machinePriorities[id],
      status: "idle" as const,
      currentWorker: null,
      task: null,
    }));
    this.workers = Array.from({ length: numWorkers }, (_, id) => ({
      id,
      status: "idle" as const,
      currentMachine: null,
    }));

    this.downUntil = new Array<number | null>(numMachines).fill(null);
    this.lastWorkerPerMachine = new Array<number | null>(numMachines).fill(null);
    this.workedMinutes = Array.from({ length: numWorkers }, () => new Array<number>(numShifts).fill(0));
    this.fatigueLevels = new Array<number>(numWorkers).fill(0);
    this.rewardCalc.reset();

    this.recordHistory = recordHistory;
    this.history = [];
    this.lastHistoryTime = 0;

    this.decisionMachine = this.selectDecisionMachine();
    return this.getState();
  }

  /**
   * Take a step in the environment.
   *
   * `action` in [0, numWorkers): assign that worker to the machine awaiting a
   * decision. Any other value leaves the machine idle.
   */
  step(action: RLAction): StepResult {
    if (this.done) {
      throw new Error("Episode is done. Call reset() to start a new episode.");
    }

    const breakdown = createBreakdown();
    const decided = this.decisionMachine;

    if (decided !== null && this.isWorkerAction(action)) {
      this.applyDecision(this.machines[decided], this.workers[action], breakdown);
    }

    this.autoFill(decided);
    this.recoverMachines();
    const finished = this.advanceTime();
    this.resolveCompletions(finished, breakdown);

    const idleMachines = this.machines.filter((m) => m.status === "idle" && !this.isDown(m.id)).length;
    const busyMachines = this.machines.filter((m) => m.status === "busy").length;
    this.rewardCalc.utilization(breakdown, idleMachines, busyMachines);

    this.done = this.time >= this.dayDuration;
    if (this.done) {
      this.rewardCalc.terminal(breakdown, this.produced);
    }

    this.decisionMachine = this.done ? null : this.selectDecisionMachine();

    if (this.recordHistory && (this.done || this.time - this.lastHistoryTime >= HISTORY_INTERVAL_MINUTES)) {
      this.recordSnapshot();
    }

    const reward = this.rewardCalc.finalize(breakdown);
    return {
      state: this.getState(),
      reward,
      done: this.done,
      info: {
        producedGoodParts: this.produced,
        currentTime: this.time,
        currentShift: this.currentShiftIndex,
        rewardBreakdown: breakdown,
      },
    };
  }

  // ============ Decision Handling ============

  private isWorkerAction(action: RLAction): boolean {
    return Number.isInteger(action) && action >= 0 && action < this.params.numWorkers;
  }

  private applyDecision(machine: Machine, worker: Worker, breakdown: RewardBreakdown): void {
    if (worker.status === "busy") {
      this.rewardCalc.busyWorker(breakdown);
      return;
    }

    if (worker.currentMachine !== null) {
      const previous = this.machines[worker.currentMachine];
      previous.currentWorker = null;
      previous.status = "idle";
      previous.task = null;
    }

    this.startTask(machine, worker);
    this.recordSnapshot();

    const lastWorker = this.lastWorkerPerMachine[machine.id];
    if (lastWorker !== null && lastWorker !== worker.id) {
      this.rewardCalc.workerSwitch(breakdown);
    }
    this.lastWorkerPerMachine[machine.id] = worker.id;
  }

  /**
   * Fill the remaining idle machines with the most skilled idle workers,
   * highest priority first. Independent of the learned policy.
   */
  private autoFill(decided: number | null): void {
    const available = this.workers.filter((w) => w.status === "idle");

    for (const machineId of this.listAssignableMachines()) {
      if (machineId === decided) continue;
      if (available.length === 0) break;

      const machine = this.machines[machineId];
      let bestIndex = 0;
      let bestSkill = -1;
      available.forEach((w, i) => {
        const skill = this.skillOf(w.id, machine);
        if (skill > bestSkill) {
          bestSkill = skill;
          bestIndex = i;
        }
      });

      const [worker] = available.splice(bestIndex, 1);
      this.startTask(machine, worker);
    }
  }

  private startTask(machine: Machine, worker: Worker): void {
    machine.currentWorker = worker.id;
    machine.status = "busy";
    const minutes = this.processingMinutes(worker.id, machine);
    machine.task = { minutes, remaining: minutes };
    worker.status = "busy";
    worker.currentMachine = machine.id;
  }

  private release(machine: Machine): void {
    if (machine.currentWorker !== null) {
      const worker = this.workers[machine.currentWorker];
      worker.status = "idle";
      worker.currentMachine = null;
    }
    machine.currentWorker = null;
    machine.status = "idle";
    machine.task = null;
  }

  // ============ Time and Completions ============

  private recoverMachines(): void {
    this.downUntil.forEach((until, id) => {
      if (until !== null && this.time >= until) {
        this.downUntil[id] = null;
        const machine = this.machines[id];
        if (machine.status === "broken" || machine.status === "maintenance") {
          machine.status = "idle";
        }
      }
    });
  }

  /**
   * Advance to the next completion (or one idle tick), never past the end of
   * the day. Returns the ids of machines whose task finished.
   */
  private advanceTime(): number[] {
    const horizon = this.dayDuration - this.time;
    const inFlight: Array<{ machine: Machine; task: ActiveTask }> = [];
    for (const machine of this.machines) {
      if (machine.task !== null) {
        inFlight.push({ machine, task: machine.task });
      }
    }

    if (inFlight.length === 0) {
      const advance = Math.min(IDLE_TICK_MINUTES, horizon);
      if (advance > 0) {
        this.moveClock(advance, horizon);
      }
      return [];
    }

    const advance = Math.min(Math.min(...inFlight.map(({ task }) => task.remaining)), horizon);
    if (advance <= 0) {
      return [];
    }

    this.recordSnapshot();
    this.moveClock(advance, horizon);

    const finished: number[] = [];
    for (const { machine, task } of inFlight) {
      task.remaining -= advance;
      if (task.remaining <= COMPLETION_EPSILON) {
        task.remaining = 0;
        finished.push(machine.id);
      }
    }
    return finished;
  }

  private moveClock(advance: number, horizon: number): void {
    this.time = advance >= horizon ? this.dayDuration : this.time + advance;
  }

  private resolveCompletions(finished: number[], breakdown: RewardBreakdown): void {
    const episodeEnded = this.time >= this.dayDuration;

    for (const machineId of finished) {
      const machine = this.machines[machineId];
      const workerId = machine.currentWorker;
      const task = machine.task;
      if (workerId === null || task === null) {
        machine.task = null;
        continue;
      }

      // Work still running at the end of the day produces nothing
      if (episodeEnded) {
        this.release(machine);
        continue;
      }

      const shift = this.currentShiftIndex;
      this.workedMinutes[workerId][shift] += task.minutes;
      const worked = this.workedMinutes[workerId][shift];
      const capacity = this.params.workerShiftCapacityMinutes[workerId][shift];

      const fatigue = computeFatigue(worked, capacity, this.params.fatigueThresholdRatio);
      this.fatigueLevels[workerId] = fatigue;
      this.rewardCalc.fatigue(breakdown, fatigue);
      this.rewardCalc.overCapacity(breakdown, worked, capacity);

      const skill = this.skillOf(workerId, machine);
      this.rewardCalc.skillTier(breakdown, skill);

      const defectProbability = Math.max(0, 0.5 - skill);
      if (this.random.next() < defectProbability) {
        this.rewardCalc.defect(breakdown);
      } else {
        this.produced++;
        this.rewardCalc.goodPart(breakdown, this.produced);
      }

      this.recordSnapshot();
      this.release(machine);

      if (!this.tryDowntime(machine, "broken", this.params.breakdown)) {
        this.tryDowntime(machine, "maintenance", this.params.maintenance);
      }
    }
  }

  private tryDowntime(machine: Machine, status: MachineStatus, downtime: Downtime): boolean {
    if (this.random.next() >= downtime.probability) {
      return false;
    }
    const maxDuration = downtime.maxDurationShifts * this.params.shiftLengthMinutes;
    const duration = Math.max(
      downtime.minDurationMinutes,
      uniform(this.random, 0.5 * maxDuration, maxDuration)
    );
    this.downUntil[machine.id] = this.time + duration;
    machine.status = status;
    return true;
  }

  // ============ Helpers ============

  private skillOf(workerId: number, machine: Machine): number {
    return this.params.skillMatrix[workerId][machine.typeIndex];
  }

  private processingMinutes(workerId: number, machine: Machine): number {
    const skill = this.skillOf(workerId, machine);
    const raw = this.params.baseProcessMinutes[machine.typeIndex] / Math.max(skill, MIN_SKILL_DIVISOR);
    return Math.max(raw, this.params.minProcessMinutes[machine.typeIndex]);
  }

  private isDown(machineId: number): boolean {
    const until = this.downUntil[machineId];
    return until !== null && this.time < until;
  }

  private selectDecisionMachine(): number | null {
    const candidates = this.listAssignableMachines();
    return candidates.length > 0 ? candidates[0] : null;
  }

  /**
   * Idle machines that are not down, highest priority first, then lowest id.
   */
  listAssignableMachines(): number[] {
    return this.machines
      .filter((m) => m.status === "idle" && !this.isDown(m.id))
      .sort((a, b) => b.priority - a.priority || a.id - b.id)
      .map((m) => m.id);
  }

  private recordSnapshot(): void {
    if (!this.recordHistory) return;

    this.history.push({
      time: this.time,
      shiftIndex: this.currentShiftIndex,
      machineAssignments: this.machines.map((m) => m.currentWorker),
      workerSkills: this.machines.map((m) =>
        m.currentWorker !== null ? this.skillOf(m.currentWorker, m) : null
      ),
      machineStatuses: this.machines.map((m) => m.status),
      producedGoodParts: this.produced,
    });
    this.lastHistoryTime = this.time;
  }

  // ============ Accessors ============

  /**
   * Current discretized state.
   */
  getState(): StateKey {
    return extractState({
      decisionMachine: this.decisionMachine !== null ? this.machines[this.decisionMachine] : null,
      machines: this.machines,
      workers: this.workers,
      skillMatrix: this.params.skillMatrix,
      currentTime: this.time,
      dayDuration: this.dayDuration,
      shiftIndex: this.currentShiftIndex,
      producedGoodParts: this.produced,
      dailyTarget: this.params.dailyTarget,
    });
  }

  get currentShiftIndex(): number {
    const shift = Math.floor(this.time / this.params.shiftLengthMinutes);
    return Math.min(shift, this.params.numShifts - 1);
  }

  get currentTime(): number {
    return this.time;
  }

  get producedGoodParts(): number {
    return this.produced;
  }

  get decisionMachineId(): number | null {
    return this.decisionMachine;
  }

  get numActions(): number {
    return numActionsFor(this.params);
  }

  getParams(): FacilityParams {
    return this.params;
  }

  isDone(): boolean {
    return this.done;
  }

  getMachines(): Machine[] {
    return this.machines.map((m) => ({ ...m, task: m.task ? { ...m.task } : null }));
  }

  getWorkers(): Worker[] {
    return this.workers.map((w) => ({ ...w }));
  }

  getDownUntil(machineId: number): number | null {
    return this.downUntil[machineId];
  }

  getWorkedMinutes(workerId: number, shift: number): number {
    return this.workedMinutes[workerId][shift];
  }

  getFatigueLevel(workerId: number): number {
    return this.fatigueLevels[workerId];
  }

  /**
   * Recorded history frames (empty unless reset with recordHistory).
   */
  getHistory(): HistoryFrame[] {
    return [...this.history];
  }
}

/**
 * Factory function to create environment, seeded when a seed is given.
 */
export function createEnvironment(
  params: FacilityParams = DEMO_FACILITY_PARAMS,
  seed?: number
): FacilityEnv {
  return new FacilityEnv(params, seed !== undefined ? createSeededRandom(seed) : defaultRandom);
}
