/**
 * Reward Calculator
 *
 * Computes the shaped reward terms of a facility step and accumulates them
 * into a RewardBreakdown. Tracks milestone bonuses so each is paid once per
 * episode.
 */

import type { RewardParams } from "../config";
import type { RewardBreakdown } from "../types";

// Penalty for choosing a worker who is already busy
export const BUSY_WORKER_PENALTY = 0.1;

export const HIGH_SKILL_THRESHOLD = 0.7;
export const LOW_SKILL_THRESHOLD = 0.3;

/**
 * Milestones already paid in the current episode.
 */
export interface RewardTracker {
  reached50Percent: boolean;
  reached80Percent: boolean;
}

export function createRewardTracker(): RewardTracker {
  return { reached50Percent: false, reached80Percent: false };
}

export function createBreakdown(): RewardBreakdown {
  return {
    assignment: 0,
    skill: 0,
    quality: 0,
    fatigue: 0,
    overCapacity: 0,
    utilization: 0,
    terminal: 0,
    total: 0,
  };
}

/**
 * Fatigue in [0, 1]: zero below the threshold usage ratio, reaching 1 at full capacity.
 */
export function computeFatigue(worked: number, capacity: number, thresholdRatio: number): number {
  if (capacity <= 0) return 0;
  const usage = worked / capacity;
  if (usage < thresholdRatio) return 0;
  return Math.min(1, (usage - thresholdRatio) / (1 - thresholdRatio));
}

/**
 * Overrun relative to capacity. A zero-minute capacity counts overrun per minute.
 */
export function overCapacityRatio(worked: number, capacity: number): number {
  if (worked <= capacity) return 0;
  return (worked - capacity) / Math.max(capacity, 1);
}

export class RewardCalculator {
  private readonly rewards: RewardParams;
  private readonly dailyTarget: number;
  private readonly fatiguePenaltyScale: number;
  private tracker: RewardTracker;

  constructor(rewards: RewardParams, dailyTarget: number, fatiguePenaltyScale: number) {
    this.rewards = rewards;
    this.dailyTarget = dailyTarget;
    this.fatiguePenaltyScale = fatiguePenaltyScale;
    this.tracker = createRewardTracker();
  }

  reset(): void {
    this.tracker = createRewardTracker();
  }

  getTracker(): Readonly<RewardTracker> {
    return this.tracker;
  }

  busyWorker(b: RewardBreakdown): void {
    b.assignment -= BUSY_WORKER_PENALTY;
  }

  workerSwitch(b: RewardBreakdown): void {
    b.assignment -= this.rewards.penaltySwitchWorker;
  }

  fatigue(b: RewardBreakdown, level: number): void {
    if (level > 0) {
      b.fatigue -= this.fatiguePenaltyScale * level;
    }
  }

  overCapacity(b: RewardBreakdown, worked: number, capacity: number): void {
    const ratio = overCapacityRatio(worked, capacity);
    if (ratio > 0) {
      b.overCapacity -= this.rewards.penaltyOverCapacity * ratio;
    }
  }

  /**
   * High skill earns a bonus, low skill pays slow-production and mismatch
   * penalties, mid skill earns a proportional reward.
   */
  skillTier(b: RewardBreakdown, skill: number): void {
    if (skill >= HIGH_SKILL_THRESHOLD) {
      b.skill += this.rewards.rewardAppropriateAssignment;
    } else if (skill < LOW_SKILL_THRESHOLD) {
      b.skill -= this.rewards.penaltySlowProduction + this.rewards.penaltyMismatchLowSkill;
    } else {
      b.skill += this.rewards.rewardSkillScale * skill;
    }
  }

  defect(b: RewardBreakdown): void {
    b.quality -= this.rewards.penaltyDefectiveProduct;
  }

  /**
   * Good part with the one-time milestone bonuses. `produced` already counts it.
   */
  goodPart(b: RewardBreakdown, produced: number): void {
    b.quality += this.rewards.rewardPerGoodPart + this.rewards.rewardSuccessfulPart;

    if (!this.tracker.reached50Percent && produced >= 0.5 * this.dailyTarget) {
      b.quality += this.rewards.bonusReach50Percent;
      this.tracker.reached50Percent = true;
    }
    if (!this.tracker.reached80Percent && produced >= 0.8 * this.dailyTarget) {
      b.quality += this.rewards.bonusReach80Percent;
      this.tracker.reached80Percent = true;
    }
  }

  utilization(b: RewardBreakdown, idleMachines: number, busyMachines: number): void {
    b.utilization -= this.rewards.penaltyMachineIdle * idleMachines;
    if (idleMachines === 0 && busyMachines > 0) {
      b.utilization += this.rewards.rewardPreventIdle;
    }
  }

  terminal(b: RewardBreakdown, produced: number): void {
    if (produced >= this.dailyTarget) {
      b.terminal += this.rewards.goalBonus;
    } else {
      b.terminal -= this.rewards.shortfallPenaltyScale * (this.dailyTarget - produced);
    }
  }

  /**
   * Sum the components into `total` and return it.
   */
  finalize(b: RewardBreakdown): number {
    b.total =
      b.assignment + b.skill + b.quality + b.fatigue + b.overCapacity + b.utilization + b.terminal;
    return b.total;
  }
}
