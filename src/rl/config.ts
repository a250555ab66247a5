/**
 * Facility Parameter Bundle
 *
 * Static, validated description of the shop floor consumed by FacilityEnv at
 * construction. Validation is exhaustive: every issue is reported at once and
 * nothing falls back to a default.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigError } from "./errors";

const probability = z.number().min(0).max(1);
const minutes = z.number().nonnegative();

const downtimeSchema = z.object({
  probability,
  maxDurationShifts: z.number().nonnegative(),
  minDurationMinutes: minutes,
});

export const rewardParamsSchema = z.object({
  rewardPerGoodPart: z.number(),
  rewardSkillScale: z.number(),
  penaltyMismatchLowSkill: z.number(),
  penaltySwitchWorker: z.number(),
  penaltyOverCapacity: z.number(),
  goalBonus: z.number(),
  shortfallPenaltyScale: z.number(),
  bonusReach50Percent: z.number(),
  bonusReach80Percent: z.number(),
  rewardAppropriateAssignment: z.number(),
  penaltySlowProduction: z.number(),
  penaltyDefectiveProduct: z.number(),
  rewardPreventIdle: z.number(),
  penaltyMachineIdle: z.number(),
  rewardSuccessfulPart: z.number(),
  // Required in every bundle, not read by the simulator
  penaltyIdleMachine: z.number(),
  penaltyDefect: z.number(),
});

export const facilityParamsSchema = z
  .object({
    numMachines: z.number().int().positive(),
    numWorkers: z.number().int().positive(),
    numShifts: z.number().int().positive(),
    shiftLengthMinutes: z.number().positive(),
    dailyTarget: z.number().int().nonnegative(),
    machineTypes: z.array(z.string().min(1)).min(1),
    machinePriorities: z.array(z.number().int()),
    // skillMatrix[worker][machineType]
    skillMatrix: z.array(z.array(z.number().min(0.1).max(1))),
    // workerShiftCapacityMinutes[worker][shift]
    workerShiftCapacityMinutes: z.array(z.array(minutes)),
    baseProcessMinutes: z.array(z.number().positive()),
    minProcessMinutes: z.array(minutes),
    breakdown: downtimeSchema,
    maintenance: downtimeSchema,
    fatigueThresholdRatio: z.number().min(0).lt(1),
    fatiguePenaltyScale: z.number().nonnegative(),
    rewards: rewardParamsSchema,
  })
  .superRefine((p, ctx) => {
    const expectLength = (path: string, actual: number, expected: number, what: string) => {
      if (actual !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [path],
          message: `expected ${expected} entries (${what}), got ${actual}`,
        });
      }
    };

    const numTypes = p.machineTypes.length;
    expectLength("machinePriorities", p.machinePriorities.length, p.numMachines, "one per machine");
    expectLength("skillMatrix", p.skillMatrix.length, p.numWorkers, "one row per worker");
    p.skillMatrix.forEach((row, i) =>
      expectLength(`skillMatrix.${i}`, row.length, numTypes, "one per machine type")
    );
    expectLength(
      "workerShiftCapacityMinutes",
      p.workerShiftCapacityMinutes.length,
      p.numWorkers,
      "one row per worker"
    );
    p.workerShiftCapacityMinutes.forEach((row, i) =>
      expectLength(`workerShiftCapacityMinutes.${i}`, row.length, p.numShifts, "one per shift")
    );
    expectLength("baseProcessMinutes", p.baseProcessMinutes.length, numTypes, "one per machine type");
    expectLength("minProcessMinutes", p.minProcessMinutes.length, numTypes, "one per machine type");
  });

export type RewardParams = z.infer<typeof rewardParamsSchema>;
export type FacilityParams = z.infer<typeof facilityParamsSchema>;

/**
 * Validate an untrusted bundle. Throws ConfigError listing every issue.
 */
export function parseFacilityParams(input: unknown): FacilityParams {
  const result = facilityParamsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError("Invalid facility parameters", issues);
  }
  return result.data;
}

/**
 * Read and validate a JSON parameter bundle from disk.
 */
export function loadFacilityParams(path: string): FacilityParams {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read facility parameters from ${path}: ${reason}`);
  }
  return parseFacilityParams(raw);
}

/**
 * Length of the simulated day.
 */
export function dayDurationMinutes(params: FacilityParams): number {
  return params.numShifts * params.shiftLengthMinutes;
}

/**
 * Number of learner actions: one per worker plus "leave idle".
 */
export function numActionsFor(params: FacilityParams): number {
  return params.numWorkers + 1;
}

/**
 * Demo facility: 4 machines, 6 workers, three 8-hour shifts.
 */
export const DEMO_FACILITY_PARAMS: FacilityParams = {
  numMachines: 4,
  numWorkers: 6,
  numShifts: 3,
  shiftLengthMinutes: 480,
  dailyTarget: 90,
  machineTypes: ["press", "lathe", "welding", "packing"],
  machinePriorities: [1, 2, 1, 0],
  skillMatrix: [
    [0.95, 0.35, 0.15, 0.2],
    [0.25, 0.9, 0.65, 0.55],
    [0.55, 0.3, 0.95, 0.85],
    [0.45, 0.5, 0.48, 0.52],
    [0.7, 0.65, 0.55, 0.92],
    [0.88, 0.58, 0.42, 0.68],
  ],
  workerShiftCapacityMinutes: [
    [480, 460, 480],
    [460, 480, 460],
    [440, 420, 440],
    [460, 460, 460],
    [480, 440, 480],
    [470, 450, 470],
  ],
  baseProcessMinutes: [6, 7, 9, 5],
  // No part finishes faster than this, whatever the skill
  minProcessMinutes: [10, 45, 75, 25],
  breakdown: { probability: 0.02, maxDurationShifts: 2, minDurationMinutes: 60 },
  maintenance: { probability: 0.01, maxDurationShifts: 2, minDurationMinutes: 30 },
  fatigueThresholdRatio: 0.8,
  fatiguePenaltyScale: 0.5,
  rewards: {
    rewardPerGoodPart: 2.0,
    rewardSkillScale: 0.5,
    penaltyMismatchLowSkill: 1.0,
    penaltySwitchWorker: 0.5,
    penaltyOverCapacity: 1.0,
    goalBonus: 80.0,
    shortfallPenaltyScale: 0.3,
    bonusReach50Percent: 10.0,
    bonusReach80Percent: 20.0,
    rewardAppropriateAssignment: 15.0,
    penaltySlowProduction: 8.0,
    penaltyDefectiveProduct: 25.0,
    rewardPreventIdle: 5.0,
    penaltyMachineIdle: 10.0,
    rewardSuccessfulPart: 1.0,
    penaltyIdleMachine: 0.2,
    penaltyDefect: 10.0,
  },
};
