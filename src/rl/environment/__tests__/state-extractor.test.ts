/**
 * State Extractor Tests
 */

import {
  discretizeState,
  getGapBucket,
  getSkillBucket,
  getTimeBucket,
  parseStateKey,
} from "../state-extractor";
import { FacilityEnv } from "../gym-wrapper";
import { DEMO_FACILITY_PARAMS } from "../../config";
import { createSeededRandom } from "../../random";
import type { StateKey } from "../../types";

describe("bucketing", () => {
  it("should bucket remaining time by quarter of the day", () => {
    expect(getTimeBucket(0, 1440)).toBe(3);
    expect(getTimeBucket(720, 1440)).toBe(2);
    expect(getTimeBucket(1080, 1440)).toBe(1);
    expect(getTimeBucket(1440, 1440)).toBe(0);
  });

  it("should bucket the production gap", () => {
    expect(getGapBucket(90, 95)).toBe(0);
    expect(getGapBucket(90, 60)).toBe(1);
    expect(getGapBucket(90, 40)).toBe(2);
    expect(getGapBucket(90, 0)).toBe(3);
  });

  it("should bucket skill at 0.3 and 0.7", () => {
    expect(getSkillBucket(0.29)).toBe(0);
    expect(getSkillBucket(0.3)).toBe(1);
    expect(getSkillBucket(0.69)).toBe(1);
    expect(getSkillBucket(0.7)).toBe(2);
  });
});

describe("discretizeState", () => {
  it("should render the tuple form", () => {
    const state: StateKey = [0, 2, 0, 3, 3, [1, 1], [2, 0], [0, 0, 0, 0]];
    expect(discretizeState(state)).toBe("(0, 2, 0, 3, 3, (1, 1), (2, 0), (0, 0, 0, 0))");
  });

  it("should keep a trailing comma on single-element tuples", () => {
    const state: StateKey = [1, 0, 0, 3, 3, [1], [2], [0]];
    expect(discretizeState(state)).toBe("(1, 0, 0, 3, 3, (1,), (2,), (0,))");
  });

  it("should distinguish order", () => {
    const a: StateKey = [0, 0, 0, 3, 3, [1, 0], [2, 1], [0]];
    const b: StateKey = [0, 0, 0, 3, 3, [0, 1], [2, 1], [0]];
    expect(discretizeState(a)).not.toBe(discretizeState(b));
    expect(discretizeState(a)).toBe(discretizeState([0, 0, 0, 3, 3, [1, 0], [2, 1], [0]]));
  });
});

describe("parseStateKey", () => {
  it("should reverse discretizeState", () => {
    const states: StateKey[] = [
      [0, 2, 0, 3, 3, [1, 1], [2, 0], [0, 0, 0, 0]],
      [1, 0, 2, 1, 0, [1], [2], [3]],
    ];
    for (const state of states) {
      expect(parseStateKey(discretizeState(state))).toEqual(state);
    }
  });

  it("should accept keys without spaces", () => {
    expect(parseStateKey("(1,0,0,3,3,(1,),(2,),(0,))")).toEqual([1, 0, 0, 3, 3, [1], [2], [0]]);
  });

  it("should reject the wrong number of fields", () => {
    expect(() => parseStateKey("(1, 2)")).toThrow("expected 8 fields, got 2");
  });

  it("should reject worker vectors of different lengths", () => {
    expect(() => parseStateKey("(0, 2, 0, 3, 3, (1, 1), (2,), (0,))")).toThrow(
      "worker vectors differ in length"
    );
  });

  it("should reject non-integer fields", () => {
    expect(() => parseStateKey("(0, x, 0, 3, 3, (1,), (2,), (0,))")).toThrow("expected integer");
    expect(() => parseStateKey("((0,), 2, 0, 3, 3, (1,), (2,), (0,))")).toThrow(
      "machineId must be an integer"
    );
  });

  it("should reject trailing characters", () => {
    expect(() => parseStateKey("(1, 0, 0, 3, 3, (1,), (2,), (0,)) extra")).toThrow(
      "trailing characters"
    );
  });
});

describe("extractState", () => {
  it("should describe the highest-priority idle machine at reset", () => {
    const env = new FacilityEnv(DEMO_FACILITY_PARAMS, createSeededRandom(1));

    // Machine 1 (lathe) has priority 2; lathe skills 0.35, 0.9, 0.3, 0.5, 0.65, 0.58
    expect(discretizeState(env.getState())).toBe(
      "(1, 2, 0, 3, 3, (1, 1, 1, 1, 1, 1), (1, 2, 1, 1, 1, 1), (0, 0, 0, 0))"
    );
  });
});
