/**
 * Q-Learner Tests
 */

import { QLearner } from "../qlearning";
import { PersistenceError } from "../../errors";
import { createSeededRandom, type RandomSource } from "../../random";
import type { StateKey } from "../../types";
import { discretizeState } from "../../environment/state-extractor";

/**
 * Random source replaying a fixed sequence.
 */
function sequence(...values: number[]): RandomSource {
  let i = 0;
  return { next: () => values[i++ % values.length] };
}

const S1: StateKey = [0, 1, 0, 3, 3, [1, 1], [2, 1], [0, 0]];
const S2: StateKey = [1, 0, 0, 3, 3, [0, 1], [2, 2], [1, 0]];
const S3: StateKey = [1, 0, 1, 2, 3, [1, 0], [0, 2], [0, 1]];

describe("QLearner", () => {
  describe("update", () => {
    it("should move toward the reward on a terminal step", () => {
      const learner = new QLearner({ numActions: 3 });
      learner.update(S1, 1, 10, S2, true);
      expect(learner.getValue(S1, 1)).toBe(1); // 0.1 * 10
      expect(learner.getEpisodesTrained()).toBe(1);
    });

    it("should bootstrap from the best next-state value", () => {
      const learner = new QLearner({ numActions: 3, learningRate: 0.5 });
      learner.update(S2, 0, 4, S1, true);
      expect(learner.getValue(S2, 0)).toBe(2);

      learner.update(S1, 1, 1, S2, false);
      // 0.5 * (1 + 0.99 * 2)
      expect(learner.getValue(S1, 1)).toBeCloseTo(1.49);
      expect(learner.getEpisodesTrained()).toBe(1);
    });

    it("should treat an unseen next state as worth zero", () => {
      const learner = new QLearner({ numActions: 3, learningRate: 0.5 });
      learner.update(S1, 0, 3, S3, false);
      expect(learner.getValue(S1, 0)).toBe(1.5);
    });

    it("should count absent actions as zero in the next-state max", () => {
      const learner = new QLearner({ numActions: 3, learningRate: 0.5 });
      learner.update(S2, 0, -4, S1, true);
      learner.update(S1, 2, 0, S2, false);
      expect(learner.getValue(S1, 2)).toBe(0);
    });

    it("should use the scheduled rate when an episode is given", () => {
      const learner = new QLearner({ numActions: 3, learningRate: 0.5, epsilonDecayEpisodes: 100 });
      learner.update(S1, 0, 10, S2, true, 100);
      expect(learner.getValue(S1, 0)).toBeCloseTo(0.5); // alpha = 0.05
      expect(learner.getCurrentLearningRate()).toBeCloseTo(0.05);

      // Without an episode the last rate is reused
      learner.update(S3, 0, 10, S2, true);
      expect(learner.getValue(S3, 0)).toBeCloseTo(0.5);
    });

    it("should reject actions outside the action space", () => {
      const learner = new QLearner({ numActions: 3 });
      expect(() => learner.update(S1, 3, 1, S2, true)).toThrow(RangeError);
    });
  });

  describe("selectAction", () => {
    it("should pick the unique best action when greedy", () => {
      const learner = new QLearner({ numActions: 3 }, createSeededRandom(3));
      learner.update(S1, 2, 5, S2, true);
      learner.update(S1, 0, -5, S2, true);

      for (let i = 0; i < 20; i++) {
        expect(learner.selectAction(S1, 0, true)).toBe(2);
      }
    });

    it("should break ties at random", () => {
      expect(new QLearner({ numActions: 3 }, sequence(0.99)).selectAction(S1, 0, true)).toBe(2);
      expect(new QLearner({ numActions: 3 }, sequence(0.0)).selectAction(S1, 0, true)).toBe(0);
    });

    it("should explore with probability epsilon", () => {
      const learner = new QLearner({ numActions: 3 }, sequence(0.5, 0.7));
      learner.update(S1, 0, 5, S2, true);

      // epsilon(0) = 1: 0.5 < 1 explores, 0.7 picks action 2
      expect(learner.selectAction(S1, 0)).toBe(2);
    });

    it("should exploit once epsilon has decayed", () => {
      const learner = new QLearner({ numActions: 3 }, sequence(0.9, 0.5));
      learner.update(S1, 1, 5, S2, true);

      // epsilon(500) = 0.05: 0.9 exploits
      expect(learner.selectAction(S1, 500)).toBe(1);
    });
  });

  describe("table access", () => {
    it("should report size and entries", () => {
      const learner = new QLearner({ numActions: 3 });
      learner.update(S1, 0, 1, S2, true);
      learner.update(S1, 2, 1, S2, true);
      learner.update(S2, 1, 1, S1, true);

      expect(learner.getTableSize()).toEqual({ states: 2, pairs: 3 });
      expect(learner.entries().map(([key]) => key)).toEqual([
        discretizeState(S1),
        discretizeState(S2),
      ]);
      expect(learner.getQValues(S1)).toEqual(
        new Map([
          [0, 0.1],
          [2, 0.1],
        ])
      );
      expect(learner.getQValues(S3).size).toBe(0);
    });

    it("should clear everything on reset", () => {
      const learner = new QLearner({ numActions: 3 });
      learner.update(S1, 0, 1, S2, true);
      learner.reset();
      expect(learner.getTableSize()).toEqual({ states: 0, pairs: 0 });
      expect(learner.getEpisodesTrained()).toBe(0);
    });
  });

  describe("save / load", () => {
    it("should restore values, config and episode count", () => {
      const learner = new QLearner({ numActions: 3, learningRate: 0.3 });
      learner.update(S1, 0, 7, S2, true);
      learner.update(S2, 2, -3, S1, false);

      const restored = new QLearner({ numActions: 3 });
      restored.load(learner.save());

      expect(restored.getValue(S1, 0)).toBe(learner.getValue(S1, 0));
      expect(restored.getValue(S2, 2)).toBe(learner.getValue(S2, 2));
      expect(restored.getConfig().learningRate).toBe(0.3);
      expect(restored.getEpisodesTrained()).toBe(1);
      expect(restored.getTableSize()).toEqual(learner.getTableSize());
    });

    it("should reject malformed dumps without changing the table", () => {
      const learner = new QLearner({ numActions: 3 });
      learner.update(S1, 0, 10, S2, true);

      expect(() => learner.load("not json")).toThrow(PersistenceError);
      expect(() => learner.load(JSON.stringify({ type: "qlearning" }))).toThrow(PersistenceError);
      expect(learner.getValue(S1, 0)).toBe(1);
    });

    it("should reject actions beyond the stored action count", () => {
      const learner = new QLearner({ numActions: 3 });
      const dump = JSON.parse(learner.save());
      dump.qTable[discretizeState(S1)] = { "5": 1 };

      expect(() => learner.load(JSON.stringify(dump))).toThrow("Action 5 out of range");
    });
  });

  describe("loadPortable", () => {
    it("should keep only non-zero entries and canonicalize keys", () => {
      const learner = new QLearner({ numActions: 3 });
      learner.loadPortable({
        numActions: 3,
        stateKeys: ["(0,1,0,3,3,(1,1),(2,1),(0,0))", discretizeState(S2)],
        qValues: [Float64Array.from([0, 1.5, 0]), Float64Array.from([0, 0, 0])],
      });

      expect(learner.getValue(S1, 1)).toBe(1.5);
      expect(learner.getTableSize()).toEqual({ states: 1, pairs: 1 });
    });

    it("should reject a table for another action space", () => {
      const learner = new QLearner({ numActions: 3 });
      expect(() =>
        learner.loadPortable({ numActions: 4, stateKeys: [], qValues: [] })
      ).toThrow(PersistenceError);
    });

    it("should reject unparsable keys without partial loading", () => {
      const learner = new QLearner({ numActions: 3 });
      learner.update(S3, 0, 10, S2, true);

      expect(() =>
        learner.loadPortable({
          numActions: 3,
          stateKeys: [discretizeState(S1), "(garbage"],
          qValues: [Float64Array.from([1, 0, 0]), Float64Array.from([1, 0, 0])],
        })
      ).toThrow("Unparsable state key in row 1");
      expect(learner.getValue(S3, 0)).toBe(1);
      expect(learner.getValue(S1, 0)).toBe(0);
    });
  });
});
