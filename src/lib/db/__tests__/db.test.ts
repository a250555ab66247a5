/**
 * Results Store Tests
 */

import {
  addLearningCurvePoints,
  closeDb,
  configureDb,
  createEpisodesBatch,
  createExperiment,
  getExperiment,
  getExperimentStats,
  getLearningCurve,
  listEpisodes,
  listExperiments,
} from "..";

function seedEpisodes(experimentId: string): void {
  createEpisodesBatch([
    { id: `${experimentId}-ep-0`, experimentId, episodeNum: 0, totalReturn: -20, producedParts: 40, steps: 90, finalTime: 1440, targetMet: false },
    { id: `${experimentId}-ep-1`, experimentId, episodeNum: 1, totalReturn: 10, producedParts: 110, steps: 120, finalTime: 1440, targetMet: true },
    { id: `${experimentId}-ep-2`, experimentId, episodeNum: 2, totalReturn: 40, producedParts: 150, steps: 150, finalTime: 1440, targetMet: true },
  ]);
}

describe("results store", () => {
  beforeEach(() => {
    configureDb(":memory:");
  });

  afterEach(() => {
    closeDb();
  });

  describe("experiments", () => {
    it("should store and read back an experiment", () => {
      createExperiment({
        id: "exp-1",
        type: "training",
        learnerType: "qlearning",
        config: { numEpisodes: 5 },
        learnerState: "{}",
        trainTimeMs: 12,
      });

      const row = getExperiment("exp-1");
      expect(row?.type).toBe("training");
      expect(row?.learner_type).toBe("qlearning");
      expect(row?.config_json).toBe('{"numEpisodes":5}');
      expect(row?.final_metrics_json).toBeNull();
      expect(row?.train_time_ms).toBe(12);
      expect(getExperiment("missing")).toBeUndefined();
    });

    it("should list newest first and filter by type", () => {
      createExperiment({ id: "a", type: "training" });
      createExperiment({ id: "b", type: "baseline", learnerType: "random" });
      createExperiment({ id: "c", type: "training" });

      expect(listExperiments().map((e) => e.id)).toEqual(["c", "b", "a"]);
      expect(listExperiments("training").map((e) => e.id)).toEqual(["c", "a"]);
      expect(listExperiments("evaluation")).toEqual([]);
    });

    it("should reject a duplicate id", () => {
      createExperiment({ id: "x", type: "training", learnerType: "qlearning" });
      expect(() => createExperiment({ id: "x", type: "baseline" })).toThrow();
    });
  });

  describe("episodes", () => {
    beforeEach(() => {
      createExperiment({ id: "exp-1", type: "training" });
      seedEpisodes("exp-1");
    });

    it("should list episodes in order with targets stored as integers", () => {
      const rows = listEpisodes("exp-1");
      expect(rows.map((r) => r.episode_num)).toEqual([0, 1, 2]);
      expect(rows.map((r) => r.target_met)).toEqual([0, 1, 1]);
    });

    it("should aggregate per experiment", () => {
      const stats = getExperimentStats("exp-1");
      expect(stats.totalEpisodes).toBe(3);
      expect(stats.avgReturn).toBe(10);
      expect(stats.avgProduced).toBe(100);
      expect(stats.targetHitRate).toBeCloseTo(2 / 3);

      expect(getExperimentStats("none")).toEqual({
        totalEpisodes: 0,
        avgReturn: 0,
        avgProduced: 0,
        targetHitRate: 0,
      });
    });
  });

  describe("learning curve", () => {
    it("should keep optional evaluation columns null", () => {
      createExperiment({ id: "exp-1", type: "training" });
      addLearningCurvePoints([
        { experimentId: "exp-1", episodeNum: 1, trainReturn: 5, producedParts: 60, rollingReturn: 4, evalReturn: 7, evalTargetHitRate: 0.5 },
        { experimentId: "exp-1", episodeNum: 0, trainReturn: 3, producedParts: 50, rollingReturn: 3 },
      ]);

      const curve = getLearningCurve("exp-1");
      expect(curve.map((p) => p.episode_num)).toEqual([0, 1]);
      expect(curve[0].eval_return).toBeNull();
      expect(curve[1].eval_return).toBe(7);
      expect(curve[1].eval_target_hit_rate).toBe(0.5);
    });
  });
});
