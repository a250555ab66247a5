/**
 * Value-Table File Tests
 */

import Database from "better-sqlite3";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { QLearner } from "../../learners/qlearning";
import { loadNativeValueTable, saveNativeValueTable } from "../native";
import {
  MAX_KEY_BYTES,
  loadPortableValueTable,
  readPortableValueTable,
  savePortableValueTable,
  toPortableTable,
  writePortableValueTable,
} from "../portable";
import { PersistenceError } from "../../errors";
import type { StateKey } from "../../types";

const S1: StateKey = [0, 2, 0, 3, 3, [1, 1, 0], [2, 0, 1], [0, 1]];
const S2: StateKey = [1, 0, 1, 1, 0, [0, 1, 1], [1, 1, 2], [1, 0]];
const SINGLE: StateKey = [0, 0, 2, 0, 0, [1], [2], [3]];

function trainedLearner(): QLearner {
  const learner = new QLearner({ numActions: 4, learningRate: 0.5 });
  learner.update(S1, 0, 3, S2, true);
  learner.update(S1, 3, -1.25, S2, true);
  learner.update(S2, 1, 7, S1, false);
  learner.update(SINGLE, 2, 10, SINGLE, true);
  return learner;
}

describe("value-table files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "shopfloor-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("toPortableTable", () => {
    it("should produce dense rows in insertion order", () => {
      const table = toPortableTable(trainedLearner());

      expect(table.numActions).toBe(4);
      expect(table.stateKeys).toEqual([
        "(0, 2, 0, 3, 3, (1, 1, 0), (2, 0, 1), (0, 1))",
        "(1, 0, 1, 1, 0, (0, 1, 1), (1, 1, 2), (1, 0))",
        "(0, 0, 2, 0, 0, (1,), (2,), (3,))",
      ]);
      expect(Array.from(table.qValues[0])).toEqual([1.5, 0, 0, -0.625]);
      expect(Array.from(table.qValues[2])).toEqual([0, 0, 5, 0]);
    });
  });

  describe("portable round trip", () => {
    it("should reproduce every non-zero entry", () => {
      const learner = trainedLearner();
      const path = join(dir, "q_table.sqlite");
      savePortableValueTable(path, learner);

      const restored = new QLearner({ numActions: 4 });
      loadPortableValueTable(path, restored);

      expect(restored.getTableSize()).toEqual(learner.getTableSize());
      for (const [key, values] of learner.entries()) {
        values.forEach((value, action) => {
          const restoredRow = restored.entries().find(([k]) => k === key);
          expect(restoredRow?.[1].get(action)).toBe(value);
        });
      }
    });

    it("should drop entries that are exactly zero", () => {
      const learner = new QLearner({ numActions: 2 });
      learner.update(S1, 0, 0, S2, true);
      learner.update(S2, 1, 4, S1, true);
      const path = join(dir, "zeros.sqlite");
      savePortableValueTable(path, learner);

      const restored = new QLearner({ numActions: 2 });
      loadPortableValueTable(path, restored);

      expect(restored.getTableSize()).toEqual({ states: 1, pairs: 1 });
      expect(restored.getValue(S2, 1)).toBeCloseTo(0.4);
    });

    it("should read back the stored table unchanged", () => {
      const table = toPortableTable(trainedLearner());
      const path = join(dir, "table.sqlite");
      writePortableValueTable(path, table);

      const read = readPortableValueTable(path);
      expect(read.numActions).toBe(4);
      expect(read.stateKeys).toEqual(table.stateKeys);
      expect(read.qValues.map((row) => Array.from(row))).toEqual(
        table.qValues.map((row) => Array.from(row))
      );
    });

    it("should overwrite an existing file", () => {
      const path = join(dir, "table.sqlite");
      writePortableValueTable(path, toPortableTable(trainedLearner()));
      writePortableValueTable(path, { numActions: 1, stateKeys: [], qValues: [] });

      expect(readPortableValueTable(path)).toEqual({ numActions: 1, stateKeys: [], qValues: [] });
    });
  });

  describe("portable errors", () => {
    it("should fail on a missing file", () => {
      expect(() => readPortableValueTable(join(dir, "absent.sqlite"))).toThrow(PersistenceError);
    });

    it("should fail on a file that is not a table", () => {
      const path = join(dir, "garbage.sqlite");
      writeFileSync(path, "this is not a database, just some text padding it out a little");
      expect(() => readPortableValueTable(path)).toThrow(PersistenceError);
    });

    it("should fail when rows are missing", () => {
      const path = join(dir, "short.sqlite");
      const db = new Database(path);
      db.exec(`
        CREATE TABLE meta (num_actions INTEGER NOT NULL, num_states INTEGER NOT NULL);
        CREATE TABLE state_keys (row INTEGER PRIMARY KEY, key TEXT NOT NULL);
        CREATE TABLE q_values (row INTEGER PRIMARY KEY, action_values BLOB NOT NULL);
        INSERT INTO meta VALUES (2, 2);
        INSERT INTO state_keys VALUES (0, '(0, 0, 0, 3, 3, (1,), (2,), (0,))');
      `);
      db.close();

      expect(() => readPortableValueTable(path)).toThrow("Expected 2 rows, found 1 keys and 0 value rows");
    });

    it("should refuse keys longer than the stored bound", () => {
      const key = "x".repeat(MAX_KEY_BYTES + 1);
      expect(() =>
        writePortableValueTable(join(dir, "long.sqlite"), {
          numActions: 1,
          stateKeys: [key],
          qValues: [Float64Array.from([1])],
        })
      ).toThrow(`State key in row 0 exceeds ${MAX_KEY_BYTES} bytes`);
    });

    it("should refuse a learner with a different action count", () => {
      const path = join(dir, "table.sqlite");
      savePortableValueTable(path, trainedLearner());

      expect(() => loadPortableValueTable(path, new QLearner({ numActions: 5 }))).toThrow(
        PersistenceError
      );
    });
  });

  describe("native dump", () => {
    it("should round-trip through a file", () => {
      const learner = trainedLearner();
      const path = join(dir, "nested", "q_table.json");
      saveNativeValueTable(path, learner);

      const restored = new QLearner({ numActions: 4 });
      loadNativeValueTable(path, restored);

      expect(JSON.parse(restored.save())).toEqual(JSON.parse(learner.save()));
    });

    it("should fail on a missing or malformed file", () => {
      const missing = join(dir, "missing.json");
      expect(() => loadNativeValueTable(missing, new QLearner({ numActions: 4 }))).toThrow(
        `Value table file not found (${missing})`
      );

      const malformed = join(dir, "bad.json");
      writeFileSync(malformed, "{ nope");
      expect(() => loadNativeValueTable(malformed, new QLearner({ numActions: 4 }))).toThrow(
        PersistenceError
      );
    });
  });
});
