/**
 * Native value-table file: the learner's own JSON dump, written as is.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { QLearner } from "../learners/qlearning";
import { PersistenceError } from "../errors";

export function saveNativeValueTable(path: string, learner: QLearner): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, learner.save(), "utf-8");
}

/**
 * Replace the learner's table with the one stored at `path`.
 */
export function loadNativeValueTable(path: string, learner: QLearner): void {
  if (!existsSync(path)) {
    throw new PersistenceError("Value table file not found", { path });
  }

  try {
    learner.load(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PersistenceError(`Cannot load value table: ${reason}`, { path, cause: err });
  }
}
