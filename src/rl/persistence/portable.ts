/**
 * Portable Value-Table File
 *
 * Columnar SQLite file readable from any language: the textual state keys in
 * one table, the dense value rows (little-endian float64, one column per
 * action) in another, aligned by row index.
 *
 *   meta(num_actions, num_states)
 *   state_keys(row, key)
 *   q_values(row, action_values)
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync, rmSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import type { PortableValueTable } from "../types";
import type { QLearner } from "../learners/qlearning";
import { PersistenceError } from "../errors";

// Upper bound on the UTF-8 length of a stored key
export const MAX_KEY_BYTES = 256;

const FLOAT_BYTES = 8;

const metaSchema = z.object({
  num_actions: z.number().int().positive(),
  num_states: z.number().int().nonnegative(),
});
const keyRowSchema = z.object({ row: z.number().int(), key: z.string() });
const valueRowSchema = z.object({ row: z.number().int(), action_values: z.instanceof(Buffer) });

/**
 * Dense columnar copy of a learner's table, rows in insertion order.
 */
export function toPortableTable(learner: QLearner): PortableValueTable {
  const numActions = learner.numActions;
  const stateKeys: string[] = [];
  const qValues: Float64Array[] = [];

  for (const [stateKey, actionValues] of learner.entries()) {
    const row = new Float64Array(numActions);
    actionValues.forEach((value, action) => {
      row[action] = value;
    });
    stateKeys.push(stateKey);
    qValues.push(row);
  }

  return { numActions, stateKeys, qValues };
}

function encodeRow(values: Float64Array): Buffer {
  const buf = Buffer.alloc(values.length * FLOAT_BYTES);
  values.forEach((v, i) => buf.writeDoubleLE(v, i * FLOAT_BYTES));
  return buf;
}

function decodeRow(buf: Buffer): Float64Array {
  const values = new Float64Array(buf.length / FLOAT_BYTES);
  for (let i = 0; i < values.length; i++) {
    values[i] = buf.readDoubleLE(i * FLOAT_BYTES);
  }
  return values;
}

function checkKeyLength(key: string, row: number, path: string): void {
  if (Buffer.byteLength(key, "utf-8") > MAX_KEY_BYTES) {
    throw new PersistenceError(`State key in row ${row} exceeds ${MAX_KEY_BYTES} bytes`, { path });
  }
}

/**
 * Write the table, replacing any existing file.
 */
export function writePortableValueTable(path: string, table: PortableValueTable): void {
  if (table.stateKeys.length !== table.qValues.length) {
    throw new PersistenceError(
      `Table has ${table.stateKeys.length} keys but ${table.qValues.length} rows`,
      { path }
    );
  }
  table.stateKeys.forEach((key, row) => {
    checkKeyLength(key, row, path);
    if (table.qValues[row].length !== table.numActions) {
      throw new PersistenceError(`Row ${row} does not have ${table.numActions} values`, { path });
    }
  });

  mkdirSync(dirname(path), { recursive: true });
  rmSync(path, { force: true });

  const db = new Database(path);
  try {
    db.exec(`
      CREATE TABLE meta (num_actions INTEGER NOT NULL, num_states INTEGER NOT NULL);
      CREATE TABLE state_keys (row INTEGER PRIMARY KEY, key TEXT NOT NULL);
      CREATE TABLE q_values (row INTEGER PRIMARY KEY, action_values BLOB NOT NULL);
    `);

    const insertKey = db.prepare("INSERT INTO state_keys (row, key) VALUES (?, ?)");
    const insertValues = db.prepare("INSERT INTO q_values (row, action_values) VALUES (?, ?)");

    db.transaction(() => {
      db.prepare("INSERT INTO meta (num_actions, num_states) VALUES (?, ?)").run(
        table.numActions,
        table.stateKeys.length
      );
      table.stateKeys.forEach((key, row) => {
        insertKey.run(row, key);
        insertValues.run(row, encodeRow(table.qValues[row]));
      });
    })();
  } finally {
    db.close();
  }
}

/**
 * Read a table written by writePortableValueTable. Any structural problem is
 * a PersistenceError; nothing is returned partially.
 */
export function readPortableValueTable(path: string): PortableValueTable {
  if (!existsSync(path)) {
    throw new PersistenceError("Portable value table not found", { path });
  }

  let meta: z.infer<typeof metaSchema>;
  let keyRows: z.infer<typeof keyRowSchema>[];
  let valueRows: z.infer<typeof valueRowSchema>[];

  let db: Database.Database;
  try {
    db = new Database(path, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new PersistenceError("Cannot open portable value table", { path, cause: err });
  }

  try {
    meta = metaSchema.parse(db.prepare("SELECT num_actions, num_states FROM meta").get());
    keyRows = z.array(keyRowSchema).parse(
      db.prepare("SELECT row, key FROM state_keys ORDER BY row").all()
    );
    valueRows = z.array(valueRowSchema).parse(
      db.prepare("SELECT row, action_values FROM q_values ORDER BY row").all()
    );
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PersistenceError(`Malformed portable value table: ${reason}`, { path, cause: err });
  } finally {
    db.close();
  }

  if (keyRows.length !== meta.num_states || valueRows.length !== meta.num_states) {
    throw new PersistenceError(
      `Expected ${meta.num_states} rows, found ${keyRows.length} keys and ${valueRows.length} value rows`,
      { path }
    );
  }

  const stateKeys: string[] = [];
  const qValues: Float64Array[] = [];
  for (let i = 0; i < meta.num_states; i++) {
    const keyRow = keyRows[i];
    const valueRow = valueRows[i];
    if (keyRow.row !== i || valueRow.row !== i) {
      throw new PersistenceError(`Row ${i} is missing`, { path });
    }
    checkKeyLength(keyRow.key, i, path);
    if (valueRow.action_values.length !== meta.num_actions * FLOAT_BYTES) {
      throw new PersistenceError(`Row ${i} does not hold ${meta.num_actions} values`, { path });
    }
    stateKeys.push(keyRow.key);
    qValues.push(decodeRow(valueRow.action_values));
  }

  return { numActions: meta.num_actions, stateKeys, qValues };
}

export function savePortableValueTable(path: string, learner: QLearner): void {
  writePortableValueTable(path, toPortableTable(learner));
}

/**
 * Replace the learner's table with the non-zero entries stored at `path`.
 */
export function loadPortableValueTable(path: string, learner: QLearner): void {
  const table = readPortableValueTable(path);
  try {
    learner.loadPortable(table);
  } catch (err) {
    if (err instanceof PersistenceError) {
      throw new PersistenceError(err.message, { path, cause: err.cause });
    }
    throw err;
  }
}
