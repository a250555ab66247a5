/**
 * State Feature Extractor
 *
 * Builds the discretized StateKey from simulator internals and converts it
 * to and from the textual form used as the value-table key.
 */

import type { DiscreteStateKey, Machine, MachineStatus, StateKey, Worker } from "../types";

// Production gap thresholds (parts short of the daily target)
const GAP_LOW = 30;
const GAP_HIGH = 60;

/**
 * Bucket remaining time in the day: 0 (over), 1 (last quarter), 2 (second half), 3 (first half).
 */
export function getTimeBucket(currentTime: number, dayDuration: number): number {
  const remaining = dayDuration - currentTime;
  if (remaining <= 0) return 0;
  if (remaining <= dayDuration / 4) return 1;
  if (remaining <= dayDuration / 2) return 2;
  return 3;
}

/**
 * Bucket the production shortfall against the daily target.
 */
export function getGapBucket(dailyTarget: number, produced: number): number {
  const gap = dailyTarget - produced;
  if (gap <= 0) return 0;
  if (gap <= GAP_LOW) return 1;
  if (gap <= GAP_HIGH) return 2;
  return 3;
}

/**
 * 0 low (< 0.3), 1 mid (< 0.7), 2 high.
 */
export function getSkillBucket(skill: number): number {
  if (skill < 0.3) return 0;
  if (skill < 0.7) return 1;
  return 2;
}

const STATUS_BUCKETS: Record<MachineStatus, number> = {
  idle: 0,
  busy: 1,
  broken: 2,
  maintenance: 3,
};

export function getMachineStatusBucket(status: MachineStatus): number {
  return STATUS_BUCKETS[status];
}

/**
 * Simulator internals needed for state extraction.
 */
export interface FloorSnapshot {
  decisionMachine: Machine | null;
  machines: readonly Machine[];
  workers: readonly Worker[];
  skillMatrix: readonly (readonly number[])[];
  currentTime: number;
  dayDuration: number;
  shiftIndex: number;
  producedGoodParts: number;
  dailyTarget: number;
}

/**
 * Extract the StateKey for the current decision.
 */
export function extractState(snapshot: FloorSnapshot): StateKey {
  const { decisionMachine, machines, workers, skillMatrix } = snapshot;

  const workerIdle = workers.map((w) => (w.status === "idle" ? 1 : 0));
  const skillBuckets = decisionMachine
    ? workers.map((w) => getSkillBucket(skillMatrix[w.id][decisionMachine.typeIndex]))
    : workers.map(() => 0);
  const machineStatuses = machines.map((m) => getMachineStatusBucket(m.status));

  return [
    decisionMachine ? decisionMachine.id : 0,
    decisionMachine ? decisionMachine.priority : 0,
    snapshot.shiftIndex,
    getTimeBucket(snapshot.currentTime, snapshot.dayDuration),
    getGapBucket(snapshot.dailyTarget, snapshot.producedGoodParts),
    workerIdle,
    skillBuckets,
    machineStatuses,
  ];
}

// ============ Textual Encoding ============

function encodeTuple(values: readonly number[]): string {
  // Single-element tuples keep a trailing comma: "(1,)"
  return values.length === 1 ? `(${values[0]},)` : `(${values.join(", ")})`;
}

/**
 * Discretize a StateKey to its textual form,
 * e.g. "(0, 2, 0, 3, 3, (1, 1), (2, 0), (0, 0, 0, 0))".
 */
export function discretizeState(state: StateKey): DiscreteStateKey {
  const [machineId, priority, shift, timeBucket, gapBucket, workerIdle, skillBuckets, statuses] = state;
  return [
    `(${machineId}, ${priority}, ${shift}, ${timeBucket}, ${gapBucket}`,
    encodeTuple(workerIdle),
    encodeTuple(skillBuckets),
    `${encodeTuple(statuses)})`,
  ].join(", ");
}

type TupleNode = number | TupleNode[];

class KeyParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): TupleNode[] {
    const node = this.parseTuple();
    this.skipWhitespace();
    if (this.pos !== this.text.length) {
      this.fail("trailing characters");
    }
    return node;
  }

  private parseTuple(): TupleNode[] {
    this.expect("(");
    const items: TupleNode[] = [];
    this.skipWhitespace();
    if (this.peek() === ")") {
      this.pos++;
      return items;
    }
    for (;;) {
      this.skipWhitespace();
      items.push(this.peek() === "(" ? this.parseTuple() : this.parseInteger());
      this.skipWhitespace();
      const c = this.peek();
      if (c === ")") {
        this.pos++;
        return items;
      }
      this.expect(",");
      this.skipWhitespace();
      if (this.peek() === ")") {
        this.pos++;
        return items;
      }
    }
  }

  private parseInteger(): number {
    const match = /^-?\d+/.exec(this.text.slice(this.pos));
    if (!match) {
      return this.fail("expected integer");
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private expect(c: string): void {
    if (this.peek() !== c) {
      this.fail(`expected '${c}'`);
    }
    this.pos++;
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  private fail(reason: string): never {
    throw new Error(`Malformed state key at ${this.pos}: ${reason} in "${this.text}"`);
  }
}

function asInt(node: TupleNode | undefined, field: string): number {
  if (typeof node !== "number") {
    throw new Error(`Malformed state key: ${field} must be an integer`);
  }
  return node;
}

function asIntTuple(node: TupleNode | undefined, field: string): number[] {
  if (!Array.isArray(node) || node.some((v) => typeof v !== "number")) {
    throw new Error(`Malformed state key: ${field} must be a tuple of integers`);
  }
  return node.map((v) => asInt(v, field));
}

/**
 * Parse the textual form back into a StateKey. Throws on malformed input.
 */
export function parseStateKey(text: DiscreteStateKey): StateKey {
  const root = new KeyParser(text).parse();
  if (root.length !== 8) {
    throw new Error(`Malformed state key: expected 8 fields, got ${root.length}`);
  }

  const workerIdle = asIntTuple(root[5], "workerIdle");
  const skillBuckets = asIntTuple(root[6], "skillBuckets");
  if (workerIdle.length !== skillBuckets.length) {
    throw new Error("Malformed state key: worker vectors differ in length");
  }

  return [
    asInt(root[0], "machineId"),
    asInt(root[1], "priority"),
    asInt(root[2], "shift"),
    asInt(root[3], "timeBucket"),
    asInt(root[4], "gapBucket"),
    workerIdle,
    skillBuckets,
    asIntTuple(root[7], "machineStatuses"),
  ];
}
