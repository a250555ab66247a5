/**
 * SQLite database for storing training runs, episodes and learning curves
 */

import Database from "better-sqlite3";
import { join } from "path";

let dbPath = join(process.cwd(), "shopfloor.db");

let db: Database.Database | null = null;

/**
 * Point the store at another file (or ":memory:"). Closes any open handle.
 */
export function configureDb(path: string): void {
  closeDb();
  dbPath = path;
}

export function getDb(): Database.Database {
  if (!db) {
    db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    initSchema(db);
  }
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    -- Experiments: training runs, baseline runs and evaluations
    CREATE TABLE IF NOT EXISTS experiments (
      id TEXT PRIMARY KEY,
      type TEXT NOT NULL CHECK (type IN ('training', 'baseline', 'evaluation')),
      learner_type TEXT CHECK (learner_type IN ('qlearning', 'random', 'heuristic')),
      config_json TEXT,
      final_metrics_json TEXT,
      learner_state TEXT,
      train_time_ms INTEGER,
      created_at TEXT DEFAULT (datetime('now'))
    );

    -- Episodes: one simulated day each
    CREATE TABLE IF NOT EXISTS episodes (
      id TEXT PRIMARY KEY,
      experiment_id TEXT NOT NULL REFERENCES experiments(id) ON DELETE CASCADE,
      episode_num INTEGER NOT NULL,
      total_return REAL,
      produced_parts INTEGER,
      steps INTEGER,
      final_time REAL,
      target_met INTEGER,
      created_at TEXT DEFAULT (datetime('now'))
    );

    -- Learning curve points
    CREATE TABLE IF NOT EXISTS learning_curve (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      experiment_id TEXT NOT NULL REFERENCES experiments(id) ON DELETE CASCADE,
      episode_num INTEGER NOT NULL,
      train_return REAL,
      produced_parts INTEGER,
      rolling_return REAL,
      eval_return REAL,
      eval_target_hit_rate REAL
    );

    -- Indexes
    CREATE INDEX IF NOT EXISTS idx_episodes_experiment ON episodes(experiment_id);
    CREATE INDEX IF NOT EXISTS idx_learning_curve_experiment ON learning_curve(experiment_id);
  `);
}

// ============ Experiment Operations ============

export type ExperimentType = "training" | "baseline" | "evaluation";
export type StoredLearnerType = "qlearning" | "random" | "heuristic";

export interface ExperimentRow {
  id: string;
  type: ExperimentType;
  learner_type: StoredLearnerType | null;
  config_json: string | null;
  final_metrics_json: string | null;
  learner_state: string | null;
  train_time_ms: number | null;
  created_at: string;
}

export function createExperiment(data: {
  id: string;
  type: ExperimentType;
  learnerType?: StoredLearnerType;
  config?: object;
  finalMetrics?: object;
  learnerState?: string;
  trainTimeMs?: number;
}): void {
  const db = getDb();
  db.prepare(`
    INSERT INTO experiments (id, type, learner_type, config_json, final_metrics_json, learner_state, train_time_ms)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    data.id,
    data.type,
    data.learnerType ?? null,
    data.config ? JSON.stringify(data.config) : null,
    data.finalMetrics ? JSON.stringify(data.finalMetrics) : null,
    data.learnerState ?? null,
    data.trainTimeMs ?? null
  );
}

export function listExperiments(type?: ExperimentType): ExperimentRow[] {
  const db = getDb();
  if (type) {
    return db
      .prepare<[string], ExperimentRow>("SELECT * FROM experiments WHERE type = ? ORDER BY created_at DESC, rowid DESC")
      .all(type);
  }
  return db
    .prepare<[], ExperimentRow>("SELECT * FROM experiments ORDER BY created_at DESC, rowid DESC")
    .all();
}

export function getExperiment(id: string): ExperimentRow | undefined {
  const db = getDb();
  return db.prepare<[string], ExperimentRow>("SELECT * FROM experiments WHERE id = ?").get(id);
}

// ============ Episode Operations ============

export interface EpisodeRow {
  id: string;
  experiment_id: string;
  episode_num: number;
  total_return: number | null;
  produced_parts: number | null;
  steps: number | null;
  final_time: number | null;
  target_met: number | null;
  created_at: string;
}

export interface EpisodeInput {
  id: string;
  experimentId: string;
  episodeNum: number;
  totalReturn: number;
  producedParts: number;
  steps: number;
  finalTime: number;
  targetMet: boolean;
}

export function createEpisodesBatch(episodes: EpisodeInput[]): void {
  const db = getDb();
  const stmt = db.prepare(`
    INSERT INTO episodes (id, experiment_id, episode_num, total_return, produced_parts, steps, final_time, target_met)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const insertMany = db.transaction((items: EpisodeInput[]) => {
    for (const data of items) {
      stmt.run(
        data.id,
        data.experimentId,
        data.episodeNum,
        data.totalReturn,
        data.producedParts,
        data.steps,
        data.finalTime,
        data.targetMet ? 1 : 0
      );
    }
  });

  insertMany(episodes);
}

export function listEpisodes(experimentId: string): EpisodeRow[] {
  const db = getDb();
  return db
    .prepare<[string], EpisodeRow>("SELECT * FROM episodes WHERE experiment_id = ? ORDER BY episode_num")
    .all(experimentId);
}

// ============ Learning Curve Operations ============

export interface LearningCurveRow {
  id: number;
  experiment_id: string;
  episode_num: number;
  train_return: number | null;
  produced_parts: number | null;
  rolling_return: number | null;
  eval_return: number | null;
  eval_target_hit_rate: number | null;
}

export interface LearningCurveInput {
  experimentId: string;
  episodeNum: number;
  trainReturn: number;
  producedParts: number;
  rollingReturn: number;
  evalReturn?: number;
  evalTargetHitRate?: number;
}

export function addLearningCurvePoints(points: LearningCurveInput[]): void {
  const db = getDb();
  const stmt = db.prepare(`
    INSERT INTO learning_curve (experiment_id, episode_num, train_return, produced_parts, rolling_return, eval_return, eval_target_hit_rate)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const insertMany = db.transaction((items: LearningCurveInput[]) => {
    for (const data of items) {
      stmt.run(
        data.experimentId,
        data.episodeNum,
        data.trainReturn,
        data.producedParts,
        data.rollingReturn,
        data.evalReturn ?? null,
        data.evalTargetHitRate ?? null
      );
    }
  });

  insertMany(points);
}

export function getLearningCurve(experimentId: string): LearningCurveRow[] {
  const db = getDb();
  return db
    .prepare<[string], LearningCurveRow>("SELECT * FROM learning_curve WHERE experiment_id = ? ORDER BY episode_num")
    .all(experimentId);
}

// ============ Aggregation Queries ============

export function getExperimentStats(experimentId: string): {
  totalEpisodes: number;
  avgReturn: number;
  avgProduced: number;
  targetHitRate: number;
} {
  const db = getDb();

  const stats = db.prepare<[string], {
    total_episodes: number;
    avg_return: number | null;
    avg_produced: number | null;
    target_hit_rate: number | null;
  }>(`
    SELECT
      COUNT(*) as total_episodes,
      AVG(total_return) as avg_return,
      AVG(produced_parts) as avg_produced,
      AVG(target_met) as target_hit_rate
    FROM episodes
    WHERE experiment_id = ?
  `).get(experimentId);

  return {
    totalEpisodes: stats?.total_episodes ?? 0,
    avgReturn: stats?.avg_return ?? 0,
    avgProduced: stats?.avg_produced ?? 0,
    targetHitRate: stats?.target_hit_rate ?? 0,
  };
}

// ============ Cleanup ============

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
