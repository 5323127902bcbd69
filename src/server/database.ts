import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type {
  FeedbackUpdate,
  FeedbackUpdateResult,
  FeedbackValue,
  PredictionAttempt,
  PredictionRecord,
  PetClass,
  PredictionResult,
} from './types/prediction.js';

export interface PredictionCounts {
  total: number;
  successes: number;
  avgInferenceTimeMs: number;
  positiveFeedback: number;
  negativeFeedback: number;
  byClass: Record<PetClass, number>;
}

const IN_MEMORY = ':memory:';

/**
 * Opens (creating if needed) the SQLite database backing the feedback store.
 * Pass ':memory:' for a throwaway store.
 */
export function initializeDatabase(path: string): FeedbackStore {
  if (path !== IN_MEMORY) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  const store = new FeedbackStore(db);
  console.log(`[Database] Initialized at ${path}`);
  return store;
}

// ============================================================================
// PREDICTION_FEEDBACK TABLE
// ============================================================================

interface PredictionRow {
  id: number;
  timestamp: string;
  success: number;
  prediction_result: PredictionResult;
  proba_cat: number;
  proba_dog: number;
  inference_time_ms: number;
  rgpd_consent: number;
  filename: string | null;
  user_feedback: number | null;
  user_comment: string | null;
}

interface StatsRow {
  total: number;
  successes: number | null;
  avg_inference_time_ms: number | null;
  positive: number | null;
  negative: number | null;
  cats: number | null;
  dogs: number | null;
}

function toFeedbackValue(value: number | null): FeedbackValue | undefined {
  if (value === 0 || value === 1) return value;
  return undefined;
}

function toRecord(row: PredictionRow): PredictionRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    success: row.success === 1,
    predictionResult: row.prediction_result,
    probaCat: row.proba_cat,
    probaDog: row.proba_dog,
    inferenceTimeMs: row.inference_time_ms,
    rgpdConsent: row.rgpd_consent === 1,
    filename: row.filename ?? undefined,
    userFeedback: toFeedbackValue(row.user_feedback),
    userComment: row.user_comment ?? undefined,
  };
}

/**
 * Durable log of inference attempts. Rows are append-only apart from the
 * user_feedback / user_comment columns, which only change through
 * updateFeedback() and only for rows stored with consent.
 */
export class FeedbackStore {
  private readonly db: Database.Database;
  private readonly amend: (id: number, update: FeedbackUpdate) => FeedbackUpdateResult;

  constructor(db: Database.Database) {
    this.db = db;
    this.createTables();

    // read-check-write in one transaction: a throw anywhere rolls the row back
    this.amend = this.db.transaction((id: number, update: FeedbackUpdate): FeedbackUpdateResult => {
      const existing = this.getRecord(id);
      if (!existing) return { status: 'not_found' };
      if (!existing.rgpdConsent) return { status: 'consent_denied' };

      const fields: string[] = [];
      const values: Array<string | number> = [];

      if (update.userFeedback !== undefined) {
        fields.push('user_feedback = ?');
        values.push(update.userFeedback);
      }
      if (update.userComment) {
        fields.push('user_comment = ?');
        values.push(update.userComment);
      }

      if (fields.length > 0) {
        values.push(id);
        this.db.prepare(`UPDATE prediction_feedback SET ${fields.join(', ')} WHERE id = ?`).run(...values);
      }

      const record = this.getRecord(id);
      if (!record) throw new Error(`Prediction ${id} vanished during update`);
      return { status: 'updated', record };
    });
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS prediction_feedback (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        success INTEGER NOT NULL,
        prediction_result TEXT NOT NULL CHECK(prediction_result IN ('cat', 'dog', 'error')),
        proba_cat REAL NOT NULL DEFAULT 0,
        proba_dog REAL NOT NULL DEFAULT 0,
        inference_time_ms INTEGER NOT NULL CHECK(inference_time_ms >= 0),
        rgpd_consent INTEGER NOT NULL DEFAULT 0,
        filename TEXT,
        user_feedback INTEGER CHECK(user_feedback IN (0, 1)),
        user_comment TEXT,
        CHECK((success = 1) = (prediction_result != 'error'))
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_feedback_timestamp ON prediction_feedback(timestamp);
      CREATE INDEX IF NOT EXISTS idx_feedback_result ON prediction_feedback(prediction_result);
    `);
  }

  savePredictionFeedback(attempt: PredictionAttempt): PredictionRecord {
    const failed = !attempt.success;
    const stmt = this.db.prepare(`
      INSERT INTO prediction_feedback (
        timestamp, success, prediction_result, proba_cat, proba_dog,
        inference_time_ms, rgpd_consent, filename, user_comment
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const result = stmt.run(
      attempt.timestamp ?? new Date().toISOString(),
      attempt.success ? 1 : 0,
      failed ? 'error' : attempt.predictionResult,
      failed ? 0 : attempt.probaCat,
      failed ? 0 : attempt.probaDog,
      Math.max(0, Math.round(attempt.inferenceTimeMs)),
      attempt.rgpdConsent ? 1 : 0,
      // filename is personal data: never stored without consent
      attempt.rgpdConsent ? attempt.filename ?? null : null,
      attempt.userComment ?? null
    );

    const id = Number(result.lastInsertRowid);
    const record = this.getRecord(id);
    if (!record) throw new Error(`Prediction ${id} was not persisted`);
    return record;
  }

  getRecord(id: number): PredictionRecord | undefined {
    const row = this.db
      .prepare<[number], PredictionRow>('SELECT * FROM prediction_feedback WHERE id = ?')
      .get(id);
    return row ? toRecord(row) : undefined;
  }

  updateFeedback(id: number, update: FeedbackUpdate): FeedbackUpdateResult {
    return this.amend(id, update);
  }

  /** Newest first by insertion order; wall-clock timestamps can step backwards. */
  getRecent(limit: number): PredictionRecord[] {
    const rows = this.db
      .prepare<[number], PredictionRow>('SELECT * FROM prediction_feedback ORDER BY id DESC LIMIT ?')
      .all(Math.max(0, Math.floor(limit)));
    return rows.map(toRecord);
  }

  countPredictions(): PredictionCounts {
    const stats = this.db
      .prepare<[], StatsRow>(`
        SELECT
          COUNT(*) as total,
          SUM(CASE WHEN success = 1 THEN 1 ELSE 0 END) as successes,
          AVG(inference_time_ms) as avg_inference_time_ms,
          SUM(CASE WHEN user_feedback = 1 THEN 1 ELSE 0 END) as positive,
          SUM(CASE WHEN user_feedback = 0 THEN 1 ELSE 0 END) as negative,
          SUM(CASE WHEN success = 1 AND prediction_result = 'cat' THEN 1 ELSE 0 END) as cats,
          SUM(CASE WHEN success = 1 AND prediction_result = 'dog' THEN 1 ELSE 0 END) as dogs
        FROM prediction_feedback
      `)
      .get();

    // SUM/AVG yield NULL on an empty table
    return {
      total: stats?.total ?? 0,
      successes: stats?.successes ?? 0,
      avgInferenceTimeMs: stats?.avg_inference_time_ms ?? 0,
      positiveFeedback: stats?.positive ?? 0,
      negativeFeedback: stats?.negative ?? 0,
      byClass: {
        cat: stats?.cats ?? 0,
        dog: stats?.dogs ?? 0,
      },
    };
  }

  // ==========================================================================
  // DATABASE MANAGEMENT
  // ==========================================================================

  /** Throws when the connection cannot serve queries. */
  ping(): void {
    this.db.prepare('SELECT 1').get();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      console.log('[Database] Connection closed');
    }
  }
}
