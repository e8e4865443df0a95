/**
 * @fileoverview SQLite Event Store
 *
 * better-sqlite3 implementation of the EventStore contract. Statements are
 * prepared once at initialization and every call runs synchronously on the
 * single handle, so writes from one process are serialized. Other processes
 * are kept out of an on-disk database by a proper-lockfile lock.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import lockfile from 'proper-lockfile';
import { parseJsonObject } from '../utils/safe_json.js';
import { getErrorMessage, isStorageError, StorageError, toError, type StorageOperation } from '../utils/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { OUTCOME_CODES, type ActionRecord, type ContextSnapshot } from '../types.js';
import { applyMigrations } from './migrations.js';
import type {
  ActionAggregate,
  ActionFrequency,
  ActionUse,
  EventStore,
  Exemplar,
  ExemplarStats,
  LearningStats,
  NewExemplar,
  NewTransfer,
  RecentAction,
  RecordActionInput,
  SituationCount,
  TimelineEntry,
  TransferStats,
  ValueEntry,
} from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const IN_MEMORY_DB = ':memory:';

const LOCK_STALE_TIMEOUT_MS = 5 * 60_000;
const LOCK_UPDATE_INTERVAL_MS = 30_000;
const LOCK_MAX_RETRIES = 5;
const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// ROW TYPES
// ============================================================================

interface ActionHistoryRow {
  id: number;
  timestamp: string;
  hour: number | null;
  day_of_week: string | null;
  is_weekend: number;
  time_of_day: string | null;
  battery_percent: number | null;
  situation: string | null;
  action_taken: string;
  action_params: string | null;
  success: number;
  execution_time_ms: number;
  context_json: string | null;
  created_at: string;
}

interface ValueRow {
  state_hash: string;
  action: string;
  q_value: number;
  update_count: number;
  last_updated: string;
}

interface ExemplarRow {
  id: number;
  text: string;
  embedding: Buffer;
  dimension: number;
  action: string;
  situation: string | null;
  success_count: number;
  created_at: string;
}

interface CountRow {
  situation: string;
  count: number;
}

// ============================================================================
// ROW MAPPING
// ============================================================================

function toActionRecord(row: ActionHistoryRow): ActionRecord {
  return {
    id: row.id,
    timestamp: row.timestamp,
    hour: row.hour,
    dayOfWeek: row.day_of_week,
    isWeekend: row.is_weekend === 1,
    timeOfDay: row.time_of_day,
    batteryPercent: row.battery_percent,
    situation: row.situation,
    action: row.action_taken,
    params: parseJsonObject(row.action_params),
    outcomeCode: row.success,
    durationMs: row.execution_time_ms,
    contextJson: row.context_json,
    createdAt: row.created_at,
  };
}

function toValueEntry(row: ValueRow): ValueEntry {
  return {
    stateHash: row.state_hash,
    action: row.action,
    value: row.q_value,
    updateCount: row.update_count,
    lastUpdated: row.last_updated,
  };
}

function encodeEmbedding(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

function decodeEmbedding(blob: Buffer): Float32Array {
  // Copy first: a Buffer slice is not guaranteed to be 4-byte aligned.
  return new Float32Array(new Uint8Array(blob).buffer);
}

function toExemplar(row: ExemplarRow): Exemplar {
  return {
    id: row.id,
    text: row.text,
    embedding: decodeEmbedding(row.embedding),
    dimension: row.dimension,
    action: row.action,
    situation: row.situation,
    successCount: row.success_count,
    createdAt: row.created_at,
  };
}

// ============================================================================
// STATEMENTS
// ============================================================================

function prepareStatements(db: Database.Database) {
  return {
    insertAction: db.prepare(`
      INSERT INTO action_history (
        timestamp, hour, day_of_week, is_weekend, time_of_day, battery_percent,
        situation, action_taken, action_params, success, execution_time_ms, context_json, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `),
    similar: db.prepare(`
      SELECT * FROM action_history
      WHERE situation = ? AND success = 1
      ORDER BY
        CASE
          WHEN time_of_day = ? THEN 3
          WHEN ABS(hour - ?) <= 2 THEN 2
          WHEN is_weekend = ? THEN 1
          ELSE 0
        END DESC,
        timestamp DESC
      LIMIT ?
    `),
    aggregate: db.prepare(`
      SELECT
        COUNT(*) AS total,
        SUM(CASE WHEN success = 1 THEN 1 ELSE 0 END) AS successes,
        AVG(CASE WHEN success = 1 THEN execution_time_ms ELSE NULL END) AS avg_duration
      FROM action_history
      WHERE situation = ? AND action_taken = ?
    `),
    prune: db.prepare('DELETE FROM action_history WHERE timestamp < ?'),
    recent: db.prepare(`
      SELECT action_taken, timestamp, situation FROM action_history
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `),
    learningStats: db.prepare(`
      SELECT
        COUNT(*) AS total_actions,
        COUNT(DISTINCT situation) AS unique_situations,
        COUNT(DISTINCT action_taken) AS unique_actions,
        SUM(CASE WHEN success = 1 THEN 1 ELSE 0 END) AS successful_actions,
        AVG(execution_time_ms) AS avg_duration
      FROM action_history
    `),
    topSituations: db.prepare(`
      SELECT situation, COUNT(*) AS count FROM action_history
      WHERE situation IS NOT NULL
      GROUP BY situation
      ORDER BY count DESC, situation ASC
      LIMIT ?
    `),
    situationFrequencies: db.prepare(`
      SELECT situation, COUNT(*) AS count FROM action_history
      WHERE situation IS NOT NULL AND situation != ? AND success = 1
      GROUP BY situation
      HAVING count >= ?
      ORDER BY count DESC, situation ASC
    `),
    transferable: db.prepare(`
      SELECT action_taken, COUNT(*) AS frequency,
             AVG(CASE WHEN success = 1 THEN 1.0 ELSE 0.0 END) AS success_rate
      FROM action_history
      WHERE situation = ?
      GROUP BY action_taken
      HAVING success_rate > ? AND frequency >= ?
      ORDER BY success_rate DESC, frequency DESC
      LIMIT ?
    `),
    timeline: db.prepare(`
      SELECT action_taken, timestamp FROM action_history
      WHERE success = 1
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `),
    actionUses: db.prepare(`
      SELECT action_params, context_json FROM action_history
      WHERE action_taken = ? AND success = 1
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `),
    loadValues: db.prepare('SELECT * FROM q_values'),
    upsertValue: db.prepare(`
      INSERT INTO q_values (state_hash, action, q_value, update_count, last_updated)
      VALUES (?, ?, ?, 1, ?)
      ON CONFLICT(state_hash, action) DO UPDATE SET
        q_value = excluded.q_value,
        update_count = update_count + 1,
        last_updated = excluded.last_updated
    `),
    topValues: db.prepare('SELECT * FROM q_values ORDER BY q_value DESC, update_count DESC LIMIT ?'),
    resetValues: db.prepare('DELETE FROM q_values'),
    findExemplar: db.prepare('SELECT * FROM exemplars WHERE situation IS ? AND action = ? ORDER BY id LIMIT 1'),
    insertExemplar: db.prepare(`
      INSERT INTO exemplars (text, embedding, dimension, action, situation, success_count, created_at)
      VALUES (?, ?, ?, ?, ?, 1, ?)
    `),
    incrementExemplar: db.prepare('UPDATE exemplars SET success_count = success_count + 1 WHERE id = ?'),
    listExemplars: db.prepare('SELECT * FROM exemplars ORDER BY id'),
    listExemplarsFor: db.prepare('SELECT * FROM exemplars WHERE situation = ? ORDER BY id'),
    exemplarStats: db.prepare(`
      SELECT COUNT(*) AS total_examples,
             COUNT(DISTINCT situation) AS unique_situations,
             COALESCE(SUM(success_count), 0) AS total_uses
      FROM exemplars
    `),
    insertTransfer: db.prepare(`
      INSERT INTO pattern_transfers (source_situation, target_situation, pattern_type, action, confidence, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `),
    transferStats: db.prepare(`
      SELECT COUNT(*) AS total_transfers,
             COUNT(DISTINCT target_situation) AS unique_targets,
             COALESCE(AVG(confidence), 0) AS avg_confidence
      FROM pattern_transfers
    `),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

// ============================================================================
// SQLITE EVENT STORE
// ============================================================================

export interface SqliteEventStoreOptions {
  /** Clock used for timestamps and retention cutoffs */
  clock?: () => Date;
}

export class SqliteEventStore implements EventStore {
  private db: Database.Database | null = null;
  private statements: Statements | null = null;
  private readonly dbPath: string;
  private readonly lockPath: string;
  private readonly clock: () => Date;
  private releaseLock: (() => Promise<void>) | null = null;
  private initialized = false;

  constructor(dbPath: string = IN_MEMORY_DB, options: SqliteEventStoreOptions = {}) {
    this.dbPath = dbPath;
    this.lockPath = `${dbPath}.lock`;
    this.clock = options.clock ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    if (this.dbPath !== IN_MEMORY_DB) {
      await this.acquireLock();
    }

    try {
      const db = new Database(this.dbPath);
      this.db = db;
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('busy_timeout = 5000');

      const applied = applyMigrations(db, this.clock);
      if (applied.length > 0) {
        logDebug('Applied event store migrations', { path: this.dbPath, versions: applied.map((m) => m.version) });
      }
      this.statements = prepareStatements(db);
      this.initialized = true;
    } catch (error) {
      await this.close();
      throw new StorageError('migrate', false, getErrorMessage(error), toError(error));
    }
  }

  async close(): Promise<void> {
    try {
      if (this.db) {
        this.db.close();
      }
    } finally {
      this.db = null;
      this.statements = null;
      this.initialized = false;
      if (this.releaseLock) {
        await this.releaseLock().catch((lockError: unknown) => {
          logWarning('Failed to release event store lock during close', { path: this.lockPath, error: getErrorMessage(lockError) });
        });
        this.releaseLock = null;
      }
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  private async acquireLock(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      await fs.writeFile(this.dbPath, '', { flag: 'a' });
      this.releaseLock = await lockfile.lock(this.dbPath, {
        lockfilePath: this.lockPath,
        stale: LOCK_STALE_TIMEOUT_MS,
        update: LOCK_UPDATE_INTERVAL_MS,
        onCompromised: (err) => {
          logWarning('Event store lock compromised; closing database', { path: this.lockPath, error: err.message });
          if (this.db) {
            this.db.close();
            this.db = null;
            this.statements = null;
            this.initialized = false;
          }
        },
        retries: {
          retries: LOCK_MAX_RETRIES,
          factor: 1.5,
          minTimeout: 100,
          maxTimeout: 2_000,
        },
      });
    } catch (error) {
      throw new StorageError('lock', true, `${this.dbPath} is locked by another process (${getErrorMessage(error)})`, toError(error));
    }
  }

  private run<T>(operation: StorageOperation, fn: (statements: Statements, db: Database.Database) => T): T {
    const db = this.db;
    const statements = this.statements;
    if (!db || !statements) {
      throw new StorageError(operation, false, 'event store is not initialized');
    }
    try {
      return fn(statements, db);
    } catch (error) {
      if (isStorageError(error)) throw error;
      const busy = error instanceof Database.SqliteError && error.code === 'SQLITE_BUSY';
      throw new StorageError(operation, busy, getErrorMessage(error), toError(error));
    }
  }

  private nowIso(): string {
    return this.clock().toISOString();
  }

  private daysAgoIso(days: number): string {
    return new Date(this.clock().getTime() - days * DAY_MS).toISOString();
  }

  // --------------------------------------------------------------------------
  // Action history
  // --------------------------------------------------------------------------

  async record(input: RecordActionInput): Promise<number> {
    const { context } = input;
    const situation = input.situation === undefined ? context.situation : input.situation;
    const params = input.params && Object.keys(input.params).length > 0 ? JSON.stringify(input.params) : null;
    return this.run('write', (s) => {
      const result = s.insertAction.run(
        context.timestamp,
        context.hour,
        context.dayOfWeek,
        context.isWeekend ? 1 : 0,
        context.timeOfDay,
        context.batteryPercent,
        situation,
        input.action,
        params,
        OUTCOME_CODES[input.outcome],
        Math.max(0, Math.round(input.durationMs ?? 0)),
        JSON.stringify(context),
        this.nowIso()
      );
      return Number(result.lastInsertRowid);
    });
  }

  async querySimilar(context: ContextSnapshot, situation: string, limit: number): Promise<ActionRecord[]> {
    return this.run('query', (s) => {
      const rows = s.similar.all(situation, context.timeOfDay, context.hour, context.isWeekend ? 1 : 0, limit) as ActionHistoryRow[];
      return rows.map(toActionRecord);
    });
  }

  async aggregate(situation: string, action: string): Promise<ActionAggregate> {
    return this.run('query', (s) => {
      const row = s.aggregate.get(situation, action) as
        | { total: number; successes: number | null; avg_duration: number | null }
        | undefined;
      const total = row?.total ?? 0;
      const successes = row?.successes ?? 0;
      return {
        total,
        successes,
        successRate: total > 0 ? successes / total : 0,
        avgDurationMs: row?.avg_duration ?? 0,
      };
    });
  }

  async prune(retentionDays: number): Promise<number> {
    const cutoff = this.daysAgoIso(retentionDays);
    return this.run('delete', (s, db) => {
      const deleted = s.prune.run(cutoff).changes;
      db.exec('VACUUM');
      return deleted;
    });
  }

  async recentActions(limit: number): Promise<RecentAction[]> {
    return this.run('query', (s) => {
      const rows = s.recent.all(limit) as Array<{ action_taken: string; timestamp: string; situation: string | null }>;
      return rows.map((row) => ({ action: row.action_taken, timestamp: row.timestamp, situation: row.situation }));
    });
  }

  async learningStats(): Promise<LearningStats> {
    return this.run('query', (s) => {
      const row = s.learningStats.get() as
        | {
            total_actions: number;
            unique_situations: number;
            unique_actions: number;
            successful_actions: number | null;
            avg_duration: number | null;
          }
        | undefined;
      const total = row?.total_actions ?? 0;
      const successes = row?.successful_actions ?? 0;
      return {
        totalActions: total,
        uniqueSituations: row?.unique_situations ?? 0,
        uniqueActions: row?.unique_actions ?? 0,
        successRate: total > 0 ? successes / total : 0,
        avgDurationMs: row?.avg_duration ?? 0,
      };
    });
  }

  async topSituations(limit: number): Promise<SituationCount[]> {
    return this.run('query', (s) => (s.topSituations.all(limit) as CountRow[]).map((row) => ({ ...row })));
  }

  async situationFrequencies(exclude: string, minSuccesses: number): Promise<SituationCount[]> {
    return this.run('query', (s) =>
      (s.situationFrequencies.all(exclude, minSuccesses) as CountRow[]).map((row) => ({ ...row }))
    );
  }

  async transferableActions(
    source: string,
    minSuccessRate: number,
    minFrequency: number,
    limit: number
  ): Promise<ActionFrequency[]> {
    return this.run('query', (s) => {
      const rows = s.transferable.all(source, minSuccessRate, minFrequency, limit) as Array<{
        action_taken: string;
        frequency: number;
        success_rate: number;
      }>;
      return rows.map((row) => ({ action: row.action_taken, frequency: row.frequency, successRate: row.success_rate }));
    });
  }

  async successfulTimeline(limit: number): Promise<TimelineEntry[]> {
    return this.run('query', (s) => {
      const rows = s.timeline.all(limit) as Array<{ action_taken: string; timestamp: string }>;
      return rows.map((row) => ({ action: row.action_taken, timestamp: row.timestamp }));
    });
  }

  async successfulRecordsForAction(action: string, limit: number): Promise<ActionUse[]> {
    return this.run('query', (s) => {
      const rows = s.actionUses.all(action, limit) as Array<{ action_params: string | null; context_json: string | null }>;
      return rows.map((row) => ({ params: parseJsonObject(row.action_params), contextJson: row.context_json }));
    });
  }

  // --------------------------------------------------------------------------
  // Value table
  // --------------------------------------------------------------------------

  async loadValues(): Promise<ValueEntry[]> {
    return this.run('read', (s) => (s.loadValues.all() as ValueRow[]).map(toValueEntry));
  }

  async upsertValue(stateHash: string, action: string, value: number): Promise<void> {
    this.run('write', (s) => {
      s.upsertValue.run(stateHash, action, value, this.nowIso());
    });
  }

  async topValues(limit: number): Promise<ValueEntry[]> {
    return this.run('read', (s) => (s.topValues.all(limit) as ValueRow[]).map(toValueEntry));
  }

  async resetValues(): Promise<number> {
    return this.run('delete', (s) => s.resetValues.run().changes);
  }

  // --------------------------------------------------------------------------
  // Exemplars
  // --------------------------------------------------------------------------

  async findExemplar(situation: string | null, action: string): Promise<Exemplar | null> {
    return this.run('read', (s) => {
      const row = s.findExemplar.get(situation, action) as ExemplarRow | undefined;
      return row ? toExemplar(row) : null;
    });
  }

  async insertExemplar(exemplar: NewExemplar): Promise<number> {
    return this.run('write', (s) => {
      const result = s.insertExemplar.run(
        exemplar.text,
        encodeEmbedding(exemplar.embedding),
        exemplar.embedding.length,
        exemplar.action,
        exemplar.situation,
        this.nowIso()
      );
      return Number(result.lastInsertRowid);
    });
  }

  async incrementExemplar(id: number): Promise<void> {
    this.run('write', (s) => {
      s.incrementExemplar.run(id);
    });
  }

  async listExemplars(situation?: string | null): Promise<Exemplar[]> {
    return this.run('read', (s) => {
      const rows = (situation ? s.listExemplarsFor.all(situation) : s.listExemplars.all()) as ExemplarRow[];
      return rows.map(toExemplar);
    });
  }

  async exemplarStats(): Promise<ExemplarStats> {
    return this.run('read', (s) => {
      const row = s.exemplarStats.get() as
        | { total_examples: number; unique_situations: number; total_uses: number }
        | undefined;
      return {
        totalExamples: row?.total_examples ?? 0,
        uniqueSituations: row?.unique_situations ?? 0,
        totalUses: row?.total_uses ?? 0,
      };
    });
  }

  // --------------------------------------------------------------------------
  // Transfers
  // --------------------------------------------------------------------------

  async insertTransfer(transfer: NewTransfer): Promise<number> {
    return this.run('write', (s) => {
      const result = s.insertTransfer.run(
        transfer.sourceSituation,
        transfer.targetSituation,
        transfer.patternType,
        transfer.action,
        transfer.confidence,
        this.nowIso()
      );
      return Number(result.lastInsertRowid);
    });
  }

  async transferStats(): Promise<TransferStats> {
    return this.run('read', (s) => {
      const row = s.transferStats.get() as
        | { total_transfers: number; unique_targets: number; avg_confidence: number }
        | undefined;
      return {
        totalTransfers: row?.total_transfers ?? 0,
        uniqueTargets: row?.unique_targets ?? 0,
        avgConfidence: row?.avg_confidence ?? 0,
      };
    });
  }
}

/**
 * Open and initialize a store in one step.
 */
export async function openEventStore(
  dbPath: string = IN_MEMORY_DB,
  options: SqliteEventStoreOptions = {}
): Promise<SqliteEventStore> {
  const store = new SqliteEventStore(dbPath, options);
  await store.initialize();
  return store;
}
