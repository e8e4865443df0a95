import { createHash } from 'node:crypto';
import type Database from 'better-sqlite3';

export interface MigrationDefinition { version: number; name: string; sql: string; }
export interface AppliedMigration { version: number; name: string; checksum: string; }

const MIGRATIONS: MigrationDefinition[] = [
  {
    version: 1,
    name: 'action_history',
    sql: [
      'CREATE TABLE IF NOT EXISTS action_history (id INTEGER PRIMARY KEY AUTOINCREMENT, timestamp TEXT NOT NULL, hour INTEGER, day_of_week TEXT, is_weekend INTEGER NOT NULL DEFAULT 0, time_of_day TEXT, battery_percent INTEGER, situation TEXT, action_taken TEXT NOT NULL, action_params TEXT, success INTEGER NOT NULL DEFAULT 1, execution_time_ms INTEGER NOT NULL DEFAULT 0, context_json TEXT, created_at TEXT NOT NULL);',
      'CREATE INDEX IF NOT EXISTS idx_action_history_situation ON action_history(situation);',
      'CREATE INDEX IF NOT EXISTS idx_action_history_hour ON action_history(hour);',
      'CREATE INDEX IF NOT EXISTS idx_action_history_dow ON action_history(day_of_week);',
      'CREATE INDEX IF NOT EXISTS idx_action_history_timestamp ON action_history(timestamp);',
    ].join('\n'),
  },
  {
    version: 2,
    name: 'value_table',
    sql: [
      'CREATE TABLE IF NOT EXISTS q_values (state_hash TEXT NOT NULL, action TEXT NOT NULL, q_value REAL NOT NULL, update_count INTEGER NOT NULL DEFAULT 1, last_updated TEXT NOT NULL, PRIMARY KEY (state_hash, action));',
    ].join('\n'),
  },
  {
    version: 3,
    name: 'exemplars',
    sql: [
      'CREATE TABLE IF NOT EXISTS exemplars (id INTEGER PRIMARY KEY AUTOINCREMENT, text TEXT NOT NULL, embedding BLOB NOT NULL, dimension INTEGER NOT NULL, action TEXT NOT NULL, situation TEXT, success_count INTEGER NOT NULL DEFAULT 1 CHECK (success_count >= 1), created_at TEXT NOT NULL);',
      'CREATE INDEX IF NOT EXISTS idx_exemplars_situation ON exemplars(situation);',
    ].join('\n'),
  },
  {
    version: 4,
    name: 'pattern_transfers',
    sql: [
      'CREATE TABLE IF NOT EXISTS pattern_transfers (id INTEGER PRIMARY KEY AUTOINCREMENT, source_situation TEXT NOT NULL, target_situation TEXT NOT NULL, pattern_type TEXT NOT NULL, action TEXT NOT NULL, confidence REAL NOT NULL CHECK (confidence <= 0.9), created_at TEXT NOT NULL);',
      'CREATE INDEX IF NOT EXISTS idx_pattern_transfers_target ON pattern_transfers(target_situation);',
    ].join('\n'),
  },
];

export const SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1]?.version ?? 0;

const hashSql = (sql: string): string => createHash('sha256').update(sql).digest('hex');

const ensureMigrationTable = (db: Database.Database): void => {
  db.exec('CREATE TABLE IF NOT EXISTS schema_migrations (version INTEGER PRIMARY KEY, name TEXT NOT NULL, checksum TEXT NOT NULL, applied_at TEXT NOT NULL);');
};

export const readSchemaVersion = (db: Database.Database): number => {
  ensureMigrationTable(db);
  const row = db.prepare('SELECT MAX(version) AS version FROM schema_migrations').get() as { version: number | null } | undefined;
  return row?.version ?? 0;
};

/**
 * Apply every migration newer than the recorded schema version, each in its own
 * transaction. Returns what was applied; an up-to-date database yields [].
 */
export function applyMigrations(db: Database.Database, now: () => Date = () => new Date()): AppliedMigration[] {
  const fromVersion = readSchemaVersion(db);
  const pending = MIGRATIONS.filter((migration) => migration.version > fromVersion);
  const insert = db.prepare('INSERT INTO schema_migrations (version, name, checksum, applied_at) VALUES (?, ?, ?, ?)');
  const applied: AppliedMigration[] = [];
  for (const migration of pending) {
    const checksum = hashSql(migration.sql);
    db.transaction(() => {
      db.exec(migration.sql);
      insert.run(migration.version, migration.name, checksum, now().toISOString());
    })();
    applied.push({ version: migration.version, name: migration.name, checksum });
  }
  return applied;
}
