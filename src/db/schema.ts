/**
 * SQLite Session Store Schema and Migrations
 */

import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { mkdirSync, existsSync } from 'fs';

// Current schema version
const SCHEMA_VERSION = 1;

/**
 * Home directory for config and sessions; LAMBDA_HOME overrides ~/.lambda-lang
 */
export function getLambdaDir(): string {
  return process.env.LAMBDA_HOME || join(homedir(), '.lambda-lang');
}

export function getSessionDbPath(): string {
  return join(getLambdaDir(), 'sessions.db');
}

/**
 * Ensure the lambda directory exists
 */
export function ensureDirectories(): void {
  const dir = getLambdaDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Initialize database with schema
 */
export function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY
    );
  `);

  const versionRow = db
    .prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1')
    .get();
  const currentVersion = versionRow?.version ?? 0;

  if (currentVersion < SCHEMA_VERSION) {
    migrate(db, currentVersion, SCHEMA_VERSION);
  }
}

/**
 * Run migrations from one version to another
 */
function migrate(db: Database.Database, from: number, to: number): void {
  const migrations: Array<(db: Database.Database) => void> = [
    migrateV0toV1,
  ];

  db.transaction(() => {
    for (let v = from; v < to; v++) {
      migrations[v](db);
    }

    db.prepare('DELETE FROM schema_version').run();
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(to);
  })();
}

/**
 * Migration from v0 (fresh) to v1
 */
function migrateV0toV1(db: Database.Database): void {
  db.exec(`
    -- One row per translation session; context stored as JSON
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      activated_domains TEXT NOT NULL DEFAULT '[]',
      definitions TEXT NOT NULL DEFAULT '{}',
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_sessions_updated ON sessions(updated_at DESC);
  `);
}

/**
 * Open the session database. Pass ':memory:' for a throwaway store.
 */
export function openSessionDb(path: string = getSessionDbPath()): Database.Database {
  if (path !== ':memory:') {
    ensureDirectories();
  }
  const db = new Database(path);
  initializeSchema(db);
  return db;
}
