/**
 * Session persistence
 *
 * Stores a translation context per session id so that namespace activations
 * and local definitions survive between calls.
 */

import type Database from 'better-sqlite3';
import { createContext, snapshotContext, type Context } from '../lambda/context.js';
import type { SessionRecord } from '../types.js';

interface DbSessionRow {
  id: string;
  activated_domains: string;
  definitions: string;
  created_at: number;
  updated_at: number;
}

function parseStringArray(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function parseStringRecord(json: string): Record<string, string> {
  const value: unknown = JSON.parse(json);
  const result: Record<string, string> = {};
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === 'string') result[key] = entry;
    }
  }
  return result;
}

function rowToSession(row: DbSessionRow): SessionRecord {
  return {
    id: row.id,
    activatedDomains: parseStringArray(row.activated_domains),
    definitions: parseStringRecord(row.definitions),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Get a stored session by id
 */
export function getSession(db: Database.Database, id: string): SessionRecord | null {
  const row = db
    .prepare<[string], DbSessionRow>('SELECT * FROM sessions WHERE id = ?')
    .get(id);
  return row ? rowToSession(row) : null;
}

/**
 * Load the context for a session, or a fresh one if it has never been saved
 */
export function loadSession(db: Database.Database, id: string): Context {
  const session = getSession(db, id);
  return session ? createContext(session) : createContext();
}

/**
 * Insert or update the stored context for a session
 */
export function saveSession(db: Database.Database, id: string, context: Context): SessionRecord {
  const now = Date.now();
  const snapshot = snapshotContext(context);

  db.prepare(`
    INSERT INTO sessions (id, activated_domains, definitions, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      activated_domains = excluded.activated_domains,
      definitions = excluded.definitions,
      updated_at = excluded.updated_at
  `).run(id, JSON.stringify(snapshot.activatedDomains), JSON.stringify(snapshot.definitions), now, now);

  const stored = getSession(db, id);
  if (!stored) {
    throw new Error(`Session ${id} was not stored`);
  }
  return stored;
}

/**
 * Delete a session. Returns false if it did not exist.
 */
export function deleteSession(db: Database.Database, id: string): boolean {
  return db.prepare('DELETE FROM sessions WHERE id = ?').run(id).changes > 0;
}

/**
 * List sessions, most recently used first
 */
export function listSessions(db: Database.Database, limit: number = 50): SessionRecord[] {
  const rows = db
    .prepare<[number], DbSessionRow>('SELECT * FROM sessions ORDER BY updated_at DESC, rowid DESC LIMIT ?')
    .all(limit);
  return rows.map(rowToSession);
}

/**
 * Run `fn` against a session's context and save the result.
 * Without a session id the context is fresh and nothing is stored.
 */
export function withSession<T>(
  db: Database.Database,
  sessionId: string | undefined,
  fn: (context: Context) => T
): T {
  if (sessionId === undefined) {
    return fn(createContext());
  }

  const context = loadSession(db, sessionId);
  const result = fn(context);
  saveSession(db, sessionId, context);
  return result;
}
