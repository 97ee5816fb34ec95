import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type TasklaneDb = BetterSQLite3Database<typeof schema>;

export interface DbHandle {
  readonly db: TasklaneDb;
  readonly raw: Database.Database;
}

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'tasklane');
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'tasklane');
  } else {
    dir = join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'tasklane');
  }

  return join(dir, 'tasks.db');
}

/** The raw SQL to create the schema from scratch (idempotent) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('Not started', 'In progress', 'Done')),
    archived INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_archived ON tasks(archived);
CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status, archived);

CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

/**
 * Open a database with pragmas applied and the schema ensured.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function openDb(path: string): DbHandle {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const raw = new Database(path);

  raw.pragma('journal_mode = WAL');
  raw.pragma('busy_timeout = 5000');
  raw.exec(CREATE_SCHEMA_SQL);

  return { db: drizzle(raw, { schema }), raw };
}

/** Get the file path of an open database ('' for in-memory) */
export function getDbPath(handle: DbHandle): string {
  const list = handle.raw.pragma('database_list') as Array<{ file: string }>;
  return list[0]?.file ?? '';
}
