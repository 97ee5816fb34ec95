import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { openDb, getDbPath } from '../src/db.js';
import type { DbHandle } from '../src/db.js';

const handles: DbHandle[] = [];

function open(path: string): DbHandle {
  const handle = openDb(path);
  handles.push(handle);
  return handle;
}

afterEach(() => {
  for (const h of handles.splice(0)) {
    if (h.raw.open) h.raw.close();
  }
});

describe('openDb', () => {
  it('creates the tasks and settings tables', () => {
    const { raw } = open(':memory:');
    const tables = raw
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .pluck()
      .all();
    expect(tables).toEqual(['settings', 'tasks']);
  });

  it('rejects statuses outside the enum', () => {
    const { raw } = open(':memory:');
    const insert = raw.prepare(
      'INSERT INTO tasks (id, name, status, created_at, updated_at) VALUES (?, ?, ?, ?, ?)',
    );
    expect(() => insert.run('t1', 'x', 'Blocked', '2026-01-01', '2026-01-01')).toThrow(/CHECK constraint failed/);
    expect(() => insert.run('t2', 'x', 'Done', '2026-01-01', '2026-01-01')).not.toThrow();
  });

  it('defaults archived to 0', () => {
    const { raw } = open(':memory:');
    raw.prepare(
      "INSERT INTO tasks (id, name, status, created_at, updated_at) VALUES ('t1', 'x', 'Done', 'a', 'a')",
    ).run();
    expect(raw.prepare("SELECT archived FROM tasks WHERE id = 't1'").pluck().get()).toBe(0);
  });

  it('can reopen an existing file without losing rows', () => {
    const dir = mkdtempSync(join(tmpdir(), 'tasklane-db-'));
    try {
      const path = join(dir, 'tasks.db');
      const first = open(path);
      first.raw.prepare("INSERT INTO settings (key, value) VALUES ('k', 'v')").run();
      first.raw.close();

      const second = open(path);
      expect(second.raw.prepare("SELECT value FROM settings WHERE key = 'k'").pluck().get()).toBe('v');
      expect(getDbPath(second)).toBe(path);
      second.raw.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports an empty path for in-memory databases', () => {
    expect(getDbPath(open(':memory:'))).toBe('');
  });
});
