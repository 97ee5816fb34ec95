import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDb } from '../../src/db.js';
import type { DbHandle } from '../../src/db.js';
import {
  getSetting, setSetting, getPreferredBackend, setPreferredBackend,
} from '../../src/queries/settings-queries.js';

let handle: DbHandle;

beforeEach(() => {
  handle = openDb(':memory:');
});

afterEach(() => {
  handle.raw.close();
});

describe('settings', () => {
  it('returns null for unknown keys', () => {
    expect(getSetting(handle.db, 'missing')).toBeNull();
  });

  it('inserts then overwrites a value', () => {
    setSetting(handle.db, 'theme', 'dark');
    setSetting(handle.db, 'theme', 'light');
    expect(getSetting(handle.db, 'theme')).toBe('light');
  });
});

describe('preferred backend', () => {
  it('is unset on a fresh database', () => {
    expect(getPreferredBackend(handle.db)).toBeNull();
  });

  it('round-trips a backend kind', () => {
    setPreferredBackend(handle.db, 'notion');
    expect(getPreferredBackend(handle.db)).toBe('notion');
  });

  it('ignores an unrecognized stored value', () => {
    setSetting(handle.db, 'preferred_backend', 'postgres');
    expect(getPreferredBackend(handle.db)).toBeNull();
  });
});
