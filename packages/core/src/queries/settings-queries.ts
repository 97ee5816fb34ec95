/**
 * Key-value settings stored beside the tasks table.
 */

import { eq } from 'drizzle-orm';
import type { TasklaneDb } from '../db.js';
import { settings } from '../schema/index.js';
import type { BackendKind } from '../types/task.js';
import { isBackendKind } from '../types/task.js';

const PREFERRED_BACKEND_KEY = 'preferred_backend';

/** Get a setting value by key */
export function getSetting(db: TasklaneDb, key: string): string | null {
  const row = db.select({ value: settings.value }).from(settings).where(eq(settings.key, key)).get();
  return row?.value ?? null;
}

/** Set a setting value */
export function setSetting(db: TasklaneDb, key: string, value: string): void {
  db.insert(settings).values({ key, value }).onConflictDoUpdate({ target: settings.key, set: { value } }).run();
}

/** The backend chosen with `tasklane backend <kind>`, if any */
export function getPreferredBackend(db: TasklaneDb): BackendKind | null {
  const value = getSetting(db, PREFERRED_BACKEND_KEY);
  return value != null && isBackendKind(value) ? value : null;
}

export function setPreferredBackend(db: TasklaneDb, kind: BackendKind): void {
  setSetting(db, PREFERRED_BACKEND_KEY, kind);
}
