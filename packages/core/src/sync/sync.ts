import type { TaskStore } from '../store/task-store.js';
import type { DelayStrategy } from '../store/delay.js';
import { noDelay } from '../store/delay.js';
import type { BackendResolution } from '../registry/backend-registry.js';
import type { StoreFailure } from '../types/results.js';
import { describeFailure } from '../types/results.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('sync');

export type SyncReport =
  | {
    readonly type: 'missing-credentials';
    readonly missing: readonly string[];
    readonly suggestion: string;
  }
  | { readonly type: 'fetch-failed'; readonly failure: StoreFailure }
  | { readonly type: 'nothing-to-sync' }
  | { readonly type: 'clear-failed'; readonly failure: StoreFailure }
  | {
    readonly type: 'synced';
    readonly fetched: number;
    readonly inserted: number;
    /** Names whose insert failed */
    readonly failedNames: readonly string[];
  };

export interface SyncOptions {
  /** Remote side; a missing-credentials resolution aborts before anything is read */
  source: BackendResolution;
  /** Local side; its contents are replaced */
  target: TaskStore;
  delay?: DelayStrategy;
}

/**
 * One-shot copy of every non-archived source task into the target.
 *
 * The target is cleared first and tasks are re-added by name and status,
 * so identifiers are not preserved. There is no rollback: an interruption
 * after the clear leaves the target with a subset of the source.
 */
export async function syncRemoteToLocal(options: SyncOptions): Promise<SyncReport> {
  const { source, target } = options;
  const delay = options.delay ?? noDelay;

  if (source.type === 'missing-credentials') {
    log.warn(`sync skipped: missing ${source.missing.join(', ')}`);
    return { type: 'missing-credentials', missing: source.missing, suggestion: source.suggestion };
  }

  await delay('sync');

  const fetched = await source.store.list();
  if (fetched.type !== 'success') {
    log.error(`sync aborted, could not read ${source.store.describe()}: ${describeFailure(fetched)}`);
    return { type: 'fetch-failed', failure: fetched };
  }
  if (fetched.data.length === 0) {
    log.warn(`sync skipped: ${source.store.describe()} has no tasks`);
    return { type: 'nothing-to-sync' };
  }

  const cleared = await target.clearAll();
  if (cleared.type !== 'success') {
    return { type: 'clear-failed', failure: cleared };
  }

  let inserted = 0;
  const failedNames: string[] = [];
  for (const task of fetched.data) {
    const added = await target.add(task.name, task.status);
    if (added.type === 'success') {
      inserted++;
    } else {
      failedNames.push(task.name);
    }
  }

  log.info(`synced ${inserted} of ${fetched.data.length} task(s) into ${target.describe()}`);
  return { type: 'synced', fetched: fetched.data.length, inserted, failedNames };
}
