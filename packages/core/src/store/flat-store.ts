import type {
  Task, TaskId, BackendKind,
  ArchiveConfirmation, StatusConfirmation, NameConfirmation, ClearSummary,
} from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';
import type { StoreResult } from '../types/results.js';
import { describeFailure } from '../types/results.js';
import { createLogger } from '../logging/logger.js';
import type { TaskStore } from './task-store.js';

const log = createLogger('store');

/**
 * Truthiness view of a TaskStore: failures collapse to an empty list,
 * null or false. Callers cannot tell "not found" from other failures here.
 */
export interface FlatTaskStore {
  readonly kind: BackendKind;
  list(statusFilter?: TaskStatus): Promise<Task[]>;
  add(name: string, status?: TaskStatus): Promise<Task | null>;
  delete(id: TaskId): Promise<ArchiveConfirmation | null>;
  restore(id: TaskId): Promise<ArchiveConfirmation | null>;
  updateStatus(id: TaskId, status: TaskStatus): Promise<StatusConfirmation | null>;
  updateName(id: TaskId, name: string): Promise<NameConfirmation | null>;
  clearAll(): Promise<boolean>;
  clearByStatus(status: TaskStatus): Promise<boolean>;
}

function orNull<T>(kind: BackendKind, result: StoreResult<T>): T | null {
  if (result.type === 'success') return result.data;
  log.warn(`${kind}: ${describeFailure(result)}`);
  return null;
}

function cleared(kind: BackendKind, result: StoreResult<ClearSummary>): boolean {
  const summary = orNull(kind, result);
  return summary != null && summary.failedIds.length === 0;
}

export function flattenStore(store: TaskStore): FlatTaskStore {
  const { kind } = store;
  return {
    kind,
    list: async (statusFilter) => orNull(kind, await store.list(statusFilter)) ?? [],
    add: async (name, status) => orNull(kind, await store.add(name, status)),
    delete: async (id) => orNull(kind, await store.delete(id)),
    restore: async (id) => orNull(kind, await store.restore(id)),
    updateStatus: async (id, status) => orNull(kind, await store.updateStatus(id, status)),
    updateName: async (id, name) => orNull(kind, await store.updateName(id, name)),
    clearAll: async () => cleared(kind, await store.clearAll()),
    clearByStatus: async (status) => cleared(kind, await store.clearByStatus(status)),
  };
}
