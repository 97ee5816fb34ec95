import type {
  Task, TaskId, TaskRecord, BackendKind,
  ArchiveConfirmation, StatusConfirmation, NameConfirmation, ClearSummary,
} from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';
import { isTaskStatus } from '../types/task-status.js';
import type { StoreResult, StoreFailure } from '../types/results.js';
import { describeFailure } from '../types/results.js';
import type { Logger } from '../logging/logger.js';
import type { StoreOperation } from './delay.js';

/**
 * Contract shared by every backend. The presentation layer is written once
 * against this interface and never touches backend-specific details.
 *
 * Operations resolve to a StoreResult and never reject.
 */
export interface TaskStore {
  readonly kind: BackendKind;

  /** Human-readable location of the backing store */
  describe(): string;

  /** Non-archived tasks, optionally only those with the given status */
  list(statusFilter?: TaskStatus): Promise<StoreResult<Task[]>>;

  /** Direct lookup by id, archived tasks included */
  get(id: TaskId): Promise<StoreResult<TaskRecord>>;

  add(name: string, status?: TaskStatus): Promise<StoreResult<Task>>;

  /** Soft delete: archives the task */
  delete(id: TaskId): Promise<StoreResult<ArchiveConfirmation>>;

  restore(id: TaskId): Promise<StoreResult<ArchiveConfirmation>>;

  updateStatus(id: TaskId, status: TaskStatus): Promise<StoreResult<StatusConfirmation>>;

  updateName(id: TaskId, name: string): Promise<StoreResult<NameConfirmation>>;

  /** Irreversible removal of every task */
  clearAll(): Promise<StoreResult<ClearSummary>>;

  /** Irreversible removal of non-archived tasks with the given status */
  clearByStatus(status: TaskStatus): Promise<StoreResult<ClearSummary>>;

  close(): void;
}

// ---------------------------------------------------------------------------
// Shared input validation and failure reporting
// ---------------------------------------------------------------------------

/** Trim and check a task name; empty names never reach a backend */
export function validateName(name: string): StoreResult<string> {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    return { type: 'invalid', message: 'Task name must not be empty' };
  }
  return { type: 'success', data: trimmed };
}

/** Guard against status values that bypassed the type system (CLI input, remote data) */
export function validateStatus(status: string): StoreResult<TaskStatus> {
  if (!isTaskStatus(status)) {
    return { type: 'invalid', message: `Unknown status '${status}'` };
  }
  return { type: 'success', data: status };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Log a failure at the store boundary and hand it back unchanged */
export function reportFailure(
  logger: Logger,
  operation: StoreOperation,
  failure: StoreFailure,
): StoreFailure {
  const text = `${operation} failed: ${describeFailure(failure)}`;
  // Unknown ids and bad input are the caller's problem; only backend trouble is an error
  if (failure.type === 'not-found' || failure.type === 'invalid') {
    logger.debug(text);
  } else {
    logger.error(text);
  }
  return failure;
}
