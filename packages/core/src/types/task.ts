import type { TaskStatus } from './task-status.js';

export type TaskId = string;

export type BackendKind = 'sqlite' | 'notion';

export const BACKEND_KINDS: readonly BackendKind[] = ['sqlite', 'notion'];

/** Uniform task shape returned by every backend */
export interface Task {
  readonly id: TaskId;
  readonly name: string;
  readonly status: TaskStatus;
}

/** A task looked up directly by id; archived tasks stay identifiable */
export interface TaskRecord extends Task {
  readonly archived: boolean;
}

export interface ArchiveConfirmation {
  readonly id: TaskId;
  readonly archived: boolean;
}

export interface StatusConfirmation {
  readonly id: TaskId;
  readonly status: TaskStatus;
}

export interface NameConfirmation {
  readonly id: TaskId;
  readonly name: string;
}

export interface ClearSummary {
  readonly cleared: number;
  /** Ids whose individual removal failed (remote backend only) */
  readonly failedIds: readonly TaskId[];
}

export function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KINDS.some(k => k === value);
}
