/**
 * CLI helpers: argument parsing and error handling.
 */

import { TaskStatus, isTaskStatus } from '@tasklane/core';
import * as out from './output.js';
import type { CliSession } from './session.js';

/**
 * Parse a status argument into a TaskStatus value.
 * Accepts the exact labels as well as short forms.
 */
export function parseStatus(status: string): TaskStatus | null {
  if (isTaskStatus(status)) return status;
  switch (status.trim().toLowerCase()) {
    case 'not-started': case 'not started': case 'notstarted': case 'todo': case 'pending':
      return TaskStatus.NotStarted;
    case 'in-progress': case 'in progress': case 'inprogress': case 'wip':
      return TaskStatus.InProgress;
    case 'done': case 'complete': case 'completed':
      return TaskStatus.Done;
    default:
      return null;
  }
}

export const STATUS_HELP = 'not-started, in-progress, done';

/**
 * Run a command action, printing any unexpected error instead of crashing.
 * Returns false when the action threw.
 */
export async function $try(fn: () => Promise<void>): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    return false;
  }
}

/** Wrap a command action so any failure marks the session's exit code */
export function action(session: CliSession, fn: () => Promise<boolean | void>): Promise<void> {
  return $try(async () => {
    if ((await fn()) === false) session.fail();
  }).then((ok) => {
    if (!ok) session.fail();
  });
}
