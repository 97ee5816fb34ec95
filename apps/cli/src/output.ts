/**
 * chalk-based output formatting for the CLI.
 */

import chalk from 'chalk';
import { TaskStatus, describeFailure } from '@tasklane/core';
import type {
  Task, TaskRecord, TaskSummary, StoreFailure, ClearSummary, SyncReport,
} from '@tasklane/core';

// --- Formatting functions ---

export function formatCheckbox(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Done: return chalk.green('[x]');
    case TaskStatus.InProgress: return chalk.yellow('[-]');
    case TaskStatus.NotStarted: return chalk.gray('[ ]');
  }
}

export function formatStatus(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Done: return chalk.green(status);
    case TaskStatus.InProgress: return chalk.yellow(status);
    case TaskStatus.NotStarted: return chalk.gray(status);
  }
}

export function formatTask(task: Task): string {
  return `${formatCheckbox(task.status)} ${chalk.bold(task.name)}  ${chalk.dim(`(${task.id})`)}`;
}

export function formatRecord(record: TaskRecord): string[] {
  return [
    `${chalk.dim('id:')}       ${record.id}`,
    `${chalk.dim('name:')}     ${chalk.bold(record.name)}`,
    `${chalk.dim('status:')}   ${formatStatus(record.status)}`,
    `${chalk.dim('archived:')} ${record.archived ? chalk.red('yes') : 'no'}`,
  ];
}

export function formatSummary(summary: TaskSummary): string {
  return [
    `Total: ${chalk.bold(String(summary.total))}`,
    chalk.gray(`${summary.notStarted} not started`),
    chalk.yellow(`${summary.inProgress} in progress`),
    chalk.green(`${summary.done} done`),
  ].join(chalk.dim(' · '));
}

// --- Result output ---

export function printFailure(failure: StoreFailure): void {
  error(describeFailure(failure));
}

export function printClearSummary(summary: ClearSummary): void {
  success(`Cleared ${summary.cleared} task(s)`);
  if (summary.failedIds.length > 0) {
    warning(`Could not clear ${summary.failedIds.length} task(s): ${summary.failedIds.join(', ')}`);
  }
}

/** Prints the report; returns true when the sync completed */
export function printSyncReport(report: SyncReport): boolean {
  switch (report.type) {
    case 'missing-credentials':
      error(`Notion credentials not found (${report.missing.join(', ')})`);
      info(report.suggestion);
      return false;
    case 'fetch-failed':
      error(`Could not read tasks from Notion: ${describeFailure(report.failure)}`);
      return false;
    case 'nothing-to-sync':
      warning('No tasks found in the Notion database; SQLite was left unchanged');
      return true;
    case 'clear-failed':
      error(`Could not clear SQLite before copying: ${describeFailure(report.failure)}`);
      return false;
    case 'synced':
      success(`Synced ${report.inserted} task(s) from Notion to SQLite`);
      if (report.failedNames.length > 0) {
        warning(`Could not copy ${report.failedNames.length} task(s): ${report.failedNames.join(', ')}`);
        return false;
      }
      return true;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
