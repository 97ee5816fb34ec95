export const TaskStatus = {
  NotStarted: 'Not started',
  InProgress: 'In progress',
  Done: 'Done',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Display order, also the order of the status filter */
export const TASK_STATUSES: readonly TaskStatus[] = [
  TaskStatus.NotStarted,
  TaskStatus.InProgress,
  TaskStatus.Done,
];

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some(s => s === value);
}
