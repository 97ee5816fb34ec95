import type { Task } from './types/task.js';
import { TaskStatus } from './types/task-status.js';

export interface TaskSummary {
  total: number;
  notStarted: number;
  inProgress: number;
  done: number;
}

/** Per-status counts over a task list */
export function summarizeTasks(tasks: readonly Task[]): TaskSummary {
  const summary: TaskSummary = { total: tasks.length, notStarted: 0, inProgress: 0, done: 0 };
  for (const task of tasks) {
    switch (task.status) {
      case TaskStatus.NotStarted: summary.notStarted++; break;
      case TaskStatus.InProgress: summary.inProgress++; break;
      case TaskStatus.Done: summary.done++; break;
    }
  }
  return summary;
}
