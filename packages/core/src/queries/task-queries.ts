/**
 * Row-level task operations using Drizzle ORM.
 * These throw on storage engine errors; SqliteTaskStore turns them into results.
 */

import { eq, and, asc, sql } from 'drizzle-orm';
import type { TasklaneDb } from '../db.js';
import type { Task, TaskId, TaskRecord } from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';
import { tasks } from '../schema/tasks.js';

// ---------------------------------------------------------------------------
// Row mappers
// ---------------------------------------------------------------------------

type TaskRow = typeof tasks.$inferSelect;

function toTask(row: Pick<TaskRow, 'id' | 'name' | 'status'>): Task {
  return { id: row.id, name: row.name, status: row.status };
}

function toRecord(row: TaskRow): TaskRecord {
  return { ...toTask(row), archived: row.archived !== 0 };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a task by id, archived or not */
export function getTaskRecord(db: TasklaneDb, taskId: TaskId): TaskRecord | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toRecord(row) : null;
}

/** Get all non-archived tasks, optionally filtered by status, oldest first */
export function getActiveTasks(db: TasklaneDb, status?: TaskStatus): Task[] {
  const conditions = status
    ? and(eq(tasks.archived, 0), eq(tasks.status, status))
    : eq(tasks.archived, 0);
  const rows = db.select({ id: tasks.id, name: tasks.name, status: tasks.status })
    .from(tasks)
    .where(conditions)
    .orderBy(asc(tasks.createdAt), sql`rowid`)
    .all();
  return rows.map(toTask);
}

// ---------------------------------------------------------------------------
// Write operations (return the number of rows changed)
// ---------------------------------------------------------------------------

export function insertTask(db: TasklaneDb, task: Task, now: string): void {
  db.insert(tasks).values({
    id: task.id,
    name: task.name,
    status: task.status,
    archived: 0,
    createdAt: now,
    updatedAt: now,
  }).run();
}

export function setArchived(db: TasklaneDb, taskId: TaskId, archived: boolean, now: string): number {
  return db.update(tasks)
    .set({ archived: archived ? 1 : 0, updatedAt: now })
    .where(eq(tasks.id, taskId))
    .run().changes;
}

export function setTaskStatus(db: TasklaneDb, taskId: TaskId, status: TaskStatus, now: string): number {
  return db.update(tasks)
    .set({ status, updatedAt: now })
    .where(eq(tasks.id, taskId))
    .run().changes;
}

export function setTaskName(db: TasklaneDb, taskId: TaskId, name: string, now: string): number {
  return db.update(tasks)
    .set({ name, updatedAt: now })
    .where(eq(tasks.id, taskId))
    .run().changes;
}

/** Permanently delete every task, archived ones included */
export function deleteAllTasks(db: TasklaneDb): number {
  return db.delete(tasks).run().changes;
}

/** Permanently delete non-archived tasks with the given status */
export function deleteActiveTasksByStatus(db: TasklaneDb, status: TaskStatus): number {
  return db.delete(tasks)
    .where(and(eq(tasks.status, status), eq(tasks.archived, 0)))
    .run().changes;
}
