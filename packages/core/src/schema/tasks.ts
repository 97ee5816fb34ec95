import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { TaskStatus } from '../types/task-status.js';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  status: text('status').$type<TaskStatus>().notNull(),
  /** Soft-delete flag: archived rows are hidden from listing but can be restored */
  archived: integer('archived').notNull().default(0),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_tasks_archived').on(table.archived),
  index('idx_tasks_status').on(table.status, table.archived),
]);
