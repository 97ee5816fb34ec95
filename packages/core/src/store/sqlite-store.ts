import { randomUUID } from 'node:crypto';
import type { DbHandle, TasklaneDb } from '../db.js';
import { openDb, getDbPath } from '../db.js';
import type {
  Task, TaskId, TaskRecord,
  ArchiveConfirmation, StatusConfirmation, NameConfirmation, ClearSummary,
} from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import type { StoreResult } from '../types/results.js';
import { ok } from '../types/results.js';
import { createLogger } from '../logging/logger.js';
import type { DelayStrategy, StoreOperation } from './delay.js';
import { noDelay } from './delay.js';
import type { TaskStore } from './task-store.js';
import { validateName, validateStatus, errorMessage, reportFailure } from './task-store.js';
import {
  getActiveTasks, getTaskRecord, insertTask,
  setArchived, setTaskStatus, setTaskName,
  deleteAllTasks, deleteActiveTasksByStatus,
} from '../queries/task-queries.js';

const log = createLogger('sqlite');

export interface SqliteStoreOptions {
  /** Database file path, or ':memory:' */
  path: string;
  delay?: DelayStrategy;
  /** Clock used for created_at/updated_at */
  now?: () => Date;
}

/**
 * Task store backed by a single SQLite file.
 * Deletes are soft (archived flag); only the clear operations remove rows.
 */
export class SqliteTaskStore implements TaskStore {
  readonly kind = 'sqlite';

  private readonly handle: DbHandle;
  /** Resolved file path, captured while the handle is open */
  private readonly location: string;
  private readonly delay: DelayStrategy;
  private readonly now: () => Date;

  constructor(options: SqliteStoreOptions) {
    this.handle = openDb(options.path);
    this.location = getDbPath(this.handle) || ':memory:';
    this.delay = options.delay ?? noDelay;
    this.now = options.now ?? (() => new Date());
  }

  /** Drizzle instance, shared with the settings queries */
  get db(): TasklaneDb {
    return this.handle.db;
  }

  describe(): string {
    return this.location;
  }

  async list(statusFilter?: TaskStatus): Promise<StoreResult<Task[]>> {
    if (statusFilter !== undefined) {
      const status = validateStatus(statusFilter);
      if (status.type !== 'success') return reportFailure(log, 'list', status);
    }
    return this.run('list', () => {
      const found = getActiveTasks(this.db, statusFilter);
      log.debug(`list returned ${found.length} task(s)`);
      return ok(found);
    });
  }

  async get(id: TaskId): Promise<StoreResult<TaskRecord>> {
    return this.run<TaskRecord>('get', () => {
      const record = getTaskRecord(this.db, id);
      return record ? ok(record) : { type: 'not-found', taskId: id };
    });
  }

  async add(name: string, status: TaskStatus = TaskStatus.NotStarted): Promise<StoreResult<Task>> {
    const validName = validateName(name);
    if (validName.type !== 'success') return reportFailure(log, 'add', validName);
    const validStatus = validateStatus(status);
    if (validStatus.type !== 'success') return reportFailure(log, 'add', validStatus);

    await this.delay('add');
    return this.run('add', () => {
      const task: Task = { id: randomUUID(), name: validName.data, status: validStatus.data };
      insertTask(this.db, task, this.timestamp());
      log.info(`created task ${task.id}`);
      return ok(task);
    });
  }

  async delete(id: TaskId): Promise<StoreResult<ArchiveConfirmation>> {
    await this.delay('delete');
    return this.run('delete', () =>
      this.changed(id, setArchived(this.db, id, true, this.timestamp()), { id, archived: true }));
  }

  async restore(id: TaskId): Promise<StoreResult<ArchiveConfirmation>> {
    await this.delay('restore');
    return this.run('restore', () =>
      this.changed(id, setArchived(this.db, id, false, this.timestamp()), { id, archived: false }));
  }

  async updateStatus(id: TaskId, status: TaskStatus): Promise<StoreResult<StatusConfirmation>> {
    const valid = validateStatus(status);
    if (valid.type !== 'success') return reportFailure(log, 'update-status', valid);

    await this.delay('update-status');
    return this.run('update-status', () =>
      this.changed(id, setTaskStatus(this.db, id, valid.data, this.timestamp()), { id, status: valid.data }));
  }

  async updateName(id: TaskId, name: string): Promise<StoreResult<NameConfirmation>> {
    const valid = validateName(name);
    if (valid.type !== 'success') return reportFailure(log, 'update-name', valid);

    await this.delay('update-name');
    return this.run('update-name', () =>
      this.changed(id, setTaskName(this.db, id, valid.data, this.timestamp()), { id, name: valid.data }));
  }

  async clearAll(): Promise<StoreResult<ClearSummary>> {
    await this.delay('clear-all');
    return this.run('clear-all', () => {
      const cleared = deleteAllTasks(this.db);
      log.info(`cleared ${cleared} task(s)`);
      return ok({ cleared, failedIds: [] });
    });
  }

  async clearByStatus(status: TaskStatus): Promise<StoreResult<ClearSummary>> {
    const valid = validateStatus(status);
    if (valid.type !== 'success') return reportFailure(log, 'clear-by-status', valid);

    await this.delay('clear-by-status');
    return this.run('clear-by-status', () => {
      const cleared = deleteActiveTasksByStatus(this.db, valid.data);
      log.info(`cleared ${cleared} task(s) with status '${valid.data}'`);
      return ok({ cleared, failedIds: [] });
    });
  }

  close(): void {
    if (this.handle.raw.open) this.handle.raw.close();
  }

  // -------------------------------------------------------------------------

  private timestamp(): string {
    return this.now().toISOString();
  }

  /** An update touching zero rows means the id is unknown */
  private changed<T>(id: TaskId, changes: number, data: T): StoreResult<T> {
    return changes > 0 ? ok(data) : { type: 'not-found', taskId: id };
  }

  /** Run one statement, converting engine errors into an error result */
  private run<T>(operation: StoreOperation, fn: () => StoreResult<T>): StoreResult<T> {
    let result: StoreResult<T>;
    try {
      result = fn();
    } catch (err: unknown) {
      result = { type: 'error', message: errorMessage(err) };
    }
    if (result.type !== 'success') reportFailure(log, operation, result);
    return result;
  }
}
