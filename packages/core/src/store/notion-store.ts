import {
  Client,
  APIErrorCode,
  LogLevel,
  collectPaginatedAPI,
  isFullPage,
  isNotionClientError,
} from '@notionhq/client';
import type {
  Task, TaskId, TaskRecord,
  ArchiveConfirmation, StatusConfirmation, NameConfirmation, ClearSummary,
} from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import type { StoreResult, StoreFailure } from '../types/results.js';
import { ok } from '../types/results.js';
import { createLogger } from '../logging/logger.js';
import type { StoreOperation } from './delay.js';
import type { TaskStore } from './task-store.js';
import { validateName, validateStatus, errorMessage, reportFailure } from './task-store.js';
import type { NotionPage, NotionPropertyNames } from './notion-mapping.js';
import {
  DEFAULT_PROPERTY_NAMES, MalformedPageError,
  pageToRecord, titleValue, statusValue,
} from './notion-mapping.js';

const log = createLogger('notion');

type QueryArgs = Parameters<Client['databases']['query']>[0];

export interface NotionStoreOptions {
  /** Integration token */
  auth: string;
  databaseId: string;
  properties?: Partial<NotionPropertyNames>;
  timeoutMs?: number;
  /** Override the API origin (tests, proxies) */
  baseUrl?: string;
}

/**
 * Task store backed by a Notion database.
 *
 * Maps tasks to pages:
 * - id → page.id (assigned by Notion)
 * - name → title property (first text run)
 * - status → status property name
 * - archived → page.archived
 */
export class NotionTaskStore implements TaskStore {
  readonly kind = 'notion';

  private readonly client: Client;
  private readonly databaseId: string;
  private readonly names: NotionPropertyNames;

  constructor(options: NotionStoreOptions) {
    this.client = new Client({
      auth: options.auth,
      timeoutMs: options.timeoutMs,
      baseUrl: options.baseUrl,
      logLevel: LogLevel.DEBUG,
      logger: (level, message, extraInfo) => log.debug(`sdk ${level}: ${message}`, extraInfo),
    });
    this.databaseId = options.databaseId;
    this.names = { ...DEFAULT_PROPERTY_NAMES, ...options.properties };
  }

  describe(): string {
    return `notion:${this.databaseId}`;
  }

  async list(statusFilter?: TaskStatus): Promise<StoreResult<Task[]>> {
    if (statusFilter !== undefined) {
      const status = validateStatus(statusFilter);
      if (status.type !== 'success') return reportFailure(log, 'list', status);
    }

    return this.call('list', undefined, async () => {
      const args: QueryArgs = statusFilter
        ? {
          database_id: this.databaseId,
          filter: { property: this.names.status, status: { equals: statusFilter } },
        }
        : { database_id: this.databaseId };

      const results = await collectPaginatedAPI(this.client.databases.query, args);
      log.debug(`query on ${this.databaseId} returned ${results.length} page(s)`);

      const found: Task[] = [];
      for (const result of results) {
        if (!isFullPage(result)) {
          throw new MalformedPageError(result.id, 'query returned a partial page');
        }
        const { id, name, status } = pageToRecord(result, this.names);
        found.push({ id, name, status });
      }
      return ok(found);
    });
  }

  async get(id: TaskId): Promise<StoreResult<TaskRecord>> {
    return this.call('get', id, async () => {
      const page = await this.client.pages.retrieve({ page_id: id });
      return ok(pageToRecord(this.fullPage(page), this.names));
    });
  }

  async add(name: string, status: TaskStatus = TaskStatus.NotStarted): Promise<StoreResult<Task>> {
    const validName = validateName(name);
    if (validName.type !== 'success') return reportFailure(log, 'add', validName);
    const validStatus = validateStatus(status);
    if (validStatus.type !== 'success') return reportFailure(log, 'add', validStatus);

    return this.call('add', undefined, async () => {
      const page = await this.client.pages.create({
        parent: { database_id: this.databaseId },
        properties: {
          [this.names.name]: titleValue(validName.data),
          [this.names.status]: statusValue(validStatus.data),
        },
      });
      log.info(`created task ${page.id}`);
      if (!isFullPage(page)) {
        return ok({ id: page.id, name: validName.data, status: validStatus.data });
      }
      const { id, name: created, status: createdStatus } = pageToRecord(page, this.names);
      return ok({ id, name: created, status: createdStatus });
    });
  }

  async delete(id: TaskId): Promise<StoreResult<ArchiveConfirmation>> {
    return this.setArchived('delete', id, true);
  }

  async restore(id: TaskId): Promise<StoreResult<ArchiveConfirmation>> {
    return this.setArchived('restore', id, false);
  }

  async updateStatus(id: TaskId, status: TaskStatus): Promise<StoreResult<StatusConfirmation>> {
    const valid = validateStatus(status);
    if (valid.type !== 'success') return reportFailure(log, 'update-status', valid);

    return this.call('update-status', id, async () => {
      await this.client.pages.update({
        page_id: id,
        properties: { [this.names.status]: statusValue(valid.data) },
      });
      return ok({ id, status: valid.data });
    });
  }

  async updateName(id: TaskId, name: string): Promise<StoreResult<NameConfirmation>> {
    const valid = validateName(name);
    if (valid.type !== 'success') return reportFailure(log, 'update-name', valid);

    return this.call('update-name', id, async () => {
      await this.client.pages.update({
        page_id: id,
        properties: { [this.names.name]: titleValue(valid.data) },
      });
      return ok({ id, name: valid.data });
    });
  }

  async clearAll(): Promise<StoreResult<ClearSummary>> {
    return this.archiveEach('clear-all', await this.list());
  }

  async clearByStatus(status: TaskStatus): Promise<StoreResult<ClearSummary>> {
    const valid = validateStatus(status);
    if (valid.type !== 'success') return reportFailure(log, 'clear-by-status', valid);
    return this.archiveEach('clear-by-status', await this.list(valid.data));
  }

  close(): void {
    // HTTP client holds no connection between calls
  }

  // -------------------------------------------------------------------------

  private async setArchived(
    operation: StoreOperation,
    id: TaskId,
    archived: boolean,
  ): Promise<StoreResult<ArchiveConfirmation>> {
    return this.call(operation, id, async () => {
      await this.client.pages.update({ page_id: id, archived });
      return ok({ id, archived });
    });
  }

  /**
   * Archive each listed task with its own request. Individual failures are
   * collected rather than aborting, so the summary says exactly what is left.
   */
  private async archiveEach(
    operation: StoreOperation,
    listed: StoreResult<Task[]>,
  ): Promise<StoreResult<ClearSummary>> {
    if (listed.type !== 'success') return reportFailure(log, operation, listed);

    let cleared = 0;
    const failedIds: TaskId[] = [];
    for (const task of listed.data) {
      const result = await this.delete(task.id);
      if (result.type === 'success') {
        cleared++;
      } else {
        failedIds.push(task.id);
      }
    }

    if (failedIds.length > 0) {
      log.warn(`${operation}: ${failedIds.length} of ${listed.data.length} task(s) could not be archived`);
    }
    return ok({ cleared, failedIds });
  }

  private fullPage(page: Parameters<typeof isFullPage>[0]): NotionPage {
    if (!isFullPage(page)) {
      throw new MalformedPageError(page.id, 'response is a partial page');
    }
    return page;
  }

  /** Run one API call, converting thrown errors into a typed failure */
  private async call<T>(
    operation: StoreOperation,
    taskId: TaskId | undefined,
    fn: () => Promise<StoreResult<T>>,
  ): Promise<StoreResult<T>> {
    try {
      return await fn();
    } catch (err: unknown) {
      return reportFailure(log, operation, toFailure(err, taskId));
    }
  }
}

/** Classify an SDK error into the store's failure variants */
export function toFailure(err: unknown, taskId?: TaskId): StoreFailure {
  if (isNotionClientError(err)) {
    switch (err.code) {
      case APIErrorCode.ObjectNotFound:
        return taskId !== undefined
          ? { type: 'not-found', taskId }
          : { type: 'unauthorized', message: `${err.message} (is the database shared with the integration?)` };
      case APIErrorCode.Unauthorized:
      case APIErrorCode.RestrictedResource:
        return { type: 'unauthorized', message: err.message };
      case APIErrorCode.ValidationError:
        return { type: 'invalid', message: err.message };
      default:
        return { type: 'error', message: err.message };
    }
  }
  return { type: 'error', message: errorMessage(err) };
}
