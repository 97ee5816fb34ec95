import type { TasklaneConfig } from '../config.js';
import { missingNotionSettings } from '../config.js';
import type { BackendKind } from '../types/task.js';
import type { TaskStore } from '../store/task-store.js';
import { SqliteTaskStore } from '../store/sqlite-store.js';
import { NotionTaskStore } from '../store/notion-store.js';
import { fixedDelay } from '../store/delay.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('registry');

export type BackendResolution<S extends TaskStore = TaskStore> =
  | { readonly type: 'ready'; readonly store: S }
  | {
    readonly type: 'missing-credentials';
    readonly kind: BackendKind;
    readonly missing: readonly string[];
    readonly suggestion: string;
  };

export interface ActiveBackend {
  readonly store: TaskStore;
  /** Set when the preferred backend was unavailable and SQLite was used instead */
  readonly fallbackReason?: string;
}

export interface BackendFactories {
  sqlite(config: TasklaneConfig): SqliteTaskStore;
  notion(config: TasklaneConfig): NotionTaskStore;
}

export const defaultFactories: BackendFactories = {
  sqlite: (config) => new SqliteTaskStore({
    path: config.sqlite.path,
    delay: fixedDelay(config.pacingMs),
  }),
  notion: (config) => new NotionTaskStore({
    auth: config.notion.auth ?? '',
    databaseId: config.notion.databaseId ?? '',
    properties: config.notion.properties,
    timeoutMs: config.notion.timeoutMs,
  }),
};

/**
 * Holds at most one live store per backend kind, constructed lazily on first
 * use. Create one registry per process and pass it to whatever needs a store.
 */
export class BackendRegistry {
  private sqliteStore: SqliteTaskStore | null = null;
  private notionStore: NotionTaskStore | null = null;

  constructor(
    private readonly config: TasklaneConfig,
    private readonly factories: BackendFactories = defaultFactories,
  ) {}

  /** The relational store always resolves; it only needs a file path */
  sqlite(): SqliteTaskStore {
    if (!this.sqliteStore) {
      this.sqliteStore = this.factories.sqlite(this.config);
      log.debug(`opened sqlite store at ${this.sqliteStore.describe()}`);
    }
    return this.sqliteStore;
  }

  notion(): BackendResolution<NotionTaskStore> {
    const missing = missingNotionSettings(this.config.notion);
    if (missing.length > 0) {
      return {
        type: 'missing-credentials',
        kind: 'notion',
        missing,
        suggestion: `Set ${missing.join(' and ')} in the environment to use the Notion backend`,
      };
    }
    if (!this.notionStore) {
      this.notionStore = this.factories.notion(this.config);
      log.debug(`created notion store for ${this.notionStore.describe()}`);
    }
    return { type: 'ready', store: this.notionStore };
  }

  resolve(kind: BackendKind): BackendResolution {
    switch (kind) {
      case 'sqlite': return { type: 'ready', store: this.sqlite() };
      case 'notion': return this.notion();
    }
  }

  /** Resolve the preferred backend, falling back to SQLite when Notion is not configured */
  resolveActive(preferred: BackendKind): ActiveBackend {
    const resolution = this.resolve(preferred);
    if (resolution.type === 'ready') {
      return { store: resolution.store };
    }
    const fallbackReason = `Notion is not configured (missing ${resolution.missing.join(', ')}); using SQLite`;
    log.info(fallbackReason);
    return { store: this.sqlite(), fallbackReason };
  }

  closeAll(): void {
    this.sqliteStore?.close();
    this.notionStore?.close();
    this.sqliteStore = null;
    this.notionStore = null;
  }
}
