import {
  BackendRegistry, loadConfig, setLogLevel, getPreferredBackend,
} from '@tasklane/core';
import type {
  ActiveBackend, BackendFactories, BackendKind, TasklaneConfig,
} from '@tasklane/core';
import * as out from './output.js';

/** Options every command receives through optsWithGlobals() */
export type GlobalOptions = {
  backend?: BackendKind;
  db?: string;
  verbose?: boolean;
};

export interface SessionOptions {
  env?: NodeJS.ProcessEnv;
  /** Store constructors; tests pass in-memory ones */
  factories?: BackendFactories;
}

/**
 * Per-invocation state: configuration from the environment plus global flags,
 * the backend registry built from it, and the exit code.
 */
export class CliSession {
  exitCode = 0;

  private globals: GlobalOptions = {};
  private config: TasklaneConfig | null = null;
  private registry: BackendRegistry | null = null;

  constructor(private readonly options: SessionOptions = {}) {}

  /** Called once the global flags are parsed, before the command action */
  configure(globals: GlobalOptions): void {
    this.globals = globals;
    this.config = null;
    this.registry?.closeAll();
    this.registry = null;
    setLogLevel(this.getConfig().logLevel);
  }

  getConfig(): TasklaneConfig {
    if (!this.config) {
      this.config = loadConfig(this.options.env ?? process.env, {
        dbPath: this.globals.db,
        backend: this.globals.backend,
        logLevel: this.globals.verbose ? 'debug' : undefined,
      });
    }
    return this.config;
  }

  getRegistry(): BackendRegistry {
    if (!this.registry) {
      this.registry = new BackendRegistry(this.getConfig(), this.options.factories);
    }
    return this.registry;
  }

  /** --backend, then TASKLANE_BACKEND, then the stored preference, then sqlite */
  preferredBackend(): BackendKind {
    const registry = this.getRegistry();
    return this.getConfig().backend ?? getPreferredBackend(registry.sqlite().db) ?? 'sqlite';
  }

  /** The store commands operate on; announces a fallback to SQLite */
  activeBackend(): ActiveBackend {
    const active = this.getRegistry().resolveActive(this.preferredBackend());
    if (active.fallbackReason) out.warning(active.fallbackReason);
    return active;
  }

  fail(): void {
    this.exitCode = 1;
  }

  close(): void {
    this.registry?.closeAll();
    this.registry = null;
  }
}
