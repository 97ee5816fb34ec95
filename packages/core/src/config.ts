/**
 * Configuration from environment variables, with CLI overrides on top.
 */

import { getDefaultDbPath } from './db.js';
import type { BackendKind } from './types/task.js';
import { isBackendKind } from './types/task.js';
import type { LogLevel } from './logging/logger.js';
import { createLogger, isLogLevel } from './logging/logger.js';
import type { NotionPropertyNames } from './store/notion-mapping.js';
import { DEFAULT_PROPERTY_NAMES } from './store/notion-mapping.js';

const log = createLogger('config');

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface NotionConfig {
  /** Integration token; null when not configured */
  auth: string | null;
  databaseId: string | null;
  properties: NotionPropertyNames;
  timeoutMs: number;
}

export interface TasklaneConfig {
  sqlite: { path: string };
  notion: NotionConfig;
  /** Preferred backend from the environment; null defers to the stored setting */
  backend: BackendKind | null;
  /** Fixed delay before relational mutations, 0 to disable */
  pacingMs: number;
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  dbPath?: string;
  backend?: BackendKind;
  logLevel?: LogLevel;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readNonNegativeInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw == null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    log.warn(`ignoring ${key}=${raw}: expected a non-negative integer`);
    return fallback;
  }
  return value;
}

function readBackend(env: NodeJS.ProcessEnv): BackendKind | null {
  const raw = readString(env, 'TASKLANE_BACKEND')?.toLowerCase();
  if (raw == null) return null;
  if (!isBackendKind(raw)) {
    log.warn(`ignoring TASKLANE_BACKEND=${raw}: expected sqlite or notion`);
    return null;
  }
  return raw;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = readString(env, 'TASKLANE_LOG_LEVEL')?.toLowerCase();
  if (raw == null) return DEFAULT_LOG_LEVEL;
  if (!isLogLevel(raw)) {
    log.warn(`ignoring TASKLANE_LOG_LEVEL=${raw}: expected debug, info, warn or error`);
    return DEFAULT_LOG_LEVEL;
  }
  return raw;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): TasklaneConfig {
  return {
    sqlite: {
      path: overrides.dbPath ?? readString(env, 'TASKLANE_DB_PATH') ?? getDefaultDbPath(env),
    },
    notion: {
      auth: readString(env, 'NOTION_AUTH_TOKEN'),
      databaseId: readString(env, 'NOTION_DATABASE_ID'),
      properties: {
        name: readString(env, 'NOTION_NAME_PROPERTY') ?? DEFAULT_PROPERTY_NAMES.name,
        status: readString(env, 'NOTION_STATUS_PROPERTY') ?? DEFAULT_PROPERTY_NAMES.status,
      },
      timeoutMs: readNonNegativeInt(env, 'NOTION_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    },
    backend: overrides.backend ?? readBackend(env),
    pacingMs: readNonNegativeInt(env, 'TASKLANE_PACING_MS', 0),
    logLevel: overrides.logLevel ?? readLogLevel(env),
  };
}

/** Names of the Notion settings that are still missing */
export function missingNotionSettings(config: NotionConfig): string[] {
  const missing: string[] = [];
  if (config.auth == null) missing.push('NOTION_AUTH_TOKEN');
  if (config.databaseId == null) missing.push('NOTION_DATABASE_ID');
  return missing;
}
