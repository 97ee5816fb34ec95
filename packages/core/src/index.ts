// Types
export { TaskStatus, TASK_STATUSES, isTaskStatus } from './types/task-status.js';
export { BACKEND_KINDS, isBackendKind } from './types/task.js';
export type {
  TaskId, BackendKind, Task, TaskRecord,
  ArchiveConfirmation, StatusConfirmation, NameConfirmation, ClearSummary,
} from './types/task.js';
export type { StoreResult, StoreFailure } from './types/results.js';
export { ok, isSuccess, isFailure, describeFailure } from './types/results.js';

// Schema
export * from './schema/index.js';

// Database
export { openDb, getDefaultDbPath, getDbPath, CREATE_SCHEMA_SQL } from './db.js';
export type { TasklaneDb, DbHandle } from './db.js';

// Queries
export * from './queries/index.js';

// Stores
export * from './store/index.js';

// Registry
export { BackendRegistry, defaultFactories } from './registry/backend-registry.js';
export type { BackendResolution, ActiveBackend, BackendFactories } from './registry/backend-registry.js';

// Sync
export * from './sync/index.js';

// Summary
export { summarizeTasks } from './summary.js';
export type { TaskSummary } from './summary.js';

// Config
export { loadConfig, missingNotionSettings } from './config.js';
export type { TasklaneConfig, NotionConfig, ConfigOverrides } from './config.js';

// Logging
export {
  createLogger, setLogLevel, getLogLevel, setLogEcho,
  getLogHistory, clearLogs, onLog, isLogLevel,
} from './logging/logger.js';
export type { Logger, LogLevel, LogEntry } from './logging/logger.js';
