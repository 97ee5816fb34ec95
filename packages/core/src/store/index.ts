export type { TaskStore } from './task-store.js';
export { validateName, validateStatus } from './task-store.js';
export type { DelayStrategy, StoreOperation } from './delay.js';
export { noDelay, fixedDelay } from './delay.js';
export { SqliteTaskStore } from './sqlite-store.js';
export type { SqliteStoreOptions } from './sqlite-store.js';
export { NotionTaskStore, toFailure } from './notion-store.js';
export type { NotionStoreOptions } from './notion-store.js';
export { DEFAULT_PROPERTY_NAMES, MalformedPageError, pageToRecord } from './notion-mapping.js';
export type { NotionPage, NotionPropertyNames } from './notion-mapping.js';
export { flattenStore } from './flat-store.js';
export type { FlatTaskStore } from './flat-store.js';
