export { syncRemoteToLocal } from './sync.js';
export type { SyncReport, SyncOptions } from './sync.js';
