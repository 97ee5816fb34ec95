export type StoreOperation =
  | 'list'
  | 'get'
  | 'add'
  | 'delete'
  | 'restore'
  | 'update-status'
  | 'update-name'
  | 'clear-all'
  | 'clear-by-status'
  | 'sync';

/** Awaited before an operation runs. Used only for UI pacing. */
export type DelayStrategy = (operation: StoreOperation) => Promise<void>;

export const noDelay: DelayStrategy = () => Promise.resolve();

export function fixedDelay(ms: number): DelayStrategy {
  if (ms <= 0) return noDelay;
  return () => new Promise(resolve => setTimeout(resolve, ms));
}
