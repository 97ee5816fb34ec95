/**
 * Outcome of a store operation. Stores never throw across their boundary;
 * the presentation layer decides how to flatten a failure for display.
 */
export type StoreResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'not-found'; readonly taskId: string }
  | { readonly type: 'invalid'; readonly message: string }
  | { readonly type: 'unauthorized'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export type StoreFailure = Exclude<StoreResult<never>, { type: 'success' }>;

export function ok<T>(data: T): StoreResult<T> {
  return { type: 'success', data };
}

export function isSuccess<T>(r: StoreResult<T>): r is { readonly type: 'success'; readonly data: T } {
  return r.type === 'success';
}

export function isFailure<T>(r: StoreResult<T>): r is StoreFailure {
  return r.type !== 'success';
}

/** One-line description of a failure, for logs and CLI output */
export function describeFailure(failure: StoreFailure): string {
  switch (failure.type) {
    case 'not-found': return `Could not find task with id ${failure.taskId}`;
    case 'invalid': return `Invalid input: ${failure.message}`;
    case 'unauthorized': return `Not authorized: ${failure.message}`;
    case 'error': return failure.message;
  }
}
