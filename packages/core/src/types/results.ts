/** Kind of record an operation was looking for, for not-found messages */
export type EntityKind = 'todo' | 'category' | 'tag' | 'subtask' | 'attachment';

/** Outcome of a write against the store or the bucket */
export type TodoResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly entity: EntityKind; readonly id: number }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'invalid'; readonly reason: string }
  | { readonly type: 'error'; readonly message: string };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly entity: EntityKind; readonly id: number }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'invalid'; readonly reason: string }
  | { readonly type: 'error'; readonly message: string };

export type Failure = Exclude<TodoResult, { type: 'success' }>;

export function notFound(entity: EntityKind, id: number): Failure {
  return { type: 'not-found', entity, id };
}

export function invalid(reason: string): Failure {
  return { type: 'invalid', reason };
}

/** Message text of anything thrown */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Run a store call, turning a thrown driver error into an error result */
export function attempt<R extends TodoResult | DataResult<unknown>>(fn: () => R): R | Failure {
  try {
    return fn();
  } catch (err: unknown) {
    return { type: 'error', message: describeError(err) };
  }
}

/** Async variant of {@link attempt} for bucket calls */
export async function attemptAsync<R extends TodoResult | DataResult<unknown>>(fn: () => Promise<R>): Promise<R | Failure> {
  try {
    return await fn();
  } catch (err: unknown) {
    return { type: 'error', message: describeError(err) };
  }
}
