import {
  HookError,
  PersistenceError,
  RecordSyncError,
  describeCause,
} from '../domain/errors/RecordSyncError.js';

/** Run a user hook, wrapping whatever it throws in a `HookError`. */
export async function runHook<R>(name: string, call: () => R | Promise<R>): Promise<R> {
  try {
    return await call();
  } catch (error) {
    throw error instanceof HookError ? error : new HookError(name, error);
  }
}

/** Run a store write, wrapping foreign errors in a `PersistenceError`. */
export async function persist(operation: PersistenceError['operation'], call: () => Promise<void>): Promise<void> {
  try {
    await call();
  } catch (error) {
    if (error instanceof RecordSyncError) throw error;
    throw new PersistenceError(operation, `Store ${operation} failed: ${describeCause(error)}`, { cause: error });
  }
}
