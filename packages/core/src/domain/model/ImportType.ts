/**
 * Outcome of importing one row.
 *
 * - `new`: no existing object matched; one was created.
 * - `update`: an existing object was modified.
 * - `delete`: an existing object was deleted.
 * - `skip`: nothing to do (unchanged row, or deletion of a missing object).
 * - `error`: processing the row failed.
 */
export const ImportType = {
  NEW: 'new',
  UPDATE: 'update',
  DELETE: 'delete',
  SKIP: 'skip',
  ERROR: 'error',
} as const;

export type ImportType = (typeof ImportType)[keyof typeof ImportType];
