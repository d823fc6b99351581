import type { CapturedError } from './CapturedError.js';
import type { ImportType } from './ImportType.js';

/** Outcome record for one imported row. Frozen once appended to a `Result`. */
export interface RowResult {
  readonly importType: ImportType;
  /** Rendered diff per field, in column order. Empty when the row failed before diffing. */
  readonly diff: readonly string[];
  readonly errors: readonly CapturedError[];
  /** Text representation of the saved object. */
  readonly objectRepr: string | null;
  /** Identity of the saved object. */
  readonly objectId: string | number | null;
  /** Whether the row resolved to a freshly allocated object. */
  readonly newRecord: boolean;
}

/** Mutable draft of a `RowResult`, owned by the engine while the row is processed. */
export interface RowResultDraft {
  importType: ImportType;
  diff: string[];
  errors: CapturedError[];
  objectRepr: string | null;
  objectId: string | number | null;
  newRecord: boolean;
}

/** Start a draft for a row about to be processed. */
export function createRowResult(): RowResultDraft {
  return { importType: 'new', diff: [], errors: [], objectRepr: null, objectId: null, newRecord: false };
}

/** Freeze a draft into its final `RowResult`. */
export function finalizeRowResult(draft: RowResultDraft): RowResult {
  return Object.freeze({
    importType: draft.importType,
    diff: Object.freeze([...draft.diff]),
    errors: Object.freeze([...draft.errors]),
    objectRepr: draft.objectRepr,
    objectId: draft.objectId,
    newRecord: draft.newRecord,
  });
}
