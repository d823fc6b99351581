/** Edit operation kind: deletion, equality or insertion. */
export type EditOperation = -1 | 0 | 1;

/** One edit of a text diff. */
export type Edit = readonly [operation: EditOperation, text: string];

/**
 * Port for the text-diff algorithm. Treated as a black box by the engine.
 */
export interface Differ {
  /** Compute the edit sequence turning `before` into `after`. */
  diff(before: string, after: string): Edit[];
  /** Merge trivial equalities so the edits read as whole words. */
  cleanupSemantic(edits: readonly Edit[]): Edit[];
  /** Render edits as marked-up text. */
  render(edits: readonly Edit[]): string;
}
