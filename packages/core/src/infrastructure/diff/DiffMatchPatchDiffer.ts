import DiffMatchPatch from 'diff-match-patch';
import type { Differ, Edit, EditOperation } from '../../domain/ports/Differ.js';

function toOperation(operation: number): EditOperation {
  if (operation < 0) return -1;
  return operation > 0 ? 1 : 0;
}

/**
 * `Differ` adapter over diff-match-patch. Renders edits as HTML with
 * `<ins>` / `<del>` / `<span>` markup.
 */
export class DiffMatchPatchDiffer implements Differ {
  private readonly dmp = new DiffMatchPatch();

  diff(before: string, after: string): Edit[] {
    return this.dmp.diff_main(before, after).map(([operation, text]): Edit => [toOperation(operation), text]);
  }

  cleanupSemantic(edits: readonly Edit[]): Edit[] {
    const diffs = edits.map(([operation, text]): DiffMatchPatch.Diff => [operation, text]);
    this.dmp.diff_cleanupSemantic(diffs);
    return diffs.map(([operation, text]): Edit => [toOperation(operation), text]);
  }

  render(edits: readonly Edit[]): string {
    return this.dmp.diff_prettyHtml(edits.map(([operation, text]): DiffMatchPatch.Diff => [operation, text]));
  }
}
