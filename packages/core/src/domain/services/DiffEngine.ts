import type { Differ, Edit } from '../ports/Differ.js';
import type { Snapshot } from '../model/Snapshot.js';

/** Compares exported field values of two snapshots through the text differ. */
export class DiffEngine {
  constructor(private readonly differ: Differ) {}

  /** Semantic-cleaned edits turning `before` into `after`. */
  edits(before: string, after: string): Edit[] {
    return this.differ.cleanupSemantic(this.differ.diff(before, after));
  }

  /** Insertions and deletions only; empty when both texts are equal. */
  changes(before: string, after: string): Edit[] {
    return this.edits(before, after).filter(([operation]) => operation !== 0);
  }

  /** Rendered diff of one field. */
  renderField(before: string, after: string): string {
    return this.differ.render(this.edits(before, after));
  }

  /** Rendered diff of every named field, in the given order. Missing values diff as `''`. */
  diffSnapshots(original: Snapshot, current: Snapshot, fieldNames: readonly string[]): string[] {
    return fieldNames.map((name) => this.renderField(original.get(name) ?? '', current.get(name) ?? ''));
  }
}
