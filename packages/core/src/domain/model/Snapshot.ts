/**
 * Exported value of every field of an object, in column order, taken right
 * after the row resolved. Baseline for the unchanged check and the diff.
 */
export type Snapshot = ReadonlyMap<string, string>;

/** Snapshot of an absent object: every field exports as `''`. */
export function emptySnapshot(fieldNames: Iterable<string>): Snapshot {
  const snapshot = new Map<string, string>();
  for (const name of fieldNames) snapshot.set(name, '');
  return snapshot;
}

/** `true` when both snapshots hold the same exported value for every field of `a`. */
export function snapshotsEqual(a: Snapshot, b: Snapshot): boolean {
  for (const [name, value] of a) {
    if (b.get(name) !== value) return false;
  }
  return true;
}
