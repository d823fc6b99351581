import type { Dataset } from '../model/Dataset.js';
import type { Row } from '../model/Row.js';
import type { Snapshot } from '../model/Snapshot.js';
import type { Field } from '../model/Field.js';

/**
 * Extension points around the import pipeline. All hooks are optional; a
 * hook that throws fails the row (or, for `beforeImport`, the batch) with a
 * `HookError`.
 *
 * Row pipeline order:
 * 1. Resolve the row to an existing or a new instance
 * 2. **`forDelete`**: return `true` to delete the instance instead of updating it
 * 3. Apply fields (each through **`importers[name]`** when set)
 * 4. **`skipRow`**: return `true` to skip saving (default: `skipUnchanged` comparison)
 * 5. **`beforeSaveInstance`** / **`afterSaveInstance`** around the save
 *    (or **`beforeDeleteInstance`** / **`afterDeleteInstance`** around the delete)
 */
export interface ResourceHooks<T extends object> {
  /** Called once before the first row. */
  beforeImport?: (dataset: Dataset, dryRun: boolean) => void | Promise<void>;
  /** Decide whether the row deletes its instance. */
  forDelete?: (row: Row, instance: T) => boolean | Promise<boolean>;
  /** Decide whether the row is skipped. Receives the snapshots before and after field application. */
  skipRow?: (instance: T, original: Snapshot, current: Snapshot) => boolean | Promise<boolean>;
  beforeSaveInstance?: (instance: T, dryRun: boolean) => void | Promise<void>;
  afterSaveInstance?: (instance: T, dryRun: boolean) => void | Promise<void>;
  beforeDeleteInstance?: (instance: T, dryRun: boolean) => void | Promise<void>;
  afterDeleteInstance?: (instance: T, dryRun: boolean) => void | Promise<void>;
}

/** Custom exporter for one field, replacing `Field.export()`. */
export type FieldExporter<T extends object> = (instance: T) => string | Promise<string>;

/** Custom importer for one field, replacing `Field.save()`. */
export type FieldImporter<T extends object> = (instance: T, row: Row, field: Field) => void | Promise<void>;
