import type { InstanceLoader } from '../ports/InstanceLoader.js';
import type { ObjectStore } from '../ports/ObjectStore.js';
import type { Field } from '../model/Field.js';
import type { Row } from '../model/Row.js';
import { ResolutionError } from '../errors/RecordSyncError.js';

/** Identification field paired with the attribute it is looked up by. */
export interface IdentificationField {
  readonly name: string;
  readonly field: Field;
  readonly attribute: string;
}

/**
 * Resolves each row with one exact-match lookup on the store.
 *
 * A key that cleans to `null` (e.g. an empty `id` cell) matches nothing.
 */
export class ModelInstanceLoader<T extends object, Tx = unknown> implements InstanceLoader<T> {
  constructor(
    protected readonly store: ObjectStore<T, Tx>,
    protected readonly idFields: readonly IdentificationField[],
    protected readonly transaction?: Tx,
  ) {}

  async getInstance(row: Row): Promise<T | null> {
    const criteria: Record<string, unknown> = {};
    for (const { field, attribute } of this.idFields) {
      const value = await field.clean(row, { transaction: this.transaction });
      if (value === null || value === undefined) return null;
      criteria[attribute] = value;
    }

    const matches = await this.store.find(criteria, { transaction: this.transaction, limit: 2 });
    if (matches.length > 1) {
      throw new ResolutionError(
        `More than one object matches ${this.idFields.map((f) => `${f.name}=${String(criteria[f.attribute])}`).join(', ')}`,
      );
    }
    return matches[0] ?? null;
  }
}
