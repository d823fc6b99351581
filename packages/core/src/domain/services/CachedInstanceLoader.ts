import type { InstanceLoader } from '../ports/InstanceLoader.js';
import type { ObjectStore } from '../ports/ObjectStore.js';
import type { Dataset } from '../model/Dataset.js';
import type { Row } from '../model/Row.js';
import type { IdentificationField } from './ModelInstanceLoader.js';
import { ConfigurationError } from '../errors/RecordSyncError.js';

function keyOf(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Loads every object the dataset names up front, then resolves rows from
 * memory. Works with a single identification field only.
 *
 * Create with `CachedInstanceLoader.load()`.
 */
export class CachedInstanceLoader<T extends object> implements InstanceLoader<T> {
  private constructor(
    private readonly idField: IdentificationField,
    private readonly instances: ReadonlyMap<string, T>,
    private readonly transaction: unknown,
  ) {}

  static async load<T extends object, Tx>(
    store: ObjectStore<T, Tx>,
    idFields: readonly IdentificationField[],
    dataset: Dataset,
    transaction?: Tx,
  ): Promise<CachedInstanceLoader<T>> {
    const [idField] = idFields;
    if (idField === undefined || idFields.length > 1) {
      throw new ConfigurationError('The cached instance loader needs exactly one import id field');
    }

    const keys = new Map<string, unknown>();
    for (const row of dataset.dict()) {
      // A key that fails to clean fails its row again, with the error, in getInstance().
      const value = await idField.field.clean(row, { transaction }).catch(() => null);
      if (value !== null && value !== undefined) keys.set(keyOf(value), value);
    }

    const instances = new Map<string, T>();
    for (const value of keys.values()) {
      const [match] = await store.find({ [idField.attribute]: value }, { transaction, limit: 1 });
      if (match !== undefined) instances.set(keyOf(value), match);
    }
    return new CachedInstanceLoader(idField, instances, transaction);
  }

  async getInstance(row: Row): Promise<T | null> {
    const value = await this.idField.field.clean(row, { transaction: this.transaction });
    if (value === null || value === undefined) return null;
    return this.instances.get(keyOf(value)) ?? null;
  }
}
