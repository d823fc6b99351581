import type { Logger } from 'pino';
import type { Field } from '../domain/model/Field.js';
import type { ResolvedOptions } from '../domain/model/Options.js';
import type { Snapshot } from '../domain/model/Snapshot.js';
import type { ObjectStore } from '../domain/ports/ObjectStore.js';
import type { FieldExporter, FieldImporter } from '../domain/ports/ResourceHooks.js';
import type { DiffEngine } from '../domain/services/DiffEngine.js';
import type { IdentificationField } from '../domain/services/ModelInstanceLoader.js';
import { isManyToManyWidget } from '../domain/widgets/ManyToManyWidget.js';
import { ConfigurationError, HookError } from '../domain/errors/RecordSyncError.js';
import type { EventBus } from './EventBus.js';

/**
 * State shared by the import and export use cases of one resource.
 *
 * Built once by `Resource`; immutable afterwards. Exposed for extension
 * packages that compose their own pipelines.
 */
export class ResourceContext<T extends object, Tx = unknown> {
  /** Field names in column order. */
  readonly columnOrder: readonly string[];

  constructor(
    readonly store: ObjectStore<T, Tx>,
    readonly fields: ReadonlyMap<string, Field>,
    columnOrder: readonly string[],
    readonly options: ResolvedOptions,
    readonly exporters: ReadonlyMap<string, FieldExporter<T>>,
    readonly importers: ReadonlyMap<string, FieldImporter<T>>,
    readonly diffEngine: DiffEngine,
    readonly eventBus: EventBus,
    readonly logger: Logger,
  ) {
    this.columnOrder = Object.freeze([...columnOrder]);
  }

  /** Fields in column order, paired with their names. */
  orderedFields(): [string, Field][] {
    return this.columnOrder.map((name) => [name, this.getField(name)]);
  }

  getField(name: string): Field {
    const field = this.fields.get(name);
    if (!field) throw new ConfigurationError(`Unknown field '${name}'`);
    return field;
  }

  /** Identification fields with the attribute each is looked up by. */
  identificationFields(): IdentificationField[] {
    return this.options.importIdFields.map((name) => {
      const field = this.fields.get(name);
      if (!field || field.attribute === undefined) {
        throw new ConfigurationError(`Import id field '${name}' is not a field with an attribute`);
      }
      return { name, field, attribute: field.attribute };
    });
  }

  isRelationCollection(field: Field): boolean {
    return isManyToManyWidget(field.widget);
  }

  /**
   * Exported value of one field: the field's exporter when one is set, the
   * store's relation members for many-to-many fields, `Field.export()`
   * otherwise.
   */
  async exportField(name: string, instance: T, transaction?: Tx): Promise<string> {
    const exporter = this.exporters.get(name);
    if (exporter) {
      try {
        return await exporter(instance);
      } catch (error) {
        throw new HookError(`exporters.${name}`, error);
      }
    }

    const field = this.getField(name);
    if (this.isRelationCollection(field) && field.attribute !== undefined && this.store.getRelated) {
      const members = await this.store.getRelated(instance, field.attribute, transaction);
      return field.widget.render(members);
    }
    return field.export(instance);
  }

  /**
   * Exported value of every field, in column order. `pending` holds
   * many-to-many targets computed from the row but not written yet; they
   * stand in for the stored members.
   */
  async takeSnapshot(
    instance: T,
    pending?: ReadonlyMap<string, readonly object[]>,
    transaction?: Tx,
  ): Promise<Snapshot> {
    const snapshot = new Map<string, string>();
    for (const [name, field] of this.orderedFields()) {
      const members = pending?.get(name);
      snapshot.set(
        name,
        members !== undefined && !this.exporters.has(name)
          ? field.widget.render(members)
          : await this.exportField(name, instance, transaction),
      );
    }
    return snapshot;
  }
}
