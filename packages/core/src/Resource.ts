import { pino } from 'pino';
import type { Logger } from 'pino';
import type { Dataset } from './domain/model/Dataset.js';
import type { Field } from './domain/model/Field.js';
import type { Row } from './domain/model/Row.js';
import type { Result } from './domain/model/Result.js';
import type { Snapshot } from './domain/model/Snapshot.js';
import type { ResourceOptions, ResolvedOptions } from './domain/model/Options.js';
import type { ObjectStore } from './domain/ports/ObjectStore.js';
import type { Differ } from './domain/ports/Differ.js';
import type { ResourceHooks, FieldExporter, FieldImporter } from './domain/ports/ResourceHooks.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { FieldDeclaration } from './domain/services/FieldRegistry.js';
import { resolveOptions } from './domain/model/Options.js';
import { snapshotsEqual } from './domain/model/Snapshot.js';
import { declareFields, buildSchemaFields, resolveColumnOrder } from './domain/services/FieldRegistry.js';
import { DiffEngine } from './domain/services/DiffEngine.js';
import { isManyToManyWidget } from './domain/widgets/ManyToManyWidget.js';
import { ConfigurationError } from './domain/errors/RecordSyncError.js';
import { DiffMatchPatchDiffer } from './infrastructure/diff/DiffMatchPatchDiffer.js';
import { EventBus } from './application/EventBus.js';
import { ResourceContext } from './application/ResourceContext.js';
import { ImportData } from './application/usecases/ImportData.js';
import type { ImportDataOptions } from './application/usecases/ImportData.js';
import { ExportData } from './application/usecases/ExportData.js';
import { getSettings } from './config/settings.js';

/** Configuration of a resource. */
export interface ResourceConfig<T extends object, Tx = unknown> {
  /** Store the rows are reconciled against. */
  readonly store: ObjectStore<T, Tx>;
  /** Explicit field declarations, in column order. */
  readonly fields?: Readonly<Record<string, FieldDeclaration>>;
  /** Declarative options (identification fields, transactions, skipping, column order...). */
  readonly options?: ResourceOptions;
  /** Also build fields from `store.schema()`. Default: `false`. */
  readonly fromSchema?: boolean;
  /** Extension points around the import pipeline. */
  readonly hooks?: ResourceHooks<T>;
  /** Per-field exporters replacing `Field.export()`. */
  readonly exporters?: Readonly<Record<string, FieldExporter<T>>>;
  /** Per-field importers replacing `Field.save()`. */
  readonly importers?: Readonly<Record<string, FieldImporter<T>>>;
  /** Text differ used for row diffs. Default: `DiffMatchPatchDiffer`. */
  readonly differ?: Differ;
  /** Logger for transaction boundaries and row failures. Default: silent. */
  readonly logger?: Logger;
}

function tableOf<V>(kind: string, entries: Readonly<Record<string, V>> | undefined, fields: ReadonlyMap<string, Field>) {
  const table = new Map<string, V>();
  for (const [name, value] of Object.entries(entries ?? {})) {
    if (!fields.has(name)) throw new ConfigurationError(`${kind} names unknown field '${name}'`);
    table.set(name, value);
  }
  return table;
}

/**
 * Defines how domain objects map to dataset rows, and imports and exports
 * them.
 *
 * Import reconciles each row against the store: resolve or create, apply
 * fields, skip unchanged rows, save or delete, diff. Row failures are
 * recorded on the row and never stop the batch unless `raiseErrors` is set.
 *
 * Hooks can be passed in `config.hooks` or implemented by overriding the
 * hook methods in a subclass.
 *
 * @example
 * ```typescript
 * const books = new Resource({
 *   store: bookStore,
 *   fields: {
 *     id: { attribute: 'id', widget: new IntegerWidget() },
 *     name: { attribute: 'name' },
 *   },
 *   options: { skipUnchanged: true, useTransactions: true },
 * });
 * const result = await books.importData(dataset, { dryRun: true });
 * ```
 */
export class Resource<T extends object, Tx = unknown> {
  protected readonly ctx: ResourceContext<T, Tx>;
  private readonly hooks: ResourceHooks<T>;

  constructor(config: ResourceConfig<T, Tx>) {
    const options = resolveOptions(config.options);
    const declared = declareFields(config.fields ?? {});
    const fields = config.fromSchema ? buildSchemaFields(config.store, options, declared) : declared;
    const logger = config.logger ?? pino({ level: 'silent' });

    this.assertRelationSupport(config.store, fields);
    this.hooks = config.hooks ?? {};
    this.ctx = new ResourceContext(
      config.store,
      fields,
      resolveColumnOrder(fields, options.columnOrder),
      options,
      tableOf('exporters', config.exporters, fields),
      tableOf('importers', config.importers, fields),
      new DiffEngine(config.differ ?? new DiffMatchPatchDiffer()),
      new EventBus(logger),
      logger,
    );
  }

  private assertRelationSupport(store: ObjectStore<T, Tx>, fields: ReadonlyMap<string, Field>): void {
    for (const [name, field] of fields) {
      if (isManyToManyWidget(field.widget) && (!store.getRelated || !store.setRelated)) {
        throw new ConfigurationError(`Field '${name}' is many-to-many but the store cannot read or write relations`);
      }
    }
  }

  get options(): ResolvedOptions {
    return this.ctx.options;
  }

  /** Every field by name, in declaration order. */
  get fields(): ReadonlyMap<string, Field> {
    return this.ctx.fields;
  }

  /** Fields in column order. */
  getFields(): Field[] {
    return this.ctx.orderedFields().map(([, field]) => field);
  }

  /** Name under which `field` is registered. */
  getFieldName(field: Field): string {
    for (const [name, candidate] of this.ctx.fields) {
      if (candidate === field) return name;
    }
    throw new ConfigurationError(`Field '${field.columnName}' does not exist in this resource`);
  }

  getColumnOrder(): readonly string[] {
    return this.ctx.columnOrder;
  }

  /** Column labels in column order. */
  getColumnHeaders(): string[] {
    return new ExportData(this.ctx).headers();
  }

  /** Labels matching each entry of `RowResult.diff`. */
  getDiffHeaders(): string[] {
    return this.getColumnHeaders();
  }

  getImportIdFields(): readonly string[] {
    return this.ctx.options.importIdFields;
  }

  /** Whether imports use transactions when the call does not say: the resource option, else the process setting. */
  getUseTransactions(): boolean {
    return this.ctx.options.useTransactions ?? getSettings().useTransactions;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Import every row of `dataset`.
   *
   * @throws ConfigurationError when the identification fields or the transaction setup are invalid.
   * @throws the first row error, after rolling back, when `raiseErrors` is set.
   */
  async importData(dataset: Dataset, options?: ImportDataOptions): Promise<Result> {
    return new ImportData(this.ctx, this, () => this.getUseTransactions()).execute(dataset, options);
  }

  /** Export the given objects, or every stored object, into a dataset. */
  async export(objects?: AsyncIterable<T> | Iterable<T>): Promise<Dataset> {
    return new ExportData(this.ctx).execute(objects);
  }

  /** Lazily export rows, one object in memory at a time. */
  exportRows(objects?: AsyncIterable<T> | Iterable<T>): AsyncGenerator<string[]> {
    return new ExportData(this.ctx).rows(objects);
  }

  /** Exported values of one object, in column order. */
  async exportInstance(instance: T): Promise<string[]> {
    return new ExportData(this.ctx).exportInstance(instance);
  }

  /** Exported value of one field, through its exporter when one is set. */
  async exportField(name: string, instance: T): Promise<string> {
    return this.ctx.exportField(name, instance);
  }

  // ── Hooks ───────────────────────────────────────────────────────────

  /** Allocate the instance for a row that matched nothing. */
  initInstance(row: Row): T {
    return this.ctx.store.create(row);
  }

  async beforeImport(dataset: Dataset, dryRun: boolean): Promise<void> {
    await this.hooks.beforeImport?.(dataset, dryRun);
  }

  /** `true` when the row deletes its instance. Default: never. */
  async forDelete(row: Row, instance: T): Promise<boolean> {
    return (await this.hooks.forDelete?.(row, instance)) ?? false;
  }

  /** `true` when the row is skipped. Default: unchanged rows when `skipUnchanged` is set. */
  async skipRow(instance: T, original: Snapshot, current: Snapshot): Promise<boolean> {
    if (this.hooks.skipRow) return this.hooks.skipRow(instance, original, current);
    return this.ctx.options.skipUnchanged && snapshotsEqual(original, current);
  }

  async beforeSaveInstance(instance: T, dryRun: boolean): Promise<void> {
    await this.hooks.beforeSaveInstance?.(instance, dryRun);
  }

  async afterSaveInstance(instance: T, dryRun: boolean): Promise<void> {
    await this.hooks.afterSaveInstance?.(instance, dryRun);
  }

  async beforeDeleteInstance(instance: T, dryRun: boolean): Promise<void> {
    await this.hooks.beforeDeleteInstance?.(instance, dryRun);
  }

  async afterDeleteInstance(instance: T, dryRun: boolean): Promise<void> {
    await this.hooks.afterDeleteInstance?.(instance, dryRun);
  }
}

/**
 * Resource whose fields are built from the store's schema, filtered by the
 * `fields` / `exclude` options. Explicit `fields` declarations take
 * precedence over schema-built ones.
 */
export function modelResource<T extends object, Tx = unknown>(
  store: ObjectStore<T, Tx>,
  config: Omit<ResourceConfig<T, Tx>, 'store' | 'fromSchema'> = {},
): Resource<T, Tx> {
  return new Resource({ ...config, store, fromSchema: true });
}
