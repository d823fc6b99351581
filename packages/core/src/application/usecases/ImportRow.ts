import type { Row } from '../../domain/model/Row.js';
import type { RowResult, RowResultDraft } from '../../domain/model/RowResult.js';
import type { ResourceHooks } from '../../domain/ports/ResourceHooks.js';
import type { InstanceLoader } from '../../domain/ports/InstanceLoader.js';
import { createRowResult, finalizeRowResult } from '../../domain/model/RowResult.js';
import { captureError } from '../../domain/model/CapturedError.js';
import { ImportType } from '../../domain/model/ImportType.js';
import { emptySnapshot } from '../../domain/model/Snapshot.js';
import { describeCause } from '../../domain/errors/RecordSyncError.js';
import type { ResourceContext } from '../ResourceContext.js';
import { runHook, persist } from '../guards.js';

/** Hook implementations the row pipeline calls, plus instance allocation. */
export type RowHooks<T extends object> = Required<Omit<ResourceHooks<T>, 'beforeImport'>> & {
  initInstance(row: Row): T;
};

/** Settings of one row run, fixed for the whole batch. */
export interface RowRunOptions<Tx> {
  /** When `true`, nothing is written to the store. */
  readonly dryRun: boolean;
  /** Re-throw the row's error instead of recording it. */
  readonly raiseErrors: boolean;
  /** Open batch transaction, threaded through every store call. */
  readonly transaction?: Tx;
}

function toMembers(value: unknown): object[] {
  if (!Array.isArray(value)) return [];
  return value.filter((member): member is object => typeof member === 'object' && member !== null);
}

/**
 * Use case: reconcile one row.
 *
 * resolve → snapshot → delete check → apply fields → skip check → save
 * (+ many-to-many second pass) → diff. Any error ends the row as `error`.
 */
export class ImportRow<T extends object, Tx = unknown> {
  constructor(
    private readonly ctx: ResourceContext<T, Tx>,
    private readonly hooks: RowHooks<T>,
    private readonly loader: InstanceLoader<T>,
    private readonly options: RowRunOptions<Tx>,
  ) {}

  async execute(row: Row, rowIndex: number): Promise<RowResult> {
    const draft = createRowResult();

    try {
      await this.process(row, draft);
    } catch (error) {
      draft.importType = ImportType.ERROR;
      draft.errors.push(captureError(error));
      const result = finalizeRowResult(draft);
      this.ctx.logger.warn({ err: error, rowIndex }, 'row import failed');
      this.ctx.eventBus.emit({
        type: 'row:failed',
        rowIndex,
        error: describeCause(error),
        result,
        timestamp: Date.now(),
      });
      if (this.options.raiseErrors) throw error;
      return result;
    }

    const result = finalizeRowResult(draft);
    this.ctx.eventBus.emit({ type: 'row:imported', rowIndex, result, timestamp: Date.now() });
    return result;
  }

  private async process(row: Row, draft: RowResultDraft): Promise<void> {
    const { ctx } = this;
    const { transaction } = this.options;
    const names = ctx.columnOrder;

    const found = await this.loader.getInstance(row);
    const isNew = found === null;
    const instance = found ?? this.hooks.initInstance(row);
    draft.newRecord = isNew;
    draft.importType = isNew ? ImportType.NEW : ImportType.UPDATE;

    const original = await ctx.takeSnapshot(instance, undefined, transaction);

    if (await runHook('forDelete', () => this.hooks.forDelete(row, instance))) {
      if (isNew) {
        draft.importType = ImportType.SKIP;
        draft.diff = ctx.diffEngine.diffSnapshots(emptySnapshot(names), emptySnapshot(names), names);
      } else {
        draft.importType = ImportType.DELETE;
        await this.deleteInstance(instance);
        draft.diff = ctx.diffEngine.diffSnapshots(original, emptySnapshot(names), names);
      }
      return;
    }

    const pending = await this.importObj(instance, row);
    const current = await ctx.takeSnapshot(instance, pending, transaction);

    if (await runHook('skipRow', () => this.hooks.skipRow(instance, original, current))) {
      draft.importType = ImportType.SKIP;
    } else {
      await this.saveInstance(instance);
      await this.saveManyToMany(instance, pending);
      draft.objectRepr = ctx.store.describe(instance);
      draft.objectId = ctx.store.identify(instance);
    }

    const saved = await ctx.takeSnapshot(instance, pending, transaction);
    draft.diff = ctx.diffEngine.diffSnapshots(original, saved, names);
  }

  /**
   * Apply every present, writable column except many-to-many ones. Returns
   * the many-to-many targets computed from the row, keyed by field name.
   */
  private async importObj(instance: T, row: Row): Promise<Map<string, readonly object[]>> {
    const { transaction } = this.options;
    const pending = new Map<string, readonly object[]>();

    for (const [name, field] of this.ctx.orderedFields()) {
      if (field.attribute === undefined || field.readonly || !(field.columnName in row)) continue;

      if (this.ctx.isRelationCollection(field)) {
        pending.set(name, toMembers(await field.clean(row, { transaction })));
        continue;
      }

      const importer = this.ctx.importers.get(name);
      if (importer) {
        await runHook(`importers.${name}`, () => importer(instance, row, field));
      } else {
        await field.save(instance, row, { transaction });
      }
    }

    return pending;
  }

  private async saveInstance(instance: T): Promise<void> {
    const { dryRun, transaction } = this.options;
    await runHook('beforeSaveInstance', () => this.hooks.beforeSaveInstance(instance, dryRun));
    if (!dryRun) {
      await persist('save', () => this.ctx.store.save(instance, transaction));
    }
    await runHook('afterSaveInstance', () => this.hooks.afterSaveInstance(instance, dryRun));
  }

  /** Second pass: relations need the owner's identity, so they are written after the save. */
  private async saveManyToMany(instance: T, pending: ReadonlyMap<string, readonly object[]>): Promise<void> {
    const { dryRun, transaction } = this.options;
    const { store } = this.ctx;
    if (dryRun || pending.size === 0) return;

    for (const [name, members] of pending) {
      const { attribute } = this.ctx.getField(name);
      const setRelated = store.setRelated?.bind(store);
      if (attribute === undefined || !setRelated) continue;
      await persist('relation', () => setRelated(instance, attribute, members, transaction));
    }
  }

  private async deleteInstance(instance: T): Promise<void> {
    const { dryRun, transaction } = this.options;
    await runHook('beforeDeleteInstance', () => this.hooks.beforeDeleteInstance(instance, dryRun));
    if (!dryRun) {
      await persist('delete', () => this.ctx.store.delete(instance, transaction));
    }
    await runHook('afterDeleteInstance', () => this.hooks.afterDeleteInstance(instance, dryRun));
  }
}
