import type { Dataset } from '../../domain/model/Dataset.js';
import type { InstanceLoader } from '../../domain/ports/InstanceLoader.js';
import type { TransactionManager } from '../../domain/ports/TransactionManager.js';
import type { ImportRolledBackEvent } from '../../domain/events/DomainEvents.js';
import { Result } from '../../domain/model/Result.js';
import { captureError } from '../../domain/model/CapturedError.js';
import { ImportType } from '../../domain/model/ImportType.js';
import { ModelInstanceLoader } from '../../domain/services/ModelInstanceLoader.js';
import { CachedInstanceLoader } from '../../domain/services/CachedInstanceLoader.js';
import { ConfigurationError, HookError } from '../../domain/errors/RecordSyncError.js';
import type { ResourceContext } from '../ResourceContext.js';
import { ImportRow } from './ImportRow.js';
import type { RowHooks } from './ImportRow.js';

/** Options of one `importData()` call. */
export interface ImportDataOptions {
  /** Compute outcomes and diffs without keeping any change. Default: `false`. */
  readonly dryRun?: boolean;
  /** Stop at the first error, roll back and re-throw it. Default: `false`. */
  readonly raiseErrors?: boolean;
  /** Override the resource's transaction setting for this call. */
  readonly useTransactions?: boolean;
}

/** Hooks the batch pipeline calls: the row hooks plus `beforeImport`. */
export type BatchHooks<T extends object> = RowHooks<T> & {
  beforeImport(dataset: Dataset, dryRun: boolean): void | Promise<void>;
};

/** An open batch transaction and the manager that closes it. */
interface OpenTransaction<Tx> {
  readonly manager: TransactionManager<Tx>;
  readonly handle: Tx;
  closed: boolean;
}

/**
 * Use case: import every row of a dataset.
 *
 * With transactions, rows are fully applied inside one transaction that is
 * rolled back at the end when the caller asked for a dry run or anything
 * failed; the transaction is closed exactly once on every path.
 */
export class ImportData<T extends object, Tx = unknown> {
  constructor(
    private readonly ctx: ResourceContext<T, Tx>,
    private readonly hooks: BatchHooks<T>,
    private readonly defaultUseTransactions: () => boolean,
  ) {}

  async execute(dataset: Dataset, options: ImportDataOptions = {}): Promise<Result> {
    const { ctx } = this;
    const dryRun = options.dryRun ?? false;
    const raiseErrors = options.raiseErrors ?? false;
    const useTransactions = options.useTransactions ?? this.defaultUseTransactions();
    const startedAt = Date.now();

    const idFields = ctx.identificationFields();
    const result = new Result();
    result.diffHeaders = ctx.columnOrder.map((name) => ctx.getField(name).columnName);

    const tx = useTransactions ? await this.begin() : null;
    // Inside a transaction rows are really written; the rollback undoes a dry run.
    const rowDryRun = tx ? false : dryRun;

    ctx.eventBus.emit({ type: 'import:started', dryRun, useTransactions, timestamp: Date.now() });

    try {
      const loader = await this.createLoader(dataset, idFields, tx?.handle);

      try {
        await this.hooks.beforeImport(dataset, rowDryRun);
      } catch (error) {
        const hookError = error instanceof HookError ? error : new HookError('beforeImport', error);
        result.baseErrors.push(captureError(hookError));
        ctx.logger.warn({ err: hookError }, 'beforeImport failed');
        if (raiseErrors) throw hookError;
      }

      const rowImport = new ImportRow(ctx, this.hooks, loader, {
        dryRun: rowDryRun,
        raiseErrors,
        transaction: tx?.handle,
      });

      let rowIndex = 0;
      for (const row of dataset.dict()) {
        const rowResult = await rowImport.execute(row, rowIndex);
        result.addRowResult(rowResult, rowResult.importType !== ImportType.SKIP || ctx.options.reportSkipped);
        rowIndex++;
      }
    } catch (error) {
      if (tx) await this.close(tx, 'raised');
      throw error;
    }

    if (tx) {
      if (dryRun) await this.close(tx, 'dry-run');
      else if (result.hasErrors()) await this.close(tx, 'errors');
      else await this.close(tx, null);
    }

    ctx.eventBus.emit({
      type: 'import:completed',
      totals: result.totals,
      hasErrors: result.hasErrors(),
      elapsedMs: Date.now() - startedAt,
      timestamp: Date.now(),
    });
    return result;
  }

  private async begin(): Promise<OpenTransaction<Tx>> {
    const manager = this.ctx.store.transactions;
    if (!manager) {
      throw new ConfigurationError('useTransactions is set but the store has no transaction manager');
    }
    const handle = await manager.begin();
    this.ctx.logger.debug('import transaction opened');
    return { manager, handle, closed: false };
  }

  /** Commit when `rollbackReason` is `null`, roll back otherwise. Idempotent. */
  private async close(tx: OpenTransaction<Tx>, rollbackReason: ImportRolledBackEvent['reason'] | null): Promise<void> {
    if (tx.closed) return;
    tx.closed = true;

    if (rollbackReason === null) {
      await tx.manager.commit(tx.handle);
      this.ctx.logger.debug('import transaction committed');
      this.ctx.eventBus.emit({ type: 'import:committed', timestamp: Date.now() });
    } else {
      await tx.manager.rollback(tx.handle);
      this.ctx.logger.debug({ reason: rollbackReason }, 'import transaction rolled back');
      this.ctx.eventBus.emit({ type: 'import:rolledBack', reason: rollbackReason, timestamp: Date.now() });
    }
  }

  private async createLoader(
    dataset: Dataset,
    idFields: ReturnType<ResourceContext<T, Tx>['identificationFields']>,
    transaction: Tx | undefined,
  ): Promise<InstanceLoader<T>> {
    if (this.ctx.options.instanceLoader === 'cached') {
      return CachedInstanceLoader.load(this.ctx.store, idFields, dataset, transaction);
    }
    return new ModelInstanceLoader(this.ctx.store, idFields, transaction);
  }
}
