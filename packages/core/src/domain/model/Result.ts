import type { CapturedError } from './CapturedError.js';
import type { RowResult } from './RowResult.js';
import { ImportType } from './ImportType.js';

/** Row counts per import type. */
export type ImportTotals = Readonly<Record<ImportType, number>>;

/** Outcome of one `importData()` run. */
export class Result {
  readonly rows: RowResult[] = [];
  /** Errors raised outside row processing (e.g. in `beforeImport`). */
  readonly baseErrors: CapturedError[] = [];
  /** Column labels matching each entry of `RowResult.diff`. */
  diffHeaders: readonly string[] = [];

  private readonly counts: Record<ImportType, number> = {
    [ImportType.NEW]: 0,
    [ImportType.UPDATE]: 0,
    [ImportType.DELETE]: 0,
    [ImportType.SKIP]: 0,
    [ImportType.ERROR]: 0,
  };
  private rowErrors = false;

  /**
   * Record a row outcome. Counted in `totals` even when it is not kept in
   * `rows` (skipped rows while skip reporting is off).
   */
  addRowResult(row: RowResult, report = true): void {
    this.counts[row.importType] += 1;
    if (row.errors.length > 0) this.rowErrors = true;
    if (report) this.rows.push(row);
  }

  /** `true` when a base error exists or any row carries an error. */
  hasErrors(): boolean {
    return this.baseErrors.length > 0 || this.rowErrors;
  }

  get totals(): ImportTotals {
    return { ...this.counts };
  }
}
