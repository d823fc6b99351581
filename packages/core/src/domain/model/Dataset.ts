import type { Row } from './Row.js';

/**
 * Ordered tabular container: a header row and value rows of the same width.
 *
 * Used both as import input (iterate `dict()`) and as export output
 * (`append()` one row per exported object).
 */
export class Dataset {
  private readonly _headers: string[];
  private readonly _rows: unknown[][] = [];

  constructor(headers: readonly string[] = []) {
    this._headers = [...headers];
  }

  /** Build a dataset from column→value records. Headers are the union of keys in first-seen order. */
  static fromRecords(records: readonly Row[], headers?: readonly string[]): Dataset {
    const columns = headers ? [...headers] : Dataset.collectHeaders(records);
    const dataset = new Dataset(columns);
    for (const record of records) {
      dataset.append(columns.map((column) => record[column]));
    }
    return dataset;
  }

  private static collectHeaders(records: readonly Row[]): string[] {
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) seen.add(key);
    }
    return [...seen];
  }

  get headers(): readonly string[] {
    return this._headers;
  }

  /** Number of value rows (the header row is not counted). */
  get height(): number {
    return this._rows.length;
  }

  get rows(): readonly (readonly unknown[])[] {
    return this._rows;
  }

  /** Append one row. Its width must match the header row when headers are set. */
  append(values: readonly unknown[]): void {
    if (this._headers.length > 0 && values.length !== this._headers.length) {
      throw new Error(
        `Row has ${String(values.length)} values but the dataset has ${String(this._headers.length)} columns`,
      );
    }
    this._rows.push([...values]);
  }

  /**
   * Iterate rows as column→value records.
   *
   * Cells that are `undefined` are left out of the record, so an absent column
   * and a missing cell look the same to the engine.
   */
  *dict(): Generator<Row> {
    for (const values of this._rows) {
      const record: Record<string, unknown> = {};
      this._headers.forEach((header, i) => {
        const value = values[i];
        if (value !== undefined) record[header] = value;
      });
      yield record;
    }
  }
}
