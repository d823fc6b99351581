/** One record of the input dataset: column name → raw cell value. */
export interface Row {
  readonly [column: string]: unknown;
}
