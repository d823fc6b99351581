import type { Dataset } from '@recordsync/core';

/**
 * Port for a text format datasets are loaded from and dumped to.
 *
 * Implement this interface to support new formats. `load()` reads the whole
 * input; the first record names the columns.
 */
export interface DatasetFormat {
  /** Short name of the format (e.g. `'csv'`). */
  readonly title: string;
  /** File extension without the dot. */
  readonly extension: string;
  /** MIME type of dumped text. */
  readonly contentType: string;
  /** Read text into a dataset. Throws `FormatError` for unreadable input. */
  load(data: string | Buffer): Dataset;
  /** Write a dataset as text. */
  dump(dataset: Dataset): string;
}
