import type { DatasetFormat } from './domain/ports/DatasetFormat.js';
import { CsvFormat, TsvFormat } from './infrastructure/CsvFormat.js';
import { JsonFormat } from './infrastructure/JsonFormat.js';

/** The built-in formats, keyed by file extension. */
export function defaultFormats(): Map<string, DatasetFormat> {
  const formats: DatasetFormat[] = [new CsvFormat(), new TsvFormat(), new JsonFormat(), new JsonFormat({ format: 'ndjson' })];
  return new Map(formats.map((format) => [format.extension, format]));
}

/** Format for a file name, by its extension. `undefined` when none matches. */
export function formatForFile(fileName: string): DatasetFormat | undefined {
  const dot = fileName.lastIndexOf('.');
  if (dot < 0) return undefined;
  return defaultFormats().get(fileName.slice(dot + 1).toLowerCase());
}
