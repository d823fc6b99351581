// Domain ports
export type { DatasetFormat } from './domain/ports/DatasetFormat.js';

// Infrastructure adapters (built-in formats)
export { CsvFormat, TsvFormat } from './infrastructure/CsvFormat.js';
export type { CsvFormatOptions } from './infrastructure/CsvFormat.js';
export { JsonFormat } from './infrastructure/JsonFormat.js';
export type { JsonFormatOptions } from './infrastructure/JsonFormat.js';
export { defaultFormats, formatForFile } from './formats.js';
