import Papa from 'papaparse';
import { Dataset, FormatError } from '@recordsync/core';
import type { DatasetFormat } from '../domain/ports/DatasetFormat.js';

export interface CsvFormatOptions {
  /** Column delimiter. Default: auto-detected on load, `','` on dump. */
  readonly delimiter?: string;
  /** Line terminator used by `dump()`. Default: `'\n'`. */
  readonly newline?: string;
}

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];

function cellText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/** CSV format adapter using PapaParse. Cells are loaded as text, never typed. */
export class CsvFormat implements DatasetFormat {
  readonly title: string = 'csv';
  readonly extension: string = 'csv';
  readonly contentType: string = 'text/csv';

  private readonly delimiter: string | undefined;
  private readonly newline: string;

  constructor(options?: CsvFormatOptions) {
    this.delimiter = options?.delimiter;
    this.newline = options?.newline ?? '\n';
  }

  load(data: string | Buffer): Dataset {
    const content = typeof data === 'string' ? data : data.toString('utf-8');

    const result = Papa.parse<string[]>(content, {
      header: false,
      delimiter: this.delimiter ?? this.detectDelimiter(content),
      skipEmptyLines: 'greedy',
      dynamicTyping: false,
    });

    const [quoteError] = result.errors.filter((e) => e.type === 'Quotes');
    if (quoteError) {
      throw new FormatError(`CSV: ${quoteError.message}`, { line: (quoteError.row ?? 0) + 1 });
    }

    const [headers, ...rows] = result.data;
    if (!headers) return new Dataset();

    const dataset = new Dataset(headers.map((h) => h.trim()));
    rows.forEach((values, i) => {
      if (values.length !== headers.length) {
        throw new FormatError(
          `CSV: line ${String(i + 2)} has ${String(values.length)} values but the header has ${String(headers.length)}`,
          { line: i + 2 },
        );
      }
      dataset.append(values);
    });
    return dataset;
  }

  dump(dataset: Dataset): string {
    return Papa.unparse(
      {
        fields: [...dataset.headers],
        data: dataset.rows.map((row) => row.map(cellText)),
      },
      { delimiter: this.delimiter ?? ',', newline: this.newline },
    );
  }

  /** Pick the candidate delimiter that splits the first lines into the most columns. */
  detectDelimiter(sample: string | Buffer): string {
    const content = typeof sample === 'string' ? sample : sample.toString('utf-8');
    const firstLines = content.split('\n').slice(0, 5).join('\n');

    let bestDelimiter = ',';
    let maxColumns = 0;

    for (const delimiter of CANDIDATE_DELIMITERS) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
      const firstRow = result.data[0];
      if (firstRow && firstRow.length > maxColumns) {
        maxColumns = firstRow.length;
        bestDelimiter = delimiter;
      }
    }

    return bestDelimiter;
  }
}

/** Tab-separated values. */
export class TsvFormat extends CsvFormat {
  override readonly title: string = 'tsv';
  override readonly extension: string = 'tsv';
  override readonly contentType: string = 'text/tab-separated-values';

  constructor(options?: Omit<CsvFormatOptions, 'delimiter'>) {
    super({ ...options, delimiter: '\t' });
  }
}
