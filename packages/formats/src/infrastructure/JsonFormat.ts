import { Dataset, FormatError } from '@recordsync/core';
import type { Row } from '@recordsync/core';
import type { DatasetFormat } from '../domain/ports/DatasetFormat.js';

export interface JsonFormatOptions {
  /** 'array' for a JSON array of objects, 'ndjson' for newline-delimited JSON. Default: 'auto' (load), 'array' (dump). */
  readonly format?: 'array' | 'ndjson' | 'auto';
  /** Indentation of dumped arrays. Default: none. */
  readonly indent?: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** JSON format adapter supporting JSON arrays and NDJSON. Zero dependencies. */
export class JsonFormat implements DatasetFormat {
  readonly title: string;
  readonly extension: string;
  readonly contentType: string;

  private readonly format: 'array' | 'ndjson' | 'auto';
  private readonly indent: number | undefined;

  constructor(options?: JsonFormatOptions) {
    this.format = options?.format ?? 'auto';
    this.indent = options?.indent;
    const ndjson = this.format === 'ndjson';
    this.title = ndjson ? 'ndjson' : 'json';
    this.extension = ndjson ? 'ndjson' : 'json';
    this.contentType = ndjson ? 'application/x-ndjson' : 'application/json';
  }

  load(data: string | Buffer): Dataset {
    const content = typeof data === 'string' ? data : data.toString('utf-8');
    const trimmed = content.trim();

    if (trimmed === '') return new Dataset();

    const format = this.format === 'auto' ? this.detectFormat(trimmed) : this.format;
    const records = format === 'array' ? this.parseArray(trimmed) : this.parseNdjson(trimmed);
    return Dataset.fromRecords(records);
  }

  dump(dataset: Dataset): string {
    const records = [...dataset.dict()];
    if (this.format === 'ndjson') {
      return records.map((record) => JSON.stringify(record)).join('\n');
    }
    return JSON.stringify(records, null, this.indent);
  }

  private detectFormat(content: string): 'array' | 'ndjson' {
    return content.startsWith('[') ? 'array' : 'ndjson';
  }

  private parseArray(content: string): Row[] {
    const parsed = this.parseJson(content, 1);

    if (!Array.isArray(parsed)) {
      throw new FormatError('JSON: expected an array of objects');
    }

    return parsed.map((item: unknown, i) => {
      if (!isPlainObject(item)) {
        throw new FormatError(`JSON: item ${String(i + 1)} is not an object`, { line: i + 1 });
      }
      return this.flattenValues(item);
    });
  }

  private parseNdjson(content: string): Row[] {
    const records: Row[] = [];
    content.split('\n').forEach((line, i) => {
      const trimmedLine = line.trim();
      if (trimmedLine === '') return;

      const parsed = this.parseJson(trimmedLine, i + 1);
      if (!isPlainObject(parsed)) {
        throw new FormatError(`NDJSON: line ${String(i + 1)} is not an object`, { line: i + 1 });
      }
      records.push(this.flattenValues(parsed));
    });
    return records;
  }

  private parseJson(text: string, line: number): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new FormatError(`JSON: line ${String(line)} is not valid JSON`, { line, cause: error });
    }
  }

  /** Nested values become their JSON text, so every cell is a scalar. */
  private flattenValues(obj: Record<string, unknown>): Row {
    const flat: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      flat[key] = typeof value === 'object' && value !== null ? JSON.stringify(value) : value;
    }
    return flat;
  }
}
