import type { Widget } from './Widget.js';
import { isBlank } from './Widget.js';
import { parseDate, formatDate } from './dateFormat.js';
import { ConversionError } from '../errors/RecordSyncError.js';

export interface DateWidgetOptions {
  /**
   * Accepted input formats (`YYYY`, `MM`, `DD`, `HH`, `mm`, `ss` tokens).
   * The first one is used by `render()`.
   */
  readonly format?: string | readonly string[];
}

/** Calendar date widget. Native values are `Date`s at UTC midnight. */
export class DateWidget implements Widget<Date> {
  protected readonly formats: readonly string[];
  protected readonly invalidMessage: string = 'Enter a valid date';

  constructor(options?: DateWidgetOptions, defaultFormat = 'YYYY-MM-DD') {
    const format = options?.format ?? defaultFormat;
    this.formats = typeof format === 'string' ? [format] : format;
    if (this.formats.length === 0) {
      throw new RangeError('At least one date format is required');
    }
  }

  clean(raw: unknown): Date | null {
    if (isBlank(raw)) return null;
    if (raw instanceof Date) return raw;

    const text = String(raw);
    for (const format of this.formats) {
      const parsed = parseDate(text, format);
      if (parsed) return parsed;
    }
    throw new ConversionError(`${this.invalidMessage}, got '${text}'.`, { value: raw });
  }

  render(value: unknown): string {
    if (!(value instanceof Date)) return value === undefined || value === null ? '' : String(value);
    return formatDate(value, this.formats[0] ?? '');
  }
}
