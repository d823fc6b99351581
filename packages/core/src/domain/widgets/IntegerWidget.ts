import type { Widget } from './Widget.js';
import { isBlank } from './Widget.js';
import { ConversionError } from '../errors/RecordSyncError.js';

const INTEGER_PATTERN = /^[+-]?\d+(\.0*)?$/;

function safe(value: number, text: string, raw: unknown): number {
  if (!Number.isSafeInteger(value)) {
    throw new ConversionError(`'${text}' is outside the safe integer range.`, { value: raw });
  }
  return value;
}

/**
 * Whole-number widget. Values beyond `Number.MAX_SAFE_INTEGER` are rejected
 * rather than rounded.
 *
 * Accepts `'42'`, `'-7'` and integral decimals such as `'3.0'`.
 */
export class IntegerWidget implements Widget<number> {
  clean(raw: unknown): number | null {
    if (isBlank(raw)) return null;
    const text = String(raw).trim();
    if (typeof raw === 'number' && Number.isInteger(raw)) return safe(raw, text, raw);

    if (!INTEGER_PATTERN.test(text)) {
      throw new ConversionError(`Enter a valid integer, got '${text}'.`, { value: raw });
    }
    return safe(Number(text), text, raw);
  }

  render(value: unknown): string {
    if (value === undefined || value === null) return '';
    return String(value);
  }
}
