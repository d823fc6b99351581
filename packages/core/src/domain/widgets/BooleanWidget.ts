import type { Widget } from './Widget.js';
import { isBlank } from './Widget.js';
import { ConversionError } from '../errors/RecordSyncError.js';

const TRUE_VALUES = ['1', 'true', 't', 'yes', 'y'];
const FALSE_VALUES = ['0', 'false', 'f', 'no', 'n'];

/** Boolean widget. Renders `'1'` / `'0'`; cleans the usual spellings case-insensitively. */
export class BooleanWidget implements Widget<boolean> {
  clean(raw: unknown): boolean | null {
    if (isBlank(raw)) return null;
    if (typeof raw === 'boolean') return raw;

    const text = String(raw).trim().toLowerCase();
    if (TRUE_VALUES.includes(text)) return true;
    if (FALSE_VALUES.includes(text)) return false;
    throw new ConversionError(`Enter a valid boolean, got '${String(raw)}'.`, { value: raw });
  }

  render(value: unknown): string {
    if (value === undefined || value === null) return '';
    return value ? '1' : '0';
  }
}
