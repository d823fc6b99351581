import type { Widget } from './Widget.js';
import { isBlank } from './Widget.js';
import { ConversionError } from '../errors/RecordSyncError.js';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Mantissa digits without sign, point, exponent or leading and trailing zeros. */
function significantDigits(text: string): string {
  return text
    .replace(/^[+-]/, '')
    .replace(/[eE].*$/, '')
    .replace('.', '')
    .replace(/^0+/, '')
    .replace(/0+$/, '');
}

/** Any decimal of up to 15 significant digits survives a double; longer ones must match exactly. */
function roundTrips(text: string, value: number): boolean {
  const digits = significantDigits(text);
  if (digits.length <= 15) return true;
  if (digits.length > 100) return false;
  return significantDigits(Math.abs(value).toPrecision(digits.length)) === digits;
}

export interface DecimalWidgetOptions {
  /** Fixed number of fraction digits used by `render()`. Default: as many as the value needs. */
  readonly decimalPlaces?: number;
}

/**
 * Decimal widget. Native values are finite JavaScript numbers; text the
 * number would round is rejected.
 */
export class DecimalWidget implements Widget<number> {
  private readonly decimalPlaces: number | undefined;

  constructor(options?: DecimalWidgetOptions) {
    this.decimalPlaces = options?.decimalPlaces;
  }

  clean(raw: unknown): number | null {
    if (isBlank(raw)) return null;
    if (typeof raw === 'number' && Number.isFinite(raw)) return raw;

    const text = String(raw).trim();
    if (!DECIMAL_PATTERN.test(text)) {
      throw new ConversionError(`Enter a valid decimal number, got '${text}'.`, { value: raw });
    }
    const value = Number(text);
    if (!Number.isFinite(value) || !roundTrips(text, value)) {
      throw new ConversionError(`'${text}' cannot be stored without losing precision.`, { value: raw });
    }
    return value;
  }

  render(value: unknown): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'number' && this.decimalPlaces !== undefined) {
      return value.toFixed(this.decimalPlaces);
    }
    return String(value);
  }
}
