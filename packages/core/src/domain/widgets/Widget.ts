/** Per-import state handed to `Widget.clean()`. */
export interface CleanContext {
  /** Open batch transaction; store lookups made while cleaning must run in it. */
  readonly transaction?: unknown;
}

/**
 * Converts one attribute between its raw cell representation and its native
 * domain value.
 *
 * `clean()` throws `ConversionError` when the raw value cannot be parsed;
 * `render()` accepts any value `clean()` can produce. Widgets hold no state
 * between calls.
 */
export interface Widget<T = unknown> {
  clean(raw: unknown, context?: CleanContext): T | null | Promise<T | null>;
  render(value: unknown): string;
}

/** Check whether a raw cell carries no value (`undefined`, `null`, or blank text). */
export function isBlank(raw: unknown): boolean {
  return raw === undefined || raw === null || (typeof raw === 'string' && raw.trim() === '');
}
