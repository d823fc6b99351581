import type { Widget } from './Widget.js';

/** Text widget. Cleans any scalar to its string form; `null` stays `null`. */
export class CharWidget implements Widget<string> {
  clean(raw: unknown): string | null {
    if (raw === undefined || raw === null) return null;
    return typeof raw === 'string' ? raw : String(raw);
  }

  render(value: unknown): string {
    if (value === undefined || value === null) return '';
    return String(value);
  }
}
