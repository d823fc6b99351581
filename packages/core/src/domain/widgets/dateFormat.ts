/**
 * Minimal UTC date formatting for date widgets.
 *
 * Supported tokens: `YYYY`, `MM`, `DD`, `HH`, `mm`, `ss`. Any other character
 * is matched literally.
 */

const TOKENS = ['YYYY', 'MM', 'DD', 'HH', 'mm', 'ss'] as const;
type Token = (typeof TOKENS)[number];

type Part = { readonly token: Token } | { readonly literal: string };

function tokenize(format: string): Part[] {
  const parts: Part[] = [];
  let i = 0;
  while (i < format.length) {
    const token = TOKENS.find((t) => format.startsWith(t, i));
    if (token) {
      parts.push({ token });
      i += token.length;
    } else {
      parts.push({ literal: format.charAt(i) });
      i += 1;
    }
  }
  return parts;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Parse `text` with `format`. Returns `null` when the text does not match or names an impossible date. */
export function parseDate(text: string, format: string): Date | null {
  const parts = tokenize(format);
  const tokens: Token[] = [];
  const source = parts
    .map((part) => {
      if ('literal' in part) return escapeRegExp(part.literal);
      tokens.push(part.token);
      return part.token === 'YYYY' ? '(\\d{4})' : '(\\d{2})';
    })
    .join('');

  const match = new RegExp(`^${source}$`).exec(text.trim());
  if (!match) return null;

  const values: Record<Token, number> = { YYYY: 1970, MM: 1, DD: 1, HH: 0, mm: 0, ss: 0 };
  tokens.forEach((token, i) => {
    values[token] = Number(match[i + 1]);
  });

  const date = new Date(Date.UTC(values.YYYY, values.MM - 1, values.DD, values.HH, values.mm, values.ss));
  const roundTrips =
    date.getUTCFullYear() === values.YYYY &&
    date.getUTCMonth() === values.MM - 1 &&
    date.getUTCDate() === values.DD &&
    date.getUTCHours() === values.HH &&
    date.getUTCMinutes() === values.mm &&
    date.getUTCSeconds() === values.ss;
  return roundTrips ? date : null;
}

/** Format a date in UTC with `format`. */
export function formatDate(date: Date, format: string): string {
  const values: Record<Token, string> = {
    YYYY: pad(date.getUTCFullYear(), 4),
    MM: pad(date.getUTCMonth() + 1, 2),
    DD: pad(date.getUTCDate(), 2),
    HH: pad(date.getUTCHours(), 2),
    mm: pad(date.getUTCMinutes(), 2),
    ss: pad(date.getUTCSeconds(), 2),
  };
  return tokenize(format)
    .map((part) => ('literal' in part ? part.literal : values[part.token]))
    .join('');
}
