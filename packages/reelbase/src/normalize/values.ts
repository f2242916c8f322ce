/**
 * Raw value coercion. CSV cells arrive as strings; fixtures and JSON sources
 * may carry numbers, booleans or arrays.
 */

const NULL_TOKENS: ReadonlySet<string> = new Set(['', 'nan', 'null', 'none', 'n/a', 'na']);

// "None" and "NA" are real film titles
const BLANK_TOKENS: ReadonlySet<string> = new Set(['', 'nan']);

function missingAmong(value: unknown, tokens: ReadonlySet<string>): boolean {
  if (value == null) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return tokens.has(value.trim().toLowerCase());
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

function textAmong(value: unknown, tokens: ReadonlySet<string>): string | null {
  if (missingAmong(value, tokens)) return null;
  if (typeof value === 'string') return value.replace(/\s+/g, ' ').trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

export function isMissing(value: unknown): boolean {
  return missingAmong(value, NULL_TOKENS);
}

export function toText(value: unknown): string | null {
  return textAmong(value, NULL_TOKENS);
}

/** Blank only when empty or NaN; placeholder words are kept. */
export function isBlank(value: unknown): boolean {
  return missingAmong(value, BLANK_TOKENS);
}

/** toText for title cells. */
export function toTitleText(value: unknown): string | null {
  return textAmong(value, BLANK_TOKENS);
}

/** Parse "$160,000,000", " 7.5 ", 42. Unparseable → null. */
export function toNumber(value: unknown): number | null {
  if (isMissing(value)) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const cleaned = value.replace(/[$,\s]/g, '');
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

/** Money and runtime columns record "unknown" as zero. */
export function toPositiveNumber(value: unknown): number | null {
  const n = toNumber(value);
  return n != null && n > 0 ? n : null;
}

/** "142 min" → 142. Zero → null. */
export function toRuntime(value: unknown): number | null {
  const direct = toPositiveNumber(value);
  if (direct != null) return direct;
  const match = toText(value)?.match(/\d+(\.\d+)?/);
  if (!match) return null;
  const n = Number(match[0]);
  return n > 0 ? n : null;
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/**
 * "1999-03-31", "1999-03-31T00:00:00", "Dec 18, 2009", "12/18/2009" → YYYY-MM-DD.
 * Bare years and unparseable text → null.
 */
export function toIsoDate(value: unknown): string | null {
  const text = toText(value);
  if (!text) return null;
  const iso = text.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;
  if (/^\d{4}$/.test(text)) return null;
  const ms = Date.parse(text);
  if (Number.isNaN(ms)) return null;
  const d = new Date(ms);
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

export function toInteger(value: unknown): number | null {
  const n = toNumber(value);
  return n == null ? null : Math.round(n);
}

export function toBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  const text = toText(value)?.toLowerCase();
  if (text === 'true' || text === '1' || text === 'yes') return true;
  if (text === 'false' || text === '0' || text === 'no') return false;
  return null;
}

/**
 * Split a list-like cell: arrays, "a, b", "a|b", or a stringified list such
 * as "['Keanu Reeves', 'Carrie-Anne Moss']".
 */
export function toList(value: unknown, separator: RegExp = /\s*[,|]\s*/): string[] {
  if (Array.isArray(value)) {
    return value.map(v => toText(v)).filter((v): v is string => v != null);
  }
  const text = toText(value);
  if (!text) return [];
  return text
    .replace(/^\[|\]$/g, '')
    .split(separator)
    .map(part => part.trim().replace(/^['"]|['"]$/g, '').trim())
    .filter(part => part.length > 0 && !NULL_TOKENS.has(part.toLowerCase()));
}
