/**
 * Year extraction from heterogeneous date representations:
 * full dates, bare years, "(I) 2016", ranges like "2010–2012", numbers.
 */

export interface YearRange {
  minYear: number;
  maxYear: number;
}

export type YearExtraction =
  | { kind: 'ok'; year: number }
  | { kind: 'out_of_range'; year: number }
  | { kind: 'malformed' };

// Four digits not embedded in a longer digit run
const YEAR_TOKEN = /(?<!\d)\d{4}(?!\d)/g;

function inRange(year: number, range: YearRange): boolean {
  return year >= range.minYear && year <= range.maxYear;
}

/**
 * Take the first 4-digit token inside the valid range. When tokens exist but
 * none is in range, the first one is returned flagged out_of_range so the
 * QualityFilter can reject the row.
 */
export function extractYear(value: unknown, range: YearRange): YearExtraction {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 1000 || value > 9999) return { kind: 'malformed' };
    return inRange(value, range) ? { kind: 'ok', year: value } : { kind: 'out_of_range', year: value };
  }
  if (typeof value !== 'string') return { kind: 'malformed' };

  const tokens = (value.match(YEAR_TOKEN) ?? []).map(t => parseInt(t, 10));
  if (tokens.length === 0) return { kind: 'malformed' };

  const valid = tokens.find(y => inRange(y, range));
  if (valid !== undefined) return { kind: 'ok', year: valid };
  return { kind: 'out_of_range', year: tokens[0] };
}

export function isYearInRange(year: number, range: YearRange): boolean {
  return inRange(year, range);
}
