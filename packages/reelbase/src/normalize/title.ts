/**
 * Title normalisation: the single function every dataset uses to build the
 * fallback key, so keys from different sources compare equal.
 */

/**
 * Decompose (NFKD) and drop combining marks, lowercase, drop everything that
 * is not a letter, digit or whitespace, collapse whitespace runs. Composed and
 * decomposed spellings of one title give the same result. Idempotent.
 * Returns null for titles that normalise to nothing.
 */
export function normalizeTitle(title: string | null | undefined): string | null {
  if (title == null) return null;
  const norm = title
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
  return norm.length > 0 ? norm : null;
}

/** Compound key used when two records share no native identifier. */
export function fallbackKey(normalizedTitle: string, year: number): string {
  return `${normalizedTitle}|${year}`;
}
