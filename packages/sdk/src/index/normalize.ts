/**
 * Normalization policy shared by indexing and querying
 *
 * Invariants:
 * - Normalization is deterministic and length-preserving, so offsets in the
 *   normalized text are offsets in the original text
 * - The same normalizer is applied to stored content and to every query
 */

export type Normalizer = (symbols: string) => string;

/**
 * Upper-case each character whose upper-case form has the same length
 *
 * Characters such as "ß" (which would expand to "SS") are kept as-is.
 */
export function foldCase(symbols: string): string {
  let out = "";
  for (const ch of symbols) {
    const upper = ch.toUpperCase();
    out += upper.length === ch.length ? upper : ch;
  }
  return out;
}

/**
 * Create the normalizer for a case policy
 */
export function createNormalizer(caseSensitive: boolean): Normalizer {
  return caseSensitive ? (symbols) => symbols : foldCase;
}
