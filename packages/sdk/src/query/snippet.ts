/**
 * Excerpts around pattern occurrences
 */

import type { SequenceId, Snippet, SnippetOptions } from "../types.js";

const ELLIPSIS = "...";

/**
 * Start offsets of non-overlapping occurrences, left to right
 */
export function findOccurrences(text: string, pattern: string): number[] {
  const positions: number[] = [];
  if (pattern.length === 0) {
    return positions;
  }

  let from = 0;
  for (let at = text.indexOf(pattern, from); at !== -1; at = text.indexOf(pattern, from)) {
    positions.push(at);
    from = at + pattern.length;
  }
  return positions;
}

/**
 * Build an excerpt of `original` around the first occurrence of `pattern`
 *
 * Offsets are found in the normalized text and applied to the original, which
 * has the same length. Occurrences fully inside the window are wrapped in the
 * markers; "..." marks each side where the excerpt is cut.
 */
export function buildSnippet(
  id: SequenceId,
  original: string,
  normalized: string,
  pattern: string,
  options: Required<SnippetOptions>
): Snippet {
  const { width, open, close } = options;
  const positions = findOccurrences(normalized, pattern);
  const first = positions[0];

  if (first === undefined) {
    const end = Math.min(original.length, 2 * width);
    return {
      id,
      excerpt: original.slice(0, end) + (end < original.length ? ELLIPSIS : ""),
      position: -1,
      occurrences: 0,
    };
  }

  const start = Math.max(0, first - width);
  const end = Math.min(original.length, first + pattern.length + width);

  let excerpt = start > 0 ? ELLIPSIS : "";
  let cursor = start;
  for (const at of positions) {
    if (at < start) continue;
    if (at + pattern.length > end) break;
    excerpt += original.slice(cursor, at) + open + original.slice(at, at + pattern.length) + close;
    cursor = at + pattern.length;
  }
  excerpt += original.slice(cursor, end);
  if (end < original.length) {
    excerpt += ELLIPSIS;
  }

  return { id, excerpt, position: first, occurrences: positions.length };
}
