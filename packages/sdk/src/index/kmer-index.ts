/**
 * k-mer posting lists
 */

import type { SequenceId } from "../types.js";

/**
 * Distinct k-mers of a normalized string
 *
 * A string shorter than k yields one degenerate token: the whole string.
 */
export function kmersOf(normalized: string, k: number): Set<string> {
  const out = new Set<string>();
  if (normalized.length < k) {
    out.add(normalized);
    return out;
  }

  for (let i = 0; i + k <= normalized.length; i++) {
    out.add(normalized.slice(i, i + k));
  }
  return out;
}

const EMPTY: ReadonlySet<SequenceId> = new Set();

/**
 * Inverted index from k-mer to the ids containing it
 */
export class KmerIndex {
  #postings = new Map<string, Set<SequenceId>>();

  /** Number of distinct tokens */
  get size(): number {
    return this.#postings.size;
  }

  add(id: SequenceId, tokens: Iterable<string>): void {
    for (const token of tokens) {
      let ids = this.#postings.get(token);
      if (!ids) {
        ids = new Set();
        this.#postings.set(token, ids);
      }
      ids.add(id);
    }
  }

  /**
   * Remove an id from the given tokens, dropping empty posting lists
   */
  remove(id: SequenceId, tokens: Iterable<string>): void {
    for (const token of tokens) {
      const ids = this.#postings.get(token);
      if (!ids) continue;
      ids.delete(id);
      if (ids.size === 0) {
        this.#postings.delete(token);
      }
    }
  }

  postings(token: string): ReadonlySet<SequenceId> {
    return this.#postings.get(token) ?? EMPTY;
  }

  /**
   * Token to sorted id list, for snapshots
   */
  toRecord(): Record<string, SequenceId[]> {
    const out: Record<string, SequenceId[]> = {};
    for (const [token, ids] of this.#postings) {
      out[token] = [...ids].sort((a, b) => a - b);
    }
    return out;
  }

  clear(): void {
    this.#postings.clear();
  }
}
