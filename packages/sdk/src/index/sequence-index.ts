/**
 * In-memory search index over stored sequences
 *
 * Structures:
 * - exact table: radix trie from normalized content to the ids holding it
 * - k-mer table: k-mer (or degenerate token) to ids containing it
 * - per-id normalized symbols, used to verify candidates and rank them
 *
 * Invariants:
 * - Every id in the exact or k-mer tables has normalized symbols
 * - An id's traces are exactly those derived from its normalized symbols
 * - Two indexes built from the same records serialize identically
 */

import { IndexInconsistencyError } from "../errors.js";
import { stableStringify } from "../format.js";
import type { ConsistencyReport, SequenceId } from "../types.js";
import { KmerIndex, kmersOf } from "./kmer-index.js";
import { createNormalizer, type Normalizer } from "./normalize.js";
import { RadixTrie } from "./radix-trie.js";

/** Version written into snapshots */
export const INDEX_SNAPSHOT_VERSION = 1;

/**
 * Persisted form of an index
 */
export interface IndexSnapshot {
  version: number;
  k: number;
  caseSensitive: boolean;
  /** Normalized content to sorted ids */
  exact: Record<string, SequenceId[]>;
  /** k-mer to sorted ids */
  kmers: Record<string, SequenceId[]>;
  /** Id (as a decimal string) to normalized symbols */
  symbols: Record<string, string>;
}

export interface IndexSettings {
  k: number;
  caseSensitive: boolean;
}

/**
 * Minimal record shape the index is built from
 */
export interface IndexedRecord {
  id: SequenceId;
  symbols: string;
}

export interface IndexStats {
  sequences: number;
  kmers: number;
  distinctContents: number;
  totalSymbols: number;
}

const byNumber = (a: number, b: number): number => a - b;

export class SequenceIndex {
  readonly k: number;
  readonly caseSensitive: boolean;
  readonly normalize: Normalizer;

  #exact = new RadixTrie<Set<SequenceId>>();
  #kmers = new KmerIndex();
  #symbols = new Map<SequenceId, string>();
  /** Ids whose content is shorter than k */
  #short = new Set<SequenceId>();

  constructor(settings: IndexSettings) {
    this.k = settings.k;
    this.caseSensitive = settings.caseSensitive;
    this.normalize = createNormalizer(settings.caseSensitive);
  }

  /** Number of indexed sequences */
  get size(): number {
    return this.#symbols.size;
  }

  /**
   * Index a new sequence
   * @throws IndexInconsistencyError if the id is already indexed
   */
  onCreate(id: SequenceId, symbols: string): void {
    if (this.#symbols.has(id)) {
      throw new IndexInconsistencyError(`sequence ${id} is already indexed`);
    }

    const normalized = this.normalize(symbols);
    this.#symbols.set(id, normalized);

    let ids = this.#exact.get(normalized);
    if (!ids) {
      ids = new Set();
      this.#exact.set(normalized, ids);
    }
    ids.add(id);

    this.#kmers.add(id, kmersOf(normalized, this.k));
    if (normalized.length < this.k) {
      this.#short.add(id);
    }
  }

  /**
   * Replace an id's content: its old traces are removed, then the new ones added
   */
  onUpdate(id: SequenceId, oldSymbols: string, newSymbols: string): void {
    this.onDelete(id, oldSymbols);
    this.onCreate(id, newSymbols);
  }

  /**
   * Remove every trace of an id
   * @throws IndexInconsistencyError if the indexed content differs from `symbols`
   */
  onDelete(id: SequenceId, symbols: string): void {
    const normalized = this.normalize(symbols);
    const indexed = this.#symbols.get(id);
    if (indexed === undefined) {
      throw new IndexInconsistencyError(`sequence ${id} is not indexed`);
    }
    if (indexed !== normalized) {
      throw new IndexInconsistencyError(`sequence ${id} is indexed with different content`);
    }

    this.#symbols.delete(id);
    this.#short.delete(id);
    this.#kmers.remove(id, kmersOf(normalized, this.k));

    const ids = this.#exact.get(normalized);
    if (ids) {
      ids.delete(id);
      if (ids.size === 0) {
        this.#exact.delete(normalized);
      }
    }
  }

  /**
   * Discard all structures and index the given records
   */
  rebuild(records: Iterable<IndexedRecord>): void {
    this.#exact.clear();
    this.#kmers.clear();
    this.#symbols.clear();
    this.#short.clear();

    for (const record of records) {
      this.onCreate(record.id, record.symbols);
    }
  }

  has(id: SequenceId): boolean {
    return this.#symbols.has(id);
  }

  /**
   * Normalized symbols of an indexed id
   * @throws IndexInconsistencyError when a posting references an id without symbols
   */
  symbolsOf(id: SequenceId): string {
    const symbols = this.#symbols.get(id);
    if (symbols === undefined) {
      throw new IndexInconsistencyError(`posting references sequence ${id} without symbols`);
    }
    return symbols;
  }

  /**
   * Ids holding exactly this normalized content, ascending
   */
  exactIds(normalized: string): SequenceId[] {
    const ids = this.#exact.get(normalized);
    return ids ? [...ids].sort(byNumber) : [];
  }

  /**
   * Contents starting with a normalized prefix, with their ids
   */
  prefixEntries(normalized: string): Array<[string, SequenceId[]]> {
    return this.#exact
      .entriesWithPrefix(normalized)
      .map(([content, ids]): [string, SequenceId[]] => [content, [...ids].sort(byNumber)]);
  }

  postings(token: string): ReadonlySet<SequenceId> {
    return this.#kmers.postings(token);
  }

  /**
   * Ids whose content is shorter than k, ascending
   */
  shortIds(): SequenceId[] {
    return [...this.#short].sort(byNumber);
  }

  /**
   * All indexed ids, ascending
   */
  ids(): SequenceId[] {
    return [...this.#symbols.keys()].sort(byNumber);
  }

  stats(): IndexStats {
    let totalSymbols = 0;
    for (const symbols of this.#symbols.values()) {
      totalSymbols += symbols.length;
    }

    return {
      sequences: this.#symbols.size,
      kmers: this.#kmers.size,
      distinctContents: this.#exact.size,
      totalSymbols,
    };
  }

  toSnapshot(): IndexSnapshot {
    const exact: Record<string, SequenceId[]> = {};
    for (const [content, ids] of this.#exact.entries()) {
      exact[content] = [...ids].sort(byNumber);
    }

    const symbols: Record<string, string> = {};
    for (const id of this.ids()) {
      symbols[String(id)] = this.symbolsOf(id);
    }

    return {
      version: INDEX_SNAPSHOT_VERSION,
      k: this.k,
      caseSensitive: this.caseSensitive,
      exact,
      kmers: this.#kmers.toRecord(),
      symbols,
    };
  }

  /**
   * Deterministic JSON form of the index
   */
  serialize(): string {
    return stableStringify(this.toSnapshot());
  }

  /**
   * Compare indexed content with store records
   */
  diff(records: Iterable<IndexedRecord>): ConsistencyReport {
    const missing: SequenceId[] = [];
    const mismatched: SequenceId[] = [];
    const seen = new Set<SequenceId>();

    for (const record of records) {
      seen.add(record.id);
      const indexed = this.#symbols.get(record.id);
      if (indexed === undefined) {
        missing.push(record.id);
      } else if (indexed !== this.normalize(record.symbols)) {
        mismatched.push(record.id);
      }
    }

    const stale = this.ids().filter((id) => !seen.has(id));
    missing.sort(byNumber);
    mismatched.sort(byNumber);

    return {
      consistent: missing.length === 0 && stale.length === 0 && mismatched.length === 0,
      missing,
      stale,
      mismatched,
    };
  }

  /**
   * Restore an index from a snapshot
   *
   * Tables are re-derived from the snapshot's symbols and must match the
   * persisted ones.
   * @throws IndexInconsistencyError when the snapshot contradicts itself
   */
  static fromSnapshot(snapshot: IndexSnapshot): SequenceIndex {
    if (snapshot.version !== INDEX_SNAPSHOT_VERSION) {
      throw new IndexInconsistencyError(`unsupported snapshot version ${snapshot.version}`);
    }

    const index = new SequenceIndex({ k: snapshot.k, caseSensitive: snapshot.caseSensitive });

    for (const [key, symbols] of Object.entries(snapshot.symbols)) {
      const id = Number(key);
      if (!Number.isSafeInteger(id) || id < 1 || String(id) !== key) {
        throw new IndexInconsistencyError(`snapshot holds invalid id "${key}"`);
      }
      if (index.normalize(symbols) !== symbols) {
        throw new IndexInconsistencyError(`snapshot holds unnormalized symbols for ${id}`);
      }
      index.onCreate(id, symbols);
    }

    const derived = index.toSnapshot();
    if (
      stableStringify(derived.exact) !== stableStringify(snapshot.exact) ||
      stableStringify(derived.kmers) !== stableStringify(snapshot.kmers)
    ) {
      throw new IndexInconsistencyError("snapshot tables disagree with its symbols");
    }

    return index;
  }
}
