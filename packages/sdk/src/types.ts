/**
 * Core types for seqindex
 */

import type { SequenceRepository } from "./repository/types.js";

/**
 * Stable sequence identifier (positive integer, never reused)
 */
export type SequenceId = number;

/**
 * Match modes understood by the query engine
 */
export type MatchMode = "exact" | "contains" | "fuzzy" | "prefix";

/**
 * All match modes, in documentation order
 */
export const MATCH_MODES: readonly MatchMode[] = ["exact", "contains", "fuzzy", "prefix"];

/**
 * Optional descriptive data attached to a sequence
 */
export interface SequenceMetadata {
  /** Human-readable name (max 200 characters) */
  name?: string;
  /** Free-form labels without whitespace */
  tags?: string[];
}

/**
 * A stored sequence
 */
export interface Sequence {
  id: SequenceId;
  /** Original symbols as supplied by the caller (not normalized) */
  symbols: string;
  metadata: SequenceMetadata;
  /** ISO-8601 creation timestamp */
  createdAt: string;
  /** ISO-8601 timestamp of the last update */
  updatedAt: string;
}

/**
 * Search query
 */
export interface Query {
  pattern: string;
  mode: MatchMode;
}

/**
 * Ranked search hit
 */
export interface SearchResult {
  id: SequenceId;
  /** Match quality in [0, 1]; 1.0 for exact and verified contains matches */
  score: number;
}

/**
 * Per-query options
 */
export interface SearchOptions {
  /** Maximum number of results returned after ranking */
  limit?: number;
  /** Fuzzy threshold override for this query (0..1) */
  threshold?: number;
}

/**
 * Options for snippet extraction
 */
export interface SnippetOptions {
  /** Symbols of context on each side of the first match (default: 10) */
  width?: number;
  /** Marker inserted before each occurrence (default: "[") */
  open?: string;
  /** Marker inserted after each occurrence (default: "]") */
  close?: string;
}

/**
 * Excerpt of a sequence around a pattern occurrence
 */
export interface Snippet {
  id: SequenceId;
  /** Excerpt with occurrences wrapped in markers */
  excerpt: string;
  /** Offset of the first occurrence, or -1 when the pattern does not occur */
  position: number;
  /** Number of non-overlapping occurrences in the whole sequence */
  occurrences: number;
}

/**
 * Pagination window
 */
export interface PageRequest {
  /** Number of sequences to skip (default: 0) */
  offset?: number;
  /** Maximum number of sequences to return (default: 50) */
  limit?: number;
}

/**
 * One page of sequences
 */
export interface Page<T> {
  items: T[];
  /** Total number of sequences in the store */
  total: number;
  /** Offset of the next page, or null on the last page */
  nextOffset: number | null;
}

/**
 * Aggregate statistics for a store and its index
 */
export interface StoreStats {
  /** Number of stored sequences */
  sequences: number;
  /** Sum of sequence lengths */
  totalSymbols: number;
  /** Mean sequence length (0 when empty) */
  averageLength: number;
  /** Distinct normalized contents (exact-table keys) */
  distinctContents: number;
  /** Distinct k-mers, degenerate tokens included */
  kmers: number;
  k: number;
  caseSensitive: boolean;
}

/**
 * Result of comparing the index against the store
 */
export interface ConsistencyReport {
  consistent: boolean;
  /** Ids present in the store but absent from the index */
  missing: SequenceId[];
  /** Ids present in the index but absent from the store */
  stale: SequenceId[];
  /** Ids whose indexed content differs from the stored content */
  mismatched: SequenceId[];
}

/**
 * Summary of an index rebuild
 */
export interface RebuildReport {
  sequences: number;
  kmers: number;
  distinctContents: number;
  durationMs: number;
  /** Number of attempts used (1, or 2 after an automatic retry) */
  attempts: number;
}

/**
 * Configuration options for opening a store
 */
export interface StoreOptions {
  /** Root directory for a file-backed store (e.g., ./data) */
  root?: string;
  /** Custom repository; takes precedence over `root` */
  repository?: SequenceRepository;
  /** k-mer length (default: 3) */
  k?: number;
  /** Minimum acceptable fuzzy score (default: 0.5) */
  fuzzyThreshold?: number;
  /** Whether normalization preserves case (default: false) */
  caseSensitive?: boolean;
  /** Fixed alphabet; when set, normalized symbols must belong to it */
  alphabet?: string;
  /** Persist index snapshots next to the data (default: true) */
  persistIndex?: boolean;
  /** Number of spaces for JSON indentation in record files (default: 2) */
  indent?: number;
}

/**
 * Resolved engine configuration
 */
export interface EngineConfig {
  k: number;
  fuzzyThreshold: number;
  caseSensitive: boolean;
  alphabet: string | null;
  persistIndex: boolean;
}

/**
 * Sequence store with an always-consistent search index
 */
export interface SequenceStore {
  /**
   * Store a new sequence
   * @returns The freshly assigned id
   */
  create(symbols: string, metadata?: SequenceMetadata): Promise<SequenceId>;

  /**
   * Read a sequence by id
   */
  read(id: SequenceId): Promise<Sequence>;

  /**
   * Replace the symbols (and optionally the metadata) of a sequence
   */
  update(id: SequenceId, symbols: string, metadata?: SequenceMetadata): Promise<void>;

  /**
   * Delete a sequence and purge its index traces
   */
  delete(id: SequenceId): Promise<void>;

  /**
   * Iterate all sequences in ascending id order; each iteration starts over
   */
  list(): AsyncIterable<Sequence>;

  /**
   * Read one page of sequences in ascending id order
   */
  listPage(request?: PageRequest): Promise<Page<Sequence>>;

  /**
   * Search sequences matching a pattern
   */
  search(pattern: string, mode: MatchMode, options?: SearchOptions): Promise<SearchResult[]>;

  /**
   * Evaluate a boolean expression of contains-terms (AND, OR, parentheses)
   */
  searchExpression(expression: string, options?: SearchOptions): Promise<SearchResult[]>;

  /**
   * Extract an excerpt of a sequence around the first occurrence of a pattern
   */
  snippet(id: SequenceId, pattern: string, options?: SnippetOptions): Promise<Snippet>;

  /**
   * Store and index statistics
   */
  stats(): Promise<StoreStats>;

  /**
   * Compare the index with the store without repairing anything
   */
  verify(): Promise<ConsistencyReport>;

  /**
   * Rebuild the index from the store's current contents
   */
  rebuild(): Promise<RebuildReport>;

  /**
   * Release resources held by the store
   */
  close(): Promise<void>;
}
