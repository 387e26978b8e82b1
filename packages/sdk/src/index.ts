/**
 * seqindex SDK
 *
 * A sequence store with exact, contains, fuzzy and prefix search backed by a
 * radix trie and a k-mer index that stays consistent with the store
 */

// Re-export types
export type {
  SequenceId,
  MatchMode,
  SequenceMetadata,
  Sequence,
  Query,
  SearchResult,
  SearchOptions,
  SnippetOptions,
  Snippet,
  PageRequest,
  Page,
  StoreStats,
  ConsistencyReport,
  RebuildReport,
  StoreOptions,
  EngineConfig,
  SequenceStore,
} from "./types.js";
export { MATCH_MODES } from "./types.js";

// Repositories
export type { SequenceRepository, JournalEntry, JournalOperation } from "./repository/types.js";
export { FileSequenceRepository } from "./repository/file-repository.js";
export type { FileRepositoryOptions } from "./repository/file-repository.js";
export { MemorySequenceRepository } from "./repository/memory-repository.js";

// Index and query building blocks
export { SequenceIndex, INDEX_SNAPSHOT_VERSION } from "./index/sequence-index.js";
export type { IndexSnapshot, IndexStats, IndexedRecord } from "./index/sequence-index.js";
export { RadixTrie } from "./index/radix-trie.js";
export { KmerIndex, kmersOf } from "./index/kmer-index.js";
export { createNormalizer, foldCase } from "./index/normalize.js";
export { boundedLevenshtein, levenshtein } from "./query/distance.js";
export { parseExpression, tokenize } from "./query/expression.js";
export { ReadWriteLock } from "./lock.js";

// Validation
export {
  validateSymbols,
  validatePattern,
  validateMode,
  validateMetadata,
  validateId,
  isMatchMode,
  MAX_K,
  MAX_NAME_LENGTH,
  MAX_PAGE_SIZE,
} from "./validation.js";

// Utilities
export { stableStringify } from "./format.js";
export { logger } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { MetricOperation, OperationMetrics } from "./observability/metrics.js";

// Errors
export {
  SeqIndexError,
  InvalidInputError,
  NotFoundError,
  IndexInconsistencyError,
  StorageFailureError,
} from "./errors.js";
export type { StorageOperation } from "./errors.js";

export { openStore } from "./store.js";
