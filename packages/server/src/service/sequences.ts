/**
 * Sequence store service adapter
 * Wraps the @seqindex/sdk store with the limits the server enforces
 */

import { openStore } from "@seqindex/sdk";
import type {
  ConsistencyReport,
  MatchMode,
  Page,
  RebuildReport,
  SearchResult,
  Sequence,
  SequenceId,
  SequenceMetadata,
  SequenceStore,
  Snippet,
  SnippetOptions,
  StoreStats,
} from "@seqindex/sdk";
import { logger } from "../observability/logger.js";

// Maximum number of results returned by one search call
export const MAX_SEARCH_RESULTS = 1000;

export class SequenceService {
  #store: SequenceStore;

  constructor(store: SequenceStore) {
    this.#store = store;
  }

  /**
   * Open a file-backed service rooted at `dataRoot`
   */
  static open(dataRoot: string): SequenceService {
    logger.info("service.init", { data_root: dataRoot });
    return new SequenceService(openStore({ root: dataRoot }));
  }

  async create(symbols: string, metadata?: SequenceMetadata): Promise<SequenceId> {
    return this.#store.create(symbols, metadata);
  }

  async get(id: SequenceId): Promise<Sequence> {
    return this.#store.read(id);
  }

  /**
   * Replace symbols; metadata is kept when omitted
   */
  async update(id: SequenceId, symbols: string, metadata?: SequenceMetadata): Promise<Sequence> {
    await this.#store.update(id, symbols, metadata);
    return this.#store.read(id);
  }

  async remove(id: SequenceId): Promise<void> {
    await this.#store.delete(id);
  }

  async list(offset: number, limit: number): Promise<Page<Sequence>> {
    return this.#store.listPage({ offset, limit });
  }

  /**
   * Search, capping the result count at MAX_SEARCH_RESULTS
   */
  async search(
    pattern: string,
    mode: MatchMode,
    options: { limit?: number; threshold?: number }
  ): Promise<SearchResult[]> {
    const limit = Math.min(options.limit ?? MAX_SEARCH_RESULTS, MAX_SEARCH_RESULTS);
    return this.#store.search(pattern, mode, { limit, threshold: options.threshold });
  }

  async searchExpression(expression: string, limit?: number): Promise<SearchResult[]> {
    return this.#store.searchExpression(expression, {
      limit: Math.min(limit ?? MAX_SEARCH_RESULTS, MAX_SEARCH_RESULTS),
    });
  }

  async snippet(id: SequenceId, pattern: string, options: SnippetOptions): Promise<Snippet> {
    return this.#store.snippet(id, pattern, options);
  }

  async stats(): Promise<StoreStats> {
    return this.#store.stats();
  }

  async verify(): Promise<ConsistencyReport> {
    return this.#store.verify();
  }

  async rebuild(): Promise<RebuildReport> {
    const report = await this.#store.rebuild();
    logger.info("service.rebuild", { sequences: report.sequences, duration_ms: report.durationMs });
    return report;
  }

  async close(): Promise<void> {
    await this.#store.close();
  }
}
