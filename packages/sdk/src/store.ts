/**
 * Sequence store implementation
 */

import { performance } from "node:perf_hooks";
import { ConsistencyCoordinator } from "./consistency/coordinator.js";
import { InvalidInputError, NotFoundError } from "./errors.js";
import { createNormalizer } from "./index/normalize.js";
import { logger } from "./observability/logs.js";
import { metrics, type MetricOperation } from "./observability/metrics.js";
import { runExpression, runSearch } from "./query/engine.js";
import { parseExpression } from "./query/expression.js";
import { buildSnippet } from "./query/snippet.js";
import { FileSequenceRepository } from "./repository/file-repository.js";
import type { SequenceRepository } from "./repository/types.js";
import type {
  ConsistencyReport,
  EngineConfig,
  MatchMode,
  Page,
  PageRequest,
  RebuildReport,
  SearchOptions,
  SearchResult,
  Sequence,
  SequenceId,
  SequenceMetadata,
  SequenceStore,
  Snippet,
  SnippetOptions,
  StoreOptions,
  StoreStats,
} from "./types.js";
import {
  resolveEngineConfig,
  resolvePageRequest,
  resolveSnippetOptions,
  validateAlphabet,
  validateId,
  validateMetadata,
  validateMode,
  validatePattern,
  validateSearchOptions,
  validateSymbols,
} from "./validation.js";

/**
 * Sequence store backed by a repository, with an index kept consistent on
 * every mutation
 *
 * The repository is opened and the index loaded or rebuilt on first use.
 */
class SeqIndexStore implements SequenceStore {
  #config: EngineConfig;
  #repository: SequenceRepository;
  #coordinator: ConsistencyCoordinator;
  #alphabet: string | null;
  #opening: Promise<void> | null = null;

  constructor(options: StoreOptions) {
    this.#config = resolveEngineConfig(options);

    if (options.repository) {
      this.#repository = options.repository;
    } else if (options.root) {
      this.#repository = new FileSequenceRepository(options.root, { indent: options.indent ?? 2 });
    } else {
      throw new InvalidInputError("root", "either root or repository must be provided");
    }

    this.#coordinator = new ConsistencyCoordinator(this.#repository, this.#config);
    this.#alphabet =
      this.#config.alphabet === null ? null : createNormalizer(this.#config.caseSensitive)(this.#config.alphabet);
  }

  get config(): EngineConfig {
    return { ...this.#config };
  }

  /**
   * Store a new sequence
   *
   * @throws {InvalidInputError} If symbols or metadata are invalid
   * @throws {StorageFailureError} If the repository write fails
   */
  async create(symbols: string, metadata?: SequenceMetadata): Promise<SequenceId> {
    return this.#timed("create", async () => {
      this.#checkSymbols(symbols);
      const meta = validateMetadata(metadata);
      await this.#ensureOpen();

      return this.#coordinator.write(async () => {
        const id = await this.#repository.allocateId();
        const now = new Date().toISOString();
        const record: Sequence = { id, symbols, metadata: meta, createdAt: now, updatedAt: now };

        await this.#coordinator.mutate(
          { op: "create", id, startedAt: now },
          () => this.#repository.put(record),
          (index) => index.onCreate(id, symbols)
        );

        logger.debug("sequence.create", { id, details: { length: symbols.length } });
        return id;
      });
    });
  }

  /**
   * Read a sequence by id
   *
   * @throws {NotFoundError} If no sequence has this id
   */
  async read(id: SequenceId): Promise<Sequence> {
    return this.#timed("read", async () => {
      validateId(id);
      await this.#ensureOpen();
      return this.#coordinator.read(() => this.#require(id));
    });
  }

  /**
   * Replace the symbols of a sequence; metadata is replaced only when given
   */
  async update(id: SequenceId, symbols: string, metadata?: SequenceMetadata): Promise<void> {
    await this.#timed("update", async () => {
      validateId(id);
      this.#checkSymbols(symbols);
      const meta = metadata === undefined ? undefined : validateMetadata(metadata);
      await this.#ensureOpen();

      await this.#coordinator.write(async () => {
        const existing = await this.#require(id);
        const now = new Date().toISOString();
        const record: Sequence = {
          ...existing,
          symbols,
          metadata: meta ?? existing.metadata,
          updatedAt: now,
        };

        await this.#coordinator.mutate(
          { op: "update", id, startedAt: now },
          () => this.#repository.put(record),
          (index) => index.onUpdate(id, existing.symbols, symbols)
        );

        logger.debug("sequence.update", { id, details: { length: symbols.length } });
      });
    });
  }

  /**
   * Delete a sequence and every index trace of it
   */
  async delete(id: SequenceId): Promise<void> {
    await this.#timed("delete", async () => {
      validateId(id);
      await this.#ensureOpen();

      await this.#coordinator.write(async () => {
        const existing = await this.#require(id);

        await this.#coordinator.mutate(
          { op: "delete", id, startedAt: new Date().toISOString() },
          async () => {
            await this.#repository.remove(id);
          },
          (index) => index.onDelete(id, existing.symbols)
        );

        logger.debug("sequence.delete", { id });
      });
    });
  }

  /**
   * Iterate sequences in ascending id order
   *
   * Each iteration reads a fresh id list; sequences deleted meanwhile are skipped.
   */
  list(): AsyncIterable<Sequence> {
    return {
      [Symbol.asyncIterator]: () => this.#iterate(),
    };
  }

  async listPage(request?: PageRequest): Promise<Page<Sequence>> {
    return this.#timed("list", async () => {
      const { offset, limit } = resolvePageRequest(request);
      await this.#ensureOpen();

      return this.#coordinator.read(async () => {
        const ids = await this.#repository.ids();
        const items: Sequence[] = [];
        for (const id of ids.slice(offset, offset + limit)) {
          const record = await this.#repository.get(id);
          if (record) {
            items.push(record);
          }
        }

        const next = offset + limit;
        return { items, total: ids.length, nextOffset: next < ids.length ? next : null };
      });
    });
  }

  /**
   * Search sequences
   *
   * @example
   * ```typescript
   * const hits = await store.search('ACG', 'contains', { limit: 10 });
   * ```
   */
  async search(pattern: string, mode: MatchMode, options?: SearchOptions): Promise<SearchResult[]> {
    validateMode(mode);
    const operation: MetricOperation = `search.${mode}`;

    return this.#timed(operation, async () => {
      validatePattern(pattern);
      const opts = validateSearchOptions(options);
      const threshold = opts.threshold ?? this.#config.fuzzyThreshold;
      await this.#ensureOpen();

      const outcome = await this.#coordinator.read((index) =>
        runSearch(index, pattern, mode, { limit: opts.limit, threshold })
      );
      metrics.recordSearch(operation, outcome.candidates, outcome.results.length);
      return outcome.results;
    });
  }

  /**
   * Search with a boolean expression such as `ACG AND (TTA OR "GGC")`
   */
  async searchExpression(expression: string, options?: SearchOptions): Promise<SearchResult[]> {
    return this.#timed("search.expression", async () => {
      if (typeof expression !== "string") {
        throw new InvalidInputError("expression", "must be a string");
      }
      const parsed = parseExpression(expression);
      const opts = validateSearchOptions(options);
      await this.#ensureOpen();

      const outcome = await this.#coordinator.read((index) => runExpression(index, parsed, opts.limit));
      metrics.recordSearch("search.expression", outcome.candidates, outcome.results.length);
      return outcome.results;
    });
  }

  async snippet(id: SequenceId, pattern: string, options?: SnippetOptions): Promise<Snippet> {
    return this.#timed("snippet", async () => {
      validateId(id);
      validatePattern(pattern);
      const opts = resolveSnippetOptions(options);
      await this.#ensureOpen();

      return this.#coordinator.read(async (index) => {
        const record = await this.#require(id);
        return buildSnippet(id, record.symbols, index.normalize(record.symbols), index.normalize(pattern), opts);
      });
    });
  }

  async stats(): Promise<StoreStats> {
    await this.#ensureOpen();

    return this.#coordinator.read((index) => {
      const stats = index.stats();
      return {
        sequences: stats.sequences,
        totalSymbols: stats.totalSymbols,
        averageLength: stats.sequences === 0 ? 0 : stats.totalSymbols / stats.sequences,
        distinctContents: stats.distinctContents,
        kmers: stats.kmers,
        k: index.k,
        caseSensitive: index.caseSensitive,
      };
    });
  }

  async verify(): Promise<ConsistencyReport> {
    return this.#timed("verify", async () => {
      await this.#ensureOpen();
      return this.#coordinator.verify();
    });
  }

  async rebuild(): Promise<RebuildReport> {
    await this.#ensureOpen();
    return this.#coordinator.rebuild();
  }

  async close(): Promise<void> {
    if (this.#opening) {
      await this.#opening;
      await this.#coordinator.close();
      this.#opening = null;
    }
  }

  async *#iterate(): AsyncGenerator<Sequence> {
    await this.#ensureOpen();
    const ids = await this.#coordinator.read(() => this.#repository.ids());

    for (const id of ids) {
      const record = await this.#coordinator.read(() => this.#repository.get(id));
      if (record) {
        yield record;
      }
    }
  }

  async #ensureOpen(): Promise<void> {
    if (!this.#opening) {
      this.#opening = this.#coordinator.open().catch((err: unknown) => {
        this.#opening = null;
        throw err;
      });
    }
    await this.#opening;
  }

  async #require(id: SequenceId): Promise<Sequence> {
    const record = await this.#repository.get(id);
    if (!record) {
      throw new NotFoundError(id);
    }
    return record;
  }

  #checkSymbols(symbols: string): void {
    validateSymbols(symbols);
    if (this.#alphabet !== null) {
      validateAlphabet(createNormalizer(this.#config.caseSensitive)(symbols), this.#alphabet);
    }
  }

  async #timed<T>(operation: MetricOperation, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      metrics.record(operation, performance.now() - start);
      return result;
    } catch (err) {
      metrics.record(operation, performance.now() - start, false);
      throw err;
    }
  }
}

/**
 * Open a sequence store
 *
 * @param options.root - Directory of a file-backed store (e.g., './data')
 * @param options.repository - Custom repository, used instead of `root`
 * @param options.k - k-mer length (default: 3)
 * @param options.fuzzyThreshold - Minimum fuzzy score (default: 0.5)
 * @param options.caseSensitive - Preserve case when normalizing (default: false)
 * @returns Store instance; storage is opened on first use
 * @throws {InvalidInputError} If the options are invalid
 *
 * @example
 * ```typescript
 * const store = openStore({ root: './data', k: 4 });
 * const id = await store.create('ACGTAC', { name: 'probe-1' });
 * const hits = await store.search('ACGT', 'contains');
 * ```
 */
export function openStore(options: StoreOptions): SequenceStore {
  return new SeqIndexStore(options);
}
