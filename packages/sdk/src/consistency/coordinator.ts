/**
 * Keeps the search index consistent with the repository
 *
 * - Mutations run under the write lock: journal, repository write, index
 *   update, journal cleared. Only then does the mutation return.
 * - The snapshot is written by every rebuild and flushed at close when
 *   mutations happened since the last write. A failed flush is logged; the
 *   next open finds the snapshot stale and rebuilds.
 * - A journal entry found at open marks an interrupted mutation and forces a
 *   rebuild before anything is served.
 * - A persisted snapshot is trusted only when it validates, was built with the
 *   same settings and agrees with the stored records.
 * - A failed incremental update, or a query that finds a posting without
 *   symbols, triggers a rebuild. Rebuilds are retried once, then escalate to
 *   StorageFailureError.
 */

import { performance } from "node:perf_hooks";
import { IndexInconsistencyError, StorageFailureError } from "../errors.js";
import { parseJsonText } from "../format.js";
import { SequenceIndex } from "../index/sequence-index.js";
import { ReadWriteLock } from "../lock.js";
import { logger } from "../observability/logs.js";
import { metrics } from "../observability/metrics.js";
import type { JournalEntry, SequenceRepository } from "../repository/types.js";
import { checkIndexSnapshot } from "../schema/records.js";
import type { ConsistencyReport, EngineConfig, RebuildReport, Sequence } from "../types.js";

/** Attempts made by one rebuild before escalating */
const REBUILD_ATTEMPTS = 2;

export class ConsistencyCoordinator {
  #repository: SequenceRepository;
  #config: EngineConfig;
  #lock = new ReadWriteLock();
  #index: SequenceIndex;
  #dirty = false;
  /** Mutations applied since the snapshot was last written */
  #unsaved = 0;

  constructor(repository: SequenceRepository, config: EngineConfig) {
    this.#repository = repository;
    this.#config = config;
    this.#index = this.#emptyIndex();
  }

  get repository(): SequenceRepository {
    return this.#repository;
  }

  /** Whether the index is known to be out of date */
  get dirty(): boolean {
    return this.#dirty;
  }

  /**
   * Open the repository and bring the index up to date
   */
  async open(): Promise<void> {
    await this.#lock.withWrite(async () => {
      await this.#repository.open();

      const journal = await this.#repository.readJournal();
      if (journal) {
        logger.warn("index.journal.pending", {
          target: this.#repository.location,
          id: journal.id,
          message: "interrupted mutation found, rebuilding",
          details: { op: journal.op, startedAt: journal.startedAt },
        });
        metrics.recordRecovery();
        await this.#rebuild();
        await this.#repository.clearJournal();
        return;
      }

      const records = await this.#loadRecords();
      const restored = await this.#restoreSnapshot(records);
      if (restored) {
        this.#index = restored;
        logger.debug("index.snapshot.loaded", {
          target: this.#repository.location,
          details: { sequences: restored.size },
        });
        return;
      }

      await this.#rebuild();
    });
  }

  /**
   * Run a read-only operation against the index under the read lock
   *
   * An IndexInconsistencyError triggers a rebuild and one retry.
   */
  async read<T>(fn: (index: SequenceIndex) => T | Promise<T>): Promise<T> {
    if (this.#dirty) {
      await this.#lock.withWrite(() => this.#rebuildIfDirty());
    }

    try {
      return await this.#lock.withRead(() => fn(this.#index));
    } catch (err) {
      if (!(err instanceof IndexInconsistencyError)) {
        throw err;
      }

      logger.warn("index.inconsistency", {
        target: this.#repository.location,
        message: err.reason,
      });
      metrics.recordRecovery();
      this.#dirty = true;
      await this.#lock.withWrite(() => this.#rebuildIfDirty());
      return this.#lock.withRead(() => fn(this.#index));
    }
  }

  /**
   * Run an operation under the write lock
   */
  async write<T>(fn: () => Promise<T>): Promise<T> {
    return this.#lock.withWrite(async () => {
      await this.#rebuildIfDirty();
      return fn();
    });
  }

  /**
   * Apply one mutation; must be called from inside write()
   * @param entry - Journal entry describing the mutation
   * @param persist - Repository write
   * @param apply - Incremental index update
   */
  async mutate(
    entry: JournalEntry,
    persist: () => Promise<void>,
    apply: (index: SequenceIndex) => void
  ): Promise<void> {
    await this.#repository.writeJournal(entry);

    try {
      await persist();
    } catch (err) {
      logger.error("repository.write.failed", {
        target: this.#repository.location,
        id: entry.id,
        details: { op: entry.op, error: String(err) },
      });
      this.#dirty = true;
      await this.#recoverAfterFailedWrite();
      throw err;
    }

    // The mutation is committed from here on; later failures are logged and
    // leave the journal in place for the next open
    try {
      try {
        apply(this.#index);
        this.#unsaved++;
      } catch (err) {
        logger.warn("index.update.failed", {
          target: this.#repository.location,
          id: entry.id,
          message: "incremental update failed, rebuilding",
          details: { op: entry.op, error: String(err) },
        });
        metrics.recordRecovery();
        this.#dirty = true;
        await this.#rebuild();
      }
      await this.#repository.clearJournal();
    } catch (err) {
      logger.error("index.settle.failed", {
        target: this.#repository.location,
        id: entry.id,
        details: { op: entry.op, dirty: this.#dirty, error: String(err) },
      });
    }
  }

  /**
   * Compare the index with the stored records without repairing
   */
  async verify(): Promise<ConsistencyReport> {
    return this.#lock.withRead(async () => {
      const records = await this.#loadRecords();
      return this.#index.diff(records);
    });
  }

  /**
   * Rebuild the index from the stored records
   */
  async rebuild(): Promise<RebuildReport> {
    return this.#lock.withWrite(() => this.#rebuild());
  }

  async close(): Promise<void> {
    await this.#lock.withWrite(async () => {
      await this.#flushSnapshot();
      await this.#repository.close();
    });
  }

  #emptyIndex(): SequenceIndex {
    return new SequenceIndex({ k: this.#config.k, caseSensitive: this.#config.caseSensitive });
  }

  async #rebuildIfDirty(): Promise<void> {
    if (this.#dirty) {
      await this.#rebuild();
    }
  }

  async #recoverAfterFailedWrite(): Promise<void> {
    try {
      await this.#rebuild();
      await this.#repository.clearJournal();
    } catch (err) {
      // The index stays dirty and the journal stays in place for the next open
      logger.error("index.recovery.failed", {
        target: this.#repository.location,
        details: { error: String(err) },
      });
    }
  }

  async #loadRecords(): Promise<Sequence[]> {
    const records: Sequence[] = [];
    for (const id of await this.#repository.ids()) {
      const record = await this.#repository.get(id);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async #restoreSnapshot(records: Sequence[]): Promise<SequenceIndex | null> {
    if (!this.#config.persistIndex) {
      return null;
    }

    const target = this.#repository.location;
    const text = await this.#repository.loadIndex();
    if (text === null) {
      logger.info("index.snapshot.absent", { target });
      return null;
    }

    let value: unknown;
    try {
      value = parseJsonText(text, "index snapshot");
    } catch (err) {
      logger.warn("index.snapshot.invalid", { target, message: String(err) });
      return null;
    }

    const checked = checkIndexSnapshot(value);
    if (!checked.ok) {
      logger.warn("index.snapshot.invalid", { target, message: checked.errors });
      return null;
    }

    const snapshot = checked.value;
    if (snapshot.k !== this.#config.k || snapshot.caseSensitive !== this.#config.caseSensitive) {
      logger.info("index.snapshot.settings", {
        target,
        message: "snapshot was built with other settings",
        details: { k: snapshot.k, caseSensitive: snapshot.caseSensitive },
      });
      return null;
    }

    let index: SequenceIndex;
    try {
      index = SequenceIndex.fromSnapshot(snapshot);
    } catch (err) {
      if (!(err instanceof IndexInconsistencyError)) {
        throw err;
      }
      logger.warn("index.snapshot.invalid", { target, message: err.reason });
      return null;
    }

    const report = index.diff(records);
    if (!report.consistent) {
      logger.warn("index.snapshot.stale", {
        target,
        details: { missing: report.missing, stale: report.stale, mismatched: report.mismatched },
      });
      return null;
    }

    return index;
  }

  async #rebuild(): Promise<RebuildReport> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= REBUILD_ATTEMPTS; attempt++) {
      const start = performance.now();
      try {
        const records = await this.#loadRecords();
        const index = this.#emptyIndex();
        index.rebuild(records);
        this.#index = index;
        this.#dirty = false;
        await this.#persistSnapshot();

        const durationMs = performance.now() - start;
        const stats = index.stats();
        metrics.record("rebuild", durationMs);
        logger.info("index.rebuild", {
          target: this.#repository.location,
          details: { sequences: stats.sequences, kmers: stats.kmers, attempt },
        });

        return {
          sequences: stats.sequences,
          kmers: stats.kmers,
          distinctContents: stats.distinctContents,
          durationMs,
          attempts: attempt,
        };
      } catch (err) {
        lastError = err;
        this.#dirty = true;
        metrics.record("rebuild", performance.now() - start, false);
        logger.warn("index.rebuild.failed", {
          target: this.#repository.location,
          details: { attempt, error: String(err) },
        });
      }
    }

    throw new StorageFailureError("rebuild", this.#repository.location, { cause: lastError });
  }

  async #persistSnapshot(): Promise<void> {
    if (this.#config.persistIndex) {
      await this.#repository.saveIndex(this.#index.serialize());
    }
    this.#unsaved = 0;
  }

  async #flushSnapshot(): Promise<void> {
    if (this.#unsaved === 0 || this.#dirty) {
      return;
    }

    try {
      await this.#persistSnapshot();
    } catch (err) {
      logger.warn("index.snapshot.save.failed", {
        target: this.#repository.location,
        message: "snapshot left stale, the next open rebuilds",
        details: { unsaved: this.#unsaved, error: String(err) },
      });
    }
  }
}
