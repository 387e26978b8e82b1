/**
 * Persistence boundary for sequences, the id counter, the mutation journal
 * and the index snapshot
 */

import type { Sequence, SequenceId } from "../types.js";

/**
 * Mutating operations recorded in the journal
 */
export type JournalOperation = "create" | "update" | "delete";

/**
 * Marker of an in-flight mutation
 */
export interface JournalEntry {
  op: JournalOperation;
  id: SequenceId;
  /** ISO-8601 timestamp */
  startedAt: string;
}

/**
 * Storage backend used by the store
 *
 * Implementations throw StorageFailureError for I/O failures and return
 * null/false for absent entries.
 */
export interface SequenceRepository {
  /** Human-readable location, used in logs and errors */
  readonly location: string;

  /**
   * Prepare the backend (create directories, load the id counter)
   */
  open(): Promise<void>;

  /**
   * Reserve the next id; the counter is persisted and never goes back
   */
  allocateId(): Promise<SequenceId>;

  get(id: SequenceId): Promise<Sequence | null>;

  /**
   * Insert or replace a record
   */
  put(record: Sequence): Promise<void>;

  /**
   * Remove a record
   * @returns false when the record did not exist
   */
  remove(id: SequenceId): Promise<boolean>;

  /**
   * All stored ids in ascending order
   */
  ids(): Promise<SequenceId[]>;

  /**
   * Persisted index snapshot text, or null when none was saved
   */
  loadIndex(): Promise<string | null>;

  saveIndex(content: string): Promise<void>;

  readJournal(): Promise<JournalEntry | null>;

  writeJournal(entry: JournalEntry): Promise<void>;

  clearJournal(): Promise<void>;

  close(): Promise<void>;
}
