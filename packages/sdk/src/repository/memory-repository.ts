/**
 * In-memory sequence repository
 *
 * Records are copied on the way in and out, so callers never share state
 * with the repository.
 */

import type { Sequence, SequenceId } from "../types.js";
import type { JournalEntry, SequenceRepository } from "./types.js";

export class MemorySequenceRepository implements SequenceRepository {
  readonly location = "memory";

  #records = new Map<SequenceId, Sequence>();
  #nextId = 1;
  #index: string | null = null;
  #journal: JournalEntry | null = null;

  async open(): Promise<void> {
    for (const id of this.#records.keys()) {
      this.#nextId = Math.max(this.#nextId, id + 1);
    }
  }

  async allocateId(): Promise<SequenceId> {
    const id = this.#nextId;
    this.#nextId = id + 1;
    return id;
  }

  async get(id: SequenceId): Promise<Sequence | null> {
    const record = this.#records.get(id);
    return record ? structuredClone(record) : null;
  }

  async put(record: Sequence): Promise<void> {
    this.#records.set(record.id, structuredClone(record));
  }

  async remove(id: SequenceId): Promise<boolean> {
    return this.#records.delete(id);
  }

  async ids(): Promise<SequenceId[]> {
    return [...this.#records.keys()].sort((a, b) => a - b);
  }

  async loadIndex(): Promise<string | null> {
    return this.#index;
  }

  async saveIndex(content: string): Promise<void> {
    this.#index = content;
  }

  async readJournal(): Promise<JournalEntry | null> {
    return this.#journal ? { ...this.#journal } : null;
  }

  async writeJournal(entry: JournalEntry): Promise<void> {
    this.#journal = { ...entry };
  }

  async clearJournal(): Promise<void> {
    this.#journal = null;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
