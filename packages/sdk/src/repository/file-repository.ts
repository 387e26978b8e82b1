/**
 * File-backed sequence repository
 *
 * Layout under the root directory:
 * - sequences/<id>.json      one canonical JSON record per sequence
 * - _meta/store.json         { version, nextId }
 * - _meta/journal.json       in-flight mutation, if any
 * - _indexes/sequences.json  index snapshot
 */

import * as path from "node:path";
import { StorageFailureError } from "../errors.js";
import { parseJsonText, stableStringify } from "../format.js";
import { atomicWrite, ensureDirectory, listFiles, readTextFile, removeFile } from "../io.js";
import { logger } from "../observability/logs.js";
import {
  STORE_META_VERSION,
  checkJournalEntry,
  checkSequenceRecord,
  checkStoreMeta,
  type SchemaCheck,
} from "../schema/records.js";
import type { Sequence, SequenceId } from "../types.js";
import type { JournalEntry, SequenceRepository } from "./types.js";

/** Key order for record files */
const RECORD_KEY_ORDER = ["id", "symbols", "metadata", "createdAt", "updatedAt"];

const RECORD_FILE = /^([1-9][0-9]*)\.json$/;

export interface FileRepositoryOptions {
  /** Number of spaces for JSON indentation (default: 2) */
  indent?: number;
}

export class FileSequenceRepository implements SequenceRepository {
  #root: string;
  #indent: number;
  #nextId = 1;

  constructor(root: string, options: FileRepositoryOptions = {}) {
    this.#root = path.resolve(root);
    this.#indent = options.indent ?? 2;
  }

  get location(): string {
    return this.#root;
  }

  get #sequencesDir(): string {
    return path.join(this.#root, "sequences");
  }

  get #metaPath(): string {
    return path.join(this.#root, "_meta", "store.json");
  }

  get #journalPath(): string {
    return path.join(this.#root, "_meta", "journal.json");
  }

  get #indexPath(): string {
    return path.join(this.#root, "_indexes", "sequences.json");
  }

  #recordPath(id: SequenceId): string {
    return path.join(this.#sequencesDir, `${id}.json`);
  }

  async open(): Promise<void> {
    await ensureDirectory(this.#sequencesDir);

    const ids = await this.ids();
    const highest = ids.length > 0 ? (ids[ids.length - 1] ?? 0) : 0;

    const text = await readTextFile(this.#metaPath);
    if (text === null) {
      this.#nextId = highest + 1;
      await this.#writeMeta();
      logger.info("repository.init", { target: this.#root, details: { nextId: this.#nextId } });
      return;
    }

    const meta = this.#parse(text, this.#metaPath, checkStoreMeta);
    this.#nextId = meta.nextId;

    // A counter behind the highest record would hand out an existing id
    if (this.#nextId <= highest) {
      logger.warn("repository.counter.behind", {
        target: this.#metaPath,
        details: { nextId: this.#nextId, highest },
      });
      this.#nextId = highest + 1;
      await this.#writeMeta();
    }
  }

  async allocateId(): Promise<SequenceId> {
    const id = this.#nextId;
    this.#nextId = id + 1;
    await this.#writeMeta();
    return id;
  }

  async get(id: SequenceId): Promise<Sequence | null> {
    const filePath = this.#recordPath(id);
    const text = await readTextFile(filePath);
    if (text === null) {
      return null;
    }

    const record = this.#parse(text, filePath, checkSequenceRecord);
    if (record.id !== id) {
      throw new StorageFailureError("parse", filePath, {
        cause: new Error(`record holds id ${record.id}`),
      });
    }
    return record;
  }

  async put(record: Sequence): Promise<void> {
    await atomicWrite(this.#recordPath(record.id), stableStringify(record, this.#indent, RECORD_KEY_ORDER));
  }

  async remove(id: SequenceId): Promise<boolean> {
    return removeFile(this.#recordPath(id));
  }

  async ids(): Promise<SequenceId[]> {
    const files = await listFiles(this.#sequencesDir, ".json");
    const ids: SequenceId[] = [];
    for (const file of files) {
      const match = RECORD_FILE.exec(file);
      if (match?.[1]) {
        ids.push(Number(match[1]));
      }
    }
    return ids.sort((a, b) => a - b);
  }

  async loadIndex(): Promise<string | null> {
    return readTextFile(this.#indexPath);
  }

  async saveIndex(content: string): Promise<void> {
    await atomicWrite(this.#indexPath, content);
  }

  async readJournal(): Promise<JournalEntry | null> {
    const text = await readTextFile(this.#journalPath);
    if (text === null) {
      return null;
    }
    return this.#parse(text, this.#journalPath, checkJournalEntry);
  }

  async writeJournal(entry: JournalEntry): Promise<void> {
    await atomicWrite(this.#journalPath, stableStringify(entry));
  }

  async clearJournal(): Promise<void> {
    await removeFile(this.#journalPath);
  }

  async close(): Promise<void> {
    // No handles are held between calls
  }

  async #writeMeta(): Promise<void> {
    await atomicWrite(this.#metaPath, stableStringify({ version: STORE_META_VERSION, nextId: this.#nextId }));
  }

  #parse<T>(text: string, filePath: string, check: (value: unknown) => SchemaCheck<T>): T {
    let value: unknown;
    try {
      value = parseJsonText(text, filePath);
    } catch (err) {
      throw new StorageFailureError("parse", filePath, { cause: err });
    }

    const result = check(value);
    if (!result.ok) {
      throw new StorageFailureError("parse", filePath, { cause: new Error(result.errors) });
    }
    return result.value;
  }
}
