/**
 * JSON Schemas (draft 2020-12) for persisted files, compiled once with Ajv
 */

import Ajv2020Module from "ajv/dist/2020.js";
import addFormatsModule from "ajv-formats";
import type { ErrorObject, ValidateFunction } from "ajv";
import type { Sequence } from "../types.js";
import type { JournalEntry } from "../repository/types.js";
import type { IndexSnapshot } from "../index/sequence-index.js";

// Both packages are CommonJS; under ESM the default import is module.exports
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

/**
 * Contents of _meta/store.json
 */
export interface StoreMeta {
  version: number;
  /** Next id to hand out */
  nextId: number;
}

export const STORE_META_VERSION = 1;

const idSchema = { type: "integer", minimum: 1 } as const;
const idListSchema = { type: "array", items: idSchema } as const;

export const sequenceRecordSchema = {
  $id: "seqindex://schemas/sequence.json",
  type: "object",
  required: ["id", "symbols", "metadata", "createdAt", "updatedAt"],
  additionalProperties: false,
  properties: {
    id: idSchema,
    symbols: { type: "string", minLength: 1, pattern: "^\\S+$" },
    metadata: {
      type: "object",
      additionalProperties: false,
      properties: {
        name: { type: "string", minLength: 1, maxLength: 200 },
        tags: {
          type: "array",
          uniqueItems: true,
          items: { type: "string", minLength: 1, pattern: "^\\S+$" },
        },
      },
    },
    createdAt: { type: "string", format: "date-time" },
    updatedAt: { type: "string", format: "date-time" },
  },
} as const;

export const storeMetaSchema = {
  $id: "seqindex://schemas/store-meta.json",
  type: "object",
  required: ["version", "nextId"],
  additionalProperties: false,
  properties: {
    version: { type: "integer", const: STORE_META_VERSION },
    nextId: idSchema,
  },
} as const;

export const journalEntrySchema = {
  $id: "seqindex://schemas/journal.json",
  type: "object",
  required: ["op", "id", "startedAt"],
  additionalProperties: false,
  properties: {
    op: { type: "string", enum: ["create", "update", "delete"] },
    id: idSchema,
    startedAt: { type: "string", format: "date-time" },
  },
} as const;

export const indexSnapshotSchema = {
  $id: "seqindex://schemas/index-snapshot.json",
  type: "object",
  required: ["version", "k", "caseSensitive", "exact", "kmers", "symbols"],
  additionalProperties: false,
  properties: {
    version: { type: "integer", minimum: 1 },
    k: { type: "integer", minimum: 1 },
    caseSensitive: { type: "boolean" },
    exact: { type: "object", additionalProperties: idListSchema },
    kmers: { type: "object", additionalProperties: idListSchema },
    symbols: {
      type: "object",
      propertyNames: { type: "string", pattern: "^[1-9][0-9]*$" },
      additionalProperties: { type: "string", minLength: 1 },
    },
  },
} as const;

const ajv = new Ajv2020({ strict: true, allErrors: true });
addFormats(ajv, ["date-time"]);

const validators = {
  record: ajv.compile<Sequence>(sequenceRecordSchema),
  meta: ajv.compile<StoreMeta>(storeMetaSchema),
  journal: ajv.compile<JournalEntry>(journalEntrySchema),
  snapshot: ajv.compile<IndexSnapshot>(indexSnapshotSchema),
};

/**
 * Result of validating a persisted document
 */
export type SchemaCheck<T> = { ok: true; value: T } | { ok: false; errors: string };

function check<T>(validate: ValidateFunction<T>, value: unknown): SchemaCheck<T> {
  if (validate(value)) {
    return { ok: true, value };
  }
  return { ok: false, errors: formatErrors(validate.errors) };
}

/**
 * Render Ajv errors as "pointer message" pairs
 */
export function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown schema violation";
  }
  return errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`).join("; ");
}

export function checkSequenceRecord(value: unknown): SchemaCheck<Sequence> {
  return check(validators.record, value);
}

export function checkStoreMeta(value: unknown): SchemaCheck<StoreMeta> {
  return check(validators.meta, value);
}

export function checkJournalEntry(value: unknown): SchemaCheck<JournalEntry> {
  return check(validators.journal, value);
}

export function checkIndexSnapshot(value: unknown): SchemaCheck<IndexSnapshot> {
  return check(validators.snapshot, value);
}
