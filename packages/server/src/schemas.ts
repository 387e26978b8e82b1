/**
 * Zod schemas for validating tool inputs and outputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { MAX_NAME_LENGTH, MAX_PAGE_SIZE, type MatchMode } from "@seqindex/sdk";

const noWhitespace = /^\S+$/;

// Longest sequence or pattern accepted over the wire
const MAX_SYMBOLS = 1_000_000;

// Longest boolean expression accepted
const MAX_EXPRESSION = 10_000;

export const SymbolsSchema = z
  .string()
  .min(1, "symbols must not be empty")
  .max(MAX_SYMBOLS, `symbols cannot exceed ${MAX_SYMBOLS} characters`)
  .regex(noWhitespace, "symbols must not contain whitespace");

export const PatternSchema = z
  .string()
  .min(1, "pattern must not be empty")
  .max(MAX_SYMBOLS, `pattern cannot exceed ${MAX_SYMBOLS} characters`)
  .regex(noWhitespace, "pattern must not contain whitespace");

export const IdSchema = z.number().int().positive();

export const MetadataSchema = z
  .object({
    name: z.string().min(1).max(MAX_NAME_LENGTH).optional(),
    tags: z
      .array(z.string().min(1).regex(noWhitespace, "tags must not contain whitespace"))
      .superRefine((tags, ctx) => {
        if (new Set(tags).size !== tags.length) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "tags must be distinct",
          });
        }
      })
      .optional(),
  })
  .strict();

export const ModeSchema = z.enum(["exact", "contains", "fuzzy", "prefix"]) satisfies z.ZodType<MatchMode>;

const ResultLimitSchema = z
  .number()
  .int()
  .min(0)
  .max(MAX_PAGE_SIZE, `limit cannot exceed ${MAX_PAGE_SIZE}`);

// Tool input schemas

export const CreateSequenceInputSchema = z.object({
  symbols: SymbolsSchema,
  metadata: MetadataSchema.optional(),
});

export const GetSequenceInputSchema = z.object({
  id: IdSchema,
});

export const UpdateSequenceInputSchema = z.object({
  id: IdSchema,
  symbols: SymbolsSchema,
  metadata: MetadataSchema.optional(),
});

export const DeleteSequenceInputSchema = z.object({
  id: IdSchema,
});

export const ListSequencesInputSchema = z.object({
  offset: z.number().int().min(0).default(0),
  limit: z
    .number()
    .int()
    .positive()
    .max(MAX_PAGE_SIZE, `limit cannot exceed ${MAX_PAGE_SIZE}`)
    .default(50),
});

export const SearchSequencesInputSchema = z.object({
  pattern: PatternSchema,
  mode: ModeSchema.default("contains"),
  limit: ResultLimitSchema.default(100),
  threshold: z.number().min(0).max(1).optional(),
});

export const SearchExpressionInputSchema = z.object({
  expression: z
    .string()
    .min(1, "expression must not be empty")
    .max(MAX_EXPRESSION, `expression cannot exceed ${MAX_EXPRESSION} characters`),
  limit: ResultLimitSchema.default(100),
});

export const SequenceSnippetInputSchema = z.object({
  id: IdSchema,
  pattern: PatternSchema,
  width: z.number().int().min(0).max(1000).optional(),
  open: z.string().max(16).optional(),
  close: z.string().max(16).optional(),
});

export const IndexStatsInputSchema = z.object({});

export const VerifyIndexInputSchema = z.object({});

export const RebuildIndexInputSchema = z.object({});

// Export types
export type Metadata = z.infer<typeof MetadataSchema>;
export type CreateSequenceInput = z.infer<typeof CreateSequenceInputSchema>;
export type GetSequenceInput = z.infer<typeof GetSequenceInputSchema>;
export type UpdateSequenceInput = z.infer<typeof UpdateSequenceInputSchema>;
export type DeleteSequenceInput = z.infer<typeof DeleteSequenceInputSchema>;
export type ListSequencesInput = z.infer<typeof ListSequencesInputSchema>;
export type SearchSequencesInput = z.infer<typeof SearchSequencesInputSchema>;
export type SearchExpressionInput = z.infer<typeof SearchExpressionInputSchema>;
export type SequenceSnippetInput = z.infer<typeof SequenceSnippetInputSchema>;
