/**
 * Query execution against a sequence index
 *
 * Results are ordered by descending score, ties by ascending id.
 */

import type { SequenceIndex } from "../index/sequence-index.js";
import { kmersOf } from "../index/kmer-index.js";
import type { MatchMode, SearchResult, SequenceId } from "../types.js";
import { boundedLevenshtein } from "./distance.js";
import { evaluateExpression, type ParsedExpression } from "./expression.js";
import { findOccurrences } from "./snippet.js";

/** Tolerance for comparing floating-point scores against thresholds */
const SCORE_EPSILON = 1e-9;

export interface EngineSearchOptions {
  /** Maximum results after ranking */
  limit?: number;
  /** Minimum fuzzy score */
  threshold: number;
}

export interface SearchOutcome {
  results: SearchResult[];
  /** Ids examined after candidate filtering */
  candidates: number;
}

/**
 * Sort by descending score then ascending id, and apply the limit
 */
export function rankResults(results: SearchResult[], limit?: number): SearchResult[] {
  const ranked = [...results].sort((a, b) => b.score - a.score || a.id - b.id);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

/**
 * Ids containing a normalized pattern
 *
 * Patterns of at least k symbols intersect k-mer postings (smallest list
 * first) and verify each candidate; shorter patterns scan every id.
 */
export function containsIds(index: SequenceIndex, pattern: string): { ids: SequenceId[]; candidates: number } {
  let candidates: Iterable<SequenceId>;
  let examined = 0;

  if (pattern.length >= index.k) {
    const postings = [...kmersOf(pattern, index.k)]
      .map((token) => index.postings(token))
      .sort((a, b) => a.size - b.size);

    const [smallest, ...rest] = postings;
    if (!smallest || smallest.size === 0) {
      return { ids: [], candidates: 0 };
    }
    candidates = [...smallest].filter((id) => rest.every((ids) => ids.has(id)));
  } else {
    candidates = index.ids();
  }

  const ids: SequenceId[] = [];
  for (const id of candidates) {
    examined++;
    if (index.symbolsOf(id).includes(pattern)) {
      ids.push(id);
    }
  }

  return { ids: ids.sort((a, b) => a - b), candidates: examined };
}

function fuzzyCandidates(index: SequenceIndex, pattern: string): SequenceId[] {
  if (pattern.length < index.k) {
    return index.ids();
  }

  const ids = new Set<SequenceId>(index.shortIds());
  for (const token of kmersOf(pattern, index.k)) {
    for (const id of index.postings(token)) {
      ids.add(id);
    }
  }
  return [...ids];
}

/**
 * Run a single-pattern search
 * @param pattern - Validated, not yet normalized pattern
 */
export function runSearch(
  index: SequenceIndex,
  pattern: string,
  mode: MatchMode,
  options: EngineSearchOptions
): SearchOutcome {
  const normalized = index.normalize(pattern);
  let results: SearchResult[] = [];
  let candidates = 0;

  switch (mode) {
    case "exact": {
      const ids = index.exactIds(normalized);
      // Throws for a posting whose id has no symbols
      ids.forEach((id) => index.symbolsOf(id));
      candidates = ids.length;
      results = ids.map((id) => ({ id, score: 1 }));
      break;
    }
    case "contains": {
      const found = containsIds(index, normalized);
      candidates = found.candidates;
      results = found.ids.map((id) => ({ id, score: 1 }));
      break;
    }
    case "fuzzy": {
      const ids = fuzzyCandidates(index, normalized);
      candidates = ids.length;
      for (const id of ids) {
        const content = index.symbolsOf(id);
        const longest = Math.max(normalized.length, content.length);
        const budget = Math.floor((1 - options.threshold) * longest + SCORE_EPSILON);
        const distance = boundedLevenshtein(normalized, content, budget);
        if (distance > budget) continue;

        const score = 1 - distance / longest;
        if (score + SCORE_EPSILON >= options.threshold) {
          results.push({ id, score });
        }
      }
      break;
    }
    case "prefix": {
      const entries = index.prefixEntries(normalized);
      for (const [content, ids] of entries) {
        for (const id of ids) {
          candidates++;
          index.symbolsOf(id);
          results.push({ id, score: normalized.length / content.length });
        }
      }
      break;
    }
  }

  return { results: rankResults(results, options.limit), candidates };
}

/**
 * Standard score of one id's occurrence count for a term
 *
 * Mean and population deviation are taken over the ids containing the term;
 * an id without the term counts 0. A term with no spread scores 0.
 */
export function termZScore(counts: ReadonlyMap<SequenceId, number>, id: SequenceId): number {
  if (counts.size === 0) {
    return 0;
  }

  const values = [...counts.values()];
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  if (variance === 0) {
    return 0;
  }

  return ((counts.get(id) ?? 0) - mean) / Math.sqrt(variance);
}

/**
 * Evaluate a boolean expression of contains-terms
 *
 * A matching id scores the mean of its non-zero term z-scores (0 when all are
 * zero), computed from non-overlapping occurrence counts of each distinct term.
 */
export function runExpression(
  index: SequenceIndex,
  parsed: ParsedExpression,
  limit?: number
): SearchOutcome {
  const counts = new Map<string, Map<SequenceId, number>>();
  let candidates = 0;

  for (const term of parsed.terms) {
    const normalized = index.normalize(term);
    if (!counts.has(normalized)) {
      const found = containsIds(index, normalized);
      candidates += found.candidates;
      counts.set(
        normalized,
        new Map(found.ids.map((id) => [id, findOccurrences(index.symbolsOf(id), normalized).length]))
      );
    }
  }

  const lookup = (term: string): ReadonlySet<SequenceId> =>
    new Set(counts.get(index.normalize(term))?.keys());
  const ids = evaluateExpression(parsed, lookup);

  const results: SearchResult[] = [];
  for (const id of ids) {
    const scores = [...counts.values()].map((termCounts) => termZScore(termCounts, id)).filter((z) => z !== 0);
    const score = scores.length === 0 ? 0 : scores.reduce((sum, z) => sum + z, 0) / scores.length;
    results.push({ id, score });
  }

  return { results: rankResults(results, limit), candidates };
}
