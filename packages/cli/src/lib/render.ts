/**
 * Output rendering helpers
 */

import type { SearchResult, Sequence } from "@seqindex/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Render JSON followed by a newline
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function renderJson(data: unknown, options?: { raw?: boolean }): string {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  return `${json}\n`;
}

/**
 * Render lines (one per line)
 */
export function renderLines(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Render search hits as `id<TAB>score` lines
 */
export function renderResults(results: SearchResult[]): string {
  return renderLines(results.map((result) => `${result.id}\t${result.score.toFixed(3)}`));
}

/**
 * Render sequences as `id<TAB>name<TAB>symbols` lines
 */
export function renderSequences(sequences: Sequence[]): string {
  return renderLines(
    sequences.map((sequence) => `${sequence.id}\t${sequence.metadata.name ?? "-"}\t${sequence.symbols}`)
  );
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
