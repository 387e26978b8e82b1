/**
 * Deterministic JSON formatting utilities
 */

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering: "alpha" or explicit array (default: "alpha")
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(
  obj: unknown,
  indent = 2,
  order: "alpha" | string[] = "alpha"
): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha") {
      return a < b ? -1 : a > b ? 1 : 0;
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    if (aIndex !== -1) return -1;
    if (bIndex !== -1) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  };

  const normalize = (value: unknown): unknown => {
    if (value && typeof value === "object") {
      if (seen.has(value)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(value);

      try {
        // Arrays keep their order; only their contents are normalized
        if (Array.isArray(value)) {
          return value.map(normalize);
        }

        const entries: Array<[string, unknown]> = Object.entries(value);
        entries.sort(([a], [b]) => sorter(a, b));
        const out: Record<string, unknown> = {};
        for (const [k, v] of entries) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(value);
      }
    }
    return value;
  };

  return JSON.stringify(normalize(obj), null, indent) + "\n";
}

/**
 * Parse JSON text, reporting the source in the error message
 * @throws SyntaxError naming the source on malformed input
 */
export function parseJsonText(content: string, source: string): unknown {
  try {
    const cleaned = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new SyntaxError(`Invalid JSON in ${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
