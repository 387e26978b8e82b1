/**
 * Edit distance
 */

/**
 * Levenshtein distance with an upper bound
 *
 * @returns The distance when it is at most `maxDistance`, otherwise `maxDistance + 1`
 */
export function boundedLevenshtein(a: string, b: string, maxDistance: number): number {
  const over = maxDistance + 1;
  if (Math.abs(a.length - b.length) > maxDistance) {
    return over;
  }
  if (a === b) {
    return 0;
  }
  if (a.length === 0 || b.length === 0) {
    return Math.max(a.length, b.length);
  }

  let previous = new Array<number>(b.length + 1);
  let current = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j++) {
    previous[j] = j;
  }

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    let rowMin = i;
    const ca = a.charCodeAt(i - 1);

    for (let j = 1; j <= b.length; j++) {
      const cost = ca === b.charCodeAt(j - 1) ? 0 : 1;
      const value = Math.min(
        (previous[j] ?? over) + 1,
        (current[j - 1] ?? over) + 1,
        (previous[j - 1] ?? over) + cost
      );
      current[j] = value;
      if (value < rowMin) {
        rowMin = value;
      }
    }

    // Every later row is at least this row's minimum
    if (rowMin > maxDistance) {
      return over;
    }

    [previous, current] = [current, previous];
  }

  const distance = previous[b.length] ?? over;
  return distance > maxDistance ? over : distance;
}

/**
 * Unbounded Levenshtein distance
 */
export function levenshtein(a: string, b: string): number {
  return boundedLevenshtein(a, b, Math.max(a.length, b.length));
}
