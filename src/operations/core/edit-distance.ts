/**
 * Bounded Levenshtein distance
 *
 * Barcode/UMI matching only ever asks "is the distance at most k" for very
 * small k, so the dynamic program is restricted to a diagonal band of width
 * 2k+1 and abandons a comparison as soon as every cell in a row exceeds k.
 */

/**
 * Levenshtein distance between two strings, capped at `maxDistance + 1`
 *
 * Returns the exact distance when it is `<= maxDistance`, otherwise
 * `maxDistance + 1`.
 *
 * @example
 * ```typescript
 * boundedLevenshtein("ACGT", "AGT", 2); // 1
 * boundedLevenshtein("AAAA", "TTTT", 2); // 3 (capped)
 * ```
 */
export function boundedLevenshtein(a: string, b: string, maxDistance: number): number {
  if (maxDistance < 0) {
    throw new Error("Max distance must be non-negative");
  }
  const cap = maxDistance + 1;
  if (a === b) return 0;
  if (Math.abs(a.length - b.length) > maxDistance) return cap;
  if (a.length === 0) return Math.min(b.length, cap);
  if (b.length === 0) return Math.min(a.length, cap);

  // previous[j] is the distance between a[0..i) and b[0..j)
  let previous = new Array<number>(b.length + 1);
  let current = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j++) {
    previous[j] = j <= maxDistance ? j : cap;
  }

  for (let i = 1; i <= a.length; i++) {
    const from = Math.max(1, i - maxDistance);
    const to = Math.min(b.length, i + maxDistance);
    current.fill(cap);
    current[0] = i <= maxDistance ? i : cap;

    let rowMin = current[0] ?? cap;
    const charA = a.charCodeAt(i - 1);
    for (let j = from; j <= to; j++) {
      const substitution = (previous[j - 1] ?? cap) + (charA === b.charCodeAt(j - 1) ? 0 : 1);
      const deletion = (previous[j] ?? cap) + 1;
      const insertion = (current[j - 1] ?? cap) + 1;
      const value = Math.min(substitution, deletion, insertion, cap);
      current[j] = value;
      if (value < rowMin) rowMin = value;
    }

    if (rowMin >= cap) return cap;
    [previous, current] = [current, previous];
  }

  return Math.min(previous[b.length] ?? cap, cap);
}

/**
 * Test whether two strings are within `maxDistance` edits of each other
 */
export function withinEditDistance(a: string, b: string, maxDistance: number): boolean {
  return boundedLevenshtein(a, b, maxDistance) <= maxDistance;
}
