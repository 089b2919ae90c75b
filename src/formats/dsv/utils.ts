/**
 * DSV text utilities
 */

import { DEFAULT_DELIMITERS, MAX_DETECTION_LINES } from "./constants";

/**
 * Remove a leading byte-order mark
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Normalize CRLF and CR line endings to LF
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Pick the delimiter that splits the sampled lines most consistently
 *
 * Each candidate is scored by how many lines agree on its field count,
 * weighted by the average count and penalized by variance. Returns `null`
 * when no candidate appears at all.
 *
 * @example
 * ```typescript
 * detectDelimiter(["BC\tUMI", "AAAC\tACGT;TTGA"]); // "\t"
 * ```
 */
export function detectDelimiter(
  lines: readonly string[],
  candidates: readonly string[] = [DEFAULT_DELIMITERS.tsv, DEFAULT_DELIMITERS.csv]
): string | null {
  const sample = lines
    .filter((line) => line.trim() !== "")
    .slice(0, MAX_DETECTION_LINES);

  let bestDelimiter: string | null = null;
  let bestScore = 0;

  for (const delimiter of candidates) {
    const counts = sample
      .map((line) => line.split(delimiter).length - 1)
      .filter((count) => count > 0);
    if (counts.length === 0) continue;

    const first = counts[0] ?? 0;
    const consistent = counts.filter((count) => count === first).length;
    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;
    const variance = counts.reduce((sum, val) => sum + (val - avgCount) ** 2, 0) / counts.length;
    const score = consistent * avgCount * (1 / (1 + variance));

    if (score > bestScore) {
      bestScore = score;
      bestDelimiter = delimiter;
    }
  }

  return bestDelimiter;
}
