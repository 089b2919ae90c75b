/**
 * Order-preserving fan-out over independent work items
 *
 * Per-observation work is pure, so the input is cut into contiguous chunks,
 * each chunk is mapped on its own fiber, and results are concatenated in
 * chunk order. The output therefore lines up index-for-index with the input
 * regardless of completion order.
 */

import { Cause, Effect, Exit } from "effect";

export interface MapConcurrentOptions {
  /** Maximum number of chunks processed at once (default 4) */
  concurrency?: number;
  /** Items per chunk (default 1000) */
  chunkSize?: number;
}

/**
 * Split an array into contiguous chunks of at most `size` items
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

/**
 * Map `fn` over `items` in bounded-concurrency chunks
 *
 * `fn` must not depend on shared mutable state. The first failure aborts the
 * whole map and is re-thrown unchanged.
 *
 * @example
 * ```typescript
 * const codes = await mapConcurrent(umis, (umi) => encodeUmi(umi), { chunkSize: 500 });
 * ```
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => R,
  options: MapConcurrentOptions = {}
): Promise<R[]> {
  const chunkSize = options.chunkSize ?? 1000;
  const concurrency = options.concurrency ?? 4;
  const chunks = chunk(items, chunkSize);

  const program = Effect.forEach(
    chunks,
    (batch, batchIndex) =>
      Effect.try({
        try: () => batch.map((item, offset) => fn(item, batchIndex * chunkSize + offset)),
        catch: (error) => error,
      }),
    { concurrency }
  );

  const exit = await Effect.runPromiseExit(program);
  if (Exit.isFailure(exit)) {
    throw Cause.squash(exit.cause);
  }
  return exit.value.flat();
}
