/**
 * Gzip decompression for input files
 *
 * Whole-buffer decompression through Node's zlib. Inputs here are loaded in
 * full anyway, so there is no streaming path.
 */

import { promisify } from "node:util";
import { gunzip } from "node:zlib";
import { CompressionError } from "../errors";

const gunzipAsync = promisify(gunzip);

/**
 * 10GB safety limit on compressed input
 */
const MAX_COMPRESSED_SIZE = 10_737_418_240;

function validateGzipFormat(compressed: Uint8Array): void {
  if (compressed.length < 2 || compressed[0] !== 0x1f || compressed[1] !== 0x8b) {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }
}

/**
 * Decompress a complete gzip buffer
 *
 * Concatenated gzip members (as written by bgzip and `cat a.gz b.gz`) are
 * decompressed as one stream.
 *
 * @throws {CompressionError} If the data is not gzip or is corrupt
 *
 * @example
 * ```typescript
 * const text = new TextDecoder().decode(await decompress(bytes));
 * ```
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "gzip", "decompress");
  }
  if (compressed.length > MAX_COMPRESSED_SIZE) {
    throw new CompressionError(
      `Compressed size ${compressed.length} exceeds maximum ${MAX_COMPRESSED_SIZE}`,
      "gzip",
      "decompress",
      0
    );
  }
  validateGzipFormat(compressed);

  try {
    const result = await gunzipAsync(compressed);
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "decompress", error, compressed.length);
  }
}
