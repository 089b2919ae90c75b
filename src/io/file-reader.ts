/**
 * File reading utilities
 *
 * Whole-file reads through the Effect Platform FileSystem service with
 * transparent gzip decompression, exposed as Promise-based functions.
 */

import { FileSystem } from "@effect/platform";
import { Cause, Effect, Exit } from "effect";
import { CompressionDetector, gunzip } from "../compression";
import { FileError } from "../errors";
import { getPlatform } from "./runtime";

export interface ReadOptions {
  /** Decompress gzip input detected by extension or magic bytes (default true) */
  autoDecompress?: boolean;
  /** Refuse files larger than this many bytes (default 4GB) */
  maxFileSize?: number;
}

const DEFAULT_MAX_FILE_SIZE = 4_294_967_296;

function validatePath(path: string): string {
  if (path.trim() === "") {
    throw new FileError("File path must not be empty", path, "stat");
  }
  if (path.includes("\0")) {
    throw new FileError("File path must not contain null bytes", path, "stat");
  }
  return path;
}

/**
 * Check whether a path exists (file or directory)
 *
 * @throws {FileError} If the file system cannot be queried
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(validatedPath);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Read a file into memory, decompressing gzip content
 *
 * @throws {FileError} If the file is missing, unreadable or too large
 * @throws {CompressionError} If gzip content is corrupt
 */
export async function readBytes(path: string, options: ReadOptions = {}): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    if (info.type !== "File") {
      return yield* Effect.fail(
        new FileError(`Not a regular file (${info.type})`, validatedPath, "read")
      );
    }
    if (Number(info.size) > maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File size ${info.size} exceeds maximum ${maxFileSize}`,
          validatedPath,
          "read"
        )
      );
    }
    return yield* fs.readFile(validatedPath);
  });

  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isFailure(exit)) {
    const failure = Cause.squash(exit.cause);
    if (failure instanceof FileError) throw failure;
    throw FileError.fromSystemError("read", validatedPath, failure);
  }

  const data = exit.value;
  if (options.autoDecompress === false || data.length === 0) {
    return data;
  }

  const detection = CompressionDetector.hybrid(validatedPath, data.subarray(0, 4));
  return detection.format === "gzip" ? gunzip(data) : data;
}

/**
 * Read a text file as UTF-8, decompressing gzip content
 *
 * @example
 * ```typescript
 * const text = await readText("barcodes.tsv.gz");
 * ```
 */
export async function readText(path: string, options: ReadOptions = {}): Promise<string> {
  const bytes = await readBytes(path, options);
  return new TextDecoder("utf-8").decode(bytes);
}
