/**
 * File writing operations using Effect Platform
 *
 * Output artifacts are written once per run. A path that already exists is
 * left untouched, which makes re-running the pipeline over the same output
 * directory idempotent.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { exists } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates parent directories)
 *
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await writeString("out/summary.tsv", table);
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const parentDir = pathService.dirname(path);
    const dirExists = yield* fs.exists(parentDir);
    if (!dirExists) {
      yield* fs.makeDirectory(parentDir, { recursive: true });
    }

    yield* fs.writeFileString(path, content);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Create a directory and any missing parents
 *
 * @throws {FileError} When the directory cannot be created
 */
export async function ensureDirectory(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(path, { recursive: true });
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("mkdir", path, error);
  }
}

/**
 * Outcome of an artifact write
 */
export type ArtifactWriteResult = "written" | "skipped";

/**
 * Write an output artifact unless the path already exists
 *
 * An existing file is never overwritten; a warning is logged and the write
 * is reported as skipped.
 *
 * @param render - Produces the file content; not called when the write is skipped
 */
export async function writeArtifact(
  path: string,
  render: () => string
): Promise<ArtifactWriteResult> {
  if (await exists(path)) {
    console.warn(`Output ${path} already exists; skipping write`);
    return "skipped";
  }
  await writeString(path, render());
  return "written";
}
