/**
 * Molecule archive reader
 *
 * Reads the columnar JSON export of a molecule-level expression archive and
 * validates it with an ArkType morph. Gzip-compressed exports are inflated
 * transparently.
 *
 * @example Archive layout
 * ```json
 * {
 *   "barcodes": ["AAAC", "CCCG"],
 *   "features": { "name": ["DNMT3A", "GAPDH"], "id": ["ENSG00000119772", "ENSG00000111640"] },
 *   "barcode_idx": [0, 1],
 *   "feature_idx": [0, 1],
 *   "umi": [27, 108],
 *   "count": [5, 2]
 * }
 * ```
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../errors";
import { readText } from "../io/file-reader";
import { type MoleculeArchive, MoleculeArchiveSchema } from "../types";

const deserializeArchive = type("string.json.parse").pipe(MoleculeArchiveSchema);

function assertNonNegativeIntegers(name: string, values: readonly number[]): void {
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value === undefined || !Number.isSafeInteger(value) || value < 0) {
      throw new ValidationError(
        `Molecule archive column ${name} holds ${String(value)} at position ${i}; expected a non-negative integer`
      );
    }
  }
}

/**
 * Parse and validate a molecule archive from JSON text
 *
 * @throws {ParseError} When the text is not JSON or does not match the archive layout
 * @throws {ValidationError} When an index, UMI code or count is not a non-negative integer
 */
export function parseMoleculeArchive(text: string): MoleculeArchive {
  const archive = deserializeArchive(text);
  if (archive instanceof type.errors) {
    throw new ParseError(`Invalid molecule archive: ${archive.summary}`, "molecule-archive");
  }

  assertNonNegativeIntegers("barcode_idx", archive.barcode_idx);
  assertNonNegativeIntegers("feature_idx", archive.feature_idx);
  assertNonNegativeIntegers("umi", archive.umi);
  assertNonNegativeIntegers("count", archive.count);
  return archive;
}

/**
 * Read a (possibly gzipped) molecule archive from disk
 */
export async function readMoleculeArchive(path: string): Promise<MoleculeArchive> {
  return parseMoleculeArchive(await readText(path));
}
