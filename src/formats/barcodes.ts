/**
 * Reference barcode list
 *
 * Plain text, one barcode per line, optionally gzip-compressed. Cell callers
 * append a sample-index tag (`AAACCTGAGAAACCAT-1`); everything from the
 * separator on is stripped so the list keys match genotyping barcodes.
 */

import { DEFAULT_BARCODE_SUFFIX_SEPARATOR } from "../config";
import { ValidationError } from "../errors";
import { readText } from "../io/file-reader";

/**
 * Remove the sample-index suffix from a barcode
 *
 * @example
 * ```typescript
 * stripBarcodeSuffix("AAACCTGAGAAACCAT-1"); // "AAACCTGAGAAACCAT"
 * ```
 */
export function stripBarcodeSuffix(
  barcode: string,
  separator: string = DEFAULT_BARCODE_SUFFIX_SEPARATOR
): string {
  const cut = barcode.indexOf(separator);
  return cut === -1 ? barcode : barcode.slice(0, cut);
}

/**
 * Parse a barcode list into suffix-free barcodes, first-seen order, no duplicates
 *
 * @throws {ValidationError} If a line holds whitespace inside the barcode
 */
export function parseBarcodeList(
  text: string,
  separator: string = DEFAULT_BARCODE_SUFFIX_SEPARATOR
): string[] {
  const seen = new Set<string>();
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? "").trim();
    if (line === "") continue;
    if (/\s/.test(line)) {
      throw new ValidationError(`Barcode contains whitespace: "${line}"`, i + 1, line);
    }
    const barcode = stripBarcodeSuffix(line, separator);
    if (barcode === "") {
      throw new ValidationError("Barcode is empty after removing its suffix", i + 1, line);
    }
    seen.add(barcode);
  }
  return [...seen];
}

/**
 * Read a (possibly gzipped) barcode list from disk
 */
export async function readBarcodeList(
  path: string,
  separator: string = DEFAULT_BARCODE_SUFFIX_SEPARATOR
): Promise<string[]> {
  return parseBarcodeList(await readText(path), separator);
}
