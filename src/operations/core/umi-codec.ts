/**
 * 2-bit UMI encoding
 *
 * Molecule archives store each UMI as an unsigned integer with two bits per
 * base (A=00, C=01, G=10, T=11), most significant base first. These helpers
 * convert between that code and the nucleotide string.
 *
 * Codes are plain numbers, so arithmetic is used instead of bitwise operators
 * (which truncate to 32 bits). Sequences up to {@link MAX_UMI_LENGTH} bases
 * stay within `Number.MAX_SAFE_INTEGER`.
 *
 * @module umi-codec
 */

import { MAX_UMI_LENGTH } from "../../config";
import { DecodingError, EncodingError } from "../../errors";

const BASES = ["A", "C", "G", "T"] as const;

const BASE_CODES: Readonly<Record<string, number>> = {
  A: 0,
  C: 1,
  G: 2,
  T: 3,
};

/**
 * Encode a UMI sequence into its 2-bit integer code
 *
 * @throws {EncodingError} If a character is outside {A,C,G,T} or the
 * sequence is too long to encode exactly
 *
 * @example
 * ```typescript
 * encodeUmi("ACGT"); // 27 (0b00011011)
 * ```
 */
export function encodeUmi(sequence: string): number {
  if (sequence.length > MAX_UMI_LENGTH) {
    throw new EncodingError(
      `UMI of length ${sequence.length} exceeds maximum encodable length ${MAX_UMI_LENGTH}`,
      sequence
    );
  }

  let code = 0;
  for (let i = 0; i < sequence.length; i++) {
    const char = sequence.charAt(i);
    const bits = BASE_CODES[char];
    if (bits === undefined) {
      throw new EncodingError(
        `Invalid UMI character '${char}' at position ${i}; expected one of A, C, G, T`,
        sequence,
        i
      );
    }
    code = code * 4 + bits;
  }
  return code;
}

/**
 * Decode a 2-bit integer code back into a UMI of the declared length
 *
 * Missing high-order bits are treated as leading `A`s.
 *
 * @throws {DecodingError} If the value is not a non-negative integer or needs
 * more than `2 * length` bits
 *
 * @example
 * ```typescript
 * decodeUmi(27, 4); // "ACGT"
 * decodeUmi(27, 6); // "AAACGT"
 * ```
 */
export function decodeUmi(value: number, length: number): string {
  if (!Number.isInteger(length) || length < 1 || length > MAX_UMI_LENGTH) {
    throw new DecodingError(
      `UMI length must be an integer between 1 and ${MAX_UMI_LENGTH}`,
      value,
      length
    );
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new DecodingError(`UMI code must be a non-negative integer, got ${value}`, value, length);
  }
  if (value >= 4 ** length) {
    const bitLength = value.toString(2).length;
    throw new DecodingError(
      `UMI code needs ${bitLength} bits but length ${length} allows only ${2 * length}`,
      value,
      length
    );
  }

  const bases = new Array<string>(length);
  let remaining = value;
  for (let i = length - 1; i >= 0; i--) {
    const bits = remaining % 4;
    bases[i] = BASES[bits] ?? "A";
    remaining = (remaining - bits) / 4;
  }
  return bases.join("");
}
