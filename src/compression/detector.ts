/**
 * Compression format detection for input files
 *
 * Barcode lists and archive exports are routinely shipped gzip-compressed.
 * Detection combines the file extension with the gzip magic bytes; when the
 * two disagree the bytes win.
 */

import { CompressionError } from "../errors";

export type CompressionFormat = "gzip" | "none";

/**
 * Outcome of a compression check
 */
export interface CompressionDetection {
  format: CompressionFormat;
  /** 0.0-1.0, higher = more certain */
  confidence: number;
  detectionMethod: "extension" | "magic-bytes" | "hybrid";
  extension?: string;
}

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

const HIGH_CONFIDENCE_BOTH_METHODS = 0.7;
const MEDIUM_CONFIDENCE_EXTENSION_ONLY = 0.6;
const CONFIDENCE_BOOST_FOR_AGREEMENT = 0.1;
const CONFIDENCE_PENALTY_FOR_DISAGREEMENT = 0.3;
const MIN_CONFIDENCE_DISAGREEMENT = 0.3;

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("barcodes.tsv.gz"); // "gzip"
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])).format; // "gzip"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    for (const ext of GZIP_EXTENSIONS) {
      if (normalizedPath.endsWith(ext)) {
        return "gzip";
      }
    }
    return "none";
  }

  /**
   * Detect compression format from leading bytes
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (
      bytes.length >= 2 &&
      bytes[0] === GZIP_MAGIC_FIRST_BYTE &&
      bytes[1] === GZIP_MAGIC_SECOND_BYTE
    ) {
      return { format: "gzip", confidence: 1.0, detectionMethod: "magic-bytes" };
    }
    return {
      format: "none",
      // an empty buffer carries no signal either way
      confidence: bytes.length === 0 ? 0.8 : 0.9,
      detectionMethod: "magic-bytes",
    };
  }

  /**
   * Combine extension and magic-byte detection
   */
  static hybrid(filePath: string, bytes?: Uint8Array): CompressionDetection {
    const extensionFormat = CompressionDetector.fromExtension(filePath);
    const dot = filePath.lastIndexOf(".");
    const extension = dot >= 0 ? filePath.substring(dot) : "";

    if (bytes === undefined) {
      return {
        format: extensionFormat,
        confidence:
          extensionFormat !== "none" ? HIGH_CONFIDENCE_BOTH_METHODS : MEDIUM_CONFIDENCE_EXTENSION_ONLY,
        extension,
        detectionMethod: "extension",
      };
    }

    const magicDetection = CompressionDetector.fromMagicBytes(bytes);
    if (extensionFormat === magicDetection.format) {
      return {
        format: extensionFormat,
        confidence: Math.min(1, magicDetection.confidence + CONFIDENCE_BOOST_FOR_AGREEMENT),
        extension,
        detectionMethod: "hybrid",
      };
    }

    return {
      format: magicDetection.format,
      confidence: Math.max(
        MIN_CONFIDENCE_DISAGREEMENT,
        magicDetection.confidence - CONFIDENCE_PENALTY_FOR_DISAGREEMENT
      ),
      extension,
      detectionMethod: "hybrid",
    };
  }
}
