/**
 * Compression detection and decompression
 */

export {
  type CompressionDetection,
  CompressionDetector,
  type CompressionFormat,
} from "./detector";
export { decompress as gunzip } from "./gzip";
