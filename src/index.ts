/**
 * umi-crosscheck - cross-validate amplicon genotype calls against
 * single-cell expression molecules
 *
 * Each barcode/UMI pair supporting a genotype call is looked up in the
 * molecule archive of the same cells, classified by how well the archive
 * corroborates it, and the calls are re-aggregated per barcode at three
 * filtering levels.
 */

// Compression infrastructure
export { CompressionDetector, gunzip } from "./compression";
export type { CompressionDetection, CompressionFormat } from "./compression";
// Configuration
export {
  DEFAULT_ANTIBODY_PATTERN,
  DEFAULT_BARCODE_SUFFIX_SEPARATOR,
  DEFAULT_LIST_DELIMITER,
  DEFAULT_MAX_EDIT_DISTANCE,
  DEFAULT_QUANTILE,
  DEFAULT_UMI_LENGTH,
  MAX_UMI_LENGTH,
  RefinementOptionsSchema,
  RunOptionsSchema,
  resolveRefinementConfig,
  resolveRunConfig,
} from "./config";
export type { RefinementConfig, RefinementOptions, RunConfig, RunOptions } from "./config";
// Error types
export {
  CompressionError,
  CrosscheckError,
  DecodingError,
  DSVParseError,
  EncodingError,
  ExpansionError,
  FileError,
  MissingGeneError,
  ParseError,
  ValidationError,
} from "./errors";
// Input and output formats
export { parseBarcodeList, readBarcodeList, stripBarcodeSuffix } from "./formats/barcodes";
export { DSVParser, DSVWriter, TSVWriter } from "./formats/dsv";
export {
  GENOTYPING_COLUMNS,
  parseGenotypingTable,
  readGenotypingTable,
} from "./formats/genotype-table";
export { parseMoleculeArchive, readMoleculeArchive } from "./formats/molecule-archive";
export {
  formatBarcodeSummary,
  OBSERVATION_COLUMNS,
  SUMMARY_COLUMNS,
  writeBarcodeSummary,
  writeClassifiedObservations,
} from "./formats/report";
// File I/O infrastructure
export { exists, readBytes, readText } from "./io/file-reader";
export { type ArtifactWriteResult, writeArtifact, writeString } from "./io/file-writer";
// Core operations
export { mapConcurrent } from "./operations/core/concurrency";
export { boundedLevenshtein, withinEditDistance } from "./operations/core/edit-distance";
export { decodeUmi, encodeUmi } from "./operations/core/umi-codec";
export {
  aggregateLevel,
  applyKeepRule,
  deriveLabel,
  keepAtLevel,
  summarizeBarcodes,
} from "./operations/aggregate";
export { ApproxMatcher, classifyObservations, resolveMatchClass } from "./operations/classify";
export { renderReadSupportChart } from "./operations/diagnostics";
export { expandGenotypingTable, expandRow } from "./operations/expand";
export {
  buildMoleculeIndex,
  collapseMoleculeIndex,
  type MoleculeIndex,
  resolveMolecules,
  targetGeneSet,
} from "./operations/molecule-index";
export {
  bimodalMinimumThreshold,
  estimateThreshold,
  quantileThreshold,
} from "./operations/threshold";
// Pipeline
export {
  OUTPUT_FILES,
  type PipelineResult,
  type RefinementInputs,
  type RefinementResult,
  refineGenotypes,
  runPipeline,
} from "./pipeline";
// Core types
export type {
  BarcodeSummary,
  ClassifiedObservation,
  CollapsedMolecule,
  DupCounts,
  FilterLevel,
  GenotypeCall,
  GenotypeLabel,
  GenotypeObservation,
  GenotypingRow,
  LevelSummary,
  MatchClass,
  MoleculeArchive,
  MoleculeRecord,
  RefinedObservation,
  ThresholdEstimate,
  ThresholdStrategy,
} from "./types";
export {
  FILTER_LEVELS,
  GenotypeCallSchema,
  MATCH_CLASSES,
  MoleculeArchiveSchema,
  ThresholdStrategySchema,
} from "./types";

/**
 * Library version
 */
export const VERSION = "0.1.0";
