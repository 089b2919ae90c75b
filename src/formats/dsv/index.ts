/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) format support
 *
 * @example Parsing a tab-delimited table
 * ```typescript
 * import { DSVParser } from './formats/dsv';
 *
 * const table = new DSVParser({ autoDetectDelimiter: true }).parseString(text);
 * for (const record of table.records) {
 *   console.log(record.lineNumber, record.fields.BC);
 * }
 * ```
 */

export type { DSVCell, DSVParserOptions, DSVRecord, DSVTable, DSVWriterOptions } from "./types";

export { DSVParser } from "./parser";
export { DSVWriter, TSVWriter } from "./writer";
