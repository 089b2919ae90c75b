/**
 * DSV option validation
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { MAX_FIELD_SIZE } from "./constants";

/**
 * ArkType schema for DSV parser options
 */
export const DSVParserOptionsSchema = type({
  "delimiter?": "string==1",
  "autoDetectDelimiter?": "boolean",
  "raggedRows?": "'error' | 'pad'",
});

/**
 * ArkType schema for DSV writer options
 */
export const DSVWriterOptionsSchema = type({
  "delimiter?": "string==1",
  "excelCompatible?": "boolean",
});

/**
 * Reject fields that exceed the memory safety limit
 *
 * @throws {ValidationError} If the field is too large
 */
export function validateFieldSize(field: string, lineNumber?: number): void {
  if (field.length > MAX_FIELD_SIZE) {
    throw new ValidationError(
      `Field size ${field.length} exceeds maximum ${MAX_FIELD_SIZE}`,
      lineNumber
    );
  }
}
