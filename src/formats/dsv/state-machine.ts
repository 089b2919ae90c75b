/**
 * RFC 4180 row tokenizer
 *
 * A four-state machine over one logical row. Rows whose quoted fields span
 * physical lines are joined by the parser before they reach
 * {@link parseCSVRow}; {@link endsInsideQuotes} tells it when to keep joining.
 */

import { DSVParseError } from "../../errors";
import { CSVParseState } from "./types";

interface RowScan {
  fields: string[];
  state: CSVParseState;
}

function scanRow(line: string, delimiter: string, quote: string): RowScan {
  const fields: string[] = [];
  let field = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case CSVParseState.FIELD_START:
      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(field);
          field = "";
          state = CSVParseState.FIELD_START;
        } else if (char === quote && state === CSVParseState.FIELD_START) {
          state = CSVParseState.QUOTED_FIELD;
        } else {
          field += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          state = CSVParseState.QUOTE_IN_QUOTED;
        } else {
          field += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(field);
          field = "";
          state = CSVParseState.FIELD_START;
        } else if (char === quote) {
          // doubled quote
          field += quote;
          state = CSVParseState.QUOTED_FIELD;
        } else {
          field += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (line.length > 0) fields.push(field);
  return { fields, state };
}

/**
 * True when the row stops inside an open quoted field
 *
 * Only a quote at the start of a field opens one; a quote inside an unquoted
 * field such as `5"` is literal text.
 *
 * @example
 * ```typescript
 * endsInsideQuotes('1,"first', ","); // true
 * endsInsideQuotes('1,5"', ","); // false
 * ```
 */
export function endsInsideQuotes(line: string, delimiter: string, quote: string = '"'): boolean {
  return scanRow(line, delimiter, quote).state === CSVParseState.QUOTED_FIELD;
}

/**
 * Split one logical row into fields
 *
 * Text after a closing quote is kept as part of the field.
 *
 * @throws {DSVParseError} If a quoted field is never closed
 *
 * @example
 * ```typescript
 * parseCSVRow('AAAC,"ACGT;CGTA",2', ","); // ["AAAC", "ACGT;CGTA", "2"]
 * parseCSVRow('a\t"say ""hi"""', "\t"); // ["a", 'say "hi"']
 * ```
 */
export function parseCSVRow(line: string, delimiter: string = ",", quote: string = '"'): string[] {
  const { fields, state } = scanRow(line, delimiter, quote);
  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in field", undefined, fields.length);
  }
  return fields;
}
