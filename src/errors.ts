/**
 * Error handling for genotype cross-validation
 *
 * Every failure raised by the library is a subclass of {@link CrosscheckError}
 * carrying a machine-readable code plus optional line number and context.
 */

/**
 * Base error class for all crosscheck errors
 */
export class CrosscheckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "CrosscheckError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed or invalid data
 */
export class ValidationError extends CrosscheckError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends CrosscheckError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends CrosscheckError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    let suggestion = "";
    if (msg.includes("header") || msg.includes("magic")) {
      suggestion = `. File may be corrupted or not actually ${format} compressed`;
    } else if (msg.includes("unexpected end") || msg.includes("truncated")) {
      suggestion = ". File appears to be truncated or incomplete";
    }

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with the path and operation that failed
 */
export class FileError extends CrosscheckError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `Path: ${filePath}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("not found")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    return undefined;
  }
}

/**
 * A UMI sequence contains a character outside the 2-bit alphabet
 */
export class EncodingError extends ValidationError {
  constructor(
    message: string,
    public readonly sequence: string,
    public readonly position?: number
  ) {
    super(message, undefined, `UMI: ${sequence}`);
    this.name = "EncodingError";
  }
}

/**
 * A UMI code does not fit the declared sequence length
 */
export class DecodingError extends ValidationError {
  constructor(
    message: string,
    public readonly value: number,
    public readonly umiLength: number
  ) {
    super(message, undefined, `value ${value}, declared length ${umiLength}`);
    this.name = "DecodingError";
  }
}

/**
 * A genotyping row whose per-molecule lists disagree with its call totals
 */
export class ExpansionError extends ValidationError {
  constructor(
    message: string,
    public readonly barcode: string,
    public readonly field: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `${message} (barcode ${barcode}: ${field} has ${actual} elements, expected ${expected})`,
      undefined,
      `BC=${barcode}`
    );
    this.name = "ExpansionError";
  }
}

/**
 * The target gene is not present in the archive's feature table
 */
export class MissingGeneError extends CrosscheckError {
  constructor(
    public readonly geneName: string,
    public readonly featureCount: number
  ) {
    super(
      `Gene "${geneName}" not found in molecule archive feature table`,
      "MISSING_GENE",
      undefined,
      `Searched ${featureCount} feature names; gene symbols are case-sensitive`
    );
    this.name = "MissingGeneError";
  }
}
