/**
 * Error handling for taxonomy merging
 *
 * Every failure the tool can hit (bad parameters, unreadable files,
 * malformed taxonomy rows or FASTA records) is one of the classes below,
 * so callers can tell them apart with `instanceof`.
 */

/**
 * Base error class for all taxmerge errors
 */
export class TaxmergeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "TaxmergeError";
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
 * Validation errors for malformed options or data
 */
export class ValidationError extends TaxmergeError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends TaxmergeError {
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
 * A taxonomy table row that cannot supply both an id and a taxonomy string
 */
export class TaxonomyRowError extends ParseError {
  constructor(
    message: string,
    public readonly fieldCount: number,
    lineNumber?: number,
    row?: string
  ) {
    super(
      lineNumber !== undefined ? `${message} (line ${lineNumber})` : message,
      "TSV",
      lineNumber,
      row
    );
    this.name = "TaxonomyRowError";
  }
}

/**
 * Sequence-specific validation errors
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Sequence '${sequenceId}': ${message}`, lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * Missing or malformed command-line parameters
 */
export class ParameterError extends TaxmergeError {
  constructor(
    message: string,
    public readonly parameter?: string
  ) {
    super(message, "PARAMETER_ERROR");
    this.name = "ParameterError";
  }
}

/**
 * File I/O errors carrying the path and the underlying system error
 */
export class FileError extends TaxmergeError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close",
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
    const errorMessage = describeError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `could not ${operation} file: ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError !== undefined) {
      msg += `\nSystem Error: ${describeError(this.systemError)}`;
    }

    return msg;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends TaxmergeError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends TaxmergeError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Decompression errors for gzip input
 */
export class CompressionError extends TaxmergeError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }
}

/**
 * Normalize anything thrown during a merge into a TaxmergeError
 *
 * Errors from this module pass through unchanged; anything else becomes a
 * TaxmergeError with code UNKNOWN_ERROR.
 */
export function toTaxmergeError(error: unknown, context?: string): TaxmergeError {
  if (error instanceof TaxmergeError) {
    return error;
  }
  return new TaxmergeError(describeError(error), "UNKNOWN_ERROR", undefined, context);
}

/**
 * Message of a thrown value
 *
 * Platform failures (`SystemError` from @effect/platform) carry a
 * `message` without being `Error` instances.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    const { message } = error;
    if (typeof message === "string") {
      return message;
    }
  }
  return String(error);
}
