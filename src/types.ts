/**
 * Core type definitions for sequence records, taxonomy rows and file I/O
 *
 * Interfaces describe the shapes passed between parsers and operations;
 * the ArkType schemas at the bottom validate the values that arrive from
 * outside (paths, sequence data).
 */

import { type } from "arktype";

// =============================================================================
// SEQUENCE RECORDS
// =============================================================================

/**
 * FASTA sequence record
 * Format: >id description\nsequence
 */
export interface FastaSequence {
  readonly format: "fasta";
  /** First whitespace-delimited token of the header (may be empty in malformed data) */
  readonly id: string;
  /** Remainder of the header after the id */
  readonly description?: string;
  /** Sequence body with line wrapping removed */
  readonly sequence: string;
  readonly length: number;
  /** Line number of the header (for error reporting) */
  readonly lineNumber?: number;
}

// =============================================================================
// TAXONOMY TABLE
// =============================================================================

/**
 * One data row of a taxonomy table, before lineage cleanup
 */
export interface TaxonomyRow {
  readonly id: string;
  /** Raw taxonomy string (field 1), possibly quoted and ending in a rank marker */
  readonly taxonomy: string;
  readonly lineNumber?: number;
}

/**
 * What to do with a table row that has fewer than two fields
 */
export type ShortRowPolicy = "error" | "skip";

// =============================================================================
// PARSER CONFIGURATION
// =============================================================================

/**
 * Parser configuration options shared by every format
 */
export interface ParserOptions {
  /** Skip content checks (sequence alphabet, blank taxonomy ids) */
  skipValidation?: boolean;
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** Whether to attach source line numbers to parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Parser options after defaults have been applied
 */
export interface ResolvedParserOptions {
  skipValidation: boolean;
  maxLineLength: number;
  trackLineNumbers: boolean;
  signal?: AbortSignal;
  onError: (error: string, lineNumber?: number) => void;
  onWarning: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// COMPRESSION
// =============================================================================

export type CompressionFormat = "gzip" | "none";

/**
 * Result of inspecting a file or byte prefix for compression
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** 0 to 1; 1.0 when magic bytes confirm the format */
  readonly confidence: number;
  readonly detectionMethod: "magic-bytes" | "extension" | "hybrid";
}

// =============================================================================
// FILE I/O
// =============================================================================

/**
 * Branded type for validated file paths
 * Ensures file paths have been validated before use in I/O operations
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Whether to detect and decompress gzip input (default: true) */
  readonly autoDecompress?: boolean;
}

/**
 * File metadata gathered before opening a stream
 */
export interface FileMetadata {
  readonly path: FilePath;
  readonly size: number;
  readonly lastModified: Date;
  readonly extension: string;
}

/**
 * Line extraction result from a text buffer
 * Handles incomplete lines and buffer management
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * File path validation
 * Rejects empty paths and embedded null bytes; the path is otherwise used
 * exactly as given
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  return path as FilePath;
});

/**
 * Nucleotide sequence alphabet: IUPAC codes, gaps and stop
 */
export const SequenceSchema = type("string").pipe((seq: string) => {
  const cleaned = seq.replace(/\s+/g, "").toUpperCase();
  const invalidChars = cleaned.match(/[^ACGTURYSWKMBDHVN\-.*]/g);

  if (invalidChars !== null) {
    throw new Error(`Invalid sequence characters: ${[...new Set(invalidChars)].join(", ")}`);
  }

  return cleaned;
});

export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "autoDecompress?": "boolean",
});
