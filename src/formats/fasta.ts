/**
 * FASTA format parser and writer
 *
 * Handles the messiness of real-world FASTA files:
 * - Wrapped and unwrapped sequences
 * - Leading whitespace in headers
 * - Blank lines and `;` comment lines
 * - Records without sequence data
 */

import { type } from "arktype";
import {
  describeError,
  FileError,
  ParseError,
  SequenceError,
  TaxmergeError,
  ValidationError,
} from "../errors";
import { createStream } from "../io/file-reader";
import type { FileWriteHandle } from "../io/file-writer";
import { readLines } from "../io/stream-utils";
import type { FastaSequence, FileReaderOptions, ParserOptions } from "../types";
import { SequenceSchema } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * FASTA-specific parser options
 */
export interface FastaParserOptions extends ParserOptions {
  /**
   * Emit records whose header is followed by no sequence lines instead of
   * reporting them through onError
   * @default false
   */
  allowEmptySequences?: boolean;
}

/**
 * Header fields gathered while the record body is still being read
 */
interface PendingRecord {
  id: string;
  description?: string;
  lineNumber: number;
}

type ProcessedFastaLine =
  | { isHeader: true; header: PendingRecord }
  | { isHeader: false; sequenceData: string }
  | null;

const LINE_ENDING = "\n";

const FastaParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "allowEmptySequences?": "boolean",
});

/**
 * Streaming FASTA parser
 *
 * Processes records one at a time without loading the file into memory.
 *
 * @example Basic usage
 * ```typescript
 * const parser = new FastaParser();
 * for await (const sequence of parser.parseString(">seq1\nACGT\nACGT")) {
 *   console.log(`${sequence.id}: ${sequence.length} bp`); // seq1: 8 bp
 * }
 * ```
 *
 * @example Best-effort parsing of a reference database
 * ```typescript
 * const parser = new FastaParser({ skipValidation: true, allowEmptySequences: true });
 * for await (const sequence of parser.parseFile("gg_13_5.fasta.gz")) {
 *   // ...
 * }
 * ```
 */
export class FastaParser extends AbstractParser<FastaSequence, FastaParserOptions> {
  private readonly allowEmptySequences: boolean;

  protected getDefaultOptions(): Partial<FastaParserOptions> {
    return {
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, "FASTA", lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`FASTA Warning (line ${lineNumber}): ${warning}`);
      },
    };
  }

  /**
   * @throws {ValidationError} When options are invalid
   */
  constructor(options: FastaParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }

    super(options);
    this.allowEmptySequences = options.allowEmptySequences ?? false;
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * Parse FASTA records from a string
   * @throws {ParseError} When FASTA format is invalid
   */
  async *parseString(data: string): AsyncIterable<FastaSequence> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse FASTA records from a file, decompressing gzip input
   * @throws {FileError} When the file cannot be opened
   * @throws {ParseError} When FASTA format is invalid
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<FastaSequence> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }

    const stream = await createStream(filePath, options);
    try {
      yield* this.parse(stream);
    } catch (error) {
      if (error instanceof TaxmergeError) {
        throw error;
      }
      throw new FileError(
        `Failed to read FASTA file '${filePath}': ${describeError(error)}`,
        filePath,
        "read",
        error
      );
    }
  }

  /**
   * Parse FASTA records from a byte stream
   * @throws {ParseError} When FASTA format is invalid
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<FastaSequence> {
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Core record assembly shared by every input kind
   */
  private async *parseLines(
    lines: AsyncIterable<string> | Iterable<string>
  ): AsyncIterable<FastaSequence> {
    let current: PendingRecord | null = null;
    let sequenceBuffer: string[] = [];
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();

      let processedLine: ProcessedFastaLine;
      try {
        processedLine = this.processLine(line, lineNumber);
      } catch (error) {
        this.options.onError(describeError(error), lineNumber);
        continue;
      }

      if (processedLine === null) continue;

      if (processedLine.isHeader) {
        if (current !== null) {
          const record = this.finalizeRecord(current, sequenceBuffer);
          if (record !== null) yield record;
        }
        current = processedLine.header;
        sequenceBuffer = [];
      } else if (current === null) {
        this.options.onError("Sequence data found before header", lineNumber);
      } else {
        sequenceBuffer.push(processedLine.sequenceData);
      }
    }

    if (current !== null) {
      const record = this.finalizeRecord(current, sequenceBuffer);
      if (record !== null) yield record;
    }
  }

  private processLine(line: string, lineNumber: number): ProcessedFastaLine {
    if (line.length > this.options.maxLineLength) {
      this.options.onError(
        `Line too long (${line.length} > ${this.options.maxLineLength})`,
        lineNumber
      );
      return null;
    }

    if (shouldSkipFastaLine(line)) {
      return null;
    }

    const trimmedLine = line.trim();

    if (isFastaHeader(trimmedLine)) {
      const headerData = parseFastaHeader(trimmedLine, lineNumber, {
        skipValidation: this.options.skipValidation,
        onWarning: this.options.onWarning,
      });
      return { isHeader: true, header: { ...headerData, lineNumber } };
    }

    const sequenceData = validateFastaSequence(trimmedLine, lineNumber, {
      skipValidation: this.options.skipValidation,
    });
    return sequenceData === "" ? null : { isHeader: false, sequenceData };
  }

  /**
   * Build the finished record, or report a record without sequence data
   * @returns null when the record was reported and should be dropped
   */
  private finalizeRecord(pending: PendingRecord, sequenceBuffer: string[]): FastaSequence | null {
    if (sequenceBuffer.length === 0 && !this.allowEmptySequences) {
      this.options.onError(
        `Record '${pending.id}' has no sequence data`,
        pending.lineNumber
      );
      return null;
    }

    const sequence = sequenceBuffer.join("");
    return buildFastaRecord(pending, sequence, this.options.trackLineNumbers);
  }
}

/**
 * FASTA writer for outputting sequences
 *
 * @example Unwrapped output, header only
 * ```typescript
 * const writer = new FastaWriter({ lineWidth: 0, includeDescription: false });
 * writer.formatSequence(record); // ">seq1\nACGTACGT"
 * ```
 */
export class FastaWriter {
  private readonly lineWidth: number;
  private readonly includeDescription: boolean;

  constructor(
    options: {
      /** Characters per sequence line; 0 writes each sequence on one line */
      lineWidth?: number;
      includeDescription?: boolean;
    } = {}
  ) {
    this.lineWidth = options.lineWidth ?? 80;
    this.includeDescription = options.includeDescription ?? true;
  }

  /**
   * Format a single FASTA record (no trailing line ending)
   */
  formatSequence(sequence: FastaSequence): string {
    let header = `>${sequence.id}`;

    if (this.includeDescription && sequence.description !== undefined) {
      header += ` ${sequence.description}`;
    }

    return `${header}${LINE_ENDING}${this.wrapText(sequence.sequence)}`;
  }

  /**
   * Write records to an open file one at a time
   * @returns Number of records written
   */
  async writeAll(sequences: AsyncIterable<FastaSequence>, handle: FileWriteHandle): Promise<number> {
    let written = 0;
    for await (const sequence of sequences) {
      await handle.writeString(this.formatSequence(sequence) + LINE_ENDING);
      written++;
    }
    return written;
  }

  private wrapText(text: string): string {
    if (this.lineWidth <= 0) return text;

    const lines: string[] = [];
    for (let i = 0; i < text.length; i += this.lineWidth) {
      lines.push(text.slice(i, i + this.lineWidth));
    }
    return lines.join(LINE_ENDING);
  }
}

/**
 * Parse FASTA header line into id and description
 *
 * The id is the first whitespace-delimited token after `>`; leading
 * whitespace is ignored.
 *
 * @throws {ParseError} For an empty header unless validation is skipped
 */
export function parseFastaHeader(
  headerLine: string,
  lineNumber: number,
  options: { skipValidation?: boolean; onWarning?: (msg: string, line?: number) => void }
): { id: string; description?: string } {
  if (!headerLine.startsWith(">")) {
    throw new ValidationError('headerLine must start with ">"');
  }

  const header = headerLine.slice(1).trim();
  if (header === "") {
    if (options.skipValidation === true) {
      options.onWarning?.("Empty FASTA header", lineNumber);
      return { id: "" };
    }
    throw new ParseError(
      'Empty FASTA header: header must contain an identifier after ">"',
      "FASTA",
      lineNumber,
      headerLine
    );
  }

  const firstSpace = header.search(/\s/);
  if (firstSpace === -1) {
    return { id: header };
  }

  const id = header.slice(0, firstSpace);
  const description = header.slice(firstSpace + 1).trim();
  return description === "" ? { id } : { id, description };
}

/**
 * Remove whitespace from a sequence line, checking the alphabet unless
 * validation is skipped
 *
 * @throws {SequenceError} When validation finds non-IUPAC characters
 */
export function validateFastaSequence(
  sequenceLine: string,
  lineNumber: number,
  options: { skipValidation?: boolean }
): string {
  const cleaned = sequenceLine.replace(/\s/g, "");

  if (cleaned === "" || options.skipValidation === true) {
    return cleaned;
  }

  let problem: string | undefined;
  try {
    const validation = SequenceSchema(cleaned);
    if (validation instanceof type.errors) {
      problem = validation.summary;
    }
  } catch (error) {
    problem = describeError(error);
  }

  if (problem !== undefined) {
    throw new SequenceError(
      `${problem}. FASTA sequences should contain IUPAC nucleotide codes (A,C,G,T,U), ambiguity codes (R,Y,S,W,K,M,B,D,H,V,N) and gap characters (-,.)`,
      "unknown",
      lineNumber,
      sequenceLine
    );
  }

  return cleaned;
}

function buildFastaRecord(
  pending: PendingRecord,
  sequence: string,
  trackLineNumbers: boolean
): FastaSequence {
  return {
    format: "fasta",
    id: pending.id,
    ...(pending.description !== undefined && { description: pending.description }),
    sequence,
    length: sequence.length,
    ...(trackLineNumbers && { lineNumber: pending.lineNumber }),
  };
}

/**
 * Empty lines and semicolon comments (deprecated but still found)
 */
export function shouldSkipFastaLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === "" || trimmed.startsWith(";");
}

export function isFastaHeader(line: string): boolean {
  return line.trim().startsWith(">");
}
