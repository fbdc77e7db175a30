/**
 * Abstract base parser with shared option handling and interrupt checks
 *
 * Gives the FASTA and taxonomy parsers the same defaults, the same
 * onError/onWarning hooks and the same AbortSignal support without
 * imposing how either format is parsed.
 */

import { ParseError } from "../errors";
import type { ParserOptions, ResolvedParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces (FastaSequence, TaxonomyRow)
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: ResolvedParserOptions = {
      skipValidation: false,
      maxLineLength: 100_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    const formatDefaults = this.getDefaultOptions();
    this.options = {
      skipValidation:
        options.skipValidation ?? formatDefaults.skipValidation ?? baseDefaults.skipValidation,
      maxLineLength:
        options.maxLineLength ?? formatDefaults.maxLineLength ?? baseDefaults.maxLineLength,
      trackLineNumbers:
        options.trackLineNumbers ?? formatDefaults.trackLineNumbers ?? baseDefaults.trackLineNumbers,
      onError: options.onError ?? formatDefaults.onError ?? baseDefaults.onError,
      onWarning: options.onWarning ?? formatDefaults.onWarning ?? baseDefaults.onWarning,
      signal: options.signal,
    };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific defaults for the shared options
   */
  protected abstract getDefaultOptions(): Partial<ParserOptions>;

  /**
   * Check if parsing should stop; call this once per line
   */
  protected checkAborted(): void {
    this.interruptHandler.throwIfAborted(this.getFormatName());
  }

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format name for error messages and logging (e.g. "FASTA", "TSV")
   */
  protected abstract getFormatName(): string;
}

class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the signal has been aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context} parsing`, "ABORTED");
    }
  }
}
