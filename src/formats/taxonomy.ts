/**
 * Taxonomy table parser
 *
 * Reads the tab-separated id/taxonomy tables that accompany reference
 * sequence databases. The first line is always a header and is dropped
 * without inspection; every other non-blank line must carry at least an
 * id and a taxonomy string.
 */

import { type } from "arktype";
import {
  describeError,
  FileError,
  TaxmergeError,
  TaxonomyRowError,
  ValidationError,
} from "../errors";
import { createStream } from "../io/file-reader";
import { readLines } from "../io/stream-utils";
import type { FileReaderOptions, ParserOptions, ShortRowPolicy, TaxonomyRow } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * Taxonomy-specific parser options
 */
export interface TaxonomyParserOptions extends ParserOptions {
  /**
   * How to treat a row with fewer than two fields: fail with a
   * TaxonomyRowError, or report a warning and skip it
   * @default "error"
   */
  shortRows?: ShortRowPolicy;
}

const TaxonomyParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "shortRows?": "'error' | 'skip'",
});

/**
 * Streaming parser for id<TAB>taxonomy tables
 *
 * Yields rows with the taxonomy string exactly as found in the file;
 * cleanup and de-duplication happen in `buildTaxonomyTable`.
 *
 * @example
 * ```typescript
 * const parser = new TaxonomyParser();
 * const table = "#OTU\ttaxonomy\n4479944\tk__Bacteria; p__Firmicutes\n";
 * for await (const row of parser.parseString(table)) {
 *   console.log(row.id, row.taxonomy); // 4479944 k__Bacteria; p__Firmicutes
 * }
 * ```
 */
export class TaxonomyParser extends AbstractParser<TaxonomyRow, TaxonomyParserOptions> {
  private readonly shortRows: ShortRowPolicy;
  private skippedRows = 0;

  // With validation on, rows with a blank id are reported through onError
  protected getDefaultOptions(): Partial<TaxonomyParserOptions> {
    return {
      skipValidation: true,
    };
  }

  /**
   * @throws {ValidationError} When options are invalid
   */
  constructor(options: TaxonomyParserOptions = {}) {
    const validationResult = TaxonomyParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid taxonomy parser options: ${validationResult.summary}`);
    }

    super(options);
    this.shortRows = options.shortRows ?? "error";
  }

  protected getFormatName(): string {
    return "TSV";
  }

  /**
   * Number of short rows skipped so far under the "skip" policy
   */
  get skippedRowCount(): number {
    return this.skippedRows;
  }

  /**
   * Parse taxonomy rows from a string
   * @throws {TaxonomyRowError} When a row is short and the policy is "error"
   */
  async *parseString(data: string): AsyncIterable<TaxonomyRow> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse taxonomy rows from a file
   * @throws {FileError} When the file cannot be opened
   * @throws {TaxonomyRowError} When a row is short and the policy is "error"
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<TaxonomyRow> {
    const stream = await createStream(filePath, options);
    try {
      yield* this.parse(stream);
    } catch (error) {
      if (error instanceof TaxmergeError) {
        throw error;
      }
      throw new FileError(
        `Failed to read taxonomy file '${filePath}': ${describeError(error)}`,
        filePath,
        "read",
        error
      );
    }
  }

  /**
   * Parse taxonomy rows from a byte stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<TaxonomyRow> {
    yield* this.parseLines(readLines(stream));
  }

  private async *parseLines(
    lines: AsyncIterable<string> | Iterable<string>
  ): AsyncIterable<TaxonomyRow> {
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.checkAborted();

      // Header row, dropped unconditionally
      if (lineNumber === 1) continue;

      if (line.length > this.options.maxLineLength) {
        this.options.onError(
          `Line too long (${line.length} > ${this.options.maxLineLength})`,
          lineNumber
        );
        continue;
      }

      // Blank lines are skipped; a line of tabs is a short row
      if (line.trim() === "" && !line.includes("\t")) continue;

      const fields = splitTaxonomyFields(line);
      const [id, taxonomy] = fields;
      if (id === undefined || taxonomy === undefined) {
        this.handleShortRow(fields.length, lineNumber, line);
        continue;
      }

      if (!this.options.skipValidation && id.trim() === "") {
        this.options.onError("Taxonomy row has an empty sequence id", lineNumber);
        continue;
      }

      yield this.options.trackLineNumbers ? { id, taxonomy, lineNumber } : { id, taxonomy };
    }
  }

  private handleShortRow(fieldCount: number, lineNumber: number, line: string): void {
    const message = `Taxonomy row has ${fieldCount} field(s); expected an id and a taxonomy string`;

    if (this.shortRows === "error") {
      throw new TaxonomyRowError(message, fieldCount, lineNumber, line);
    }

    this.skippedRows++;
    this.options.onWarning(`${message}, skipping`, lineNumber);
  }
}

/**
 * Split a table line on tabs
 *
 * Trailing empty fields are dropped, so `"ID1\t"` yields one field and
 * counts as a short row. Fields after the second are kept but unused.
 */
export function splitTaxonomyFields(line: string): string[] {
  const fields = line.split("\t");
  while (fields.length > 0 && fields[fields.length - 1] === "") {
    fields.pop();
  }
  return fields;
}
