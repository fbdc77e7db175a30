/**
 * Merge a taxonomy table into a FASTA reference database
 *
 * The table is loaded completely, then the database is streamed record by
 * record: each id found in the table is replaced by its lineage and every
 * record is written unwrapped to the output file.
 *
 * Resources are scoped: the output handle is closed and the input stream
 * released whether the merge finishes or fails. Neither output nor input
 * is opened until the inputs before it have been read successfully, so a
 * missing taxonomy or database file never leaves an empty output behind.
 */

import { type } from "arktype";
import { Effect, Logger, LogLevel } from "effect";
import { type TaxmergeError, ValidationError, toTaxmergeError } from "../errors";
import { FastaParser, FastaWriter } from "../formats/fasta";
import { createStream } from "../io/file-reader";
import { openForWriting } from "../io/file-writer";
import { runEither } from "../io/runtime";
import type { ShortRowPolicy } from "../types";
import { Relabeler } from "./relabel";
import { type TaxonomyTableStats, loadTaxonomy } from "./taxonomy-table";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Minimum level for the merge's own log lines
 */
export type MergeLogLevel = "debug" | "info" | "warning" | "none";

export interface MergeOptions {
  /** Tab-separated id/taxonomy table; the first line is a header */
  readonly taxonomy: string;
  /** FASTA reference database, optionally gzip-compressed */
  readonly greengenes: string;
  /** Output FASTA path, created or truncated */
  readonly out: string;
  /** @default "error" */
  readonly shortRows?: ShortRowPolicy;
  /** Pass records without sequence lines through instead of failing @default false */
  readonly allowEmptySequences?: boolean;
  /** Check sequence characters against IUPAC codes @default false */
  readonly validateSequences?: boolean;
  /** @default "info" */
  readonly logLevel?: MergeLogLevel;
  readonly signal?: AbortSignal;
  /** Receives parser warnings; defaults to console.warn */
  readonly onWarning?: (warning: string, lineNumber?: number) => void;
}

export interface MergeSummary {
  readonly taxonomy: TaxonomyTableStats;
  /** Records written */
  readonly records: number;
  /** Records whose header was replaced by a lineage */
  readonly relabeled: number;
  /** Records that kept their own id */
  readonly passedThrough: number;
  readonly elapsedMs: number;
}

const MergeOptionsSchema = type({
  taxonomy: "string>0",
  greengenes: "string>0",
  out: "string>0",
  "shortRows?": "'error' | 'skip'",
  "allowEmptySequences?": "boolean",
  "validateSequences?": "boolean",
  "logLevel?": "'debug' | 'info' | 'warning' | 'none'",
});

const LOG_LEVELS: Record<MergeLogLevel, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  none: LogLevel.None,
};

// =============================================================================
// MERGE
// =============================================================================

/**
 * Relabel every record of `greengenes` using `taxonomy` and write `out`
 *
 * @throws {ValidationError} When options are invalid
 * @throws {FileError} When an input cannot be opened or the output cannot be written
 * @throws {ParseError} When either input is malformed
 *
 * @example
 * ```typescript
 * const summary = await mergeTaxonomy({
 *   taxonomy: "gg_13_5_taxonomy.txt",
 *   greengenes: "gg_13_5.fasta.gz",
 *   out: "gg_13_5_tax.fasta",
 * });
 * console.log(`${summary.relabeled} of ${summary.records} records relabeled`);
 * ```
 */
export async function mergeTaxonomy(options: MergeOptions): Promise<MergeSummary> {
  const validationResult = MergeOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid merge options: ${validationResult.summary}`);
  }

  const parser = new FastaParser({
    skipValidation: options.validateSequences !== true,
    allowEmptySequences: options.allowEmptySequences ?? false,
    ...(options.signal !== undefined && { signal: options.signal }),
    ...(options.onWarning !== undefined && { onWarning: options.onWarning }),
  });
  const writer = new FastaWriter({ lineWidth: 0, includeDescription: false });

  const program = Effect.gen(function* () {
    const startedAt = Date.now();

    yield* Effect.logInfo("Loading taxonomy table").pipe(
      Effect.annotateLogs("file", options.taxonomy)
    );
    const table = yield* attempt(() =>
      loadTaxonomy(options.taxonomy, {
        ...(options.shortRows !== undefined && { shortRows: options.shortRows }),
        ...(options.signal !== undefined && { signal: options.signal }),
        ...(options.onWarning !== undefined && { onWarning: options.onWarning }),
      })
    );
    yield* Effect.logDebug("Taxonomy table loaded").pipe(
      Effect.annotateLogs({
        rows: table.stats.rows,
        entries: table.stats.entries,
        repeats: table.stats.repeats,
        overwrittenIds: table.stats.overwrittenIds,
        skippedRows: table.stats.skippedRows,
      })
    );

    const input = yield* Effect.acquireRelease(
      attempt(() => createStream(options.greengenes)),
      (stream) =>
        Effect.tryPromise(() => stream.cancel()).pipe(
          Effect.catchAll((error) => Effect.logDebug("Input stream already released", error))
        )
    );

    yield* Effect.logInfo("Relabeling sequences").pipe(
      Effect.annotateLogs({ input: options.greengenes, output: options.out })
    );
    const relabeler = new Relabeler(table.entries);
    const records = yield* attempt(() =>
      openForWriting(options.out, (handle) =>
        writer.writeAll(relabeler.process(parser.parse(input)), handle)
      )
    );

    const summary: MergeSummary = {
      taxonomy: table.stats,
      records,
      relabeled: relabeler.relabeled,
      passedThrough: relabeler.passedThrough,
      elapsedMs: Date.now() - startedAt,
    };

    yield* Effect.logInfo("Merge complete").pipe(
      Effect.annotateLogs({
        records: summary.records,
        relabeled: summary.relabeled,
        passedThrough: summary.passedThrough,
        repeats: summary.taxonomy.repeats,
        elapsedMs: summary.elapsedMs,
      })
    );
    return summary;
  });

  return runEither(
    program.pipe(
      Effect.scoped,
      Logger.withMinimumLogLevel(LOG_LEVELS[options.logLevel ?? "info"])
    )
  );
}

function attempt<A>(run: () => Promise<A>): Effect.Effect<A, TaxmergeError> {
  return Effect.tryPromise({
    try: run,
    catch: (error) => toTaxmergeError(error),
  });
}
