/**
 * Build the id to lineage lookup used to relabel FASTA records
 *
 * Rows are cleaned with `cleanLineage` and labeled with a `RepeatLabeler`
 * in file order. The whole table is held in memory; records are looked up
 * against it only after it has been fully loaded.
 */

import type { ShortRowPolicy, TaxonomyRow } from "../types";
import { TaxonomyParser } from "../formats/taxonomy";
import { cleanLineage } from "./core/lineage";
import { RepeatLabeler } from "./core/repeat-labeler";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Counters gathered while a table is built
 */
export interface TaxonomyTableStats {
  /** Data rows read (header and skipped rows excluded) */
  readonly rows: number;
  /** Distinct ids in the finished table */
  readonly entries: number;
  /** Rows whose lineage received a `_REPEAT_<n>;` suffix */
  readonly repeats: number;
  /** Rows whose id replaced an earlier entry */
  readonly overwrittenIds: number;
  /** Short rows skipped under the "skip" policy */
  readonly skippedRows: number;
}

/**
 * Read-only lookup from sequence id to cleaned, de-duplicated lineage
 */
export interface TaxonomyTable {
  readonly entries: ReadonlyMap<string, string>;
  readonly stats: TaxonomyTableStats;
}

/**
 * Options for loading a taxonomy table from disk
 */
export interface LoadTaxonomyOptions {
  /** @default "error" */
  readonly shortRows?: ShortRowPolicy;
  readonly signal?: AbortSignal;
  /** Receives short-row warnings; defaults to console.warn */
  readonly onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// TABLE BUILDING
// =============================================================================

/**
 * Build a table from parsed rows
 *
 * A repeated id silently replaces the earlier entry (last write wins), but
 * its lineage still passes through the labeler, so the repeat counter
 * advances for it.
 *
 * @example
 * ```typescript
 * const table = await buildTaxonomyTable([
 *   { id: "ID1", taxonomy: '"k__Bacteria;p__Proteo"' },
 *   { id: "ID2", taxonomy: "k__Bacteria;p__Proteo" },
 * ]);
 * table.entries.get("ID2"); // "k__Bacteria;p__Proteo_REPEAT_2;"
 * ```
 */
export async function buildTaxonomyTable(
  rows: AsyncIterable<TaxonomyRow> | Iterable<TaxonomyRow>
): Promise<TaxonomyTable> {
  const entries = new Map<string, string>();
  const labeler = new RepeatLabeler();
  let rowCount = 0;
  let overwrittenIds = 0;

  for await (const row of rows) {
    rowCount++;
    if (entries.has(row.id)) {
      overwrittenIds++;
    }
    entries.set(row.id, labeler.label(cleanLineage(row.taxonomy)));
  }

  return {
    entries,
    stats: {
      rows: rowCount,
      entries: entries.size,
      repeats: labeler.repeats,
      overwrittenIds,
      skippedRows: 0,
    },
  };
}

/**
 * Read and build a table from a tab-separated file
 *
 * @throws {FileError} When the file cannot be opened
 * @throws {TaxonomyRowError} When a row is short and the policy is "error"
 */
export async function loadTaxonomy(
  filePath: string,
  options: LoadTaxonomyOptions = {}
): Promise<TaxonomyTable> {
  const parser = new TaxonomyParser({
    ...(options.shortRows !== undefined && { shortRows: options.shortRows }),
    ...(options.signal !== undefined && { signal: options.signal }),
    ...(options.onWarning !== undefined && { onWarning: options.onWarning }),
  });

  const table = await buildTaxonomyTable(parser.parseFile(filePath));
  return {
    entries: table.entries,
    stats: { ...table.stats, skippedRows: parser.skippedRowCount },
  };
}
