/**
 * Replace FASTA record ids with their taxonomy lineage
 *
 * Records whose id is a key of the taxonomy table take the stored lineage
 * as their whole header; all others keep their id. The description is
 * dropped in both cases and the sequence is left untouched.
 */

import type { FastaSequence } from "../types";

/**
 * Streaming relabeler that counts what it did
 *
 * @example
 * ```typescript
 * const relabeler = new Relabeler(table.entries);
 * for await (const record of relabeler.process(parser.parseFile("gg.fasta"))) {
 *   // ...
 * }
 * console.log(relabeler.relabeled, relabeler.passedThrough);
 * ```
 */
export class Relabeler {
  private relabeledCount = 0;
  private passedThroughCount = 0;

  constructor(private readonly entries: ReadonlyMap<string, string>) {}

  /** Records that received a lineage header */
  get relabeled(): number {
    return this.relabeledCount;
  }

  /** Records that kept their own id */
  get passedThrough(): number {
    return this.passedThroughCount;
  }

  async *process(
    records: AsyncIterable<FastaSequence> | Iterable<FastaSequence>
  ): AsyncIterable<FastaSequence> {
    for await (const record of records) {
      const lineage = this.entries.get(record.id);
      if (lineage === undefined) {
        this.passedThroughCount++;
      } else {
        this.relabeledCount++;
      }

      yield {
        format: "fasta",
        id: lineage ?? record.id,
        sequence: record.sequence,
        length: record.length,
        ...(record.lineNumber !== undefined && { lineNumber: record.lineNumber }),
      };
    }
  }
}

/**
 * Relabel records against a lookup without keeping counts
 */
export function relabel(
  records: AsyncIterable<FastaSequence> | Iterable<FastaSequence>,
  entries: ReadonlyMap<string, string>
): AsyncIterable<FastaSequence> {
  return new Relabeler(entries).process(records);
}
