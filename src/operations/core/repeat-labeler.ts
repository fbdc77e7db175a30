/**
 * Distinct labels for taxonomy strings shared by several sequences
 *
 * Several reference sequences often resolve to the same cleaned lineage.
 * The first keeps the lineage unchanged; every later one gets a numbered
 * `_REPEAT_<n>;` suffix so the merged FASTA headers stay unique.
 *
 * @module repeat-labeler
 */

/**
 * Occurrence counter keyed by cleaned lineage
 *
 * Memory is O(U) where U is the number of distinct lineages seen.
 *
 * @example
 * ```typescript
 * const labeler = new RepeatLabeler();
 * labeler.label("k__Bacteria;p__Proteo"); // "k__Bacteria;p__Proteo"
 * labeler.label("k__Bacteria;p__Proteo"); // "k__Bacteria;p__Proteo_REPEAT_2;"
 * labeler.label("k__Bacteria;p__Proteo"); // "k__Bacteria;p__Proteo_REPEAT_3;"
 * ```
 */
export class RepeatLabeler {
  private readonly counts = new Map<string, number>();
  private repeatCount = 0;

  /**
   * Return the label for the next sighting of `lineage`
   */
  label(lineage: string): string {
    const previousCount = this.counts.get(lineage);

    if (previousCount === undefined) {
      this.counts.set(lineage, 1);
      return lineage;
    }

    const count = previousCount + 1;
    this.counts.set(lineage, count);
    this.repeatCount++;
    return `${lineage}_REPEAT_${count};`;
  }

  /** Number of labels that received a suffix */
  get repeats(): number {
    return this.repeatCount;
  }
}
