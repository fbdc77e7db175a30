/**
 * Lineage string cleanup
 *
 * Taxonomy strings from reference tables carry quoting and placeholder
 * rank markers (`p__`, `g__`) for ranks that were never assigned. These
 * helpers remove them so the string can stand in as a FASTA header.
 *
 * @module lineage
 */

// =============================================================================
// PATTERNS
// =============================================================================

/** One character followed by `__` at the very end of the string */
const TRAILING_RANK_MARKER = /.__$/;

/** One character followed by `__;` anywhere */
const EMPTY_RANK_MARKER = /.__;/g;

// =============================================================================
// CLEANUP STEPS
// =============================================================================

/**
 * Remove every double quote
 */
export function stripQuotes(lineage: string): string {
  return lineage.replace(/"/g, "");
}

/**
 * Remove a single empty rank marker ending the string
 *
 * @example
 * ```typescript
 * stripTrailingRankMarker("k__Bacteria;p__"); // "k__Bacteria;"
 * stripTrailingRankMarker("k__Bacteria; p__"); // "k__Bacteria;"
 * ```
 */
export function stripTrailingRankMarker(lineage: string): string {
  return lineage.replace(TRAILING_RANK_MARKER, "");
}

/**
 * Remove every empty rank marker followed by `;`
 *
 * Matches do not overlap and are taken left to right, so only markers
 * written without a space before the next rank are removed.
 *
 * @example
 * ```typescript
 * stripEmptyRankMarkers("k__Bacteria;p__;c__Bacilli"); // "k__Bacteria;c__Bacilli"
 * ```
 */
export function stripEmptyRankMarkers(lineage: string): string {
  return lineage.replace(EMPTY_RANK_MARKER, "");
}

/**
 * Strip quotes, then the trailing marker, then inner markers
 *
 * @example
 * ```typescript
 * cleanLineage('"k__Bacteria;p__;g__"'); // "k__Bacteria;"
 * ```
 */
export function cleanLineage(lineage: string): string {
  return stripEmptyRankMarkers(stripTrailingRankMarker(stripQuotes(lineage)));
}
