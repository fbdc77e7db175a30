/**
 * Taxonomy merge operations
 *
 * Lineage cleanup and repeat labeling are pure building blocks; the table
 * loader, relabeler and `mergeTaxonomy` compose them over parsed files.
 */

export {
  cleanLineage,
  stripEmptyRankMarkers,
  stripQuotes,
  stripTrailingRankMarker,
} from "./core/lineage";
export { RepeatLabeler } from "./core/repeat-labeler";
export {
  type MergeLogLevel,
  type MergeOptions,
  type MergeSummary,
  mergeTaxonomy,
} from "./merge";
export { Relabeler, relabel } from "./relabel";
export {
  buildTaxonomyTable,
  type LoadTaxonomyOptions,
  loadTaxonomy,
  type TaxonomyTable,
  type TaxonomyTableStats,
} from "./taxonomy-table";
