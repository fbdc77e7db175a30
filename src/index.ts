/**
 * taxmerge - label reference sequence databases with their taxonomy
 *
 * Loads an id/taxonomy table, cleans and de-duplicates every lineage, and
 * rewrites FASTA headers so each known sequence is named by its lineage.
 */

// Command line
export { type CliIO, runCli, USAGE } from "./cli";
// Compression
export { CompressionDetector, wrapGzipStream } from "./compression";
// Error types
export {
  BufferError,
  CompressionError,
  describeError,
  FileError,
  ParameterError,
  ParseError,
  SequenceError,
  StreamError,
  TaxmergeError,
  TaxonomyRowError,
  toTaxmergeError,
  ValidationError,
} from "./errors";
// Formats
export {
  FastaParser,
  type FastaParserOptions,
  FastaWriter,
  splitTaxonomyFields,
  TaxonomyParser,
  type TaxonomyParserOptions,
} from "./formats";
// File I/O
export { createStream, exists, getMetadata } from "./io/file-reader";
export { type FileWriteHandle, openForWriting } from "./io/file-writer";
export { readLines } from "./io/stream-utils";
// Operations
export {
  buildTaxonomyTable,
  cleanLineage,
  type LoadTaxonomyOptions,
  loadTaxonomy,
  type MergeLogLevel,
  type MergeOptions,
  type MergeSummary,
  mergeTaxonomy,
  RepeatLabeler,
  Relabeler,
  relabel,
  stripEmptyRankMarkers,
  stripQuotes,
  stripTrailingRankMarker,
  type TaxonomyTable,
  type TaxonomyTableStats,
} from "./operations";
// Types
export type {
  CompressionDetection,
  CompressionFormat,
  FastaSequence,
  FileMetadata,
  FileReaderOptions,
  ParserOptions,
  ShortRowPolicy,
  TaxonomyRow,
} from "./types";
