/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { FastaParser, TaxonomyParser } from "../formats";
 * ```
 */

export { AbstractParser } from "./abstract-parser";
export {
  FastaParser,
  type FastaParserOptions,
  FastaWriter,
  isFastaHeader,
  parseFastaHeader,
  shouldSkipFastaLine,
  validateFastaSequence,
} from "./fasta";
export { splitTaxonomyFields, TaxonomyParser, type TaxonomyParserOptions } from "./taxonomy";
