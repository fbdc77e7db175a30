/**
 * Compression module for reference database input
 *
 * Gzip is the only compressed input format; output is always plain text.
 *
 * @example
 * ```typescript
 * import { CompressionDetector, wrapGzipStream } from "./compression";
 *
 * if (CompressionDetector.fromExtension("gg_13_5.fasta.gz") === "gzip") {
 *   const decompressed = wrapGzipStream(compressedStream);
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { wrapStream as wrapGzipStream } from "./gzip";

export type { CompressionDetection, CompressionFormat } from "../types";
export { CompressionError } from "../errors";
