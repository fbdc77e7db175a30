/**
 * Gzip stream decompression
 *
 * Uses the Web Streams `DecompressionStream`, so decompression happens
 * chunk by chunk as the FASTA parser pulls lines.
 */

import { DecompressionStream } from 'node:stream/web';
import { CompressionError, describeError } from '../errors';

/**
 * Wrap compressed readable stream with gzip decompression
 *
 * @throws {CompressionError} If the decompressor cannot be attached
 *
 * @example
 * ```typescript
 * const decompressed = wrapStream(compressedStream);
 * for await (const line of readLines(decompressed)) {
 *   // ...
 * }
 * ```
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  try {
    return input.pipeThrough(new DecompressionStream('gzip'));
  } catch (err) {
    throw new CompressionError(
      `stream operation failed for gzip: ${describeError(err)}`,
      'gzip',
      'stream'
    );
  }
}
