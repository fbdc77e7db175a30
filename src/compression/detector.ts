/**
 * Compression format detection for sequence databases
 *
 * Reference databases are commonly distributed gzipped; detection uses the
 * gzip magic bytes and falls back to the file extension.
 */

import { CompressionError } from '../errors';
import type { CompressionDetection, CompressionFormat } from '../types';

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = ['.gz', '.gzip'] as const;

const MAGIC_BYTES_CONFIDENCE = 1.0;
const EXTENSION_ONLY_CONFIDENCE = 0.6;

/**
 * Gzip detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension('/data/gg_13_5.fasta.gz'); // 'gzip'
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * detection.format; // 'gzip'
 * detection.confidence; // 1.0
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, '/');
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? 'gzip' : 'none';
  }

  /**
   * Detect compression format from the leading bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    const isGzip =
      bytes.length >= 2 && bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE;

    return {
      format: isGzip ? 'gzip' : 'none',
      confidence: bytes.length >= 2 ? MAGIC_BYTES_CONFIDENCE : 0,
      detectionMethod: 'magic-bytes',
    };
  }

  /**
   * Combine both methods
   *
   * Magic bytes decide whenever at least two bytes are available, so a
   * plain-text file named `.gz` is read as plain text. The extension only
   * decides for files too short to carry a signature.
   */
  static hybrid(filePath: string, bytes: Uint8Array): CompressionDetection {
    const magic = CompressionDetector.fromMagicBytes(bytes);
    if (magic.confidence > 0) {
      return { ...magic, detectionMethod: 'hybrid' };
    }

    return {
      format: CompressionDetector.fromExtension(filePath),
      confidence: EXTENSION_ONLY_CONFIDENCE,
      detectionMethod: 'extension',
    };
  }
}
