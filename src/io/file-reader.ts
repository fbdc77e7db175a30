/**
 * File reading utilities built on Effect Platform
 *
 * Opens taxonomy tables and sequence databases as byte streams, checking
 * up front that the path is a readable regular file so that an unusable
 * input is reported as a FileError before any output is produced.
 */

import { extname } from "node:path";
import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { CompressionDetector } from "../compression/detector";
import { wrapStream as wrapGzipStream } from "../compression/gzip";
import { describeError, FileError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform, runEither } from "./runtime";
import { BufferedStreamReader } from "./stream-utils";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  autoDecompress: true,
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runEither(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file metadata, requiring the path to be a readable regular file
 *
 * @throws {FileError} If the file is missing, unreadable or not a regular file
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.access(validatedPath, { readable: true });
    return yield* fs.stat(validatedPath);
  });

  let info: FileSystem.File.Info;
  try {
    info = await runEither(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  if (info.type !== "File") {
    throw new FileError(
      `could not open file: ${validatedPath}: not a regular file (${info.type})`,
      validatedPath,
      "open"
    );
  }

  return {
    path: validatedPath,
    size: Number(info.size),
    lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
    extension: extname(validatedPath),
  };
}

/**
 * Create a streaming reader for a file
 *
 * The file is checked before the stream is created; gzip input is
 * decompressed transparently unless `autoDecompress` is false.
 *
 * @throws {FileError} If the file cannot be opened for reading
 *
 * @example
 * ```typescript
 * const stream = await createStream("gg_13_5.fasta.gz");
 * for await (const line of readLines(stream)) {
 *   // ...
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const mergedOptions = mergeOptions(options);
  const metadata = await getMetadata(path);

  const stream = createBaseStream(metadata.path, mergedOptions);
  if (!mergedOptions.autoDecompress) {
    return stream;
  }
  return applyDecompression(stream, metadata.path);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function createBaseStream(
  validatedPath: FilePath,
  options: Required<FileReaderOptions>
): ReadableStream<Uint8Array> {
  const effectStream = Stream.unwrap(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return fs.stream(validatedPath, { bufferSize: options.bufferSize });
    })
  ).pipe(Stream.provideLayer(getPlatform()));

  return Stream.toReadableStream(effectStream);
}

/**
 * Decide on decompression from the leading bytes, falling back to the
 * file extension when the file is too short to carry a signature
 */
async function applyDecompression(
  stream: ReadableStream<Uint8Array>,
  filePath: FilePath
): Promise<ReadableStream<Uint8Array>> {
  const buffered = new BufferedStreamReader(stream);

  let magicBytes: Uint8Array;
  try {
    magicBytes = await buffered.peek(2);
  } catch (error) {
    throw FileError.fromSystemError("read", filePath, error);
  }

  const detection = CompressionDetector.hybrid(filePath, magicBytes);
  const rest = buffered.stream();

  return detection.format === "gzip" ? wrapGzipStream(rest) : rest;
}

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${describeError(error)}`,
      path,
      "stat"
    );
  }
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...options };
}

export { validatePath };
