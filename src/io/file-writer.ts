/**
 * File writing operations using Effect Platform
 *
 * Effect's scoped resource management guarantees the output handle is
 * closed whether the caller's callback resolves or throws. All Effect
 * details stay behind Promise-based functions.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { validatePath } from "./file-reader";
import { getPlatform, runEither } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is automatically closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  /**
   * Write string content (UTF-8) to the file
   */
  writeString(content: string): Promise<void>;

  /**
   * Write binary data to the file
   */
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is created if missing and truncated if present (mode 0644).
 * Errors thrown by the callback reach the caller unchanged.
 *
 * @throws {FileError} When the file cannot be opened or a write fails
 *
 * @example
 * ```typescript
 * await openForWriting("merged.fasta", async (handle) => {
 *   await handle.writeString(">k__Bacteria;p__Firmicutes\n");
 *   await handle.writeString("ACGT\n");
 * });
 * // File is closed here
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const file = yield* fs
      .open(validatedPath, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", validatedPath, error)));

    const encoder = new TextEncoder();
    const writeBytes = (content: Uint8Array): Promise<void> =>
      runEither(
        file
          .writeAll(content)
          .pipe(
            Effect.mapError((error) => FileError.fromSystemError("write", validatedPath, error))
          )
      );

    const handle: FileWriteHandle = {
      writeString: (content: string) => writeBytes(encoder.encode(content)),
      writeBytes,
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error: unknown) => error,
    });
  });

  return runEither(
    program.pipe(
      Effect.scoped, // closes the handle when the program exits
      Effect.provide(getPlatform())
    )
  );
}
