/**
 * Stream processing utilities for line-oriented text input
 *
 * Turns byte streams into complete lines regardless of how chunks fall
 * relative to line boundaries.
 */

import { BufferError, describeError, StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 100_000_000;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Line terminators (`\n`, `\r\n`, lone `\r`) are not included. A final line
 * without terminator is yielded as well; a trailing empty line is not.
 * When the consumer stops early the underlying stream is cancelled so the
 * file handle behind it is released.
 *
 * @throws {StreamError} If the underlying stream fails
 * @throws {BufferError} If a single line exceeds the maximum length
 *
 * @example
 * ```typescript
 * const stream = await createStream("taxonomy.tsv");
 * for await (const line of readLines(stream)) {
 *   console.log(line.split("\t")[0]);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let settled = false;

  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        settled = true;
        throw new StreamError(
          `Line reading failed: ${describeError(error)}`,
          "read",
          totalBytesProcessed
        );
      });

      if (chunk.done) {
        settled = true;
        buffer += decoder.decode();
        const result = processBuffer(buffer);
        yield* result.lines;
        const lastLine = result.remainder.endsWith("\r")
          ? result.remainder.slice(0, -1)
          : result.remainder;
        if (lastLine !== "") {
          yield lastLine;
        }
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      totalBytesProcessed += chunk.value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Process text buffer to extract complete lines
 *
 * Handles `\n`, `\r\n` and `\r` line endings and keeps any incomplete line
 * for the next processing cycle. A `\r` at the very end of the buffer is
 * kept in the remainder since it may be the first half of `\r\n`.
 *
 * @throws {BufferError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkLineLength(buffer.slice(lineStart, lineEnd)));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(checkLineLength(buffer.slice(lineStart, position)));
      lineStart = position + 1;
    }
  }

  const remainder = buffer.slice(lineStart);
  if (remainder.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      remainder.length,
      "overflow",
      "This might indicate a file without proper line endings"
    );
  }

  return { lines, remainder };
}

function checkLineLength(line: string): string {
  if (line.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      line.length,
      "overflow",
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}

/**
 * Allows peeking at the first bytes of a stream without consuming them
 * Used for magic byte detection before choosing a decompressor
 */
export class BufferedStreamReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private exhausted = false;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  /**
   * Return up to `bytes` leading bytes; fewer only if the stream ends first
   */
  async peek(bytes: number): Promise<Uint8Array> {
    while (this.buffer.length < bytes && !this.exhausted) {
      const { value, done } = await this.reader.read();
      if (done) {
        this.exhausted = true;
      } else {
        const merged = new Uint8Array(this.buffer.length + value.length);
        merged.set(this.buffer);
        merged.set(value, this.buffer.length);
        this.buffer = merged;
      }
    }
    return this.buffer.slice(0, bytes);
  }

  /**
   * Stream of every byte, peeked bytes included, pulled on demand
   */
  stream(): ReadableStream<Uint8Array> {
    const reader = this.reader;
    let pending: Uint8Array | null = this.buffer.length > 0 ? this.buffer : null;
    let exhausted = this.exhausted;

    return new ReadableStream<Uint8Array>({
      async pull(controller) {
        if (pending !== null) {
          controller.enqueue(pending);
          pending = null;
          return;
        }
        if (exhausted) {
          controller.close();
          return;
        }
        const { value, done } = await reader.read();
        if (done) {
          exhausted = true;
          controller.close();
        } else {
          controller.enqueue(value);
        }
      },
      async cancel(reason) {
        await reader.cancel(reason);
      },
    });
  }
}
