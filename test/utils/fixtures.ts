/**
 * Shared helpers for tests that read and write real files
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Scratch directory under the OS temp dir, removed by `cleanup`
 */
export class ScratchDir {
  readonly path: string;

  constructor(prefix = "taxmerge-test-") {
    this.path = mkdtempSync(join(tmpdir(), prefix));
  }

  file(name: string): string {
    return join(this.path, name);
  }

  write(name: string, content: string | Uint8Array): string {
    const filePath = this.file(name);
    writeFileSync(filePath, content);
    return filePath;
  }

  cleanup(): void {
    rmSync(this.path, { recursive: true, force: true });
  }
}

/**
 * Byte stream over a fixed list of chunks
 */
export function streamOf(...chunks: Array<string | Uint8Array>): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(typeof chunk === "string" ? encoder.encode(chunk) : chunk);
      }
      controller.close();
    },
  });
}

/**
 * Read a byte stream to the end
 */
export async function readBytes(stream: ReadableStream<Uint8Array>): Promise<number[]> {
  const reader = stream.getReader();
  const bytes: number[] = [];
  while (true) {
    const { value, done } = await reader.read();
    if (done) break;
    bytes.push(...value);
  }
  return bytes;
}
