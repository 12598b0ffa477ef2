/**
 * Stream processing utilities for line-oriented text
 *
 * Converts byte streams to lines with proper buffering across chunk
 * boundaries and mixed line endings.
 */

import type { ReadableStreamDefaultReader } from "node:stream/web";
import { StreamError } from "../errors";

/**
 * Lines completed by a buffer, plus the trailing partial line
 */
interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

/**
 * Split a text buffer into complete lines
 *
 * Handles `\n`, `\r\n` and lone `\r` endings. The text after the last line
 * ending is returned as the remainder for the next chunk.
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > 0 && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(buffer.slice(lineStart, lineEnd));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      // Mac classic line ending (\r not followed by \n)
      lines.push(buffer.slice(lineStart, position));
      lineStart = position + 1;
    }
  }

  return { lines, remainder: buffer.slice(lineStart) };
}

async function readChunk(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  totalBytesProcessed: number
) {
  try {
    return await reader.read();
  } catch (error) {
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  }
}

/**
 * Convert ReadableStream<Uint8Array> to an async iterable of lines
 *
 * Stopping the iteration early cancels the underlying stream.
 *
 * @throws {StreamError} If reading the stream fails
 *
 * @example
 * ```typescript
 * const stream = await openDecompressed('sample_R1.fastq.gz');
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;
  let settled = false;

  try {
    while (true) {
      const chunk = await readChunk(reader, totalBytesProcessed).catch((error: unknown) => {
        settled = true;
        throw error;
      });

      if (chunk.done) {
        settled = true;
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      totalBytesProcessed += chunk.value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    // A lone trailing \r is a complete line ending
    const { lines, remainder } = processBuffer(buffer.endsWith("\r") ? `${buffer}\n` : buffer);
    yield* lines;
    if (remainder !== "") {
      yield remainder;
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
