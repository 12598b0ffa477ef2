/**
 * File writing using Effect Platform
 *
 * Output is compressed according to the file suffix: `.gz` with fflate,
 * `.zst` with the zstd WASM module. Other suffixes are written as is.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { CompressionDetector } from "../compression";
import { compress as compressGzip } from "../compression/gzip";
import { compress as compressZstd } from "../compression/zstd";
import { CompressionError, FileError } from "../errors";
import type { CompressionFormat } from "../types";
import { runWithPlatform } from "./runtime";

/**
 * Options for writing a file
 */
export interface WriteOptions {
  /** Compress according to the file suffix (default: true) */
  autoCompress?: boolean;
  /** Format-specific level: 0-9 for gzip, 1-22 for zstd */
  compressionLevel?: number;
}

async function applyCompression(
  data: Uint8Array,
  format: CompressionFormat,
  level: number | undefined
): Promise<Uint8Array> {
  switch (format) {
    case "none":
      return data;
    case "gzip":
      return compressGzip(data, level);
    case "zstd":
      return compressZstd(data, level);
    case "bzip2":
    case "xz":
      throw new CompressionError(`Writing ${format} output is not supported`, format, "compress");
  }
}

/**
 * Write binary data to a file (overwrites if it exists)
 *
 * @throws {CompressionError} If the suffix names a format that cannot be written
 * @throws {FileError} When the write fails
 */
export async function writeBytes(
  path: string,
  content: Uint8Array,
  options: WriteOptions = {}
): Promise<void> {
  const format = (options.autoCompress ?? true) ? CompressionDetector.fromExtension(path) : "none";
  const finalData = await applyCompression(content, format, options.compressionLevel);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, finalData);
  });

  try {
    await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Write a string to a file as UTF-8 (overwrites if it exists)
 *
 * @example Automatic gzip compression
 * ```typescript
 * await writeString("reads_R1.fastq.gz", text);
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  await writeBytes(path, new TextEncoder().encode(content), options);
}
