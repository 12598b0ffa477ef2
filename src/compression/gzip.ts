/**
 * Gzip compression and decompression
 *
 * Decompression streams through Node's zlib, whose gunzip accepts
 * concatenated gzip members (as produced by `cat *.fastq.gz`). Compression
 * of whole outputs uses fflate.
 */

import { Duplex } from "node:stream";
import { createGunzip } from "node:zlib";
import { gzipSync } from "fflate";
import { CompressionError } from "../errors";

type GzipLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

function isGzipLevel(level: number): level is GzipLevel {
  return Number.isInteger(level) && level >= 0 && level <= 9;
}

/**
 * Wrap a gzip-compressed byte stream in a decompressing one
 */
export function wrapStream(stream: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  return stream.pipeThrough(Duplex.toWeb(createGunzip()));
}

/**
 * Gzip a complete buffer
 *
 * @throws {CompressionError} If the level is outside 0-9
 */
export function compress(data: Uint8Array, level = 6): Uint8Array {
  if (!isGzipLevel(level)) {
    throw new CompressionError(`Gzip level must be 0-9, got ${level}`, "gzip", "compress");
  }
  return gzipSync(data, { level });
}

export const GzipDecompressor = {
  format: "gzip",
  wrapStream,
} as const;
