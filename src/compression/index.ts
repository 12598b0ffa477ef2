/**
 * Compression module for sequencing files
 *
 * A closed set of formats, each with a stream decompressor, selected by the
 * final file suffix. Unknown suffixes are read as uncompressed text.
 *
 * @example Auto-detection and decompression
 * ```typescript
 * import { CompressionDetector, createDecompressor } from 'fastq-files';
 *
 * const format = CompressionDetector.fromExtension('sample_R1.fastq.bz2');
 * if (format !== 'none') {
 *   const decompressed = createDecompressor(format).wrapStream(compressedStream);
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { Bzip2Decompressor } from "./bzip2";
export { GzipDecompressor } from "./gzip";
export { XzDecompressor } from "./xz";
export { ZstdDecompressor } from "./zstd";

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { Bzip2Decompressor } from "./bzip2";
import { GzipDecompressor } from "./gzip";
import { XzDecompressor } from "./xz";
import { ZstdDecompressor } from "./zstd";

export type { CompressionFormat } from "../types";
export { CompressionFormatSchema } from "../types";
export { CompressionError } from "../errors";

/**
 * Decompressor for one compression format
 */
export interface Decompressor {
  readonly format: Exclude<CompressionFormat, "none">;
  wrapStream(stream: ReadableStream<Uint8Array>): ReadableStream<Uint8Array>;
}

/**
 * Factory function returning the decompressor for a format
 *
 * @throws {CompressionError} If the format is "none"
 */
export function createDecompressor(format: CompressionFormat): Decompressor {
  switch (format) {
    case "gzip":
      return GzipDecompressor;
    case "bzip2":
      return Bzip2Decompressor;
    case "xz":
      return XzDecompressor;
    case "zstd":
      return ZstdDecompressor;
    case "none":
      throw new CompressionError(
        "No decompression needed for uncompressed data",
        "none",
        "validate"
      );
  }
}

/**
 * Check whether a string names a supported compression format
 */
export function isCompressionSupported(format: string): format is CompressionFormat {
  return ["none", "gzip", "bzip2", "xz", "zstd"].includes(format);
}
