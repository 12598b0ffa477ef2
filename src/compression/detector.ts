/**
 * Compression format detection for sequencing files
 *
 * Detection looks only at the final suffix of the path, so
 * `reads.fastq.gz` is gzip and `reads.fastq` is uncompressed. Suffixes
 * outside the table mean plain text.
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

/**
 * Final suffix (without the dot, lowercase) to compression format
 */
const COMPRESSION_SUFFIXES: Readonly<Record<string, CompressionFormat>> = {
  gz: "gzip",
  gzip: "gzip",
  bz2: "bzip2",
  xz: "xz",
  zst: "zstd",
  zstd: "zstd",
};

/**
 * Final suffix of the filename part of a path, without its dot
 */
function finalSuffix(filePath: string): string {
  const filename = filePath.slice(filePath.replace(/\\/g, "/").lastIndexOf("/") + 1);
  const dot = filename.lastIndexOf(".");
  return dot <= 0 ? "" : filename.slice(dot + 1);
}

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension('/data/sample_R1.fastq.gz'); // 'gzip'
 * CompressionDetector.fromExtension('/data/sample_R1.fastq');    // 'none'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from the final file suffix
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    return COMPRESSION_SUFFIXES[finalSuffix(filePath).toLowerCase()] ?? "none";
  }

  /**
   * Whether the path carries a compression suffix
   */
  static isCompressed(filePath: string): boolean {
    return CompressionDetector.fromExtension(filePath) !== "none";
  }
}
