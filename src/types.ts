/**
 * Core type definitions and validation schemas
 *
 * Plain TypeScript types describe the values flowing through the library;
 * the ArkType schemas alongside them validate caller-supplied arguments and
 * options at the public boundary.
 */

import { type } from "arktype";

/**
 * Filesystem path as accepted and returned by this library
 *
 * Paths are kept as the caller wrote them; nothing is normalized or resolved
 * so derived sibling paths differ from their R1 only in the filename.
 */
export type FilePath = string;

/**
 * An ordered group of sibling FASTQ files; element i is the R(i+1) file
 */
export type FastqGroup = readonly FilePath[];

/**
 * Optional read designator letter preceding the read number
 */
export type ReadLetter = "" | "R";

/**
 * FASTQ filename extensions recognised by the patterns, compression included
 */
export type FastqExtension = ".fq" | ".fastq" | ".fq.gz" | ".fastq.gz";

/**
 * Structured view of a sequencing-read filename
 *
 * `<prefix>_<readLetter><readNumber><laneIndex?><extension>`, e.g.
 * `H4L1-4_S64_L001_R1_001.fastq.gz` is prefix `H4L1-4_S64_L001`, letter
 * `R`, read number 1, lane index `_001`, extension `.fastq.gz`.
 */
export interface FastqFilenameParts {
  /** Everything before the read designator; the sample ID for R1 files */
  readonly prefix: string;
  readonly readLetter: ReadLetter;
  readonly readNumber: number;
  /** Opaque numeric block after the read number, underscore included */
  readonly laneIndex?: string;
  readonly extension: FastqExtension;
}

/**
 * Single FASTQ record: identifier, sequence, separator and quality lines
 */
export interface FastqRead {
  readonly id: string;
  readonly sequence: string;
  /** The `+` line, kept verbatim (it may repeat the identifier) */
  readonly separator: string;
  readonly quality: string;
}

/**
 * Compression applied to a file on disk, chosen by its final suffix
 */
export type CompressionFormat = "none" | "gzip" | "bzip2" | "xz" | "zstd";

/**
 * Options for opening a possibly-compressed file
 */
export interface OpenOptions {
  /** Decompress according to the file suffix (default: true) */
  autoDecompress?: boolean;
  /** Force a format instead of looking at the suffix */
  compressionFormat?: CompressionFormat;
  /** Read chunk size in bytes (default: 65536) */
  bufferSize?: number;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Non-empty path without NUL bytes
 */
export const FilePathSchema = type("string>0").narrow(
  (path, ctx) => !path.includes("\0") || ctx.mustBe("a path without null characters")
);

/**
 * Read number used to derive sibling filenames; a positive safe integer, so
 * it prints without an exponent
 */
export const ReadNumberSchema = type("number>=1").narrow(
  (n, ctx) => Number.isSafeInteger(n) || ctx.mustBe("a safe integer")
);

export const CompressionFormatSchema = type('"none"|"gzip"|"bzip2"|"xz"|"zstd"');

export const OpenOptionsSchema = type({
  "autoDecompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
  "bufferSize?": "number>=1024",
});

/**
 * Grouping options: the reporter is checked structurally by TypeScript,
 * only its presence as an object is checked here
 */
export const GroupingOptionsSchema = type({
  "verbose?": "boolean",
  "reporter?": "object",
});
