/**
 * FASTQ filename recognition and sibling derivation
 *
 * Pure functions over path strings: nothing here touches the filesystem
 * except the `*File` variants, which add a regular-file check.
 *
 * @module fastq/filename
 *
 * @example Deriving the R2 of an Illumina R1
 * ```typescript
 * import { getRnFastq, getSampleIdFromR1 } from 'fastq-files';
 *
 * const r1 = 'runs/H4L1-4_S64_L001_R1_001.fastq.gz';
 * getSampleIdFromR1(r1); // 'H4L1-4_S64_L001'
 * getRnFastq(r1, 2);     // 'runs/H4L1-4_S64_L001_R2_001.fastq.gz'
 * ```
 */

import { sep } from "node:path";
import { type } from "arktype";
import { PatternMismatchError, ValidationError } from "../../errors";
import { isFile } from "../../io/file-reader";
import type { FastqExtension, FastqFilenameParts, FilePath } from "../../types";
import { ReadNumberSchema } from "../../types";
import { FASTQ_PATTERN, FASTQ_R1_PATTERN, FASTQ_READ_PATTERN } from "./constants";

// =============================================================================
// PARSING
// =============================================================================

const FASTQ_EXTENSIONS: readonly FastqExtension[] = [".fq", ".fastq", ".fq.gz", ".fastq.gz"];

function isFastqExtension(value: string): value is FastqExtension {
  return FASTQ_EXTENSIONS.some((extension) => extension === value);
}

function toParts(match: RegExpExecArray | null, readNumber?: number): FastqFilenameParts | undefined {
  const groups = match?.groups;
  if (groups === undefined) {
    return undefined;
  }

  const { prefix, letter, read, lane, extension } = groups;
  if (prefix === undefined || extension === undefined || !isFastqExtension(extension)) {
    return undefined;
  }

  return {
    prefix,
    readLetter: letter === "R" ? "R" : "",
    readNumber: readNumber ?? Number(read),
    ...(lane !== undefined && { laneIndex: lane }),
    extension,
  };
}

/**
 * Parse a FASTQ filename carrying any read number
 *
 * @param filename Bare filename, without directory
 * @returns Structured parts, or undefined when the name has no read designator
 */
export function parseFastqFilename(filename: string): FastqFilenameParts | undefined {
  return toParts(FASTQ_READ_PATTERN.exec(filename));
}

/**
 * Parse an R1 FASTQ filename
 *
 * Differs from {@link parseFastqFilename} on names with several candidate
 * designators: `S_R1_2.fq` is R1 with lane block `_2` here, but read 2 there.
 */
export function parseR1Filename(filename: string): FastqFilenameParts | undefined {
  return toParts(FASTQ_R1_PATTERN.exec(filename), 1);
}

/**
 * Reassemble a filename from its parts; inverse of the parsers
 */
export function formatFastqFilename(parts: FastqFilenameParts): string {
  return `${parts.prefix}_${parts.readLetter}${parts.readNumber}${parts.laneIndex ?? ""}${parts.extension}`;
}

// =============================================================================
// PATH HELPERS
// =============================================================================

/**
 * Split a path into its directory part (trailing separator kept) and filename
 *
 * Slicing keeps the directory part byte-for-byte, where path.join would
 * normalize it.
 */
function splitPath(filePath: FilePath): { directory: string; filename: string } {
  const slash = filePath.lastIndexOf("/");
  const backslash = sep === "\\" ? filePath.lastIndexOf("\\") : -1;
  const index = Math.max(slash, backslash);
  return { directory: filePath.slice(0, index + 1), filename: filePath.slice(index + 1) };
}

function validateReadNumber(n: number): number {
  const result = ReadNumberSchema(n);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid read number ${n}: ${result.summary}`);
  }
  return result;
}

function requireR1Parts(filePath: FilePath): FastqFilenameParts {
  const parts = parseR1Filename(splitPath(filePath).filename);
  if (parts === undefined) {
    throw new PatternMismatchError(filePath);
  }
  return parts;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Whether the filename ends in a FASTQ extension (.fq, .fastq, optionally .gz)
 */
export function isFastq(filePath: FilePath): boolean {
  return FASTQ_PATTERN.test(splitPath(filePath).filename);
}

/**
 * {@link isFastq} and the path is an existing regular file
 */
export async function isFastqFile(filePath: FilePath): Promise<boolean> {
  return isFastq(filePath) && (await isFile(filePath));
}

/**
 * Whether the filename is an R1 FASTQ name; `_2.fq.gz` or `_R2_001.fastq.gz`
 * are rejected
 */
export function isFastqR1(filePath: FilePath): boolean {
  return parseR1Filename(splitPath(filePath).filename) !== undefined;
}

/**
 * {@link isFastqR1} and the path is an existing regular file
 */
export async function isFastqR1File(filePath: FilePath): Promise<boolean> {
  return isFastqR1(filePath) && (await isFile(filePath));
}

/**
 * Sample ID of an R1 file: the filename with read designator, lane block and
 * extension removed
 *
 * @throws {PatternMismatchError} If the filename is not an R1 FASTQ name
 */
export function getSampleIdFromR1(filePath: FilePath): string {
  return requireR1Parts(filePath).prefix;
}

/**
 * Path of the Rn sibling of an R1 file
 *
 * Only the read number changes; directory, `R` letter, lane block and
 * extension are kept as written. `getRnFastq(path, 1)` returns `path`.
 *
 * @throws {PatternMismatchError} If the filename is not an R1 FASTQ name
 * @throws {ValidationError} If n is not a positive safe integer
 */
export function getRnFastq(filePath: FilePath, n: number): FilePath {
  const readNumber = validateReadNumber(n);
  const parts = requireR1Parts(filePath);
  const { directory } = splitPath(filePath);
  return directory + formatFastqFilename({ ...parts, readNumber });
}

/**
 * Read number of a FASTQ filename, or undefined when it has none
 */
export function getReadNumber(filePath: FilePath): number | undefined {
  return parseFastqFilename(splitPath(filePath).filename)?.readNumber;
}

/**
 * Replace the read number of any FASTQ filename carrying one
 *
 * Unlike {@link getRnFastq}, the input may be an R2..Rn file, so an Rn path
 * can be mapped back to its R1. The name is read with the any-read pattern:
 * when the R1 name has a lane block without a leading zero, the Rn name is
 * ambiguous and the lane block is taken for the read number, so
 * `S_R3_2.fastq` maps to `S_R3_1.fastq`, not back to `S_R1_2.fastq`.
 *
 * @throws {PatternMismatchError} If the filename has no read designator
 * @throws {ValidationError} If n is not a positive safe integer
 */
export function withReadNumber(filePath: FilePath, n: number): FilePath {
  const readNumber = validateReadNumber(n);
  const { directory, filename } = splitPath(filePath);
  const parts = parseFastqFilename(filename);
  if (parts === undefined) {
    throw new PatternMismatchError(filePath, "read-numbered FASTQ");
  }
  return directory + formatFastqFilename({ ...parts, readNumber });
}
