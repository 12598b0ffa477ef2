/**
 * FASTQ file discovery and grouping
 *
 * Walks directory trees for R1 files, derives their R2..Rn siblings and
 * yields the groups whose members all exist. Incomplete groups are reported,
 * never thrown. Every call walks and stats the filesystem anew.
 *
 * @module grouping
 *
 * @example Paired-end discovery
 * ```typescript
 * import { findGroupedFastqFiles } from 'fastq-files';
 *
 * for await (const [r1, r2] of findGroupedFastqFiles(['runs/flowcell-A'], 2)) {
 *   console.log(`${r1} <-> ${r2}`);
 * }
 * ```
 */

import { dirname, relative, sep } from "node:path";
import { type } from "arktype";
import { InvariantError, PatternMismatchError, ValidationError } from "../errors";
import { getRnFastq, isFastqFile, isFastqR1File } from "../formats/fastq/filename";
import { isFile, walkFiles } from "../io/file-reader";
import type { FastqGroup, FilePath } from "../types";
import { GroupingOptionsSchema, ReadNumberSchema } from "../types";
import type { GroupingReporter } from "./reporter";
import { createConsoleReporter } from "./reporter";

/**
 * Options for {@link findGroupedFastqFiles}
 */
export interface GroupingOptions {
  /** Report findings to the reporter (default: true) */
  verbose?: boolean;
  /** Where findings go (default: colored lines on stderr) */
  reporter?: GroupingReporter;
}

const DEFAULT_GROUPING_OPTIONS = {
  verbose: true,
} as const;

// =============================================================================
// PRIVATE HELPERS
// =============================================================================

function toDirectoryList(directories: string | Iterable<string>): Iterable<string> {
  return typeof directories === "string" ? [directories] : directories;
}

function validateGroupSize(n: number): number {
  const result = ReadNumberSchema(n);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid group size ${n}: ${result.summary}`);
  }
  return result;
}

function validateOptions(options: GroupingOptions): void {
  const result = GroupingOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid grouping options: ${result.summary}`);
  }
}

/**
 * Putative group R1..Rn for an R1 file already known to match the pattern
 */
function buildGroup(r1: FilePath, n: number): FilePath[] {
  const group = [r1];
  for (let readNumber = 2; readNumber <= n; readNumber++) {
    try {
      group.push(getRnFastq(r1, readNumber));
    } catch (error) {
      if (error instanceof PatternMismatchError) {
        throw new InvariantError(`R1 file stopped matching the R1 pattern: ${r1}`, error.message);
      }
      throw error;
    }
  }
  return group;
}

async function presentMembers(group: readonly FilePath[]): Promise<FilePath[]> {
  const present: FilePath[] = [];
  for (const path of group) {
    if (await isFile(path)) {
      present.push(path);
    }
  }
  return present;
}

/**
 * Directory of a file relative to the root, with POSIX separators; the root
 * itself is "."
 */
function relativeDirectory(root: string, filePath: FilePath): string {
  const relativePath = relative(root, dirname(filePath));
  return relativePath === "" ? "." : relativePath.split(sep).join("/");
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Recursively find R1 FASTQ files under a directory
 *
 * Lazy, in lexicographic order of full path. Each iteration walks anew.
 *
 * @throws {FileError} If a directory cannot be read
 */
export async function* findR1FastqFiles(directory: string): AsyncGenerator<FilePath> {
  for await (const path of walkFiles(directory)) {
    if (await isFastqR1File(path)) {
      yield path;
    }
  }
}

/**
 * Recursively find every FASTQ file, whatever its read number, under each
 * directory in turn
 *
 * @throws {FileError} If a directory cannot be read
 */
export async function* findAllFastqFiles(
  directories: string | Iterable<string>
): AsyncGenerator<FilePath> {
  for (const directory of toDirectoryList(directories)) {
    for await (const path of walkFiles(directory)) {
      if (await isFastqFile(path)) {
        yield path;
      }
    }
  }
}

/**
 * Find complete groups of n FASTQ files (R1 through Rn) under each directory
 *
 * An R1 file whose siblings are not all regular files is reported as
 * ungrouped and skipped; it never causes an error.
 *
 * @param directories Directories to search, in order
 * @param n Group size; 2 for paired-end, 1 returns every R1 alone
 * @returns Groups of n paths, R1 first
 * @throws {ValidationError} If n is not a positive safe integer
 * @throws {FileError} If a directory cannot be read
 *
 * @example Four-read groups (e.g. R1/R2 plus two index reads)
 * ```typescript
 * const groups: FastqGroup[] = [];
 * for await (const group of findGroupedFastqFiles('runs', 4, { verbose: false })) {
 *   groups.push(group);
 * }
 * ```
 */
export async function* findGroupedFastqFiles(
  directories: string | Iterable<string>,
  n: number,
  options: GroupingOptions = {}
): AsyncGenerator<FastqGroup> {
  const groupSize = validateGroupSize(n);
  validateOptions(options);
  const verbose = options.verbose ?? DEFAULT_GROUPING_OPTIONS.verbose;
  const reporter = options.reporter ?? createConsoleReporter();

  for (const directory of toDirectoryList(directories)) {
    for await (const r1 of findR1FastqFiles(directory)) {
      const group = buildGroup(r1, groupSize);
      const present = await presentMembers(group);

      if (present.length === group.length) {
        if (verbose) reporter.grouped(group);
        yield group;
      } else if (verbose) {
        reporter.ungrouped(r1, present);
      }
    }
  }
}

/**
 * Collect FASTQ files under a root, keyed by their containing directory
 * relative to the root
 *
 * Keys use "/" separators and "." for the root itself. Directories without
 * FASTQ files have no key.
 *
 * @throws {FileError} If a directory cannot be read
 *
 * @example
 * ```typescript
 * const byDirectory = await collectFastqFilesByDirectory('runs');
 * byDirectory.get('flowcell-A/lane1'); // ['runs/flowcell-A/lane1/S1_R1.fastq.gz', ...]
 * ```
 */
export async function collectFastqFilesByDirectory(root: string): Promise<Map<string, FilePath[]>> {
  const byDirectory = new Map<string, FilePath[]>();

  for await (const path of findAllFastqFiles(root)) {
    const key = relativeDirectory(root, path);
    const files = byDirectory.get(key);
    if (files === undefined) {
      byDirectory.set(key, [path]);
    } else {
      files.push(path);
    }
  }

  return byDirectory;
}
