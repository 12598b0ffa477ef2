/**
 * Diagnostic reporting for FASTQ grouping
 *
 * Grouping reports what it finds through a GroupingReporter so callers can
 * collect findings or route them to their own logging. The console reporter
 * prints colored progress lines: bold green for complete groups, bold red
 * for R1 files whose siblings are missing.
 */

import chalk, { type ChalkInstance } from "chalk";
import type { FastqGroup, FilePath } from "../types";

/**
 * Receiver of grouping findings; purely informational
 */
export interface GroupingReporter {
  /** A complete group was found and is being yielded */
  grouped(group: FastqGroup): void;
  /**
   * An R1 file whose group is incomplete
   *
   * @param r1 The R1 file that started the group
   * @param present Members of the putative group that exist, R1 included
   */
  ungrouped(r1: FilePath, present: readonly FilePath[]): void;
}

export interface ConsoleReporterOptions {
  /** Line sink (default: console.error, i.e. stderr) */
  write?: (line: string) => void;
  /** Chalk instance, to force or disable colors (default: the shared instance) */
  chalk?: ChalkInstance;
}

/**
 * Lines printed for a complete group
 */
export function formatGroupedLines(group: FastqGroup, style: ChalkInstance = chalk): string[] {
  return [
    style.bold.green(`Found group of ${group.length} FASTQ files:`),
    ...group.map((path) => `\t${path}`),
  ];
}

/**
 * Lines printed for an incomplete group
 */
export function formatUngroupedLines(
  present: readonly FilePath[],
  style: ChalkInstance = chalk
): string[] {
  return [style.bold.red("Found ungrouped FASTQ file(s):"), ...present.map((path) => `\t${path}`)];
}

/**
 * Reporter printing colored lines, to stderr by default
 *
 * @example
 * ```typescript
 * const reporter = createConsoleReporter({ write: (line) => process.stdout.write(`${line}\n`) });
 * for await (const group of findGroupedFastqFiles(['runs'], 2, { reporter })) {
 *   // ...
 * }
 * ```
 */
export function createConsoleReporter(options: ConsoleReporterOptions = {}): GroupingReporter {
  const write = options.write ?? ((line: string) => console.error(line));
  const style = options.chalk ?? chalk;

  return {
    grouped(group) {
      formatGroupedLines(group, style).forEach(write);
    },
    ungrouped(_r1, present) {
      formatUngroupedLines(present, style).forEach(write);
    },
  };
}

/**
 * Reporter that keeps every finding in memory
 */
export interface CollectingReporter extends GroupingReporter {
  readonly groups: FastqGroup[];
  readonly ungroupedFiles: { r1: FilePath; present: readonly FilePath[] }[];
}

export function createCollectingReporter(): CollectingReporter {
  const groups: FastqGroup[] = [];
  const ungroupedFiles: { r1: FilePath; present: readonly FilePath[] }[] = [];

  return {
    groups,
    ungroupedFiles,
    grouped(group) {
      groups.push(group);
    },
    ungrouped(r1, present) {
      ungroupedFiles.push({ r1, present });
    },
  };
}
