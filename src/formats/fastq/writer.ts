/**
 * Minimal FASTQ record writer
 */

import type { WriteOptions } from "../../io/file-writer";
import { writeString } from "../../io/file-writer";
import type { FastqRead } from "../../types";

/**
 * The four lines of a record joined by newlines, without a trailing newline
 */
export function serializeRead(read: FastqRead): string {
  return [read.id, read.sequence, read.separator, read.quality].join("\n");
}

/**
 * Records as FASTQ text, each followed by a newline
 */
export function formatFastq(reads: Iterable<FastqRead>): string {
  let output = "";
  for (const read of reads) {
    output += `${serializeRead(read)}\n`;
  }
  return output;
}

/**
 * Write records to a FASTQ file, compressed according to its suffix
 *
 * @returns Number of records written
 * @throws {FileError} If the file cannot be written
 *
 * @example
 * ```typescript
 * const count = await writeFastq('trimmed_R1.fastq.gz', reads);
 * ```
 */
export async function writeFastq(
  path: string,
  reads: Iterable<FastqRead> | AsyncIterable<FastqRead>,
  options: WriteOptions = {}
): Promise<number> {
  const collected: FastqRead[] = [];
  for await (const read of reads) {
    collected.push(read);
  }

  await writeString(path, formatFastq(collected), options);
  return collected.length;
}
