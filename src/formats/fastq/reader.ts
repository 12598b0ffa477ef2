/**
 * Minimal FASTQ record reader
 *
 * Reads fixed four-line records (identifier, sequence, separator, quality)
 * from a possibly-compressed file. Lines are trimmed; nothing about their
 * content is validated. Reading stops at the first record containing an
 * empty line, which covers both end of file and a truncated last record.
 */

import { openDecompressed } from "../../io/file-reader";
import { readLines } from "../../io/stream-utils";
import type { FastqRead, OpenOptions } from "../../types";

const LINES_PER_RECORD = 4;

function toRead(lines: readonly string[]): FastqRead | undefined {
  const [id, sequence, separator, quality] = lines;
  if (!id || !sequence || !separator || !quality) {
    return undefined;
  }
  return { id, sequence, separator, quality };
}

/**
 * Iterate over the records of a FASTQ file
 *
 * `.gz`, `.bz2`, `.xz` and `.zst` files are decompressed on the fly.
 *
 * @throws {FileError} If the file cannot be opened
 * @throws {StreamError} If reading or decompression fails midway
 *
 * @example
 * ```typescript
 * for await (const read of readFastq('sample_R1.fastq.gz')) {
 *   console.log(read.id, read.sequence.length);
 * }
 * ```
 */
export async function* readFastq(path: string, options: OpenOptions = {}): AsyncGenerator<FastqRead> {
  const stream = await openDecompressed(path, options);
  let record: string[] = [];

  for await (const line of readLines(stream)) {
    record.push(line.trim());
    if (record.length < LINES_PER_RECORD) {
      continue;
    }

    const read = toRead(record);
    if (read === undefined) {
      return;
    }
    yield read;
    record = [];
  }
}
