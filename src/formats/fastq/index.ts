/**
 * FASTQ Format Module
 *
 * Filename conventions for paired-end and multi-read sequencing output, plus
 * a minimal four-line record reader and writer.
 *
 * @module fastq
 *
 * @example Sibling derivation
 * ```typescript
 * import { getRnFastq, isFastqR1 } from 'fastq-files';
 *
 * if (isFastqR1('B001A001_R1.fastq.gz')) {
 *   getRnFastq('B001A001_R1.fastq.gz', 2); // 'B001A001_R2.fastq.gz'
 * }
 * ```
 *
 * @example Reading records
 * ```typescript
 * import { readFastq } from 'fastq-files';
 *
 * for await (const read of readFastq('B001A001_R1.fastq.gz')) {
 *   console.log(read.id);
 * }
 * ```
 */

export { FASTQ_PATTERN, FASTQ_R1_PATTERN, FASTQ_READ_PATTERN } from "./constants";
export {
  formatFastqFilename,
  getReadNumber,
  getRnFastq,
  getSampleIdFromR1,
  isFastq,
  isFastqFile,
  isFastqR1,
  isFastqR1File,
  parseFastqFilename,
  parseR1Filename,
  withReadNumber,
} from "./filename";
export { readFastq } from "./reader";
export { formatFastq, serializeRead, writeFastq } from "./writer";
