/**
 * fastq-files - discover, pair and group FASTQ sequencing-read files
 *
 * Recognises R1 files by filename convention, derives their R2..Rn
 * siblings, verifies whole groups exist on disk and groups files by
 * directory. Also reads and writes plain four-line FASTQ records from
 * possibly-compressed files.
 */

// Compression infrastructure
export {
  Bzip2Decompressor,
  CompressionDetector,
  createDecompressor,
  type Decompressor,
  GzipDecompressor,
  isCompressionSupported,
  XzDecompressor,
  ZstdDecompressor,
} from "./compression";
// Error types
export {
  CompressionError,
  FastqFilesError,
  FileError,
  InvariantError,
  PatternMismatchError,
  StreamError,
  ValidationError,
} from "./errors";
// FASTQ filenames and records
export {
  formatFastq,
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
  readFastq,
  serializeRead,
  withReadNumber,
  writeFastq,
} from "./formats/fastq";
// File I/O infrastructure
export { exists, isDirectory, isFile, openDecompressed, walkFiles } from "./io/file-reader";
export { type WriteOptions, writeBytes, writeString } from "./io/file-writer";
export { readLines } from "./io/stream-utils";
// Operations
export {
  complement,
  reverse,
  reverseComplement,
  SequenceManipulation,
} from "./operations/core/sequence-manipulation";
export {
  collectFastqFilesByDirectory,
  findAllFastqFiles,
  findGroupedFastqFiles,
  findR1FastqFiles,
  type GroupingOptions,
} from "./operations/grouping";
export {
  type CollectingReporter,
  type ConsoleReporterOptions,
  createCollectingReporter,
  createConsoleReporter,
  formatGroupedLines,
  formatUngroupedLines,
  type GroupingReporter,
} from "./operations/reporter";
// Core types
export type {
  CompressionFormat,
  FastqExtension,
  FastqFilenameParts,
  FastqGroup,
  FastqRead,
  FilePath,
  OpenOptions,
  ReadLetter,
} from "./types";
export {
  CompressionFormatSchema,
  FilePathSchema,
  GroupingOptionsSchema,
  OpenOptionsSchema,
  ReadNumberSchema,
} from "./types";
