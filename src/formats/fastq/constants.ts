/**
 * Constants for FASTQ filename recognition
 *
 * The filename grammar is the de facto contract with sequencers and upstream
 * pipelines. Two naming schemes are recognised:
 *
 * - simple: `<sample>_1.fastq.gz`, `<sample>_R1.fastq.gz`
 * - lane-indexed (Illumina): `<sample>_R1_001.fastq.gz`, where `_001` is an
 *   opaque block echoed unchanged into sibling names
 */

// ============================================================================
// EXTENSIONS
// ============================================================================

/**
 * FASTQ extension, optionally gzip-compressed. Case-sensitive.
 */
export const FASTQ_EXTENSION_SOURCE = String.raw`\.(?:fq|fastq)(?:\.gz)?`;

/**
 * Any filename ending in a FASTQ extension
 */
export const FASTQ_PATTERN = new RegExp(`^(?<stem>.*)(?<extension>${FASTQ_EXTENSION_SOURCE})$`);

// ============================================================================
// READ DESIGNATORS
// ============================================================================

/**
 * R1 filenames: `<prefix>_[R]1[_<digits>]<extension>`
 *
 * The prefix is greedy, so the last `_[R]1` block that can be followed by an
 * optional lane block and the extension is the read designator.
 */
export const FASTQ_R1_PATTERN = new RegExp(
  String.raw`^(?<prefix>.*)_(?<letter>R?)1(?<lane>_\d+)?(?<extension>${FASTQ_EXTENSION_SOURCE})$`
);

/**
 * Any read number: `<prefix>_[R]<n>[_<digits>]<extension>`
 *
 * Read numbers have no leading zero, which keeps a zero-padded lane block
 * such as `_001` from being taken for the read designator.
 */
export const FASTQ_READ_PATTERN = new RegExp(
  String.raw`^(?<prefix>.*)_(?<letter>R?)(?<read>[1-9]\d*)(?<lane>_\d+)?(?<extension>${FASTQ_EXTENSION_SOURCE})$`
);
