/**
 * Core sequence manipulation operations
 *
 * @module sequence-manipulation
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Watson-Crick pairs for uppercase DNA; every other character is its own
 * complement
 */
const DNA_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  C: "G",
  G: "C",
};

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Complement each base (A<->T, C<->G); other characters pass through
 *
 * @example
 * ```typescript
 * complement('ATCGN'); // 'TAGCN'
 * ```
 */
export function complement(sequence: string): string {
  let result = "";
  for (const base of sequence) {
    result += DNA_COMPLEMENT_MAP[base] ?? base;
  }
  return result;
}

/**
 * Reverse a sequence
 */
export function reverse(sequence: string): string {
  return Array.from(sequence).reverse().join("");
}

/**
 * Reverse complement of a DNA sequence
 *
 * Only uppercase A, C, G and T are complemented, so `N` and lowercase
 * (soft-masked) bases keep their letter and only move position.
 *
 * @example
 * ```typescript
 * reverseComplement('AACGTN'); // 'NACGTT'
 * ```
 */
export function reverseComplement(sequence: string): string {
  return reverse(complement(sequence));
}

/**
 * Convenience namespace export
 */
export const SequenceManipulation = {
  complement,
  reverse,
  reverseComplement,
} as const;
