/**
 * Tests for compression format detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";
import { CompressionError } from "../../src/errors";

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test.each([
      ["sample_R1.fastq.gz", "gzip"],
      ["sample_R1.fastq.gzip", "gzip"],
      ["sample_R1.fastq.bz2", "bzip2"],
      ["sample_R1.fastq.xz", "xz"],
      ["sample_R1.fastq.zst", "zstd"],
      ["sample_R1.fastq.zstd", "zstd"],
      ["sample_R1.fastq", "none"],
      ["sample_R1.fq", "none"],
      ["notes.txt", "none"],
    ] as const)("%s is %s", (path, format) => {
      expect(CompressionDetector.fromExtension(path)).toBe(format);
    });

    test("ignores the case of the suffix", () => {
      expect(CompressionDetector.fromExtension("READS.FASTQ.GZ")).toBe("gzip");
      expect(CompressionDetector.fromExtension("reads.fastq.Bz2")).toBe("bzip2");
    });

    test("only the final suffix counts", () => {
      expect(CompressionDetector.fromExtension("reads.gz.fastq")).toBe("none");
      expect(CompressionDetector.fromExtension("archive.gz/reads.fastq")).toBe("none");
    });

    test("files without a suffix are uncompressed", () => {
      expect(CompressionDetector.fromExtension("runs/gz")).toBe("none");
      expect(CompressionDetector.fromExtension(".gz")).toBe("none");
      expect(CompressionDetector.fromExtension("runs/data.gz/")).toBe("none");
    });

    test("rejects an empty path", () => {
      expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
      expect(() => CompressionDetector.fromExtension("")).toThrow("File path must not be empty");
    });
  });

  describe("isCompressed", () => {
    test("is true for every compression suffix", () => {
      for (const path of ["a.gz", "a.bz2", "a.xz", "a.zst"]) {
        expect(CompressionDetector.isCompressed(path)).toBe(true);
      }
    });

    test("is false for plain files", () => {
      expect(CompressionDetector.isCompressed("a.fastq")).toBe(false);
    });
  });
});
