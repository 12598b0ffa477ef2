/**
 * Tests for FASTQ filename recognition and sibling derivation
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { PatternMismatchError, ValidationError } from "../../src/errors";
import {
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
} from "../../src/formats/fastq/filename";
import { createScratchDirectory, type ScratchDirectory } from "../utils/fixtures";

const BASE = "path/to";

// R1 filename, R4 filename, sample ID; there are rarely R4 files, this
// demonstrates the substitution is not limited to pairs
const R1_NAMES: ReadonlyArray<readonly [string, string, string]> = [
  ["B001A001_1.fastq", "B001A001_4.fastq", "B001A001"],
  ["B001A001_1.fastq.gz", "B001A001_4.fastq.gz", "B001A001"],
  ["B001A001_1.fq", "B001A001_4.fq", "B001A001"],
  ["B001A001_1.fq.gz", "B001A001_4.fq.gz", "B001A001"],
  ["B001A001_R1.fastq", "B001A001_R4.fastq", "B001A001"],
  ["B001A001_R1.fastq.gz", "B001A001_R4.fastq.gz", "B001A001"],
  ["B001A001_R1.fq", "B001A001_R4.fq", "B001A001"],
  ["B001A001_R1.fq.gz", "B001A001_R4.fq.gz", "B001A001"],
  ["H4L1-4_S64_L001_R1_001.fastq.gz", "H4L1-4_S64_L001_R4_001.fastq.gz", "H4L1-4_S64_L001"],
];

const NOT_R1_NAMES = ["H4L1-4_S64_L001_R2_001.fastq.gz", "B001A001_2.fq.gz"];

describe("isFastq", () => {
  test.each(["a.fq", "a.fastq", "a.fq.gz", "a.fastq.gz", "dir/sample_R2_001.fastq.gz"])(
    "accepts %s",
    (name) => {
      expect(isFastq(name)).toBe(true);
    }
  );

  test.each(["a.FASTQ", "a.fq.bz2", "a.fastq.gz.md5", "a.fasta", "fastq", "reads.fq/notes.txt"])(
    "rejects %s",
    (name) => {
      expect(isFastq(name)).toBe(false);
    }
  );
});

describe("isFastqR1", () => {
  test.each(R1_NAMES.map(([r1]) => `${BASE}/${r1}`))("accepts %s", (path) => {
    expect(isFastqR1(path)).toBe(true);
  });

  test.each(NOT_R1_NAMES.map((name) => `${BASE}/${name}`))("rejects %s", (path) => {
    expect(isFastqR1(path)).toBe(false);
  });

  test("rejects names without an underscore before the read number", () => {
    expect(isFastqR1("sampleR1.fastq")).toBe(false);
    expect(isFastqR1("sample-1.fastq")).toBe(false);
  });

  test("rejects read numbers that merely start with 1", () => {
    expect(isFastqR1("sample_R10.fastq")).toBe(false);
    expect(isFastqR1("sample_11.fq")).toBe(false);
  });

  test("rejects unsupported extensions", () => {
    expect(isFastqR1("sample_R1.fastq.bz2")).toBe(false);
    expect(isFastqR1("sample_R1.FASTQ")).toBe(false);
  });

  test("only looks at the filename", () => {
    expect(isFastqR1("run_R1.fastq/sample_R2.fastq")).toBe(false);
    expect(isFastqR1("run_R2/sample_R1.fastq")).toBe(true);
  });
});

describe("getSampleIdFromR1", () => {
  test.each(R1_NAMES.map(([r1, , sampleId]) => [`${BASE}/${r1}`, sampleId] as const))(
    "%s has sample ID %s",
    (path, sampleId) => {
      expect(getSampleIdFromR1(path)).toBe(sampleId);
    }
  );

  test.each(NOT_R1_NAMES.map((name) => `${BASE}/${name}`))("throws for %s", (path) => {
    expect(() => getSampleIdFromR1(path)).toThrow(PatternMismatchError);
  });

  test("the error identifies the offending path", () => {
    try {
      getSampleIdFromR1("path/to/B001A001_2.fq.gz");
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(PatternMismatchError);
      if (error instanceof PatternMismatchError) {
        expect(error.path).toBe("path/to/B001A001_2.fq.gz");
        expect(error.code).toBe("PATTERN_MISMATCH");
        expect(error.message).toBe(
          "Path did not match R1 FASTQ pattern: path/to/B001A001_2.fq.gz"
        );
      }
    }
  });

  test("uses the last read designator in the name", () => {
    expect(getSampleIdFromR1("pool_1_S1_R1.fastq")).toBe("pool_1_S1");
  });
});

describe("getRnFastq", () => {
  test.each(R1_NAMES.map(([r1, r4]) => [`${BASE}/${r1}`, `${BASE}/${r4}`] as const))(
    "%s -> %s",
    (r1, r4) => {
      expect(getRnFastq(r1, 4)).toBe(r4);
    }
  );

  test.each(R1_NAMES.map(([r1]) => `${BASE}/${r1}`))("n = 1 is the identity for %s", (r1) => {
    expect(getRnFastq(r1, 1)).toBe(r1);
    expect(isFastqR1(getRnFastq(r1, 1))).toBe(true);
  });

  test.each(NOT_R1_NAMES.map((name) => `${BASE}/${name}`))("throws for %s", (path) => {
    expect(() => getRnFastq(path, 4)).toThrow(PatternMismatchError);
  });

  test("handles read numbers with several digits", () => {
    expect(getRnFastq("S_R1_001.fastq.gz", 12)).toBe("S_R12_001.fastq.gz");
  });

  test("keeps the directory part exactly as written", () => {
    expect(getRnFastq("./runs//A/S_1.fq", 2)).toBe("./runs//A/S_2.fq");
    expect(getRnFastq("S_1.fq", 2)).toBe("S_2.fq");
    expect(getRnFastq("/abs/S_R1.fq", 2)).toBe("/abs/S_R2.fq");
  });

  test.each([0, -1, 1.5, Number.NaN, 1e21, 2 ** 53])("rejects read number %s", (n) => {
    expect(() => getRnFastq("S_R1.fq", n)).toThrow(ValidationError);
  });
});

describe("parseFastqFilename", () => {
  test("splits an Illumina name into its parts", () => {
    expect(parseFastqFilename("H4L1-4_S64_L001_R2_001.fastq.gz")).toEqual({
      prefix: "H4L1-4_S64_L001",
      readLetter: "R",
      readNumber: 2,
      laneIndex: "_001",
      extension: ".fastq.gz",
    });
  });

  test("leaves out the lane index when there is none", () => {
    expect(parseFastqFilename("B001A001_2.fq")).toEqual({
      prefix: "B001A001",
      readLetter: "",
      readNumber: 2,
      extension: ".fq",
    });
  });

  test("returns undefined without a read designator", () => {
    expect(parseFastqFilename("reads.fastq")).toBeUndefined();
    expect(parseFastqFilename("sample_R1.txt")).toBeUndefined();
  });

  test("is inverted by formatFastqFilename", () => {
    for (const name of ["H4L1-4_S64_L001_R2_001.fastq.gz", "B001A001_3.fq", "x_R17.fastq"]) {
      const parts = parseFastqFilename(name);
      expect(parts).toBeDefined();
      if (parts !== undefined) {
        expect(formatFastqFilename(parts)).toBe(name);
      }
    }
  });
});

describe("parseR1Filename", () => {
  test("reads a trailing numeric block as the lane index", () => {
    expect(parseR1Filename("S_R1_2.fastq")).toEqual({
      prefix: "S",
      readLetter: "R",
      readNumber: 1,
      laneIndex: "_2",
      extension: ".fastq",
    });
  });

  test("returns undefined for other read numbers", () => {
    expect(parseR1Filename("S_R2.fastq")).toBeUndefined();
  });
});

describe("getReadNumber", () => {
  test("reads the read number of any FASTQ name", () => {
    expect(getReadNumber("dir/S_L001_R3_001.fastq.gz")).toBe(3);
    expect(getReadNumber("dir/S_1.fq")).toBe(1);
    expect(getReadNumber("dir/reads.fq")).toBeUndefined();
  });
});

describe("withReadNumber", () => {
  test.each(R1_NAMES.map(([r1]) => `${BASE}/${r1}`))(
    "maps every Rn of %s back to its R1",
    (r1) => {
      for (const n of [1, 2, 3, 4, 10]) {
        expect(withReadNumber(getRnFastq(r1, n), 1)).toBe(r1);
      }
    }
  );

  test("round-trips R1 names whose lane block is absent", () => {
    expect(withReadNumber(getRnFastq("x_5_1.fq", 3), 1)).toBe("x_5_1.fq");
  });

  test("reads a lane block without a leading zero as the read number", () => {
    const r3 = getRnFastq("S_R1_2.fastq", 3);

    expect(r3).toBe("S_R3_2.fastq");
    expect(getReadNumber(r3)).toBe(2);
    expect(withReadNumber(r3, 1)).toBe("S_R3_1.fastq");
  });

  test("accepts non-R1 names", () => {
    expect(withReadNumber("path/to/B001A001_2.fq.gz", 1)).toBe("path/to/B001A001_1.fq.gz");
  });

  test("throws for names without a read designator", () => {
    expect(() => withReadNumber("reads.fq", 2)).toThrow(PatternMismatchError);
  });
});

describe("filesystem-aware checks", () => {
  let scratch: ScratchDirectory;

  beforeEach(() => {
    scratch = createScratchDirectory();
  });

  afterEach(() => {
    scratch.remove();
  });

  test("isFastqFile requires an existing regular file", async () => {
    const file = scratch.touch("S_R2.fastq");
    const directory = scratch.mkdir("D_R1.fastq");

    expect(await isFastqFile(file)).toBe(true);
    expect(await isFastqFile(directory)).toBe(false);
    expect(await isFastqFile(scratch.path("missing_R2.fastq"))).toBe(false);
    expect(await isFastqFile(scratch.touch("notes.txt"))).toBe(false);
  });

  test("isFastqR1File requires an R1 name and a regular file", async () => {
    const r1 = scratch.touch("S_R1.fastq");
    const r2 = scratch.touch("S_R2.fastq");
    const directory = scratch.mkdir("D_R1.fastq");

    expect(await isFastqR1File(r1)).toBe(true);
    expect(await isFastqR1File(r2)).toBe(false);
    expect(await isFastqR1File(directory)).toBe(false);
    expect(await isFastqR1File(scratch.path("missing_R1.fastq"))).toBe(false);
  });
});
