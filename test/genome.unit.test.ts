import { describe, expect, it } from "vitest";

import {
  GenomeDecodeError,
  GenomeRangeError,
  decodeGenome,
  encodeGenome,
  genomeKey,
  genomeToPhenotype,
  isGenomeInRange,
  randomGenome,
} from "../src/evolution/genome.js";

const TAGS = ["a", "b", "c"] as const;

describe("genomeToPhenotype", () => {
  it("joins the tags selected by each gene", () => {
    expect(genomeToPhenotype([0, 1, 2], TAGS)).toBe("a, b, c");
    expect(genomeToPhenotype([2, 2, 0], TAGS)).toBe("c, c, a");
  });

  it("wraps the tags in the prefix and suffix", () => {
    expect(genomeToPhenotype([1, 0], TAGS, { prefix: "masterpiece", suffix: "4k" })).toBe(
      "masterpiece, b, a, 4k",
    );
  });

  it("rejects genes outside the tag table", () => {
    let caught: unknown;
    try {
      genomeToPhenotype([0, 3], TAGS);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(GenomeRangeError);
    expect(caught).toMatchObject({ gene: 3, index: 1 });
  });
});

describe("genome hex codec", () => {
  it("writes each gene as a big-endian 16-bit value", () => {
    expect(encodeGenome([0, 1, 0xffff])).toBe("00000001ffff");
    expect(encodeGenome([0x1234, 10])).toBe("1234000a");
  });

  it("reads upper- and lower-case hex", () => {
    expect(decodeGenome("00000001FFFF")).toEqual([0, 1, 65535]);
    expect(decodeGenome(encodeGenome([7, 300, 2]))).toEqual([7, 300, 2]);
  });

  it("rejects malformed text", () => {
    expect(() => decodeGenome("")).toThrow(GenomeDecodeError);
    expect(() => decodeGenome("abc")).toThrow(GenomeDecodeError);
    expect(() => decodeGenome("zzzz")).toThrow(GenomeDecodeError);
  });

  it("refuses genes that do not fit in 16 bits", () => {
    expect(() => encodeGenome([70_000])).toThrow(GenomeRangeError);
    expect(() => encodeGenome([-1])).toThrow(GenomeRangeError);
  });

  it("keys genomes by their encoding", () => {
    expect(genomeKey([1, 2])).toBe("00010002");
    expect(genomeKey([1, 2])).toBe(genomeKey([1, 2]));
    expect(genomeKey([1, 2])).not.toBe(genomeKey([2, 1]));
  });
});

describe("random genomes", () => {
  it("draws every gene from the tag range", () => {
    expect(randomGenome(4, 3, () => 0)).toEqual([0, 0, 0, 0]);
    expect(randomGenome(4, 3, () => 0.999999)).toEqual([2, 2, 2, 2]);
    expect(randomGenome(2, 3, () => 0.5)).toEqual([1, 1]);
  });

  it("checks membership in the tag range", () => {
    expect(isGenomeInRange([0, 2], 3)).toBe(true);
    expect(isGenomeInRange([0, 3], 3)).toBe(false);
    expect(isGenomeInRange([0.5], 3)).toBe(false);
  });
});
