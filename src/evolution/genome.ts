export type Genome = readonly number[];

export type TagTable = readonly string[];

export type PhenotypeAffixes = {
  readonly prefix?: string;
  readonly suffix?: string;
};

export const PHENOTYPE_SEPARATOR = ", ";

/** Genes are stored as 16-bit unsigned integers on the wire. */
export const MAX_GENE_VALUE = 0xffff;

const GENE_HEX_WIDTH = 4;

export class GenomeRangeError extends Error {
  constructor(
    message: string,
    readonly gene: number,
    readonly index: number,
  ) {
    super(message);
    this.name = "GenomeRangeError";
  }
}

export class GenomeDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenomeDecodeError";
  }
}

export function genomeToPhenotype(
  genome: Genome,
  tags: TagTable,
  { prefix, suffix }: PhenotypeAffixes = {},
): string {
  const parts: string[] = [];
  if (prefix !== undefined) {
    parts.push(prefix);
  }
  genome.forEach((gene, index) => {
    const tag = Number.isInteger(gene) ? tags[gene] : undefined;
    if (tag === undefined) {
      throw new GenomeRangeError(
        `Gene ${gene} at position ${index} is outside the tag table (size ${tags.length}).`,
        gene,
        index,
      );
    }
    parts.push(tag);
  });
  if (suffix !== undefined) {
    parts.push(suffix);
  }
  return parts.join(PHENOTYPE_SEPARATOR);
}

export function encodeGenome(genome: Genome): string {
  const bytes = Buffer.alloc(genome.length * 2);
  genome.forEach((gene, index) => {
    if (!Number.isInteger(gene) || gene < 0 || gene > MAX_GENE_VALUE) {
      throw new GenomeRangeError(`Gene ${gene} cannot be stored in 16 bits.`, gene, index);
    }
    bytes.writeUInt16BE(gene, index * 2);
  });
  return bytes.toString("hex");
}

export function decodeGenome(text: string): Genome {
  if (text.length === 0) {
    throw new GenomeDecodeError("Encoded genome is empty.");
  }
  if (text.length % GENE_HEX_WIDTH !== 0) {
    throw new GenomeDecodeError(
      `Encoded genome length ${text.length} is not a multiple of ${GENE_HEX_WIDTH}.`,
    );
  }
  if (!/^[0-9a-fA-F]+$/u.test(text)) {
    throw new GenomeDecodeError("Encoded genome contains non-hex characters.");
  }
  const bytes = Buffer.from(text, "hex");
  const genome: number[] = [];
  for (let offset = 0; offset < bytes.length; offset += 2) {
    genome.push(bytes.readUInt16BE(offset));
  }
  return genome;
}

export function genomeKey(genome: Genome): string {
  return encodeGenome(genome);
}

export function isGenomeInRange(genome: Genome, tagCount: number): boolean {
  return genome.every((gene) => Number.isInteger(gene) && gene >= 0 && gene < tagCount);
}

export function randomGenome(length: number, tagCount: number, random: () => number): Genome {
  return Array.from({ length }, () => randomGene(tagCount, random));
}

export function randomGene(tagCount: number, random: () => number): number {
  return Math.min(tagCount - 1, Math.floor(random() * tagCount));
}
