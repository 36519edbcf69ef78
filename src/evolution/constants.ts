export type EvolutionConstants = {
  readonly genomeLength: number;
  readonly populationSize: number;
  readonly individualsPerParents: number;
  readonly selectionRatio: number;
  readonly crossoverPoints: number;
  readonly mutationRate: number;
  readonly reinsertionRatio: number;
};

export const DEFAULT_GENOME_LENGTH = 10;
export const MIN_GENOME_LENGTH = 2;

const INDIVIDUALS_PER_PARENTS = 3;
const SELECTION_RATIO = 0.7;
const REINSERTION_RATIO = 0.7;

/**
 * Every tuning constant of the genetic algorithm follows from the genome length.
 * Computed once per session and handed to the loop; nothing reads these from module state.
 */
export function deriveEvolutionConstants(genomeLength: number): EvolutionConstants {
  if (!Number.isInteger(genomeLength) || genomeLength < MIN_GENOME_LENGTH) {
    throw new RangeError(
      `genomeLength must be an integer >= ${MIN_GENOME_LENGTH} (received ${genomeLength}).`,
    );
  }
  const logLength = Math.log(genomeLength);
  return {
    genomeLength,
    populationSize: Math.floor(10 * logLength),
    individualsPerParents: INDIVIDUALS_PER_PARENTS,
    selectionRatio: SELECTION_RATIO,
    crossoverPoints: Math.max(1, Math.floor(genomeLength / 6)),
    mutationRate: 0.05 / logLength,
    reinsertionRatio: REINSERTION_RATIO,
  };
}
