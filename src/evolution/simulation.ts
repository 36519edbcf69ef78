import type { EvolutionConstants } from "./constants.js";
import { MAX_GENE_VALUE, isGenomeInRange, randomGenome, type Genome } from "./genome.js";
import {
  averageFitness,
  bestOf,
  crossover,
  mutate,
  normalizeRandom,
  reinsertElitist,
  selectParents,
  type RandomSource,
  type ScoredGenome,
} from "./operators.js";

export type GenerationSnapshot = {
  readonly generation: number;
  readonly best: ScoredGenome;
  readonly averageFitness: number;
  readonly population: readonly ScoredGenome[];
};

export type EvolutionOptions = {
  readonly constants: EvolutionConstants;
  readonly tagCount: number;
  readonly requestFitness: (genome: Genome) => Promise<number>;
  readonly signal: AbortSignal;
  /** Advisory; must not block. */
  readonly publishBest?: (genome: Genome) => void;
  readonly onGeneration?: (snapshot: GenerationSnapshot) => void;
  readonly initialPopulation?: readonly Genome[];
  readonly random?: RandomSource;
};

export type EvolutionResult = {
  readonly generations: number;
  readonly best: ScoredGenome | null;
};

async function evaluate(
  population: readonly Genome[],
  requestFitness: (genome: Genome) => Promise<number>,
): Promise<ScoredGenome[]> {
  const fitness = await Promise.all(population.map((genome) => requestFitness(genome)));
  return population.map((genome, index) => ({ genome, fitness: fitness[index] ?? 0 }));
}

function resolveInitialPopulation(
  options: EvolutionOptions,
  random: RandomSource,
): readonly Genome[] {
  const { constants, tagCount, initialPopulation } = options;
  if (!initialPopulation) {
    return Array.from({ length: constants.populationSize }, () =>
      randomGenome(constants.genomeLength, tagCount, random),
    );
  }
  for (const genome of initialPopulation) {
    if (genome.length !== constants.genomeLength || !isGenomeInRange(genome, tagCount)) {
      throw new RangeError(
        `Initial population member [${genome.join(", ")}] does not fit ` +
          `genome length ${constants.genomeLength} and ${tagCount} tags.`,
      );
    }
  }
  return initialPopulation;
}

/**
 * Runs generations until `signal` aborts. Each generation evaluates through
 * `requestFitness`, which may wait indefinitely for a human rating.
 */
export async function runEvolution(options: EvolutionOptions): Promise<EvolutionResult> {
  const { constants, tagCount, requestFitness, signal, publishBest, onGeneration } = options;
  if (!Number.isInteger(tagCount) || tagCount < 1 || tagCount > MAX_GENE_VALUE + 1) {
    throw new RangeError(
      `tagCount must be between 1 and ${MAX_GENE_VALUE + 1} (received ${tagCount}).`,
    );
  }
  const random = normalizeRandom(options.random);

  let population = resolveInitialPopulation(options, random);
  let generation = 0;
  let best: ScoredGenome | null = null;

  while (!signal.aborted) {
    const scored = await evaluate(population, requestFitness);
    if (signal.aborted) {
      break;
    }

    const offspring = selectParents(scored, constants)
      .flatMap((parents) => crossover(parents, constants.crossoverPoints, random))
      .map((child) => mutate(child, constants.mutationRate, tagCount, random));

    const scoredOffspring = await evaluate(offspring, requestFitness);
    if (signal.aborted) {
      break;
    }

    const next = reinsertElitist(scored, scoredOffspring, constants.reinsertionRatio);
    generation += 1;

    const generationBest = bestOf(next);
    if (generationBest) {
      best = generationBest;
      publishBest?.(generationBest.genome);
      onGeneration?.({
        generation,
        best: generationBest,
        averageFitness: averageFitness(next),
        population: next,
      });
    }

    population = next.map((individual) => individual.genome);
  }

  return { generations: generation, best };
}
