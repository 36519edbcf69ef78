import type { EvolutionConstants } from "./constants.js";
import { randomGene, type Genome } from "./genome.js";

export type ScoredGenome = {
  readonly genome: Genome;
  readonly fitness: number;
};

export type RandomSource = () => number;

export function normalizeRandom(random: RandomSource | undefined): RandomSource {
  if (!random) {
    return () => Math.random();
  }
  return () => {
    const value = random();
    if (!Number.isFinite(value) || value <= 0) {
      return 0;
    }
    if (value >= 1) {
      return 0.999999999999;
    }
    return value;
  };
}

function byFitnessDescending(left: ScoredGenome, right: ScoredGenome): number {
  return right.fitness - left.fitness;
}

export function rankByFitness(population: readonly ScoredGenome[]): ScoredGenome[] {
  return [...population].sort(byFitnessDescending);
}

export function bestOf(population: readonly ScoredGenome[]): ScoredGenome | undefined {
  let best: ScoredGenome | undefined;
  for (const individual of population) {
    if (!best || individual.fitness > best.fitness) {
      best = individual;
    }
  }
  return best;
}

export function averageFitness(population: readonly ScoredGenome[]): number {
  if (population.length === 0) {
    return 0;
  }
  let total = 0;
  for (const individual of population) {
    total += individual.fitness;
  }
  return total / population.length;
}

/**
 * Maximizing selection: parent groups are filled from the fittest individuals
 * downwards, wrapping around the ranked pool when it runs out.
 */
export function selectParents(
  population: readonly ScoredGenome[],
  { selectionRatio, individualsPerParents }: Pick<
    EvolutionConstants,
    "selectionRatio" | "individualsPerParents"
  >,
): Genome[][] {
  if (population.length === 0) {
    return [];
  }
  const ranked = rankByFitness(population);
  const groupCount = Math.floor(population.length * selectionRatio + 0.5);
  const groups: Genome[][] = [];
  let cursor = 0;
  for (let group = 0; group < groupCount; group += 1) {
    const parents: Genome[] = [];
    for (let member = 0; member < individualsPerParents; member += 1) {
      const pick = ranked[cursor % ranked.length];
      if (pick) {
        parents.push(pick.genome);
      }
      cursor += 1;
    }
    groups.push(parents);
  }
  return groups;
}

function sampleCutPoints(count: number, genomeLength: number, random: RandomSource): number[] {
  const pool = Array.from({ length: Math.max(0, genomeLength - 1) }, (_, index) => index + 1);
  const cuts: number[] = [];
  while (cuts.length < count && pool.length > 0) {
    const pickIndex = Math.min(pool.length - 1, Math.floor(random() * pool.length));
    const [picked] = pool.splice(pickIndex, 1);
    if (picked === undefined) {
      break;
    }
    cuts.push(picked);
  }
  return cuts.sort((a, b) => a - b);
}

/**
 * Multi-point crossover producing one child per parent. Child `i` copies from
 * parent `i` and moves on to the next parent at every cut point.
 */
export function crossover(
  parents: readonly Genome[],
  cutPointCount: number,
  random: RandomSource,
): Genome[] {
  const first = parents[0];
  if (!first) {
    return [];
  }
  const genomeLength = first.length;
  if (parents.some((parent) => parent.length !== genomeLength)) {
    throw new Error("All parents must share the same genome length.");
  }

  const children: Genome[] = [];
  for (let childIndex = 0; childIndex < parents.length; childIndex += 1) {
    const cuts = new Set(sampleCutPoints(cutPointCount, genomeLength, random));
    let parentIndex = childIndex;
    const child: number[] = [];
    for (let position = 0; position < genomeLength; position += 1) {
      if (cuts.has(position)) {
        parentIndex = (parentIndex + 1) % parents.length;
      }
      child.push(parents[parentIndex]?.[position] ?? first[position] ?? 0);
    }
    children.push(child);
  }
  return children;
}

export function mutate(
  genome: Genome,
  mutationRate: number,
  tagCount: number,
  random: RandomSource,
): Genome {
  return genome.map((gene) => (random() < mutationRate ? randomGene(tagCount, random) : gene));
}

/**
 * Elitist reinsertion. The best `ceil(reinsertionRatio * size)` existing
 * individuals always survive; the fittest offspring take the remaining slots.
 */
export function reinsertElitist(
  existing: readonly ScoredGenome[],
  offspring: readonly ScoredGenome[],
  reinsertionRatio: number,
): ScoredGenome[] {
  const size = existing.length;
  const eliteCount = Math.min(size, Math.ceil(reinsertionRatio * size));
  const rankedExisting = rankByFitness(existing);
  const next = rankedExisting.slice(0, eliteCount);

  for (const child of rankByFitness(offspring)) {
    if (next.length >= size) {
      break;
    }
    next.push(child);
  }
  for (const survivor of rankedExisting.slice(eliteCount)) {
    if (next.length >= size) {
      break;
    }
    next.push(survivor);
  }
  return next;
}
