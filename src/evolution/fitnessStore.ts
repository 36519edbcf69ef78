import { genomeKey, type Genome } from "./genome.js";

export type Score =
  | { readonly status: "unknown" }
  | { readonly status: "requested" }
  | { readonly status: "ready"; readonly value: number };

export const LOWEST_FITNESS = 0;
export const HIGHEST_FITNESS = 100;

/** Value handed back to waiters that were cut short by shutdown. */
export const SHUTDOWN_FITNESS = LOWEST_FITNESS;

export type FitnessStore = {
  /**
   * Resolves with the genome's rating. The first request for an unseen genome
   * queues it for the feedback loop; there is no timeout, only shutdown ends a wait.
   */
  requestFitness: (genome: Genome) => Promise<number>;
  /** Last write wins, so a genome can be re-rated. */
  rate: (genome: Genome, value: number) => void;
  drainPending: () => Genome[];
  requeue: (genome: Genome) => boolean;
  getScore: (genome: Genome) => Score;
  readonly pendingCount: number;
};

export type FitnessStoreOptions = {
  readonly signal: AbortSignal;
};

type Entry =
  | { readonly status: "requested"; readonly genome: Genome }
  | { readonly status: "ready"; readonly genome: Genome; readonly value: number };

export function createFitnessStore({ signal }: FitnessStoreOptions): FitnessStore {
  const entries = new Map<string, Entry>();
  const pending = new Map<string, Genome>();
  const waiters = new Map<string, Set<(value: number) => void>>();

  const releaseAll = (value: number) => {
    const groups = [...waiters.values()];
    waiters.clear();
    for (const group of groups) {
      for (const resolve of group) {
        resolve(value);
      }
    }
  };

  signal.addEventListener("abort", () => releaseAll(SHUTDOWN_FITNESS), { once: true });

  const requestFitness = (genome: Genome): Promise<number> => {
    if (signal.aborted) {
      return Promise.resolve(SHUTDOWN_FITNESS);
    }
    const key = genomeKey(genome);
    const entry = entries.get(key);
    if (entry?.status === "ready") {
      return Promise.resolve(entry.value);
    }
    if (!entry) {
      const copy = [...genome];
      entries.set(key, { status: "requested", genome: copy });
      pending.set(key, copy);
    }
    return new Promise<number>((resolve) => {
      let group = waiters.get(key);
      if (!group) {
        group = new Set();
        waiters.set(key, group);
      }
      group.add(resolve);
    });
  };

  const rate = (genome: Genome, value: number) => {
    if (!Number.isInteger(value) || value < LOWEST_FITNESS || value > HIGHEST_FITNESS) {
      throw new RangeError(
        `Fitness must be an integer in [${LOWEST_FITNESS}, ${HIGHEST_FITNESS}] ` +
          `(received ${value}).`,
      );
    }
    const key = genomeKey(genome);
    entries.set(key, { status: "ready", genome: [...genome], value });
    pending.delete(key);
    const group = waiters.get(key);
    if (!group) {
      return;
    }
    waiters.delete(key);
    for (const resolve of group) {
      resolve(value);
    }
  };

  const drainPending = (): Genome[] => {
    const drained = [...pending.values()];
    pending.clear();
    return drained;
  };

  const requeue = (genome: Genome): boolean => {
    const key = genomeKey(genome);
    const entry = entries.get(key);
    if (entry?.status !== "requested" || signal.aborted) {
      return false;
    }
    pending.set(key, entry.genome);
    return true;
  };

  const getScore = (genome: Genome): Score => {
    const entry = entries.get(genomeKey(genome));
    if (!entry) {
      return { status: "unknown" };
    }
    if (entry.status === "ready") {
      return { status: "ready", value: entry.value };
    }
    return { status: "requested" };
  };

  return {
    requestFitness,
    rate,
    drainPending,
    requeue,
    getScore,
    get pendingCount() {
      return pending.size;
    },
  };
}
