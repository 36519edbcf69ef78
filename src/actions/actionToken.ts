import { decodeGenome, encodeGenome, GenomeDecodeError, type Genome } from "../evolution/genome.js";

export const ACTION_TOKEN_PREFIX = "evo";
const SEPARATOR = "#";
const PAYLOAD_SEPARATOR = ".";

export const RATINGS = ["-2", "-1", "0", "+1", "+2"] as const;

export type Rating = (typeof RATINGS)[number];

export type ActionVerb =
  | { readonly kind: "rate"; readonly rating: Rating }
  | { readonly kind: "promote" };

export type ActionToken = {
  readonly genome: Genome;
  /** Seed of the render the control was attached to. */
  readonly seed: number;
  readonly verb: ActionVerb;
};

export class ActionTokenError extends Error {
  constructor(
    message: string,
    readonly token: string,
  ) {
    super(message);
    this.name = "ActionTokenError";
  }
}

const RATING_SCORES: Record<Rating, number> = {
  "-2": 0,
  "-1": 25,
  "0": 50,
  "+1": 75,
  "+2": 100,
};

const RATING_WIRE: Record<Rating, string> = {
  "-2": "n2",
  "-1": "n1",
  "0": "z",
  "+1": "p1",
  "+2": "p2",
};

const PROMOTE_WIRE = "promote";

export function ratingScore(rating: Rating): number {
  return RATING_SCORES[rating];
}

export function isRating(value: string): value is Rating {
  return RATINGS.some((rating) => rating === value);
}

function verbToWire(verb: ActionVerb): string {
  switch (verb.kind) {
    case "rate":
      return RATING_WIRE[verb.rating];
    case "promote":
      return PROMOTE_WIRE;
  }
}

function verbFromWire(wire: string): ActionVerb | null {
  if (wire === PROMOTE_WIRE) {
    return { kind: "promote" };
  }
  const rating = RATINGS.find((candidate) => RATING_WIRE[candidate] === wire);
  return rating ? { kind: "rate", rating } : null;
}

export function encodeActionToken({ genome, seed, verb }: ActionToken): string {
  if (!Number.isSafeInteger(seed)) {
    throw new RangeError(`Seed must be a safe integer (received ${seed}).`);
  }
  const payload = `${encodeGenome(genome)}${PAYLOAD_SEPARATOR}${seed}`;
  return [ACTION_TOKEN_PREFIX, payload, verbToWire(verb)].join(SEPARATOR);
}

export function decodeActionToken(token: string): ActionToken {
  const parts = token.split(SEPARATOR);
  if (parts.length !== 3) {
    throw new ActionTokenError(
      `Expected 3 "${SEPARATOR}"-separated components, found ${parts.length}.`,
      token,
    );
  }
  const [prefix = "", payload = "", wireVerb = ""] = parts;
  if (prefix !== ACTION_TOKEN_PREFIX) {
    throw new ActionTokenError(`Unknown action prefix "${prefix}".`, token);
  }

  const verb = verbFromWire(wireVerb);
  if (!verb) {
    throw new ActionTokenError(`Unknown action verb "${wireVerb}".`, token);
  }

  const separatorIndex = payload.indexOf(PAYLOAD_SEPARATOR);
  if (separatorIndex < 0) {
    throw new ActionTokenError("Action payload is missing its seed.", token);
  }
  const genomeText = payload.slice(0, separatorIndex);
  const seedText = payload.slice(separatorIndex + 1);
  if (!/^-?\d+$/u.test(seedText)) {
    throw new ActionTokenError(`Seed "${seedText}" is not an integer.`, token);
  }
  const seed = Number.parseInt(seedText, 10);
  if (!Number.isSafeInteger(seed)) {
    throw new ActionTokenError(`Seed "${seedText}" is out of range.`, token);
  }

  let genome: Genome;
  try {
    genome = decodeGenome(genomeText);
  } catch (error) {
    if (error instanceof GenomeDecodeError) {
      throw new ActionTokenError(error.message, token);
    }
    throw error;
  }

  return { genome, seed, verb };
}
