import { ratingScore, type Rating } from "../actions/actionToken.js";
import {
  DEFAULT_GENOME_LENGTH,
  deriveEvolutionConstants,
  type EvolutionConstants,
} from "../evolution/constants.js";
import { createFitnessStore, type FitnessStore } from "../evolution/fitnessStore.js";
import {
  genomeKey,
  genomeToPhenotype,
  isGenomeInRange,
  type Genome,
  type TagTable,
} from "../evolution/genome.js";
import type { RandomSource } from "../evolution/operators.js";
import { runEvolution, type GenerationSnapshot } from "../evolution/simulation.js";
import { runFeedbackLoop } from "../feedback/feedbackLoop.js";
import type { BaseGenerationParameters } from "../render/parameters.js";
import { awaitRenderWithProgress, toRenderedImages } from "../render/render.js";
import type { RenderClient, RenderProgress } from "../render/types.js";
import { createSessionTelemetry, type SessionTelemetry } from "../telemetry.js";
import { describeError } from "../utils/abort.js";
import { createLatestValueChannel, type LatestValueChannel } from "../utils/latestValue.js";
import { imageFilename, type SessionChannel } from "./channel.js";

export type SessionErrorKind =
  | "already-running"
  | "not-running"
  | "promotion-disabled"
  | "invalid-options"
  | "invalid-genome";

export class SessionError extends Error {
  constructor(
    message: string,
    readonly kind: SessionErrorKind,
  ) {
    super(message);
    this.name = "SessionError";
  }
}

export type SessionOptions = {
  readonly conversationId: string;
  readonly channel: SessionChannel;
  readonly renderClient: RenderClient;
  readonly tags: TagTable;
  readonly parameters?: BaseGenerationParameters;
  readonly prefix?: string;
  readonly suffix?: string;
  readonly hidePrompt?: boolean;
  readonly genomeLength?: number;
  /** Enables the "promote to standalone generation" control. */
  readonly promotionChannel?: SessionChannel;
  readonly telemetry?: SessionTelemetry;
  readonly random?: RandomSource;
  readonly feedbackIntervalMs?: number;
  readonly placeholder?: () => Promise<Buffer>;
  readonly onGeneration?: (snapshot: GenerationSnapshot) => void;
};

export type RatingOutcome =
  | {
      readonly status: "rated";
      readonly rating: Rating;
      readonly score: number;
      /** Absent when the session hides prompts. */
      readonly prompt?: string;
    }
  | { readonly status: "ignored"; readonly reason: "no-session" | "shutting-down" };

export type PromotionResult = {
  readonly prompt: string;
  readonly seeds: readonly number[];
};

export type PromoteOptions = {
  readonly onProgress?: (progress: RenderProgress) => void | Promise<void>;
};

export function describeRating(outcome: RatingOutcome): string {
  if (outcome.status === "ignored") {
    return "There is no active session.";
  }
  const rating = `**Rating**: ${outcome.rating}`;
  return outcome.prompt === undefined ? rating : `\`${outcome.prompt}\` | ${rating}`;
}

/**
 * One conversation's evolutionary run: the evolution loop and the feedback
 * loop, joined by a fitness store and a latest-best channel, sharing one
 * abort signal.
 */
export class EvolutionSession {
  readonly conversationId: string;
  readonly constants: EvolutionConstants;
  readonly tags: TagTable;
  /** Settles once both loops have returned. */
  readonly done: Promise<void>;

  readonly #options: SessionOptions;
  readonly #controller = new AbortController();
  readonly #store: FitnessStore;
  readonly #best: LatestValueChannel<Genome>;
  readonly #telemetry: SessionTelemetry;
  readonly #parameters: BaseGenerationParameters;
  #generations = 0;
  #stopReason: "requested" | "evolution-failed" = "requested";

  constructor(options: SessionOptions) {
    if (options.tags.length === 0) {
      throw new SessionError("A session needs at least one tag.", "invalid-options");
    }
    this.conversationId = options.conversationId;
    this.constants = deriveEvolutionConstants(options.genomeLength ?? DEFAULT_GENOME_LENGTH);
    this.tags = options.tags;
    this.#options = options;
    this.#parameters = options.parameters ?? {};
    this.#telemetry =
      options.telemetry ?? createSessionTelemetry(undefined, options.conversationId);
    this.#store = createFitnessStore({ signal: this.#controller.signal });
    this.#best = createLatestValueChannel<Genome>();

    const signal = this.#controller.signal;
    const evolution = runEvolution({
      constants: this.constants,
      tagCount: this.tags.length,
      requestFitness: (genome) => this.#store.requestFitness(genome),
      signal,
      publishBest: (genome) => this.#best.publish(genome),
      onGeneration: (snapshot) => this.#recordGeneration(snapshot),
      ...(options.random ? { random: options.random } : {}),
    }).then(
      (result) => {
        this.#generations = result.generations;
      },
      (error: unknown) => {
        this.#stopReason = "evolution-failed";
        this.#telemetry.emit({ type: "evolution.failed", error: describeError(error) });
        this.#controller.abort();
      },
    );

    const feedback = runFeedbackLoop({
      store: this.#store,
      best: this.#best,
      renderClient: options.renderClient,
      channel: options.channel,
      parameters: this.#parameters,
      describe: (genome) => this.describe(genome),
      signal,
      hidePrompt: options.hidePrompt === true,
      promotionEnabled: options.promotionChannel !== undefined,
      telemetry: this.#telemetry,
      ...(options.placeholder ? { placeholder: options.placeholder } : {}),
      ...(options.feedbackIntervalMs !== undefined
        ? { intervalMs: options.feedbackIntervalMs }
        : {}),
    });

    this.done = Promise.all([evolution, feedback]).then(async () => {
      this.#best.close();
      this.#telemetry.emit({
        type: "session.stopped",
        reason: this.#stopReason,
        generations: this.#generations,
      });
      await this.#telemetry.flush();
    });
  }

  get isShuttingDown(): boolean {
    return this.#controller.signal.aborted;
  }

  get generations(): number {
    return this.#generations;
  }

  get hidePrompt(): boolean {
    return this.#options.hidePrompt === true;
  }

  get store(): FitnessStore {
    return this.#store;
  }

  describe(genome: Genome): string {
    return genomeToPhenotype(genome, this.tags, {
      ...(this.#options.prefix !== undefined ? { prefix: this.#options.prefix } : {}),
      ...(this.#options.suffix !== undefined ? { suffix: this.#options.suffix } : {}),
    });
  }

  /** Cooperative: in-flight renders are left to finish on their own. */
  shutdown(): void {
    this.#controller.abort();
  }

  rate(genome: Genome, rating: Rating): RatingOutcome {
    if (this.isShuttingDown) {
      this.#telemetry.emit({
        type: "rating.ignored",
        genomeKey: genomeKey(genome),
        reason: "shutting-down",
      });
      return { status: "ignored", reason: "shutting-down" };
    }
    this.#assertGenomeFits(genome);
    const score = ratingScore(rating);
    this.#store.rate(genome, score);
    this.#telemetry.emit({ type: "rating.received", genomeKey: genomeKey(genome), score });
    return {
      status: "rated",
      rating,
      score,
      ...(this.hidePrompt ? {} : { prompt: this.describe(genome) }),
    };
  }

  async promote(
    genome: Genome,
    seed: number,
    { onProgress }: PromoteOptions = {},
  ): Promise<PromotionResult> {
    const promotionChannel = this.#options.promotionChannel;
    if (!promotionChannel) {
      throw new SessionError(
        "Promotion to a standalone generation is not enabled for this session.",
        "promotion-disabled",
      );
    }
    if (this.isShuttingDown) {
      throw new SessionError("The session is shutting down.", "not-running");
    }
    this.#assertGenomeFits(genome);

    const prompt = this.describe(genome);
    const job = this.#options.renderClient.submit({ ...this.#parameters, seed }, prompt);
    const result = await awaitRenderWithProgress(job, onProgress ? { onProgress } : {});
    const images = toRenderedImages(result);
    await promotionChannel.post({
      ...(this.hidePrompt ? {} : { content: `\`${prompt}\`` }),
      images: images.map((image) => ({ data: image.data, filename: imageFilename(image.seed) })),
      controls: [],
    });
    return { prompt, seeds: images.map((image) => image.seed) };
  }

  #assertGenomeFits(genome: Genome): void {
    const fits =
      genome.length === this.constants.genomeLength && isGenomeInRange(genome, this.tags.length);
    if (!fits) {
      throw new SessionError(
        `Genome [${genome.join(", ")}] does not belong to this session.`,
        "invalid-genome",
      );
    }
  }

  #recordGeneration(snapshot: GenerationSnapshot): void {
    this.#generations = snapshot.generation;
    this.#telemetry.emit({
      type: "evolution.generation",
      generation: snapshot.generation,
      bestScore: snapshot.best.fitness,
      averageScore: snapshot.averageFitness,
      bestGenomeKey: genomeKey(snapshot.best.genome),
    });
    this.#options.onGeneration?.(snapshot);
  }
}
