import { z } from "zod";

import { decodeActionToken, type Rating } from "../actions/actionToken.js";
import { resolveTagBreederConfig } from "../config.js";
import { MIN_GENOME_LENGTH } from "../evolution/constants.js";
import { genomeKey, type Genome } from "../evolution/genome.js";
import type { RandomSource } from "../evolution/operators.js";
import type { GenerationSnapshot } from "../evolution/simulation.js";
import { BaseGenerationParametersSchema } from "../render/parameters.js";
import type { RenderClient } from "../render/types.js";
import { createWebUiRenderClient } from "../render/webui.js";
import {
  createConsoleTelemetrySink,
  createSessionTelemetry,
  type SessionTelemetrySink,
} from "../telemetry.js";
import type { SessionChannel } from "./channel.js";
import {
  EvolutionSession,
  SessionError,
  type PromoteOptions,
  type PromotionResult,
  type RatingOutcome,
} from "./session.js";
import { loadTagTable, type LoadedTagTable, type LoadTagTableOptions } from "./tagTable.js";

export const MAX_GENOME_LENGTH = 64;

export const SessionSettingsSchema = z.object({
  conversationId: z.string().min(1),
  tagsUrl: z.url().optional(),
  prefix: z.string().optional(),
  suffix: z.string().optional(),
  hidePrompt: z.boolean().optional(),
  genomeLength: z.number().int().min(MIN_GENOME_LENGTH).max(MAX_GENOME_LENGTH).optional(),
  parameters: BaseGenerationParametersSchema.optional(),
});

export type SessionSettings = z.input<typeof SessionSettingsSchema>;

export type StartSessionRequest = SessionSettings & {
  readonly channel: SessionChannel;
  /** Enables the promote control; standalone renders are posted here. */
  readonly promotionChannel?: SessionChannel;
  readonly onGeneration?: (snapshot: GenerationSnapshot) => void;
};

export type SessionRegistryOptions = {
  readonly renderClient?: RenderClient;
  readonly telemetry?: SessionTelemetrySink;
  readonly loadTags?: (options: LoadTagTableOptions) => Promise<LoadedTagTable>;
  /** Tag list used when a start request names none. */
  readonly defaultTagsUrl?: string;
  readonly random?: RandomSource;
  readonly feedbackIntervalMs?: number;
  readonly placeholder?: () => Promise<Buffer>;
};

export type ActionOutcome =
  | { readonly kind: "rate"; readonly outcome: RatingOutcome }
  | { readonly kind: "promote"; readonly result: PromotionResult };

/**
 * Owns every running session, keyed by conversation. At most one session runs
 * per conversation; a new one waits for the previous one to wind down.
 */
export class SessionRegistry {
  readonly #sessions = new Map<string, EvolutionSession>();
  readonly #starting = new Set<string>();
  readonly #stopping = new Map<string, Promise<void>>();
  readonly #renderClient: RenderClient;
  readonly #telemetrySink: SessionTelemetrySink;
  readonly #loadTags: (options: LoadTagTableOptions) => Promise<LoadedTagTable>;
  readonly #options: SessionRegistryOptions;

  constructor(options: SessionRegistryOptions = {}) {
    this.#options = options;
    this.#renderClient = options.renderClient ?? createWebUiRenderClient();
    this.#telemetrySink = options.telemetry ?? createConsoleTelemetrySink();
    this.#loadTags = options.loadTags ?? loadTagTable;
  }

  get size(): number {
    return this.#sessions.size;
  }

  get(conversationId: string): EvolutionSession | undefined {
    return this.#sessions.get(conversationId);
  }

  async start(request: StartSessionRequest): Promise<EvolutionSession> {
    const parsed = SessionSettingsSchema.safeParse({
      conversationId: request.conversationId,
      tagsUrl: request.tagsUrl,
      prefix: request.prefix,
      suffix: request.suffix,
      hidePrompt: request.hidePrompt,
      genomeLength: request.genomeLength,
      parameters: request.parameters,
    });
    if (!parsed.success) {
      throw new SessionError(
        `Invalid session options: ${z.prettifyError(parsed.error)}`,
        "invalid-options",
      );
    }
    const settings = parsed.data;
    const { conversationId } = settings;
    if (this.#sessions.has(conversationId) || this.#starting.has(conversationId)) {
      throw new SessionError(
        `A session is already running for conversation ${conversationId}.`,
        "already-running",
      );
    }

    this.#starting.add(conversationId);
    try {
      await this.#stopping.get(conversationId);
      const tagsUrl = settings.tagsUrl ?? this.#defaultTagsUrl();
      const { tags, source } = await this.#loadTags(tagsUrl ? { url: tagsUrl } : {});
      const telemetry = createSessionTelemetry(this.#telemetrySink, conversationId);
      const session = new EvolutionSession({
        conversationId,
        channel: request.channel,
        renderClient: this.#renderClient,
        tags,
        telemetry,
        ...(settings.parameters ? { parameters: settings.parameters } : {}),
        ...(settings.prefix !== undefined ? { prefix: settings.prefix } : {}),
        ...(settings.suffix !== undefined ? { suffix: settings.suffix } : {}),
        ...(settings.hidePrompt !== undefined ? { hidePrompt: settings.hidePrompt } : {}),
        ...(settings.genomeLength !== undefined ? { genomeLength: settings.genomeLength } : {}),
        ...(request.promotionChannel ? { promotionChannel: request.promotionChannel } : {}),
        ...(request.onGeneration ? { onGeneration: request.onGeneration } : {}),
        ...(this.#options.random ? { random: this.#options.random } : {}),
        ...(this.#options.placeholder ? { placeholder: this.#options.placeholder } : {}),
        ...(this.#options.feedbackIntervalMs !== undefined
          ? { feedbackIntervalMs: this.#options.feedbackIntervalMs }
          : {}),
      });
      this.#sessions.set(conversationId, session);
      void session.done.then(() => {
        if (this.#sessions.get(conversationId) === session) {
          this.#sessions.delete(conversationId);
        }
      });
      telemetry.emit({
        type: "session.started",
        tagCount: tags.length,
        tagSource: source,
        genomeLength: session.constants.genomeLength,
        populationSize: session.constants.populationSize,
      });
      return session;
    } finally {
      this.#starting.delete(conversationId);
    }
  }

  /** Returns false when no session was running for the conversation. */
  stop(conversationId: string): boolean {
    const session = this.#sessions.get(conversationId);
    if (!session) {
      return false;
    }
    this.#sessions.delete(conversationId);
    session.shutdown();
    const stopped = session.done.finally(() => {
      if (this.#stopping.get(conversationId) === stopped) {
        this.#stopping.delete(conversationId);
      }
    });
    this.#stopping.set(conversationId, stopped);
    return true;
  }

  rate(conversationId: string, genome: Genome, rating: Rating): RatingOutcome {
    const session = this.#sessions.get(conversationId);
    if (!session) {
      createSessionTelemetry(this.#telemetrySink, conversationId).emit({
        type: "rating.ignored",
        genomeKey: genomeKey(genome),
        reason: "no-session",
      });
      return { status: "ignored", reason: "no-session" };
    }
    return session.rate(genome, rating);
  }

  async promote(
    conversationId: string,
    genome: Genome,
    seed: number,
    options: PromoteOptions = {},
  ): Promise<PromotionResult> {
    const session = this.#sessions.get(conversationId);
    if (!session) {
      throw new SessionError(
        `No session is running for conversation ${conversationId}.`,
        "not-running",
      );
    }
    return session.promote(genome, seed, options);
  }

  /** Decodes a control id and routes it to the matching operation. */
  async handleAction(
    conversationId: string,
    token: string,
    options: PromoteOptions = {},
  ): Promise<ActionOutcome> {
    const { genome, seed, verb } = decodeActionToken(token);
    switch (verb.kind) {
      case "rate":
        return { kind: "rate", outcome: this.rate(conversationId, genome, verb.rating) };
      case "promote":
        return {
          kind: "promote",
          result: await this.promote(conversationId, genome, seed, options),
        };
      default: {
        const exhaustive: never = verb;
        throw new Error(`Unhandled action verb: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  /** Stops every session and waits until all of them have wound down. */
  async shutdownAll(): Promise<void> {
    for (const conversationId of [...this.#sessions.keys()]) {
      this.stop(conversationId);
    }
    await Promise.all(this.#stopping.values());
  }

  #defaultTagsUrl(): string | undefined {
    return this.#options.defaultTagsUrl ?? resolveTagBreederConfig().defaultTagsUrl;
  }
}
