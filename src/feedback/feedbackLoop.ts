import { buildPromoteControl, buildRatingControls } from "../actions/controls.js";
import type { FitnessStore } from "../evolution/fitnessStore.js";
import { genomeKey, type Genome } from "../evolution/genome.js";
import type { BaseGenerationParameters } from "../render/parameters.js";
import { loadPlaceholderImage, PLACEHOLDER_SEED, renderWithFallback } from "../render/render.js";
import type { RenderClient, RenderedImage } from "../render/types.js";
import { imageFilename, type OutboundImage, type SessionChannel } from "../session/channel.js";
import type { SessionTelemetry } from "../telemetry.js";
import { describeError, sleep } from "../utils/abort.js";
import type { LatestValueChannel } from "../utils/latestValue.js";

export const FEEDBACK_POLL_INTERVAL_MS = 500;

export type FeedbackLoopOptions = {
  readonly store: FitnessStore;
  readonly best: LatestValueChannel<Genome>;
  readonly renderClient: RenderClient;
  readonly channel: SessionChannel;
  readonly parameters: BaseGenerationParameters;
  /** Genome → prompt text. */
  readonly describe: (genome: Genome) => string;
  readonly signal: AbortSignal;
  readonly hidePrompt?: boolean;
  readonly promotionEnabled?: boolean;
  readonly telemetry?: SessionTelemetry;
  readonly placeholder?: () => Promise<Buffer>;
  readonly intervalMs?: number;
};

function toAttachments(images: readonly RenderedImage[]): OutboundImage[] {
  return images.map((image) => ({ data: image.data, filename: imageFilename(image.seed) }));
}

async function render(options: FeedbackLoopOptions, prompt: string): Promise<RenderedImage[]> {
  return renderWithFallback(options.renderClient, options.parameters, prompt, {
    placeholder: options.placeholder ?? loadPlaceholderImage,
    onError: (error) => {
      options.telemetry?.emit({ type: "render.failed", prompt, error: describeError(error) });
    },
  });
}

async function postBest(options: FeedbackLoopOptions, genome: Genome): Promise<void> {
  const prompt = options.describe(genome);
  const images = await render(options, prompt);
  const seed = images[0]?.seed ?? PLACEHOLDER_SEED;
  await options.channel.post({
    content: options.hidePrompt
      ? "**Best result so far**"
      : `**Best result so far**: \`${prompt}\``,
    images: toAttachments(images),
    controls: options.promotionEnabled ? [buildPromoteControl(genome, seed)] : [],
  });
}

async function postRatingRequest(options: FeedbackLoopOptions, genome: Genome): Promise<void> {
  const prompt = options.describe(genome);
  const images = await render(options, prompt);
  const seed = images[0]?.seed ?? PLACEHOLDER_SEED;
  await options.channel.post({
    ...(options.hidePrompt ? {} : { content: `\`${prompt}\`` }),
    images: toAttachments(images),
    controls: buildRatingControls(genome, seed),
  });
}

/**
 * One pass: announce the latest best genome, if any, then render and post
 * every pending genome with rating controls. Never throws; a genome whose post
 * fails is queued again for the next pass.
 */
export async function runFeedbackIteration(options: FeedbackLoopOptions): Promise<void> {
  const { store, best, signal, telemetry } = options;

  const latestBest = best.take();
  if (latestBest) {
    try {
      await postBest(options, latestBest);
    } catch (error) {
      telemetry?.emit({
        type: "feedback.failed",
        error: describeError(error),
        genomeKey: genomeKey(latestBest),
      });
    }
  }

  const pending = store.drainPending();
  for (const genome of pending) {
    if (signal.aborted) {
      return;
    }
    try {
      await postRatingRequest(options, genome);
    } catch (error) {
      telemetry?.emit({
        type: "feedback.failed",
        error: describeError(error),
        genomeKey: genomeKey(genome),
      });
      store.requeue(genome);
    }
  }
}

export async function runFeedbackLoop(options: FeedbackLoopOptions): Promise<void> {
  const intervalMs = options.intervalMs ?? FEEDBACK_POLL_INTERVAL_MS;
  while (!options.signal.aborted) {
    await runFeedbackIteration(options);
    await sleep(intervalMs, options.signal);
  }
}
