import { describe, expect, it, vi } from "vitest";

import { buildPromoteControl, buildRatingControls } from "../src/actions/controls.js";
import { createFitnessStore } from "../src/evolution/fitnessStore.js";
import { genomeToPhenotype, type Genome } from "../src/evolution/genome.js";
import {
  runFeedbackIteration,
  runFeedbackLoop,
  type FeedbackLoopOptions,
} from "../src/feedback/feedbackLoop.js";
import type { RenderClient, RenderResult } from "../src/render/types.js";
import type { OutboundMessage } from "../src/session/channel.js";
import { createLatestValueChannel } from "../src/utils/latestValue.js";

const TAGS = ["a", "b", "c"];
const IMAGE = Buffer.from("image");
const PLACEHOLDER = Buffer.from("placeholder");

function createRenderClient(
  render: (prompt: string) => RenderResult | Error,
): RenderClient & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    submit: (_parameters, prompt) => {
      prompts.push(prompt);
      return {
        pollProgress: async () => ({ fractionComplete: 0, etaSeconds: 0 }),
        awaitResult: async () => {
          const outcome = render(prompt);
          if (outcome instanceof Error) {
            throw outcome;
          }
          return outcome;
        },
      };
    },
  };
}

function createHarness(overrides: Partial<FeedbackLoopOptions> = {}) {
  const controller = new AbortController();
  const store = createFitnessStore({ signal: controller.signal });
  const best = createLatestValueChannel<Genome>();
  const posts: OutboundMessage[] = [];
  const emit = vi.fn();
  const options: FeedbackLoopOptions = {
    store,
    best,
    renderClient: createRenderClient(() => ({ images: [IMAGE], seeds: [42], metadata: {} })),
    channel: {
      post: async (message) => {
        posts.push(message);
      },
    },
    parameters: {},
    describe: (genome) => genomeToPhenotype(genome, TAGS),
    signal: controller.signal,
    telemetry: { emit, flush: async () => {} },
    placeholder: async () => PLACEHOLDER,
    intervalMs: 1,
    ...overrides,
  };
  return { controller, store, best, posts, emit, options };
}

describe("runFeedbackIteration", () => {
  it("posts each pending genome with rating controls", async () => {
    const { store, posts, options } = createHarness();
    void store.requestFitness([0, 1, 2]);

    await runFeedbackIteration(options);

    expect(posts).toEqual([
      {
        content: "`a, b, c`",
        images: [{ data: IMAGE, filename: "output_42.png" }],
        controls: buildRatingControls([0, 1, 2], 42),
      },
    ]);
    expect(store.pendingCount).toBe(0);
  });

  it("announces the latest best genome before the rating requests", async () => {
    const { store, best, posts, options } = createHarness();
    best.publish([0, 0, 0]);
    best.publish([2, 2, 2]);
    void store.requestFitness([1, 0, 1]);

    await runFeedbackIteration(options);

    expect(posts.map((post) => post.content)).toEqual([
      "**Best result so far**: `c, c, c`",
      "`b, a, b`",
    ]);
    expect(posts[0]?.controls).toEqual([]);
  });

  it("adds the promote control to the best genome when promotion is enabled", async () => {
    const { best, posts, options } = createHarness({ promotionEnabled: true });
    best.publish([2, 2, 2]);

    await runFeedbackIteration(options);

    expect(posts[0]?.controls).toEqual([buildPromoteControl([2, 2, 2], 42)]);
  });

  it("leaves the prompt out when it is hidden", async () => {
    const { store, best, posts, options } = createHarness({ hidePrompt: true });
    best.publish([2, 2, 2]);
    void store.requestFitness([0, 1, 2]);

    await runFeedbackIteration(options);

    expect(posts[0]?.content).toBe("**Best result so far**");
    expect(posts[1]).not.toHaveProperty("content");
  });

  it("substitutes the placeholder when rendering fails", async () => {
    const { store, posts, emit, options } = createHarness({
      renderClient: createRenderClient(() => new Error("boom")),
    });
    const fitness = store.requestFitness([1, 1, 1]);

    await runFeedbackIteration(options);

    expect(posts).toEqual([
      {
        content: "`b, b, b`",
        images: [{ data: PLACEHOLDER, filename: "output_0.png" }],
        controls: buildRatingControls([1, 1, 1], 0),
      },
    ]);
    expect(posts[0]?.controls[4]?.id).toBe("evo#000100010001.0#p2");
    expect(emit).toHaveBeenCalledWith({ type: "render.failed", prompt: "b, b, b", error: "boom" });

    store.rate([1, 1, 1], 100);
    await expect(fitness).resolves.toBe(100);
  });

  it("requeues a genome whose post fails", async () => {
    const { store, emit, options } = createHarness({
      channel: {
        post: async () => {
          throw new Error("channel closed");
        },
      },
    });
    void store.requestFitness([0, 1, 2]);

    await runFeedbackIteration(options);

    expect(store.pendingCount).toBe(1);
    expect(emit).toHaveBeenCalledWith({
      type: "feedback.failed",
      error: "channel closed",
      genomeKey: "000000010002",
    });
  });

  it("stops draining once shut down", async () => {
    const { controller, store, posts, options } = createHarness();
    void store.requestFitness([0, 1, 2]);
    controller.abort();

    await runFeedbackIteration(options);

    expect(posts).toEqual([]);
  });
});

describe("runFeedbackLoop", () => {
  it("runs until the session is shut down", async () => {
    const harness = createHarness();
    const { controller, store, posts } = harness;
    const options: FeedbackLoopOptions = {
      ...harness.options,
      channel: {
        post: async (message) => {
          posts.push(message);
          controller.abort();
        },
      },
    };
    void store.requestFitness([0, 1, 2]);

    await runFeedbackLoop(options);

    expect(posts).toHaveLength(1);
    expect(controller.signal.aborted).toBe(true);
  });

  it("returns at once when already shut down", async () => {
    const { controller, posts, options } = createHarness();
    controller.abort();

    await runFeedbackLoop(options);

    expect(posts).toEqual([]);
  });
});
