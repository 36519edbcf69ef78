import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { sleep, toError } from "../utils/abort.js";
import type { BaseGenerationParameters } from "./parameters.js";
import type {
  RenderClient,
  RenderedImage,
  RenderJob,
  RenderProgress,
  RenderResult,
} from "./types.js";

/** Seed reported for the placeholder that replaces a failed render. */
export const PLACEHOLDER_SEED = 0;

export const PROGRESS_UPDATE_MS = 250;

const PLACEHOLDER_PATH = fileURLToPath(
  new URL("../../resources/generation-failed.png", import.meta.url),
);

let placeholderPromise: Promise<Buffer> | null = null;

export function loadPlaceholderImage(): Promise<Buffer> {
  if (!placeholderPromise) {
    placeholderPromise = fs.readFile(PLACEHOLDER_PATH).catch((error: unknown) => {
      placeholderPromise = null;
      throw error;
    });
  }
  return placeholderPromise;
}

export function toRenderedImages(result: RenderResult): RenderedImage[] {
  return result.images.map((data, index) => ({
    data,
    seed: result.seeds[index] ?? result.seeds[0] ?? PLACEHOLDER_SEED,
  }));
}

export type RenderWithFallbackOptions = {
  readonly placeholder: () => Promise<Buffer>;
  readonly onError?: (error: Error) => void;
};

/**
 * Always yields at least one image: a failed or empty render is replaced by
 * the placeholder so the caller can still attach controls to it.
 */
export async function renderWithFallback(
  client: RenderClient,
  parameters: BaseGenerationParameters,
  prompt: string,
  { placeholder, onError }: RenderWithFallbackOptions,
): Promise<RenderedImage[]> {
  try {
    const images = toRenderedImages(await client.submit(parameters, prompt).awaitResult());
    if (images.length > 0) {
      return images;
    }
    onError?.(new Error("Render returned no images."));
  } catch (error) {
    onError?.(toError(error));
  }
  return [{ data: await placeholder(), seed: PLACEHOLDER_SEED }];
}

export type AwaitWithProgressOptions = {
  readonly onProgress?: (progress: RenderProgress) => void | Promise<void>;
  readonly intervalMs?: number;
  readonly signal?: AbortSignal;
};

/**
 * Waits for `job` while polling its progress. Progress failures are not fatal;
 * only the result decides the outcome.
 */
export async function awaitRenderWithProgress(
  job: RenderJob,
  { onProgress, intervalMs = PROGRESS_UPDATE_MS, signal }: AwaitWithProgressOptions = {},
): Promise<RenderResult> {
  let settled = false;
  const result = job.awaitResult().finally(() => {
    settled = true;
  });

  if (onProgress) {
    const poll = async () => {
      while (!settled && !signal?.aborted) {
        await sleep(intervalMs, signal);
        if (settled || signal?.aborted) {
          return;
        }
        try {
          await onProgress(await job.pollProgress());
        } catch {
          // The next poll, or the result itself, will surface a persistent failure.
        }
      }
    };
    const [output] = await Promise.all([result, poll()]);
    return output;
  }
  return result;
}
