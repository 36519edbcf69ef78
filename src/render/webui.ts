import { Agent, fetch as undiciFetch } from "undici";
import { z } from "zod";

import {
  DEFAULT_RENDER_TIMEOUT_MS,
  resolveRenderServiceConfig,
  type RenderServiceConfig,
} from "../config.js";
import {
  prepareGeneration,
  type BaseGenerationParameters,
  type PrepareGenerationOptions,
} from "./parameters.js";
import type { RenderClient, RenderJob, RenderProgress, RenderResult } from "./types.js";

export type RenderFetchInit = {
  readonly method: "GET" | "POST";
  readonly headers: Record<string, string>;
  readonly body?: string;
};

export type RenderFetchResponse = {
  readonly ok: boolean;
  readonly status: number;
  text: () => Promise<string>;
};

export type RenderFetch = (url: string, init: RenderFetchInit) => Promise<RenderFetchResponse>;

export type WebUiRenderClientOptions = {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly auth?: RenderServiceConfig["auth"];
  readonly fetch?: RenderFetch;
  readonly prepare?: PrepareGenerationOptions;
};

export class RenderServiceError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "RenderServiceError";
  }
}

const TEXT_TO_IMAGE_PATH = "/sdapi/v1/txt2img";
const PROGRESS_PATH = "/sdapi/v1/progress?skip_current_image=false";
const RANDOM_SEED = -1;

const TextToImageResponseSchema = z
  .object({
    images: z.array(z.string()),
    info: z.string().optional(),
  })
  .loose();

const GenerationInfoSchema = z
  .object({
    seed: z.number().optional(),
    all_seeds: z.array(z.number()).optional(),
  })
  .loose();

const ProgressResponseSchema = z
  .object({
    progress: z.number(),
    eta_relative: z.number(),
    current_image: z.string().nullable().optional(),
  })
  .loose();

function resolveConnection(options: WebUiRenderClientOptions): RenderServiceConfig {
  const base =
    options.baseUrl !== undefined
      ? { baseUrl: options.baseUrl.replace(/\/+$/u, ""), timeoutMs: DEFAULT_RENDER_TIMEOUT_MS }
      : resolveRenderServiceConfig();
  const auth = options.auth ?? (options.baseUrl !== undefined ? undefined : base.auth);
  return {
    baseUrl: base.baseUrl,
    timeoutMs: options.timeoutMs ?? base.timeoutMs,
    ...(auth ? { auth } : {}),
  };
}

function createUndiciFetch(timeoutMs: number): RenderFetch {
  const dispatcher = new Agent({
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
  });
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

export function buildTextToImageBody(
  parameters: BaseGenerationParameters,
  prompt: string,
): Record<string, unknown> {
  return {
    prompt,
    negative_prompt: parameters.negativePrompt ?? "",
    seed: parameters.seed ?? RANDOM_SEED,
    batch_size: 1,
    n_iter: parameters.batchCount ?? 1,
    ...(parameters.width !== undefined ? { width: parameters.width } : {}),
    ...(parameters.height !== undefined ? { height: parameters.height } : {}),
    ...(parameters.cfgScale !== undefined ? { cfg_scale: parameters.cfgScale } : {}),
    ...(parameters.steps !== undefined ? { steps: parameters.steps } : {}),
    tiling: parameters.tiling ?? false,
    restore_faces: parameters.restoreFaces ?? false,
    ...(parameters.sampler ? { sampler_index: parameters.sampler } : {}),
    ...(parameters.model
      ? { override_settings: { sd_model_checkpoint: parameters.model.title } }
      : {}),
  };
}

function parseJson(text: string, what: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new RenderServiceError(`Render service returned invalid JSON for ${what}.`);
  }
}

function parseResult(payload: unknown): RenderResult {
  const parsed = TextToImageResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new RenderServiceError(`Unexpected text-to-image response: ${parsed.error.message}`);
  }
  const { images, info } = parsed.data;
  if (images.length === 0) {
    throw new RenderServiceError("Render service returned no images.");
  }

  const infoPayload = info ? parseJson(info, "generation info") : {};
  const infoParsed = GenerationInfoSchema.safeParse(infoPayload);
  const metadata = infoParsed.success ? infoParsed.data : {};
  const allSeeds =
    infoParsed.success && infoParsed.data.all_seeds
      ? infoParsed.data.all_seeds
      : infoParsed.success && infoParsed.data.seed !== undefined
        ? [infoParsed.data.seed]
        : [];

  return {
    images: images.map((image) => Buffer.from(image, "base64")),
    seeds: images.map((_, index) => allSeeds[index] ?? allSeeds[0] ?? RANDOM_SEED),
    metadata,
  };
}

function parseProgress(payload: unknown): RenderProgress {
  const parsed = ProgressResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new RenderServiceError(`Unexpected progress response: ${parsed.error.message}`);
  }
  const { progress, eta_relative: etaSeconds, current_image: currentImage } = parsed.data;
  return {
    fractionComplete: Math.max(0, Math.min(1, progress)),
    etaSeconds,
    ...(currentImage ? { previewImage: Buffer.from(currentImage, "base64") } : {}),
  };
}

/**
 * Render client for a Stable Diffusion web UI style HTTP API. Connection
 * settings default to the `RENDER_*` environment variables.
 */
export function createWebUiRenderClient(options: WebUiRenderClientOptions = {}): RenderClient {
  const connection = resolveConnection(options);
  const fetchImpl = options.fetch ?? createUndiciFetch(connection.timeoutMs);

  const headers: Record<string, string> = {
    Accept: "application/json",
  };
  if (connection.auth) {
    const credentials = `${connection.auth.username}:${connection.auth.password}`;
    headers.Authorization = `Basic ${Buffer.from(credentials).toString("base64")}`;
  }

  const requestJson = async (
    method: RenderFetchInit["method"],
    path: string,
    body?: Record<string, unknown>,
  ): Promise<unknown> => {
    const response = await fetchImpl(`${connection.baseUrl}${path}`, {
      method,
      headers: body ? { ...headers, "Content-Type": "application/json" } : headers,
      ...(body ? { body: JSON.stringify(body) } : {}),
    });
    const text = await response.text();
    if (!response.ok) {
      throw new RenderServiceError(
        `Render service request ${method} ${path} failed (${response.status}): ${text}`,
        response.status,
      );
    }
    return parseJson(text, path);
  };

  const submit = (parameters: BaseGenerationParameters, prompt: string): RenderJob => {
    const prepared = prepareGeneration(parameters, prompt, options.prepare);
    const result = requestJson(
      "POST",
      TEXT_TO_IMAGE_PATH,
      buildTextToImageBody(prepared.parameters, prepared.prompt),
    ).then(parseResult);

    return {
      pollProgress: async () => parseProgress(await requestJson("GET", PROGRESS_PATH)),
      awaitResult: () => result,
    };
  };

  return { submit };
}
