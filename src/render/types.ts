import type { BaseGenerationParameters } from "./parameters.js";

export type RenderProgress = {
  /** 0..1 */
  readonly fractionComplete: number;
  readonly etaSeconds: number;
  readonly previewImage?: Buffer;
};

export type RenderResult = {
  readonly images: readonly Buffer[];
  /** One seed per image, in the same order. */
  readonly seeds: readonly number[];
  readonly metadata: Readonly<Record<string, unknown>>;
};

export type RenderJob = {
  pollProgress: () => Promise<RenderProgress>;
  awaitResult: () => Promise<RenderResult>;
};

export type RenderClient = {
  submit: (parameters: BaseGenerationParameters, prompt: string) => RenderJob;
};

export type RenderedImage = {
  readonly data: Buffer;
  readonly seed: number;
};
