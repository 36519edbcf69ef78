import { z } from "zod";

export const GENERATION_LIMITS = {
  batchCountMin: 1,
  batchCountMax: 4,
  widthMin: 64,
  widthMax: 1024,
  heightMin: 64,
  heightMax: 1024,
  cfgScaleMin: 2.5,
  cfgScaleMax: 20,
  stepsMin: 5,
  stepsMax: 100,
} as const;

const RESOLUTION_STEP = 64;

export const GenerationModelSchema = z.object({
  name: z.string().min(1),
  title: z.string().min(1),
});

export const BaseGenerationParametersSchema = z.object({
  negativePrompt: z.string().optional(),
  seed: z.number().int().optional(),
  batchCount: z
    .number()
    .int()
    .min(GENERATION_LIMITS.batchCountMin)
    .max(GENERATION_LIMITS.batchCountMax)
    .optional(),
  width: z
    .number()
    .int()
    .min(GENERATION_LIMITS.widthMin)
    .max(GENERATION_LIMITS.widthMax)
    .optional(),
  height: z
    .number()
    .int()
    .min(GENERATION_LIMITS.heightMin)
    .max(GENERATION_LIMITS.heightMax)
    .optional(),
  cfgScale: z
    .number()
    .min(GENERATION_LIMITS.cfgScaleMin)
    .max(GENERATION_LIMITS.cfgScaleMax)
    .optional(),
  steps: z
    .number()
    .int()
    .min(GENERATION_LIMITS.stepsMin)
    .max(GENERATION_LIMITS.stepsMax)
    .optional(),
  tiling: z.boolean().optional(),
  restoreFaces: z.boolean().optional(),
  sampler: z.string().min(1).optional(),
  model: GenerationModelSchema.optional(),
});

export type GenerationModel = z.infer<typeof GenerationModelSchema>;

export type BaseGenerationParameters = z.infer<typeof BaseGenerationParametersSchema>;

export type PrepareGenerationOptions = {
  readonly automaticallyPrependKeyword?: boolean;
  readonly widthMax?: number;
  readonly heightMax?: number;
};

export type PreparedGeneration = {
  readonly parameters: BaseGenerationParameters;
  readonly prompt: string;
};

function extractLastBracketed(text: string): string | null {
  const left = text.lastIndexOf("[");
  const right = text.lastIndexOf("]");
  if (left < 0 || right < 0 || left >= right) {
    return null;
  }
  return text.slice(left + 1, right);
}

/** `"Inkpunk v2 [nvinkpunk]"` → `["nvinkpunk"]` */
export function extractModelKeywords(modelName: string): string[] {
  const bracketed = extractLastBracketed(modelName);
  if (bracketed === null) {
    return [];
  }
  return bracketed.split(",").map((keyword) => keyword.trim());
}

/** Only a single unambiguous keyword is prepended. */
export function prependModelKeyword(prompt: string, modelName: string): string {
  const keywords = extractModelKeywords(modelName);
  if (keywords.length !== 1) {
    return prompt;
  }
  const [keyword = ""] = keywords;
  if (prompt.includes(keyword)) {
    return prompt;
  }
  return `${keyword}, ${prompt}`;
}

export function fitResolution(
  width: number,
  height: number,
  { widthMax, heightMax }: { widthMax: number; heightMax: number },
): { width: number; height: number } {
  let nextWidth = width;
  let nextHeight = height;
  if (nextWidth > widthMax) {
    const scale = nextWidth / widthMax;
    nextWidth = Math.floor(nextWidth / scale);
    nextHeight = Math.floor(nextHeight / scale);
  }
  if (nextHeight > heightMax) {
    const scale = nextHeight / heightMax;
    nextWidth = Math.floor(nextWidth / scale);
    nextHeight = Math.floor(nextHeight / scale);
  }
  const round = (value: number) =>
    Math.floor((value + RESOLUTION_STEP / 2) / RESOLUTION_STEP) * RESOLUTION_STEP;
  return { width: round(nextWidth), height: round(nextHeight) };
}

export function prepareGeneration(
  parameters: BaseGenerationParameters,
  prompt: string,
  {
    automaticallyPrependKeyword = true,
    widthMax = GENERATION_LIMITS.widthMax,
    heightMax = GENERATION_LIMITS.heightMax,
  }: PrepareGenerationOptions = {},
): PreparedGeneration {
  const nextPrompt =
    automaticallyPrependKeyword && parameters.model
      ? prependModelKeyword(prompt, parameters.model.name)
      : prompt;

  if (parameters.width === undefined || parameters.height === undefined) {
    return { parameters, prompt: nextPrompt };
  }
  const { width, height } = fitResolution(parameters.width, parameters.height, {
    widthMax,
    heightMax,
  });
  return { parameters: { ...parameters, width, height }, prompt: nextPrompt };
}
