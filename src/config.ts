import { readEnvPositiveNumber, readEnvString } from "./utils/env.js";

export const DEFAULT_RENDER_BASE_URL = "http://localhost:7860";
export const DEFAULT_RENDER_TIMEOUT_MS = 10 * 60_000;

export type RenderServiceConfig = {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly auth?: {
    readonly username: string;
    readonly password: string;
  };
};

export type TagBreederConfig = {
  readonly render: RenderServiceConfig;
  /** Remote tag list used when a session is started without one. */
  readonly defaultTagsUrl?: string;
};

let cachedConfig: TagBreederConfig | null = null;

function resolveAuth(): RenderServiceConfig["auth"] {
  const username = readEnvString("RENDER_API_USERNAME");
  const password = readEnvString("RENDER_API_PASSWORD");
  if (!username && !password) {
    return undefined;
  }
  if (!username || !password) {
    throw new Error(
      "RENDER_API_USERNAME and RENDER_API_PASSWORD must be provided together to authenticate.",
    );
  }
  return { username, password };
}

export function resolveTagBreederConfig(): TagBreederConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  const auth = resolveAuth();
  const defaultTagsUrl = readEnvString("TAG_BREEDER_TAGS_URL");
  cachedConfig = {
    render: {
      baseUrl: (readEnvString("RENDER_BASE_URL") ?? DEFAULT_RENDER_BASE_URL).replace(/\/+$/u, ""),
      timeoutMs: readEnvPositiveNumber("RENDER_TIMEOUT_MS", DEFAULT_RENDER_TIMEOUT_MS),
      ...(auth ? { auth } : {}),
    },
    ...(defaultTagsUrl ? { defaultTagsUrl } : {}),
  };
  return cachedConfig;
}

export function resolveRenderServiceConfig(): RenderServiceConfig {
  return resolveTagBreederConfig().render;
}

export function resetTagBreederConfigCache(): void {
  cachedConfig = null;
}
