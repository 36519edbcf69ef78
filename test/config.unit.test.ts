import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DEFAULT_RENDER_BASE_URL,
  DEFAULT_RENDER_TIMEOUT_MS,
  resetTagBreederConfigCache,
  resolveRenderServiceConfig,
  resolveTagBreederConfig,
} from "../src/config.js";

const KEYS = [
  "RENDER_BASE_URL",
  "RENDER_API_USERNAME",
  "RENDER_API_PASSWORD",
  "RENDER_TIMEOUT_MS",
  "TAG_BREEDER_TAGS_URL",
] as const;

describe("resolveTagBreederConfig", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    resetTagBreederConfigCache();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetTagBreederConfigCache();
  });

  it("uses the defaults when nothing is set", () => {
    expect(resolveTagBreederConfig()).toEqual({
      render: { baseUrl: DEFAULT_RENDER_BASE_URL, timeoutMs: DEFAULT_RENDER_TIMEOUT_MS },
    });
    expect(DEFAULT_RENDER_TIMEOUT_MS).toBe(600_000);
  });

  it("reads every variable", () => {
    process.env.RENDER_BASE_URL = "http://gpu.local:7861/";
    process.env.RENDER_API_USERNAME = "user";
    process.env.RENDER_API_PASSWORD = "test-secret";
    process.env.RENDER_TIMEOUT_MS = "5000";
    process.env.TAG_BREEDER_TAGS_URL = "http://tags.test/list.txt";

    expect(resolveTagBreederConfig()).toEqual({
      render: {
        baseUrl: "http://gpu.local:7861",
        timeoutMs: 5000,
        auth: { username: "user", password: "test-secret" },
      },
      defaultTagsUrl: "http://tags.test/list.txt",
    });
  });

  it("ignores an unusable timeout", () => {
    process.env.RENDER_TIMEOUT_MS = "soon";
    expect(resolveRenderServiceConfig().timeoutMs).toBe(DEFAULT_RENDER_TIMEOUT_MS);
  });

  it("requires both credentials", () => {
    process.env.RENDER_API_USERNAME = "user";
    expect(() => resolveTagBreederConfig()).toThrow(
      "RENDER_API_USERNAME and RENDER_API_PASSWORD must be provided together to authenticate.",
    );
  });

  it("caches until reset", () => {
    const first = resolveTagBreederConfig();
    process.env.RENDER_BASE_URL = "http://other.test";

    expect(resolveTagBreederConfig()).toBe(first);

    resetTagBreederConfigCache();
    expect(resolveRenderServiceConfig().baseUrl).toBe("http://other.test");
  });
});
