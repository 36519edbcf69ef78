import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { fetch as undiciFetch } from "undici";

import { MAX_GENE_VALUE, type TagTable } from "../evolution/genome.js";
import { describeError } from "../utils/abort.js";

export type TagTableErrorKind = "fetch-failed" | "empty" | "too-large";

export class TagTableError extends Error {
  constructor(
    message: string,
    readonly kind: TagTableErrorKind,
    readonly source: string,
  ) {
    super(message);
    this.name = "TagTableError";
  }
}

export type TagTextFetch = (
  url: string,
) => Promise<{ readonly ok: boolean; readonly status: number; text: () => Promise<string> }>;

export type LoadTagTableOptions = {
  /** Newline-delimited list; the bundled table is used when absent. */
  readonly url?: string;
  readonly fetch?: TagTextFetch;
};

export type LoadedTagTable = {
  readonly tags: TagTable;
  readonly source: string;
};

export const BUNDLED_TAGS_SOURCE = "bundled";

const BUNDLED_TAGS_PATH = fileURLToPath(new URL("../../resources/tags.txt", import.meta.url));

export function parseTagList(text: string): string[] {
  return text
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function validateTagTable(tags: readonly string[], source: string): TagTable {
  if (tags.length === 0) {
    throw new TagTableError(`Tag table from ${source} has no tags.`, "empty", source);
  }
  if (tags.length > MAX_GENE_VALUE + 1) {
    throw new TagTableError(
      `Tag table from ${source} has ${tags.length} tags; ` +
        `at most ${MAX_GENE_VALUE + 1} are supported.`,
      "too-large",
      source,
    );
  }
  return Object.freeze([...tags]);
}

async function fetchTagText(url: string, fetchImpl: TagTextFetch): Promise<string> {
  let response: Awaited<ReturnType<TagTextFetch>>;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw new TagTableError(
      `Failed to fetch tags from ${url}: ${describeError(error)}`,
      "fetch-failed",
      url,
    );
  }
  if (!response.ok) {
    throw new TagTableError(
      `Failed to fetch tags from ${url} (${response.status}).`,
      "fetch-failed",
      url,
    );
  }
  return response.text();
}

export async function loadTagTable({
  url,
  fetch: fetchImpl = (target) => undiciFetch(target),
}: LoadTagTableOptions = {}): Promise<LoadedTagTable> {
  if (url) {
    const text = await fetchTagText(url, fetchImpl);
    return { tags: validateTagTable(parseTagList(text), url), source: url };
  }
  const text = await fs.readFile(BUNDLED_TAGS_PATH, "utf8");
  return {
    tags: validateTagTable(parseTagList(text), BUNDLED_TAGS_SOURCE),
    source: BUNDLED_TAGS_SOURCE,
  };
}
