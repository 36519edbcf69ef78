import fs from "node:fs";
import path from "node:path";

let envLoaded = false;

/**
 * Loads `.env.local` from `process.cwd()` once. Variables already present in
 * `process.env` win, and a missing file is not an error.
 */
export function loadLocalEnv(): void {
  if (envLoaded) {
    return;
  }
  loadEnvFromFile(path.join(process.cwd(), ".env.local"), { override: false });
  envLoaded = true;
}

export function loadEnvFromFile(
  filePath: string,
  { override = false }: { override?: boolean } = {},
): void {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return;
    }
    throw error;
  }

  for (const [key, value] of parseEnvContent(content)) {
    if (override || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

export function parseEnvContent(content: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of content.split(/\r?\n/u)) {
    const entry = parseEnvLine(line);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}

function unquote(raw: string): string {
  for (const quote of ['"', "'"]) {
    if (raw.length >= 2 && raw.startsWith(quote) && raw.endsWith(quote)) {
      return raw.slice(1, -1);
    }
  }
  const commentIndex = raw.indexOf(" #");
  return (commentIndex >= 0 ? raw.slice(0, commentIndex) : raw).trim();
}

function parseEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }
  const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_\-.]*)\s*=\s*(.*)$/u);
  const key = match?.[1];
  if (!match || !key) {
    return null;
  }
  return [key, unquote(match[2] ?? "")];
}

export function readEnvString(name: string): string | undefined {
  loadLocalEnv();
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

export function readEnvPositiveNumber(name: string, fallback: number): number {
  const raw = readEnvString(name);
  const parsed = raw ? Number(raw) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}
