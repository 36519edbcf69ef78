#!/usr/bin/env tsx

import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import readline from "node:readline";

import {
  SessionRegistry,
  describeRating,
  loadLocalEnv,
  type MessageControl,
  type OutboundMessage,
  type SessionChannel,
} from "../src/index.js";

const CONVERSATION_ID = "terminal";
const OUTPUT_DIR = path.resolve(process.argv[2] ?? "tag-breeder-output");

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  dim: "\u001B[2m",
  cyan: "\u001B[36m",
  red: "\u001B[31m",
};

loadLocalEnv();

const controls: MessageControl[] = [];

async function printMessage(heading: string, message: OutboundMessage): Promise<void> {
  await fs.mkdir(OUTPUT_DIR, { recursive: true });
  const files: string[] = [];
  for (const image of message.images) {
    const filePath = path.join(OUTPUT_DIR, image.filename);
    await fs.writeFile(filePath, image.data);
    files.push(filePath);
  }
  process.stdout.write(`\n${ANSI.bold}${heading}${ANSI.reset} ${message.content ?? ""}\n`);
  for (const file of files) {
    process.stdout.write(`${ANSI.dim}  ${file}${ANSI.reset}\n`);
  }
  const numbered = message.controls.map((control) => {
    controls.push(control);
    return `[${controls.length}] ${control.label}`;
  });
  if (numbered.length > 0) {
    process.stdout.write(`  ${ANSI.cyan}${numbered.join("  ")}${ANSI.reset}\n`);
  }
}

const channel: SessionChannel = { post: (message) => printMessage("rate", message) };
const promotionChannel: SessionChannel = { post: (message) => printMessage("standalone", message) };

const registry = new SessionRegistry();

async function handleLine(line: string): Promise<void> {
  const trimmed = line.trim();
  if (trimmed === "quit" || trimmed === "exit") {
    await registry.shutdownAll();
    process.exit(0);
  }
  const control = controls[Number.parseInt(trimmed, 10) - 1];
  if (!control) {
    process.stdout.write(`Type a control number, or "quit".\n`);
    return;
  }
  const outcome = await registry.handleAction(CONVERSATION_ID, control.id, {
    onProgress: (progress) => {
      const percent = Math.round(progress.fractionComplete * 100);
      process.stdout.write(`${ANSI.dim}  rendering ${percent}%${ANSI.reset}\n`);
    },
  });
  if (outcome.kind === "rate") {
    process.stdout.write(`${describeRating(outcome.outcome)}\n`);
  }
}

async function main(): Promise<void> {
  await registry.start({
    conversationId: CONVERSATION_ID,
    channel,
    promotionChannel,
    ...(process.env.TAG_BREEDER_PREFIX ? { prefix: process.env.TAG_BREEDER_PREFIX } : {}),
  });
  process.stdout.write(`Images are written to ${OUTPUT_DIR}. Type "quit" to stop.\n`);

  const input = readline.createInterface({ input: process.stdin });
  input.on("line", (line) => {
    handleLine(line).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`${ANSI.red}${message}${ANSI.reset}\n`);
    });
  });
  input.on("close", () => {
    void registry.shutdownAll();
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
