#!/usr/bin/env tsx

/**
 * Starts the action server, the dialogue server and the frontend, then opens
 * the chat page. Ctrl+C stops everything. When models/ holds no trained
 * dialogue model, one is trained first from rasa/config.yml and rasa/data.
 *
 * Usage:
 *   npm run launch
 */

import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { getServiceConfig } from "@mindease/core";
import { describeError } from "@mindease/shared";
import { Launcher, colorize } from "./launcher.js";

const rootDir = resolve(fileURLToPath(new URL(".", import.meta.url)), "..");

async function main(): Promise<void> {
  const config = getServiceConfig();
  const launcher = new Launcher(rootDir, {
    actionServer: config.actionServerPort,
    dialogueServer: config.dialogueServerPort,
    frontend: config.frontendPort,
  });

  const shutdown = (code: number) => {
    launcher.stop();
    process.exit(code);
  };
  process.on("SIGINT", () => shutdown(0));
  process.on("SIGTERM", () => shutdown(0));

  try {
    if (!(await launcher.start())) {
      process.exit(1);
    }
  } catch (error) {
    console.error(colorize(`Error: ${describeError(error)}`, "red"));
    shutdown(1);
  }
}

main().catch((error: unknown) => {
  console.error(colorize(`Error: ${describeError(error)}`, "red"));
  process.exit(1);
});
