import { relative } from "node:path";
import { Hono } from "hono";
import { serveStatic } from "@hono/node-server/serve-static";
import {
  defaultRandom,
  pickOne,
  type RandomSource,
} from "@mindease/core";
import type { Quote } from "@mindease/shared";

export interface FrontendOptions {
  quotes: readonly Quote[];
  /** Absolute path of the static chat page directory. */
  publicDir: string;
  random?: RandomSource;
}

/**
 * Serves the chat page and the quote API the action server calls.
 */
export function createFrontendApp(options: FrontendOptions): Hono {
  const random = options.random ?? defaultRandom;
  const app = new Hono();

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/quote", (c) => c.json(pickOne(options.quotes, random)));

  // serveStatic resolves its root against the working directory
  app.use(
    "/*",
    serveStatic({ root: relative(process.cwd(), options.publicDir) }),
  );

  return app;
}
