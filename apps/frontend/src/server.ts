import { serve } from "@hono/node-server";
import { getServiceConfig } from "@mindease/core";
import { createLogger, describeError } from "@mindease/shared";
import { createFrontendApp } from "./app.js";
import { PUBLIC_DIR, loadQuotes } from "./quotes.js";

const logger = createLogger({ service: "frontend" });

async function main(): Promise<void> {
  const { frontendPort } = getServiceConfig();
  const app = createFrontendApp({
    quotes: await loadQuotes(),
    publicDir: PUBLIC_DIR,
  });

  serve({ fetch: app.fetch, port: frontendPort }, (info) => {
    logger.info(`Frontend running on http://localhost:${info.port}`);
  });
}

main().catch((error: unknown) => {
  logger.error("Frontend failed to start", { error: describeError(error) });
  process.exit(1);
});
