import { serve } from "@hono/node-server";
import {
  ResponseSelector,
  TIMEOUTS_MS,
  createEmotionDetector,
  createQuoteClient,
  createSupportGenerator,
  getLlmCircuitMetrics,
  getServiceConfig,
  loadResponseLibrary,
  probeServerStatus,
} from "@mindease/core";
import { createLogger, describeError } from "@mindease/shared";
import { createActionRegistry } from "./actions/index.js";
import { createApp } from "./app.js";

const logger = createLogger({ service: "action-server" });

async function main(): Promise<void> {
  const config = getServiceConfig();

  const detector = await createEmotionDetector({
    modelToken: config.emotionModel.apiKey,
    model: config.emotionModel.model,
    logger: logger.child({ service: "emotion-detector" }),
  });

  if (!config.llm.apiKey) {
    logger.warn("No generation API key configured, using canned replies only");
  }

  const selector = new ResponseSelector({
    library: await loadResponseLibrary(),
    generator: config.llm.apiKey
      ? createSupportGenerator({
          apiKey: config.llm.apiKey,
          baseUrl: config.llm.baseUrl,
          model: config.llm.model,
        })
      : undefined,
    quotes: createQuoteClient({
      url: config.quoteApiUrl,
      timeoutMs: TIMEOUTS_MS.quote,
    }),
    logger: logger.child({ service: "response-selector" }),
  });

  const actions = createActionRegistry({
    detector,
    selector,
    probeStatus: () =>
      probeServerStatus({
        url: config.statusUrl,
        timeoutMs: TIMEOUTS_MS.statusProbe,
        logger: logger.child({ service: "status-probe" }),
      }),
    logger,
  });

  const app = createApp({ actions, getLlmCircuitMetrics, logger });

  serve({ fetch: app.fetch, port: config.actionServerPort }, (info) => {
    logger.info(`Action server running on http://localhost:${info.port}`, {
      actions: [...actions.keys()],
      emotionModel: detector.usesModel,
    });
  });
}

main().catch((error: unknown) => {
  logger.error("Action server failed to start", {
    error: describeError(error),
  });
  process.exit(1);
});
