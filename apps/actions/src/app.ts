import { Hono } from "hono";
import {
  AppError,
  NotFoundError,
  ValidationError,
  describeError,
  logger as rootLogger,
  type CircuitBreakerMetrics,
  type Logger,
} from "@mindease/shared";
import type { ActionRegistry } from "./actions/index.js";
import { CollectingDispatcher } from "./dispatcher.js";
import { webhookRequestSchema, type WebhookResponse } from "./protocol.js";
import { Tracker } from "./tracker.js";

export const ACTION_FAILURE_MESSAGE =
  "I'm having trouble processing your request right now. Let's try something else.";

export interface AppOptions {
  actions: ActionRegistry;
  getLlmCircuitMetrics: () => CircuitBreakerMetrics;
  logger?: Logger;
}

function httpStatus(error: AppError) {
  switch (error.statusCode) {
    case 400:
      return 400;
    case 404:
      return 404;
    case 502:
      return 502;
    case 503:
      return 503;
    case 504:
      return 504;
    default:
      return 500;
  }
}

/**
 * HTTP surface of the action server: the dialogue-server webhook plus
 * action listing and health.
 */
export function createApp(options: AppOptions): Hono {
  const { actions } = options;
  const logger = options.logger ?? rootLogger.child({ service: "action-server" });
  const app = new Hono();

  app.onError((err, c) => {
    if (err instanceof AppError) {
      const actionName = err.context?.["action_name"];
      return c.json(
        {
          error: err.message,
          ...(typeof actionName === "string" ? { action_name: actionName } : {}),
        },
        httpStatus(err),
      );
    }
    logger.error("Unhandled request error", {
      path: c.req.path,
      error: describeError(err),
    });
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/health", (c) => {
    const circuits = { llm: options.getLlmCircuitMetrics() };
    const anyCircuitOpen = Object.values(circuits).some(
      (m) => m.state === "open",
    );

    return c.json({
      status: anyCircuitOpen ? "degraded" : "ok",
      timestamp: new Date().toISOString(),
      circuits,
    });
  });

  app.get("/actions", (c) =>
    c.json([...actions.keys()].map((name) => ({ name }))),
  );

  /**
   * Runs one custom action for the dialogue server.
   */
  app.post("/webhook", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new ValidationError("Request body must be JSON");
    }

    const parsed = webhookRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError(
        parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; "),
      );
    }

    const request = parsed.data;
    const action = actions.get(request.next_action);
    if (!action) {
      logger.warn("Unknown action requested", {
        actionName: request.next_action,
      });
      throw new NotFoundError(
        `No registered action found for name '${request.next_action}'.`,
        { context: { action_name: request.next_action } },
      );
    }

    const dispatcher = new CollectingDispatcher();
    const tracker = new Tracker(request.tracker, request.sender_id);

    try {
      const events = await action.run(dispatcher, tracker);
      const response: WebhookResponse = {
        events,
        responses: [...dispatcher.responses],
      };
      return c.json(response);
    } catch (error) {
      logger.error("Action failed", {
        actionName: action.name,
        senderId: tracker.senderId,
        error: describeError(error),
      });
      const response: WebhookResponse = {
        events: [],
        responses: [{ text: ACTION_FAILURE_MESSAGE }],
      };
      return c.json(response);
    }
  });

  return app;
}
