import type { Action, ActionDependencies } from "./types.js";
import { createProcessMessageAction } from "./processMessage.js";
import { createFallbackApiAction } from "./fallbackApi.js";
import { createCheckServerStatusAction } from "./checkServerStatus.js";
import { createSuggestCopingStrategyAction } from "./suggestCopingStrategy.js";
import { createMotivationalQuoteAction } from "./motivationalQuote.js";

export type ActionRegistry = ReadonlyMap<string, Action>;

/**
 * Every custom action this server exposes, keyed by its dialogue name.
 */
export function createActionRegistry(deps: ActionDependencies): ActionRegistry {
  const actions = [
    createProcessMessageAction(deps),
    createFallbackApiAction(deps),
    createCheckServerStatusAction(deps),
    createSuggestCopingStrategyAction(deps),
    createMotivationalQuoteAction(deps),
  ];
  return new Map(actions.map((action) => [action.name, action]));
}

export {
  DETECTED_EMOTION_SLOT,
  SERVER_CONNECTION_STATUS_SLOT,
  type Action,
  type ActionDependencies,
} from "./types.js";
