import { logger } from "@mindease/shared";
import {
  DETECTED_EMOTION_SLOT,
  type Action,
  type ActionDependencies,
} from "./types.js";

/**
 * Suggests a coping technique for the emotion stored on an earlier turn.
 * Leaves the conversation state untouched.
 */
export function createSuggestCopingStrategyAction(
  deps: ActionDependencies,
): Action {
  const log =
    deps.logger?.child({ action: "action_suggest_coping_strategy" }) ??
    logger.child({ service: "action_suggest_coping_strategy" });

  return {
    name: "action_suggest_coping_strategy",
    async run(dispatcher, tracker) {
      const slot = tracker.getSlot(DETECTED_EMOTION_SLOT);
      const label = typeof slot === "string" ? slot : "neutral";

      log.info("Suggesting coping strategy", {
        senderId: tracker.senderId,
        emotion: label,
      });

      dispatcher.utterMessage(deps.selector.copingSuggestion(label));
      return [];
    },
  };
}
