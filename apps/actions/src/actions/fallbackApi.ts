import { normalizeEmotion } from "@mindease/core";
import { logger } from "@mindease/shared";
import { slotSet } from "../protocol.js";
import {
  DETECTED_EMOTION_SLOT,
  type Action,
  type ActionDependencies,
} from "./types.js";

/**
 * Answers when no rule or intent applies: canned empathy or a generated
 * reply, never with an appended technique.
 */
export function createFallbackApiAction(deps: ActionDependencies): Action {
  const log =
    deps.logger?.child({ action: "action_fallback_api" }) ??
    logger.child({ service: "action_fallback_api" });

  return {
    name: "action_fallback_api",
    async run(dispatcher, tracker) {
      const message = tracker.latestText;
      const detection = await deps.detector.detect(message);
      const emotion = normalizeEmotion(detection.emotion);

      log.info("Fallback reply", {
        senderId: tracker.senderId,
        message,
        emotion,
        method: detection.method,
      });

      dispatcher.utterMessage(await deps.selector.supportReply(message, emotion));
      return [slotSet(DETECTED_EMOTION_SLOT, emotion)];
    },
  };
}
