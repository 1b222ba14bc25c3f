import { normalizeEmotion } from "@mindease/core";
import { logger } from "@mindease/shared";
import { slotSet } from "../protocol.js";
import {
  DETECTED_EMOTION_SLOT,
  type Action,
  type ActionDependencies,
} from "./types.js";

export function createMotivationalQuoteAction(
  deps: ActionDependencies,
): Action {
  const log =
    deps.logger?.child({ action: "action_get_motivational_quote" }) ??
    logger.child({ service: "action_get_motivational_quote" });

  return {
    name: "action_get_motivational_quote",
    async run(dispatcher, tracker) {
      const detection = await deps.detector.detect(tracker.latestText);
      const emotion = normalizeEmotion(detection.emotion);

      log.info("Sending motivational quote", {
        senderId: tracker.senderId,
        emotion,
        method: detection.method,
      });

      dispatcher.utterMessage(await deps.selector.motivationalQuote(emotion));
      return [slotSet(DETECTED_EMOTION_SLOT, emotion)];
    },
  };
}
