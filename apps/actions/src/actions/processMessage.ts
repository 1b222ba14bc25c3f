import { RESPONSE_POLICY, normalizeEmotion } from "@mindease/core";
import { logger } from "@mindease/shared";
import { slotSet } from "../protocol.js";
import {
  DETECTED_EMOTION_SLOT,
  type Action,
  type ActionDependencies,
} from "./types.js";

/**
 * Detects the user's emotion every turn. Confident intents are left to the
 * dialogue policy; low-confidence turns get an emotion-aware reply here.
 */
export function createProcessMessageAction(deps: ActionDependencies): Action {
  const log =
    deps.logger?.child({ action: "action_process_message" }) ??
    logger.child({ service: "action_process_message" });

  return {
    name: "action_process_message",
    async run(dispatcher, tracker) {
      const message = tracker.latestText;
      const detection = await deps.detector.detect(message);
      const emotion = normalizeEmotion(detection.emotion);

      log.info("Processing message", {
        senderId: tracker.senderId,
        message,
        intent: tracker.intentName,
        intentConfidence: tracker.intentConfidence,
        emotion,
        method: detection.method,
        confidence: detection.confidence,
      });

      if (
        tracker.intentConfidence < RESPONSE_POLICY.intentConfidenceThreshold
      ) {
        dispatcher.utterMessage(
          await deps.selector.supportReply(message, emotion, {
            appendTechnique: true,
          }),
        );
      }

      return [slotSet(DETECTED_EMOTION_SLOT, emotion)];
    },
  };
}
