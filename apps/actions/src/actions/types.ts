import type { EmotionDetector, ResponseSelector } from "@mindease/core";
import type { ConnectionStatus, Logger } from "@mindease/shared";
import type { CollectingDispatcher } from "../dispatcher.js";
import type { SlotSetEvent } from "../protocol.js";
import type { Tracker } from "../tracker.js";

export const DETECTED_EMOTION_SLOT = "detected_emotion";
export const SERVER_CONNECTION_STATUS_SLOT = "server_connection_status";

/**
 * A custom action the dialogue server can call by name. Messages go through
 * the dispatcher; the returned events update the conversation state.
 */
export interface Action {
  readonly name: string;
  run(dispatcher: CollectingDispatcher, tracker: Tracker): Promise<SlotSetEvent[]>;
}

export interface ActionDependencies {
  detector: Pick<EmotionDetector, "detect">;
  selector: Pick<
    ResponseSelector,
    "supportReply" | "motivationalQuote" | "copingSuggestion"
  >;
  probeStatus: () => Promise<ConnectionStatus>;
  logger?: Logger;
}
