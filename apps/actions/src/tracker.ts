import { slotValueSchema, type SlotValue, type TrackerState } from "./protocol.js";

/**
 * Read-only view of the conversation state sent with each action call.
 */
export class Tracker {
  constructor(
    private readonly state: TrackerState,
    private readonly requestSenderId?: string,
  ) {}

  get senderId(): string | undefined {
    return this.state.sender_id ?? this.requestSenderId;
  }

  /** Latest user text, or an empty string. */
  get latestText(): string {
    return this.state.latest_message.text ?? "";
  }

  get intentName(): string | undefined {
    return this.state.latest_message.intent?.name ?? undefined;
  }

  /** Confidence of the top intent; 0 when the message carries none. */
  get intentConfidence(): number {
    return this.state.latest_message.intent?.confidence ?? 0;
  }

  getSlot(name: string): SlotValue | undefined {
    const parsed = slotValueSchema.safeParse(this.state.slots[name]);
    return parsed.success ? parsed.data : undefined;
  }
}
