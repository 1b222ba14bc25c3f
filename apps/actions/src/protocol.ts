import { z } from "zod";

export const slotValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export type SlotValue = z.infer<typeof slotValueSchema>;

const intentSchema = z.object({
  name: z.string().nullish(),
  confidence: z.number().nullish(),
});

const latestMessageSchema = z.object({
  text: z.string().nullish(),
  intent: intentSchema.nullish(),
});

const trackerSchema = z.object({
  sender_id: z.string().optional(),
  slots: z.record(z.unknown()).default({}),
  latest_message: latestMessageSchema.default({}),
});

/**
 * Body of a dialogue-server request to run one custom action.
 */
export const webhookRequestSchema = z.object({
  next_action: z.string().min(1),
  sender_id: z.string().optional(),
  tracker: trackerSchema,
  domain: z.record(z.unknown()).optional(),
  version: z.string().optional(),
});

export type WebhookRequest = z.infer<typeof webhookRequestSchema>;
export type TrackerState = z.infer<typeof trackerSchema>;

export interface SlotSetEvent {
  event: "slot";
  timestamp: null;
  name: string;
  value: SlotValue;
}

export interface BotResponse {
  text: string;
}

export interface WebhookResponse {
  events: SlotSetEvent[];
  responses: BotResponse[];
}

export function slotSet(name: string, value: SlotValue): SlotSetEvent {
  return { event: "slot", timestamp: null, name, value };
}
