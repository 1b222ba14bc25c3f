import { z } from "zod";

/**
 * The canonical emotion labels. Every response table is keyed by exactly
 * these.
 */
export const EMOTION_LABELS = [
  "joy",
  "sadness",
  "anger",
  "fear",
  "neutral",
] as const;

export const emotionLabelSchema = z.enum(EMOTION_LABELS);

export type EmotionLabel = z.infer<typeof emotionLabelSchema>;

/**
 * Labels that get a coping technique appended to empathetic replies.
 */
export const DISTRESS_LABELS = [
  "sadness",
  "anger",
  "fear",
] as const satisfies readonly EmotionLabel[];

export function isEmotionLabel(value: string): value is EmotionLabel {
  return emotionLabelSchema.safeParse(value).success;
}

/**
 * Builds an object schema with one required entry per emotion label.
 */
export function perEmotionSchema<T extends z.ZodTypeAny>(value: T) {
  return z.object({
    joy: value,
    sadness: value,
    anger: value,
    fear: value,
    neutral: value,
  });
}

/**
 * Values of the `server_connection_status` slot.
 */
export const CONNECTION_STATUSES = ["connected", "disconnected"] as const;

export const connectionStatusSchema = z.enum(CONNECTION_STATUSES);

export type ConnectionStatus = z.infer<typeof connectionStatusSchema>;

/**
 * Body served by the local quote service.
 */
export const quoteSchema = z.object({
  quote: z.string().trim().min(1),
  author: z.string().trim().min(1),
});

export type Quote = z.infer<typeof quoteSchema>;
