import { isEmotionLabel, type EmotionLabel } from "@mindease/shared";

/**
 * Everyday words for an emotion, mapped onto the canonical label set.
 */
export const EMOTION_SYNONYMS: ReadonlyMap<string, EmotionLabel> = new Map([
  ["sad", "sadness"],
  ["angry", "anger"],
  ["anxious", "fear"],
  ["afraid", "fear"],
  ["happy", "joy"],
  ["excited", "joy"],
]);

/**
 * Maps any label (model output, slot value, synonym) to a canonical label.
 * Unknown or missing labels become `neutral`.
 */
export function normalizeEmotion(label: string | null | undefined): EmotionLabel {
  if (!label) return "neutral";
  const key = label.trim().toLowerCase();
  if (isEmotionLabel(key)) return key;
  return EMOTION_SYNONYMS.get(key) ?? "neutral";
}
