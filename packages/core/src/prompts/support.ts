import type { EmotionLabel } from "@mindease/shared";

/**
 * System prompt for generated support replies. Keeps the model brief and
 * away from clinical advice.
 */
export function buildSupportSystemPrompt(emotion: EmotionLabel): string {
  return (
    "You are an empathetic mental health assistant. " +
    `The user seems to be feeling ${emotion}. ` +
    "Provide a supportive response that acknowledges the user's feelings " +
    "and offers gentle guidance. Keep your response concise (2-3 sentences) " +
    "and focus on emotional support rather than clinical advice."
  );
}
