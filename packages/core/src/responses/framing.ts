import type { EmotionLabel } from "@mindease/shared";

/** Lead-in printed before a motivational quote. */
export const QUOTE_PREFIXES: Readonly<Record<EmotionLabel, string>> = {
  sadness:
    "I understand you might be feeling down. Here's something that might help: ",
  anger:
    "I can sense you're frustrated. Take a deep breath and consider this: ",
  fear: "It's okay to feel anxious sometimes. Remember: ",
  joy: "I'm glad you're feeling positive! Here's more inspiration: ",
  neutral: "Here's a thought for you: ",
};

/** Lead-in printed before a coping technique. */
export const COPING_INTROS: Readonly<Record<EmotionLabel, string>> = {
  sadness: "When you're feeling down, it can help to:",
  anger: "To manage feelings of frustration or anger, you might try:",
  fear: "When anxiety or fear arises, this technique can be helpful:",
  joy: "To build on these positive feelings, consider:",
  neutral: "Here's a helpful technique you might want to try:",
};

export const TECHNIQUE_LEAD_IN = "\n\nHere's a technique that might help: ";
