import { EMOTION_LABELS, type EmotionLabel } from "@mindease/shared";
import type { ScoredEmotion, TextClassifier } from "../types/index.js";
import type { EmotionKeywords } from "./keywords.js";

export interface KeywordScore {
  emotion: EmotionLabel;
  confidence: number;
  counts: Record<EmotionLabel, number>;
}

/**
 * Order in which tied labels are considered: non-neutral labels
 * alphabetically, then neutral. The first label to reach the top count wins.
 */
const TIE_BREAK_ORDER: readonly EmotionLabel[] = [
  ...EMOTION_LABELS.filter((label) => label !== "neutral").sort(),
  "neutral",
];

const BASE_CONFIDENCE = 0.5;
const CONFIDENCE_SPAN = 0.4;
const MAX_CONFIDENCE = 0.9;

/**
 * Deterministic fallback classifier: counts how many of each label's
 * keywords occur as substrings of the lower-cased text.
 */
export class KeywordEmotionClassifier implements TextClassifier {
  readonly method = "keywords" as const;

  constructor(private readonly keywords: EmotionKeywords) {}

  score(text: string): KeywordScore {
    const lowered = text.toLowerCase();
    const counts: Record<EmotionLabel, number> = {
      joy: 0,
      sadness: 0,
      anger: 0,
      fear: 0,
      neutral: 0,
    };

    for (const label of EMOTION_LABELS) {
      counts[label] = this.keywords[label].filter((keyword) =>
        lowered.includes(keyword),
      ).length;
    }

    let emotion: EmotionLabel = "neutral";
    let best = 0;
    for (const label of TIE_BREAK_ORDER) {
      if (counts[label] > best) {
        best = counts[label];
        emotion = label;
      }
    }

    const total = EMOTION_LABELS.reduce((sum, label) => sum + counts[label], 0);
    const confidence =
      total > 0
        ? Math.min(
            MAX_CONFIDENCE,
            BASE_CONFIDENCE + (best / total) * CONFIDENCE_SPAN,
          )
        : BASE_CONFIDENCE;

    return { emotion, confidence, counts };
  }

  async classify(text: string): Promise<ScoredEmotion[]> {
    const { emotion, confidence } = this.score(text);
    return [{ emotion, confidence }];
  }
}
