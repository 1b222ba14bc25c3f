import {
  describeError,
  logger,
  type Logger,
} from "@mindease/shared";
import type { EmotionDetection, TextClassifier } from "../types/index.js";
import { TIMEOUTS_MS } from "../config/settings.js";
import { KeywordEmotionClassifier } from "./keywordClassifier.js";
import { loadEmotionKeywords } from "./keywords.js";
import { ModelEmotionClassifier } from "./modelClassifier.js";

const EMPTY_TEXT_DETECTION: EmotionDetection = {
  emotion: "neutral",
  confidence: 0,
  method: "default",
};

export interface EmotionDetectorOptions {
  /** Learned classifier tried first. Omit to use keywords only. */
  model?: TextClassifier | undefined;
  keywords: KeywordEmotionClassifier;
  logger?: Logger;
}

/**
 * Two-tier emotion detection: an optional learned classifier, falling back
 * to keyword scoring whenever it is missing or fails. `detect` never rejects.
 */
export class EmotionDetector {
  private readonly model: TextClassifier | undefined;
  private readonly keywords: KeywordEmotionClassifier;
  private readonly log: Logger;

  constructor(options: EmotionDetectorOptions) {
    this.model = options.model;
    this.keywords = options.keywords;
    this.log = options.logger ?? logger.child({ service: "emotion-detector" });
  }

  get usesModel(): boolean {
    return this.model !== undefined;
  }

  async detect(text: string): Promise<EmotionDetection> {
    if (!text || text.trim() === "") {
      return EMPTY_TEXT_DETECTION;
    }

    if (this.model) {
      try {
        const ranked = await this.model.classify(text);
        const top = ranked[0];
        if (top) {
          return {
            emotion: top.emotion.toLowerCase(),
            confidence: top.confidence,
            method: this.model.method,
            allEmotions: ranked.map((entry) => ({
              emotion: entry.emotion.toLowerCase(),
              confidence: entry.confidence,
            })),
          };
        }
        this.log.warn("Emotion model returned no labels, using keywords");
      } catch (error) {
        this.log.error("Emotion model failed, using keywords", {
          error: describeError(error),
        });
      }
    }

    const { emotion, confidence } = this.keywords.score(text);
    return { emotion, confidence, method: "keywords" };
  }
}

export interface CreateEmotionDetectorOptions {
  /** Inference API token; without one the detector uses keywords only. */
  modelToken?: string | undefined;
  model: string;
  keywordsPath?: string;
  logger?: Logger;
}

/**
 * Builds a detector with the keyword tables loaded and, when a token is
 * configured, the hosted model in front of them.
 */
export async function createEmotionDetector(
  options: CreateEmotionDetectorOptions,
): Promise<EmotionDetector> {
  const log = options.logger ?? logger.child({ service: "emotion-detector" });
  const keywords = new KeywordEmotionClassifier(
    await loadEmotionKeywords(options.keywordsPath),
  );

  const model = options.modelToken
    ? new ModelEmotionClassifier({
        accessToken: options.modelToken,
        model: options.model,
        timeoutMs: TIMEOUTS_MS.emotionModel,
        logger: log,
      })
    : undefined;

  if (!model) {
    log.warn("No emotion model token configured, using keyword detection");
  }

  return new EmotionDetector({ model, keywords, logger: log });
}
