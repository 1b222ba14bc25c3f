import type { EmotionLabel, Quote } from "@mindease/shared";

/** Which path produced a detection. */
export type DetectionMethod = "model" | "keywords" | "default";

export interface ScoredEmotion {
  emotion: string;
  confidence: number;
}

export interface EmotionDetection {
  readonly emotion: string;
  readonly confidence: number;
  readonly method: DetectionMethod;
  /** Full ranked label list; only the model path produces one. */
  readonly allEmotions?: readonly ScoredEmotion[];
}

/**
 * Anything that turns text into ranked, scored emotion predictions.
 */
export interface TextClassifier {
  readonly method: Exclude<DetectionMethod, "default">;
  classify(text: string): Promise<ScoredEmotion[]>;
}

export type EmotionTable<T> = Readonly<Record<EmotionLabel, readonly T[]>>;

export interface ResponseLibrary {
  empatheticResponses: EmotionTable<string>;
  copingTechniques: EmotionTable<string>;
  fallbackQuotes: readonly Quote[];
}

/**
 * Uniform random number in [0, 1).
 */
export type RandomSource = () => number;

export interface SupportRequest {
  /** The user's latest utterance. */
  message: string;
  emotion: EmotionLabel;
}

/**
 * Remote text generation of a short supportive reply.
 */
export interface SupportGenerator {
  generate(request: SupportRequest): Promise<string>;
}

export interface QuoteSource {
  fetchQuote(): Promise<Quote>;
}
