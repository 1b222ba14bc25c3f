export type {
  DetectionMethod,
  ScoredEmotion,
  EmotionDetection,
  TextClassifier,
  EmotionTable,
  ResponseLibrary,
  RandomSource,
  SupportRequest,
  SupportGenerator,
  QuoteSource,
} from "./emotion.js";
