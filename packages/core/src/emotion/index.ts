export { EMOTION_SYNONYMS, normalizeEmotion } from "./normalize.js";
export { loadEmotionKeywords, type EmotionKeywords } from "./keywords.js";
export {
  KeywordEmotionClassifier,
  type KeywordScore,
} from "./keywordClassifier.js";
export {
  ModelEmotionClassifier,
  type ModelClassifierOptions,
} from "./modelClassifier.js";
export {
  EmotionDetector,
  createEmotionDetector,
  type EmotionDetectorOptions,
  type CreateEmotionDetectorOptions,
} from "./detector.js";
