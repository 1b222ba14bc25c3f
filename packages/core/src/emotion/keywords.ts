import { z } from "zod";
import { perEmotionSchema } from "@mindease/shared";
import type { EmotionTable } from "../types/index.js";
import { getDataFilePath, readJsonFile } from "../utils/dataFiles.js";

const emotionKeywordsSchema = perEmotionSchema(
  z.array(z.string().trim().toLowerCase().min(1)).min(1),
);

export type EmotionKeywords = EmotionTable<string>;

/**
 * Loads the per-label keyword lists from `data/emotion-keywords.json`.
 */
export async function loadEmotionKeywords(
  filePath: string = getDataFilePath("emotion-keywords.json"),
): Promise<EmotionKeywords> {
  return readJsonFile(filePath, emotionKeywordsSchema);
}
