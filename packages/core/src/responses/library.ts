import { z } from "zod";
import { perEmotionSchema, quoteSchema } from "@mindease/shared";
import type { ResponseLibrary } from "../types/index.js";
import { getDataFilePath, readJsonFile } from "../utils/dataFiles.js";

const phraseList = z.array(z.string().trim().min(1)).min(1);

const responseLibrarySchema = z.object({
  empatheticResponses: perEmotionSchema(phraseList),
  copingTechniques: perEmotionSchema(phraseList),
  fallbackQuotes: z.array(quoteSchema).min(1),
});

/**
 * Loads the canned replies, coping techniques and offline quotes. Every
 * emotion must have at least one entry in each table.
 */
export async function loadResponseLibrary(
  filePath: string = getDataFilePath("response-library.json"),
): Promise<ResponseLibrary> {
  return readJsonFile(filePath, responseLibrarySchema);
}
