import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { readJsonFile } from "@mindease/core";
import { quoteSchema, type Quote } from "@mindease/shared";

const quotesSchema = z.array(quoteSchema).min(1);

const appDir = resolve(dirname(fileURLToPath(import.meta.url)), "..");

export const QUOTES_PATH = resolve(appDir, "data", "quotes.json");
export const PUBLIC_DIR = resolve(appDir, "public");

export async function loadQuotes(
  filePath: string = QUOTES_PATH,
): Promise<readonly Quote[]> {
  return readJsonFile(filePath, quotesSchema);
}
