import { readFile } from "node:fs/promises";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";
import { ValidationError } from "@mindease/shared";

/**
 * Absolute path of a file in the package's `data/` directory.
 */
export function getDataFilePath(fileName: string): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  return resolve(__dirname, "..", "..", "data", fileName);
}

/**
 * Reads a JSON file and validates it against `schema`.
 *
 * @throws {ValidationError} When the file is not valid JSON or does not match
 */
export async function readJsonFile<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
): Promise<z.output<T>> {
  const raw = await readFile(filePath, "utf-8");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Malformed JSON in ${filePath}`, {
      code: "DATA_FILE_INVALID",
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new ValidationError(`Unexpected contents in ${filePath}`, {
      code: "DATA_FILE_INVALID",
      context: {
        filePath,
        issues: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      },
    });
  }
  return result.data;
}
