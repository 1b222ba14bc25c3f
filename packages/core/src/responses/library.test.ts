import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { EMOTION_LABELS } from "@mindease/shared";
import { loadResponseLibrary } from "./library.js";

describe("loadResponseLibrary", () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it("loads five replies and five techniques per emotion", async () => {
    const library = await loadResponseLibrary();

    for (const label of EMOTION_LABELS) {
      expect(library.empatheticResponses[label]).toHaveLength(5);
      expect(library.copingTechniques[label]).toHaveLength(5);
    }
    expect(library.fallbackQuotes).toContainEqual({
      quote: "This too shall pass.",
      author: "Persian Proverb",
    });
  });

  it("rejects a library missing an emotion", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "mindease-library-"));
    const filePath = join(tempDir, "library.json");
    const table = { joy: ["x"], sadness: ["x"], anger: ["x"], fear: ["x"] };
    await writeFile(
      filePath,
      JSON.stringify({
        empatheticResponses: table,
        copingTechniques: table,
        fallbackQuotes: [{ quote: "q", author: "a" }],
      }),
    );

    await expect(loadResponseLibrary(filePath)).rejects.toMatchObject({
      name: "ValidationError",
      code: "DATA_FILE_INVALID",
    });
  });

  it("rejects malformed JSON", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "mindease-library-"));
    const filePath = join(tempDir, "library.json");
    await writeFile(filePath, "{ not json");

    await expect(loadResponseLibrary(filePath)).rejects.toThrow(
      `Malformed JSON in ${filePath}`,
    );
  });
});
