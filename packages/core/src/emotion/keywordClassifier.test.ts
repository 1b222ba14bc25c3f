import { describe, it, expect, beforeAll } from "vitest";
import { KeywordEmotionClassifier } from "./keywordClassifier.js";
import { loadEmotionKeywords } from "./keywords.js";

describe("KeywordEmotionClassifier", () => {
  let classifier: KeywordEmotionClassifier;

  beforeAll(async () => {
    classifier = new KeywordEmotionClassifier(await loadEmotionKeywords());
  });

  it("scores a single-label match at the confidence cap", () => {
    const result = classifier.score("I am scared and terrified");

    expect(result.emotion).toBe("fear");
    expect(result.confidence).toBeCloseTo(0.9);
    expect(result.counts.fear).toBe(2);
  });

  it("scales confidence by the winning share of matches", () => {
    // "unhappy" also contains "happy", so joy gets one match
    const result = classifier.score("I feel sad, unhappy and depressed");

    expect(result.emotion).toBe("sadness");
    expect(result.counts).toMatchObject({ sadness: 3, joy: 1 });
    expect(result.confidence).toBeCloseTo(0.8);
  });

  it("matches case-insensitively", () => {
    expect(classifier.score("I AM FURIOUS").emotion).toBe("anger");
  });

  it("returns neutral at 0.5 when nothing matches", () => {
    const result = classifier.score("The weather report");

    expect(result.emotion).toBe("neutral");
    expect(result.confidence).toBe(0.5);
  });

  describe("ties", () => {
    it("prefers the alphabetically first non-neutral label", () => {
      const result = classifier.score("I'm happy but sad");

      expect(result.emotion).toBe("joy");
      expect(result.confidence).toBeCloseTo(0.7);
    });

    it("prefers any non-neutral label over neutral", () => {
      expect(classifier.score("fine but worried").emotion).toBe("fear");
    });
  });

  it("classify() returns the single keyword prediction", async () => {
    await expect(classifier.classify("I am so angry")).resolves.toEqual([
      { emotion: "anger", confidence: 0.9 },
    ]);
  });
});
