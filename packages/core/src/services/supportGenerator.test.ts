import { describe, it, expect, vi, beforeEach } from "vitest";
import { AIMessage } from "@langchain/core/messages";

const { mockInvoke, MockChatOpenAI } = vi.hoisted(() => {
  const mockInvoke = vi.fn();
  return {
    mockInvoke,
    MockChatOpenAI: vi.fn(() => ({ invoke: mockInvoke })),
  };
});

vi.mock("@langchain/openai", () => ({
  ChatOpenAI: MockChatOpenAI,
}));

import {
  createSupportGenerator,
  extractTextFromResponse,
  getLlmCircuitMetrics,
  resetLlmCircuit,
} from "./supportGenerator.js";

describe("createSupportGenerator", () => {
  beforeEach(() => {
    mockInvoke.mockReset();
    MockChatOpenAI.mockClear();
    resetLlmCircuit();
  });

  it("configures a single-attempt chat model", () => {
    createSupportGenerator({ apiKey: "test-secret" });

    expect(MockChatOpenAI).toHaveBeenCalledWith({
      model: "gpt-3.5-turbo",
      temperature: 0.7,
      maxTokens: 150,
      apiKey: "test-secret",
      timeout: 5000,
      maxRetries: 0,
    });
  });

  it("passes a custom base URL to the client", () => {
    createSupportGenerator({
      apiKey: "test-secret",
      baseUrl: "http://localhost:9999/v1",
    });

    expect(MockChatOpenAI).toHaveBeenCalledWith(
      expect.objectContaining({
        configuration: { baseURL: "http://localhost:9999/v1" },
      }),
    );
  });

  it("sends the emotion-aware system prompt and the user message", async () => {
    mockInvoke.mockResolvedValueOnce(new AIMessage("  You are not alone.  "));
    const generator = createSupportGenerator({ apiKey: "test-secret" });

    await expect(
      generator.generate({ message: "I feel low", emotion: "sadness" }),
    ).resolves.toBe("You are not alone.");

    const [messages] = mockInvoke.mock.calls[0] ?? [];
    expect(messages).toHaveLength(2);
    expect(messages[0].content).toContain(
      "The user seems to be feeling sadness.",
    );
    expect(messages[1].content).toBe("I feel low");
  });

  it("rejects an empty reply", async () => {
    mockInvoke.mockResolvedValueOnce(new AIMessage("   "));
    const generator = createSupportGenerator({ apiKey: "test-secret" });

    await expect(
      generator.generate({ message: "hi", emotion: "neutral" }),
    ).rejects.toThrow("Generation API returned no content");
  });

  it("opens the circuit after three failures", async () => {
    mockInvoke.mockRejectedValue(new Error("503 Service Unavailable"));
    const generator = createSupportGenerator({ apiKey: "test-secret" });

    for (let i = 0; i < 3; i++) {
      await expect(
        generator.generate({ message: "hi", emotion: "fear" }),
      ).rejects.toThrow("503 Service Unavailable");
    }

    expect(getLlmCircuitMetrics().state).toBe("open");
    await expect(
      generator.generate({ message: "hi", emotion: "fear" }),
    ).rejects.toMatchObject({ code: "CIRCUIT_BREAKER_OPEN" });
    expect(mockInvoke).toHaveBeenCalledTimes(3);
  });
});

describe("extractTextFromResponse", () => {
  it("returns string content as is", () => {
    expect(extractTextFromResponse(new AIMessage("hello"))).toBe("hello");
  });

  it("joins text blocks and skips others", () => {
    const message = new AIMessage({
      content: [
        { type: "text", text: "Take " },
        { type: "image_url", image_url: "http://localhost/x.png" },
        { type: "text", text: "a breath." },
      ],
    });

    expect(extractTextFromResponse(message)).toBe("Take a breath.");
  });
});
