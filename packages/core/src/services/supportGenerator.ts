import { ChatOpenAI } from "@langchain/openai";
import {
  HumanMessage,
  SystemMessage,
  type BaseMessage,
} from "@langchain/core/messages";
import {
  CircuitBreaker,
  ExternalServiceError,
  logger,
  type CircuitBreakerMetrics,
} from "@mindease/shared";
import type { SupportGenerator } from "../types/index.js";
import { MODEL_CONFIG, TIMEOUTS_MS } from "../config/settings.js";
import { buildSupportSystemPrompt } from "../prompts/support.js";

const log = logger.child({ service: "llm-circuit" });

/**
 * Circuit breaker for the generation API.
 *
 * Configuration:
 * - failureThreshold: 3
 * - resetTimeout: 60s
 * - requestTimeout: the generation timeout (5s)
 */
const llmCircuit = new CircuitBreaker({
  name: "llm",
  failureThreshold: 3,
  resetTimeout: 60_000,
  requestTimeout: TIMEOUTS_MS.generation,
  successThreshold: 2,
  logger: log,
});

export function getLlmCircuitMetrics(): CircuitBreakerMetrics {
  return llmCircuit.getMetrics();
}

export function resetLlmCircuit(): void {
  llmCircuit.reset();
}

/**
 * Extracts text content from a chat model response.
 */
export function extractTextFromResponse(response: BaseMessage): string {
  if (typeof response.content === "string") {
    return response.content;
  }

  return response.content
    .filter(
      (block): block is { type: "text"; text: string } =>
        typeof block === "object" &&
        block !== null &&
        "type" in block &&
        block.type === "text",
    )
    .map((block) => block.text)
    .join("");
}

export interface SupportGeneratorOptions {
  apiKey: string;
  baseUrl?: string | undefined;
  model?: string;
}

/**
 * OpenAI-compatible chat completion of a 2-3 sentence supportive reply. One
 * attempt per call; failures and empty replies reject.
 */
export function createSupportGenerator(
  options: SupportGeneratorOptions,
): SupportGenerator {
  const chat = new ChatOpenAI({
    model: options.model ?? MODEL_CONFIG.support.model,
    temperature: MODEL_CONFIG.support.temperature,
    maxTokens: MODEL_CONFIG.support.maxTokens,
    apiKey: options.apiKey,
    timeout: TIMEOUTS_MS.generation,
    maxRetries: 0,
    ...(options.baseUrl ? { configuration: { baseURL: options.baseUrl } } : {}),
  });

  return {
    async generate({ message, emotion }) {
      const response = await llmCircuit.execute(() =>
        chat.invoke([
          new SystemMessage(buildSupportSystemPrompt(emotion)),
          new HumanMessage(message),
        ]),
      );

      const text = extractTextFromResponse(response).trim();
      if (!text) {
        throw new ExternalServiceError("llm", "Generation API returned no content");
      }
      return text;
    },
  };
}
