import {
  getOptionalEnv,
  parseEnvInt,
  parseEnvUrl,
} from "@mindease/shared";

export const RESPONSE_POLICY = {
  /** Chance of answering from the canned empathetic table instead of the LLM. */
  predefinedResponseProbability: 0.7,
  /** Chance of appending a coping technique for sadness, anger and fear. */
  techniqueProbability: 0.5,
  /** Intents below this confidence get an emotion-aware reply from us. */
  intentConfidenceThreshold: 0.3,
} as const;

export const TIMEOUTS_MS = {
  emotionModel: 5_000,
  generation: 5_000,
  quote: 3_000,
  statusProbe: 2_000,
} as const;

export const MODEL_CONFIG = {
  support: {
    model: "gpt-3.5-turbo",
    temperature: 0.7,
    maxTokens: 150,
  },
  emotion: {
    model: "j-hartmann/emotion-english-distilroberta-base",
  },
} as const;

export const DEFAULT_PORTS = {
  actionServer: 5055,
  dialogueServer: 5005,
  frontend: 8000,
} as const;

export interface ServiceConfig {
  actionServerPort: number;
  frontendPort: number;
  dialogueServerPort: number;
  statusUrl: string;
  quoteApiUrl: string;
  llm: {
    apiKey: string | undefined;
    baseUrl: string | undefined;
    model: string;
  };
  emotionModel: {
    apiKey: string | undefined;
    model: string;
  };
}

/**
 * Reads runtime configuration from the environment. Unset secrets disable
 * the corresponding remote path rather than failing startup.
 */
export function getServiceConfig(): ServiceConfig {
  const dialogueServerPort = parseEnvInt(
    "RASA_PORT",
    DEFAULT_PORTS.dialogueServer,
  );
  const frontendPort = parseEnvInt("FRONTEND_PORT", DEFAULT_PORTS.frontend);

  return {
    actionServerPort: parseEnvInt(
      "ACTION_SERVER_PORT",
      DEFAULT_PORTS.actionServer,
    ),
    frontendPort,
    dialogueServerPort,
    statusUrl: parseEnvUrl(
      "RASA_STATUS_URL",
      `http://localhost:${dialogueServerPort}/status`,
    ),
    quoteApiUrl: parseEnvUrl(
      "QUOTE_API_URL",
      `http://localhost:${frontendPort}/quote`,
    ),
    llm: {
      apiKey: getOptionalEnv("OPENAI_API_KEY"),
      baseUrl: getOptionalEnv("LLM_API_BASE_URL"),
      model: getOptionalEnv("LLM_MODEL", MODEL_CONFIG.support.model),
    },
    emotionModel: {
      apiKey: getOptionalEnv("HUGGINGFACE_API_KEY"),
      model: getOptionalEnv("EMOTION_MODEL", MODEL_CONFIG.emotion.model),
    },
  };
}
