export {
  type LogLevel,
  type LogContext,
  type LogSink,
  type Logger,
  type LoggerOptions,
  createLogger,
  logger,
} from "./logger.js";

export {
  CircuitBreaker,
  CircuitBreakerError,
  type CircuitBreakerConfig,
  type CircuitBreakerMetrics,
  type CircuitBreakerState,
} from "./circuitBreaker.js";

export {
  AppError,
  NotFoundError,
  ValidationError,
  ExternalServiceError,
  TimeoutError,
  describeError,
} from "./errors.js";

export { withTimeout } from "./withTimeout.js";

export {
  getOptionalEnv,
  parseEnvInt,
  parseEnvUrl,
} from "./env.js";

export {
  EMOTION_LABELS,
  emotionLabelSchema,
  type EmotionLabel,
  DISTRESS_LABELS,
  isEmotionLabel,
  perEmotionSchema,
  CONNECTION_STATUSES,
  connectionStatusSchema,
  type ConnectionStatus,
  quoteSchema,
  type Quote,
} from "./validation.js";
