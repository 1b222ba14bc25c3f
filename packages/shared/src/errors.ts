type ErrorContext = Record<string, unknown>;

interface SubclassOptions {
  code?: string | undefined;
  cause?: Error | undefined;
  context?: ErrorContext | undefined;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: ErrorContext | undefined;

  constructor(
    message: string,
    options: SubclassOptions & {
      statusCode?: number | undefined;
      isOperational?: boolean | undefined;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.statusCode = options.statusCode ?? 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      ...(this.context ? { context: this.context } : {}),
    };
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? "NOT_FOUND",
      statusCode: 404,
    });
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed", options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? "VALIDATION_ERROR",
      statusCode: 400,
    });
  }
}

/**
 * An outbound call (generation API, quote service, status probe, inference
 * endpoint) failed or answered with something unusable.
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly upstreamStatus?: number | undefined;

  constructor(
    service: string,
    message = "External service failure",
    options: SubclassOptions & { upstreamStatus?: number | undefined } = {},
  ) {
    super(message, {
      ...options,
      code: options.code ?? "EXTERNAL_SERVICE_ERROR",
      statusCode: 502,
      context: {
        service,
        ...(options.upstreamStatus !== undefined
          ? { upstreamStatus: options.upstreamStatus }
          : {}),
        ...options.context,
      },
    });
    this.service = service;
    this.upstreamStatus = options.upstreamStatus;
  }
}

export class TimeoutError extends AppError {
  public readonly operationName: string;
  public readonly timeoutMs: number;

  constructor(operationName: string, timeoutMs: number) {
    super(`Operation '${operationName}' timed out after ${timeoutMs}ms`, {
      code: "TIMEOUT",
      statusCode: 504,
      context: { operationName, timeoutMs },
    });
    this.operationName = operationName;
    this.timeoutMs = timeoutMs;
  }
}

/** Message text of any thrown value, for log context. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
