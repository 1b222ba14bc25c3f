import {
  AppError,
  ExternalServiceError,
  TimeoutError,
  describeError,
  withTimeout,
} from "@mindease/shared";

export interface FetchOnceOptions {
  /** Name used in errors and logs. */
  service: string;
  timeoutMs: number;
  init?: RequestInit;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Single fetch attempt with a hard timeout. The deadline covers reading the
 * body as well as the headers, so `read` runs before the abort timer is
 * cleared. No retries: callers fall back to local data instead.
 *
 * @throws {TimeoutError} When the timeout fires first
 * @throws {ExternalServiceError} On network errors
 */
export async function fetchOnce<T>(
  url: string,
  options: FetchOnceOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    return await withTimeout(
      fetch(url, { ...options.init, signal: controller.signal }).then(read),
      options.timeoutMs,
      options.service,
    );
  } catch (error) {
    if (error instanceof AppError) throw error;
    if (isAbortError(error)) {
      throw new TimeoutError(options.service, options.timeoutMs);
    }
    throw new ExternalServiceError(
      options.service,
      `Request to ${url} failed: ${describeError(error)}`,
      { cause: error instanceof Error ? error : undefined },
    );
  } finally {
    clearTimeout(timeoutId);
    controller.abort();
  }
}
