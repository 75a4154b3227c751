/**
 * Retry policy for model invocations.
 *
 * Exponential backoff with jitter for transient failures such as rate limits,
 * 5xx responses, timeouts and dropped connections. Tool calls are never retried:
 * their failures go back to the model as observations.
 */

/**
 * @example
 * ```typescript
 * const runner = new Runner({
 *   model,
 *   retry: { retries: 5, minTimeout: 2000, onRetry: (err, n) => log(err, n) },
 * });
 * ```
 */
export interface RetryConfig {
  /** @default true */
  enabled?: boolean;

  /**
   * Retries after the first attempt.
   * @default 3
   */
  retries?: number;

  /** @default 1000 */
  minTimeout?: number;

  /** @default 30000 */
  maxTimeout?: number;

  /** @default 2 */
  factor?: number;

  /** @default true */
  randomize?: boolean;

  /** Called before each retry. */
  onRetry?: (error: Error, attempt: number) => void;

  /** Called once when every attempt failed; the error is still raised afterwards. */
  onRetriesExhausted?: (error: Error, attempts: number) => void;

  /** Overrides the default {@link isRetryableError} classification. */
  shouldRetry?: (error: Error) => boolean;
}

export interface ResolvedRetryConfig {
  enabled: boolean;
  retries: number;
  minTimeout: number;
  maxTimeout: number;
  factor: number;
  randomize: boolean;
  onRetry?: (error: Error, attempt: number) => void;
  onRetriesExhausted?: (error: Error, attempts: number) => void;
  shouldRetry?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_CONFIG: Omit<
  ResolvedRetryConfig,
  "onRetry" | "onRetriesExhausted" | "shouldRetry"
> = {
  enabled: true,
  retries: 3,
  minTimeout: 1000,
  maxTimeout: 30000,
  factor: 2,
  randomize: true,
};

export function resolveRetryConfig(config?: RetryConfig): ResolvedRetryConfig {
  if (!config) {
    return { ...DEFAULT_RETRY_CONFIG };
  }

  return {
    enabled: config.enabled ?? DEFAULT_RETRY_CONFIG.enabled,
    retries: config.retries ?? DEFAULT_RETRY_CONFIG.retries,
    minTimeout: config.minTimeout ?? DEFAULT_RETRY_CONFIG.minTimeout,
    maxTimeout: config.maxTimeout ?? DEFAULT_RETRY_CONFIG.maxTimeout,
    factor: config.factor ?? DEFAULT_RETRY_CONFIG.factor,
    randomize: config.randomize ?? DEFAULT_RETRY_CONFIG.randomize,
    onRetry: config.onRetry,
    onRetriesExhausted: config.onRetriesExhausted,
    shouldRetry: config.shouldRetry,
  };
}

const RETRYABLE_ERROR_NAMES = new Set([
  "APIConnectionError",
  "APIConnectionTimeoutError",
  "RateLimitError",
  "InternalServerError",
  "ModelTimeoutError",
]);

const PERMANENT_ERROR_NAMES = new Set([
  "AuthenticationError",
  "BadRequestError",
  "NotFoundError",
  "PermissionDeniedError",
  "UnprocessableEntityError",
]);

/**
 * Classifies model backend errors. Rate limits, 5xx, timeouts and connection
 * failures are retryable; authentication, bad requests and unknown errors are not.
 */
export function isRetryableError(error: Error): boolean {
  const message = error.message.toLowerCase();

  if (PERMANENT_ERROR_NAMES.has(error.name)) return false;
  if (RETRYABLE_ERROR_NAMES.has(error.name)) return true;

  if (message.includes("429") || message.includes("rate limit") || message.includes("rate_limit")) {
    return true;
  }

  if (
    /\b50[0234]\b/.test(message) ||
    message.includes("internal server error") ||
    message.includes("bad gateway") ||
    message.includes("service unavailable") ||
    message.includes("gateway timeout") ||
    message.includes("overloaded")
  ) {
    return true;
  }

  if (message.includes("timeout") || message.includes("timed out") || message.includes("etimedout")) {
    return true;
  }

  if (
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("enotfound") ||
    message.includes("connection") ||
    message.includes("network")
  ) {
    return true;
  }

  return false;
}

/**
 * Reduces a backend error to a short, human readable line: status summaries for
 * well-known failures, the nested `message` of JSON error bodies, and truncation
 * of anything very long.
 */
export function formatModelError(error: Error): string {
  const message = error.message;
  const lower = message.toLowerCase();

  if (message.includes("429") || lower.includes("rate limit")) {
    return "Rate limit exceeded (429)";
  }
  if (/\b500\b/.test(message) || lower.includes("internal server error")) {
    return "Internal server error (500)";
  }
  if (/\b503\b/.test(message) || lower.includes("service unavailable")) {
    return "Service unavailable (503)";
  }
  if (message.includes("401") || error.name === "AuthenticationError") {
    return "Authentication failed - check the API key";
  }

  const extracted = extractMessage(parseJson(message));
  if (extracted) {
    return extracted;
  }

  return message.length > 200 ? `${message.slice(0, 150).trim()}...` : message;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractMessage(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  if ("message" in value && typeof value.message === "string" && value.message.length > 0) {
    return value.message.trim();
  }
  if ("error" in value) {
    return extractMessage(value.error);
  }
  return undefined;
}
