export type ProviderRetryReason =
  | "initial"
  | "rate_limit"
  | "server_error"
  | "timeout"
  | "connection";

export interface ProviderRetryAttemptContext {
  attemptIndex: number;
  reason: ProviderRetryReason;
  /** Delay waited before this attempt; 0 for the first one. */
  delayMs: number;
}

export type ProviderRetryConfig<TResponse> = {
  call: (context: ProviderRetryAttemptContext) => Promise<TResponse>;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  onAttempt?: (context: ProviderRetryAttemptContext) => void;
  sleep?: (ms: number) => Promise<void>;
};

export type ProviderRetryResult<TResponse> = {
  response: TResponse;
  attempts: number;
  attemptHistory: ProviderRetryAttemptContext[];
};

const DEFAULT_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 500;
const DEFAULT_MAX_DELAY_MS = 8_000;

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

const field = (value: unknown, key: string): unknown =>
  value !== null && typeof value === "object" && key in value ? Reflect.get(value, key) : undefined;

const readStatus = (error: unknown): number | undefined => {
  const status = field(error, "status");
  if (typeof status === "number") return status;
  const innerStatus = field(field(error, "error"), "status");
  return typeof innerStatus === "number" ? innerStatus : undefined;
};

export const isRateLimitError = (error: unknown): boolean => {
  const code = field(error, "code");
  if (code === 429 || code === "rate_limit_exceeded") return true;
  if (readStatus(error) === 429) return true;
  const inner = field(error, "error");
  if (field(inner, "type") === "rate_limit_error") return true;
  const message = field(inner, "message");
  return typeof message === "string" && message.toLowerCase().includes("rate limit");
};

/** Classifies an error thrown by a provider call; null means "do not retry". */
export function classifyRetryableError(error: unknown): ProviderRetryReason | null {
  if (!error || typeof error !== "object") return null;
  if (isRateLimitError(error)) return "rate_limit";
  const status = readStatus(error);
  if (typeof status === "number") {
    if (status === 408) return "timeout";
    if (status >= 500) return "server_error";
    return null;
  }
  const name = field(error, "name");
  if (name === "APIConnectionTimeoutError" || name === "TimeoutError") return "timeout";
  if (name === "APIConnectionError") return "connection";
  const code = field(error, "code");
  if (code === "ECONNRESET" || code === "ETIMEDOUT" || code === "ECONNREFUSED") {
    return "connection";
  }
  return null;
}

export const computeBackoffDelay = (
  retryIndex: number,
  baseDelayMs = DEFAULT_BASE_DELAY_MS,
  maxDelayMs = DEFAULT_MAX_DELAY_MS,
): number => Math.min(maxDelayMs, baseDelayMs * 2 ** retryIndex);

/**
 * Runs `call` until it succeeds, a non-retryable error is thrown, or
 * `maxAttempts` is exhausted; the last error is rethrown.
 */
export async function runWithProviderRetry<TResponse>(
  config: ProviderRetryConfig<TResponse>,
): Promise<ProviderRetryResult<TResponse>> {
  const {
    call,
    maxAttempts = DEFAULT_ATTEMPTS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    maxDelayMs = DEFAULT_MAX_DELAY_MS,
    onAttempt,
    sleep = defaultSleep,
  } = config;

  const attemptLimit = Math.max(1, maxAttempts);
  const attemptHistory: ProviderRetryAttemptContext[] = [];
  let reason: ProviderRetryReason = "initial";
  let delayMs = 0;

  for (let attemptIndex = 0; ; attemptIndex += 1) {
    if (delayMs > 0) {
      await sleep(delayMs);
    }
    const context: ProviderRetryAttemptContext = { attemptIndex, reason, delayMs };
    attemptHistory.push(context);
    onAttempt?.(context);

    try {
      const response = await call(context);
      return { response, attempts: attemptIndex + 1, attemptHistory };
    } catch (error) {
      const retryReason = classifyRetryableError(error);
      if (!retryReason || attemptIndex + 1 >= attemptLimit) {
        throw error;
      }
      reason = retryReason;
      delayMs = computeBackoffDelay(attemptIndex, baseDelayMs, maxDelayMs);
    }
  }
}
