/**
 * Provider Retry Runner
 *
 * Bounded exponential backoff for provider calls. Only `RateLimited` and
 * `Transient` failures are retried; everything else surfaces on the
 * first attempt.
 */

import { classifyProviderError, extractHttpStatus, isRetryableFailure, readField } from "./errors.js";

/**
 * Retry configuration options
 */
export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  signal?: AbortSignal;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
};

/**
 * Default retry configuration for discovery calls
 */
export const DISCOVERY_RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 5,
  minDelayMs: 200,
  maxDelayMs: 5_000,
  jitter: 0.2,
};

export function resolveRetryConfig(
  defaults: Required<RetryConfig>,
  overrides?: RetryConfig,
): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Resolves after `ms`, or early when the signal aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Retry-After hint (seconds) carried on throttled SDK responses
 */
export function getRetryAfterMs(err: unknown): number | undefined {
  const status = extractHttpStatus(err);
  if (status === 429 || status === 503) {
    const retryAfter = readField(readField(readField(err, "$response"), "headers"), "retry-after");
    if (typeof retryAfter === "string") {
      const seconds = parseInt(retryAfter, 10);
      if (!Number.isNaN(seconds)) return seconds * 1000;
    }
  }

  return undefined;
}

/**
 * Whether a provider error should be retried
 */
export function shouldRetryProviderError(err: unknown, _attempt: number): boolean {
  if (!err) return false;
  return isRetryableFailure(classifyProviderError(err));
}

export async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts: maxAttempts, minDelayMs, maxDelayMs, jitter } = resolveRetryConfig(
    DISCOVERY_RETRY_DEFAULTS,
    options,
  );
  const shouldRetry = options.shouldRetry ?? shouldRetryProviderError;
  let lastErr: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= maxAttempts || !shouldRetry(err, attempt)) break;
      if (options.signal?.aborted) break;

      const retryAfterMs = options.retryAfterMs?.(err);
      const hasRetryAfter = typeof retryAfterMs === "number" && Number.isFinite(retryAfterMs);
      const baseDelay = hasRetryAfter ? Math.max(retryAfterMs, minDelayMs) : minDelayMs * 2 ** (attempt - 1);
      let delay = Math.min(baseDelay, maxDelayMs);
      delay = applyJitter(delay, jitter);
      delay = Math.min(Math.max(delay, minDelayMs), maxDelayMs);

      options.onRetry?.({
        attempt,
        maxAttempts,
        delayMs: delay,
        err,
        label: options.label,
      });
      await sleep(delay, options.signal);
      if (options.signal?.aborted) break;
    }
  }

  throw lastErr ?? new Error("Retry failed");
}

/**
 * Options accepted by provider gateways
 */
export type ProviderRetryOptions = {
  retry?: RetryConfig;
  onRetry?: (info: RetryInfo) => void;
};

/**
 * Create a retry runner bound to one gateway's settings
 */
export function createProviderRetryRunner(options: ProviderRetryOptions = {}) {
  const config = resolveRetryConfig(DISCOVERY_RETRY_DEFAULTS, options.retry);

  return async function providerRetry<T>(
    fn: () => Promise<T>,
    label?: string,
    signal?: AbortSignal,
  ): Promise<T> {
    return retryAsync(fn, {
      ...config,
      label,
      signal,
      shouldRetry: shouldRetryProviderError,
      retryAfterMs: getRetryAfterMs,
      onRetry: options.onRetry,
    });
  };
}
