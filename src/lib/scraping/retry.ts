import { config } from "../config";
import type { Channel } from "./channels";
import {
  FetchError,
  FetchErrorKind,
  cancelledError,
  errorMessage,
  isCancelled,
  isCredentialsExhausted,
  isRateLimited,
  toFetchError,
} from "./errors";
import { delay } from "./utils";

export interface RetryOptions {
  maxAttempts?: number;
  /** sleep after attempt N is baseDelayMs * N */
  baseDelayMs?: number;
  /** called before the next attempt when the last one was a 403/429 */
  rotate?: () => void;
  signal?: AbortSignal;
  /** prefix for log lines, usually the URL */
  label?: string;
}

/**
 * Runs `operation` up to `maxAttempts` times with linear backoff.
 * Credential exhaustion and cancellation are never retried.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? config.maxRetries);
  const baseDelayMs = options.baseDelayMs ?? config.retryBaseDelayMs;
  const { rotate, signal, label } = options;

  let lastError: FetchError | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) throw cancelledError(label);

    try {
      return await operation();
    } catch (error) {
      if (isCredentialsExhausted(error) || isCancelled(error)) throw error;
      lastError = toFetchError(error, label);

      if (attempt === maxAttempts) break;

      console.warn(
        `[retry] ${label ?? "operation"} failed (attempt ${attempt}/${maxAttempts}): ${errorMessage(error)}`
      );
      if (rotate && isRateLimited(error)) {
        rotate();
      }
      await delay(baseDelayMs * attempt, signal);
    }
  }

  throw new FetchError(
    FetchErrorKind.RETRIES_EXHAUSTED,
    `Gave up after ${maxAttempts} attempts${label ? ` (${label})` : ""}: ${lastError ? lastError.message : "unknown error"}`,
    { url: lastError?.url, status: lastError?.status, cause: lastError }
  );
}

/** withRetry around a channel fetch, rotating the channel on 403/429 */
export function fetchWithRetry(
  channel: Channel,
  url: string,
  options: Omit<RetryOptions, "rotate" | "label"> = {}
): Promise<string> {
  return withRetry(() => channel.fetch(url, options.signal), {
    ...options,
    rotate: channel.rotate ? () => channel.rotate?.() : undefined,
    label: url,
  });
}
