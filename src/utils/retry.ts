/**
 * Retry with exponential backoff for LLM calls.
 *
 * Only failures that a second attempt can plausibly fix are retried: a
 * provider timeout, and the transient HTTP
 * statuses below. Everything else is rethrown on the spot.
 */

import { getJitteredDelayMs } from "../config/timeouts.js";
import { UpstreamHTTPError, UpstreamTimeoutError } from "../adapters/llm/errors.js";
import { emit, TelemetryEvents } from "./telemetry.js";

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  /** ± spread applied to each delay, in percent */
  jitterPercent: number;
}

export interface RetryContext {
  adapter: string;
  model: string;
  operation: string;
}

/**
 * 250ms, 500ms, 1000ms ... capped at 5s, ±20%.
 * The router overrides maxAttempts from LLM_MAX_ATTEMPTS (default 1).
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  backoffFactor: 2,
  jitterPercent: 20,
};

const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export function isRetryableError(error: unknown): boolean {
  if (error instanceof UpstreamTimeoutError) return true;
  return error instanceof UpstreamHTTPError && TRANSIENT_STATUSES.has(error.status);
}

/**
 * Delay before the retry that follows `attempt` (1-based)
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const uncapped = config.baseDelayMs * config.backoffFactor ** (attempt - 1);
  return getJitteredDelayMs(Math.min(uncapped, config.maxDelayMs), config.jitterPercent);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function shortReason(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.slice(0, 100);
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or
 * maxAttempts is used up. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  context: RetryContext,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  const maxAttempts = Math.max(1, config.maxAttempts);
  let attempt = 1;

  while (true) {
    let result: T;
    try {
      result = await fn(attempt);
    } catch (error) {
      if (!isRetryableError(error)) throw error;

      if (attempt >= maxAttempts) {
        if (maxAttempts > 1) {
          emit(TelemetryEvents.LlmRetryExhausted, {
            ...context,
            total_attempts: attempt,
            error_message: shortReason(error),
          });
        }
        throw error;
      }

      const delayMs = calculateBackoffDelay(attempt, config);
      emit(TelemetryEvents.LlmRetry, {
        ...context,
        attempt,
        max_attempts: maxAttempts,
        delay_ms: delayMs,
        reason: shortReason(error),
      });
      await delay(delayMs);
      attempt++;
      continue;
    }

    if (attempt > 1) {
      emit(TelemetryEvents.LlmRetrySuccess, { ...context, attempt });
    }
    return result;
  }
}
