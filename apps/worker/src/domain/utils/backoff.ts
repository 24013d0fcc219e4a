/**
 * Exponential backoff delays for retries (NATS connect, queued delivery redelivery).
 */

export interface BackoffOptions {
  /** Delay for attempt 0 in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Ceiling in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Extra random fraction of the delay, 0-1 (default: 0) */
  jitterFactor?: number;
}

const DEFAULT_BACKOFF_OPTIONS: Required<BackoffOptions> = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0,
};

/**
 * Delay before retry number `attempt` (0-indexed).
 *
 * @example
 * calculateBackoff(0) // 1000
 * calculateBackoff(1) // 2000
 * calculateBackoff(5) // 30000 (capped)
 */
export function calculateBackoff(attempt: number, options?: BackoffOptions): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = {
    ...DEFAULT_BACKOFF_OPTIONS,
    ...options,
  };

  const cappedDelay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);

  if (jitterFactor > 0) {
    const jitter = cappedDelay * jitterFactor * Math.random();
    return Math.floor(cappedDelay + jitter);
  }

  return cappedDelay;
}

/**
 * Backoff keyed by a JetStream delivery count, which starts at 1 for the
 * first delivery.
 */
export function calculateNatsBackoff(
  redeliveryCount: number,
  options?: BackoffOptions
): number {
  const attempt = Math.max(0, redeliveryCount - 1);
  return calculateBackoff(attempt, options);
}

/**
 * Redelivery delay for a queued delivery job that hit an unexpected error
 * (store outage, lost connection). Transport rejections are never retried.
 * 1 min, 2 min, 4 min, ... capped at 10 min.
 */
export function calculateDeliveryBackoff(redeliveryCount: number): number {
  return calculateNatsBackoff(redeliveryCount, {
    baseDelayMs: 60_000,
    maxDelayMs: 10 * 60_000,
  });
}
