/**
 * Resilience Patterns
 *
 * Retry with backoff for idempotent vendor reads, and the sliding
 * window used to admit translations.
 */

import { ErrorHandler } from './errors';

// ============================================================================
// CLOCK
// ============================================================================

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

// ============================================================================
// RETRY LOGIC
// ============================================================================

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryOn: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  retryOn: (error) => ErrorHandler.isRetryable(error),
};

/**
 * Execute function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!cfg.retryOn(error) || attempt === cfg.maxAttempts) {
        throw error;
      }

      console.log(`[Retry] Attempt ${attempt}/${cfg.maxAttempts} failed, retrying in ${delay}ms...`);
      await wait(delay);
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }

  throw lastError;
}

// ============================================================================
// SLIDING WINDOW
// ============================================================================

export interface SlidingWindowConfig {
  maxEvents: number;
  windowMs: number;
}

/**
 * Timestamps of recent events; an event at `t` counts while `t > now - windowMs`.
 */
export class SlidingWindow {
  private events: number[] = [];
  readonly config: SlidingWindowConfig;

  constructor(config: SlidingWindowConfig) {
    this.config = config;
  }

  private prune(now: number): void {
    const windowStart = now - this.config.windowMs;
    this.events = this.events.filter((t) => t > windowStart);
  }

  record(now: number): void {
    this.prune(now);
    this.events.push(now);
  }

  count(now: number): number {
    this.prune(now);
    return this.events.length;
  }

  /**
   * Milliseconds until another event fits (0 when there is room now)
   */
  delayUntilFree(now: number): number {
    this.prune(now);
    if (this.events.length < this.config.maxEvents) return 0;

    const oldest = this.events[0];
    return Math.max(0, oldest + this.config.windowMs - now);
  }
}
