/**
 * Backoff helpers shared by services that retry outbound calls
 */

import type { RetryConfig } from './types.js';
import { DEFAULT_RETRY_CONFIG } from './types.js';

/**
 * Delay to wait after a failed attempt.
 *
 * `attempt` is 1-based: the wait after attempt 1 is `baseDelay`, after attempt
 * 2 it is `baseDelay * multiplier`, and so on, capped at `maxDelay`.
 */
export function computeBackoffDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = config.baseDelay * Math.pow(config.backoffMultiplier, exponent);
  return Math.max(0, Math.min(delay, config.maxDelay));
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
