import type { BackoffConfig } from '../config.js';

/**
 * Delay before reconnect attempt `attempt` (1-based):
 * min(initial * factor^(attempt-1), max), spread by +/- jitter.
 */
export function computeBackoff(
  attempt: number,
  config: BackoffConfig,
  random: () => number = Math.random
): number {
  const { initial, max, factor, jitter } = config;
  const base = Math.min(initial * Math.pow(factor, Math.max(0, attempt - 1)), max);
  const jitterAmount = base * jitter * (random() * 2 - 1);
  return Math.max(0, Math.floor(base + jitterAmount));
}
