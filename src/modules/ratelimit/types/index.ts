/**
 * Rate Limit Types
 */

/**
 * Usage accounting for one user
 */
export interface RateLimitState {
  /** Start of the current quota window (ms epoch), null before the first accepted turn */
  windowStart: number | null;
  /** Accepted turns inside the current window */
  count: number;
  /** Time of the last accepted turn (ms epoch) */
  lastTurnAt: number | null;
}

export type RateLimitReason = 'cooldown' | 'quota';

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; reason: RateLimitReason; retryAfterMs: number };

export interface RateLimiterOptions {
  dailyQuota: number;
  cooldownMs: number;
  windowMs: number;
  /** Clock override, mainly for tests */
  now?: () => number;
}
