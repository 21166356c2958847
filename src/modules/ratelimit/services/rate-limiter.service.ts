/**
 * Rate Limiter Service
 * Fixed-window daily quota plus per-user cooldown between accepted turns
 *
 * Order of evaluation is cooldown first, then quota: a user inside the
 * cooldown is told to wait even when the quota is also exhausted.
 */

import { logger } from '@/shared/utils';
import { rateLimitConfig } from '../config';
import type {
  RateLimitDecision,
  RateLimiterOptions,
  RateLimitState,
} from '../types';

export class RateLimiter {
  private readonly states = new Map<string, RateLimitState>();
  private readonly options: RateLimiterOptions;

  constructor(options: Partial<RateLimiterOptions> = {}) {
    this.options = {
      dailyQuota: rateLimitConfig.dailyQuota,
      cooldownMs: rateLimitConfig.cooldownMs,
      windowMs: rateLimitConfig.windowMs,
      ...options,
    };
  }

  /**
   * Evaluate whether a turn from `userId` may proceed now.
   * Only side effect is the lazy window reset.
   */
  check(userId: string): RateLimitDecision {
    const now = this.now();
    const state = this.states.get(userId);

    if (!state) {
      return { allowed: true, remaining: this.options.dailyQuota };
    }

    this.resetWindowIfElapsed(userId, state, now);

    if (state.lastTurnAt !== null && this.options.cooldownMs > 0) {
      const elapsed = now - state.lastTurnAt;
      if (elapsed < this.options.cooldownMs) {
        return {
          allowed: false,
          reason: 'cooldown',
          retryAfterMs: this.options.cooldownMs - elapsed,
        };
      }
    }

    if (state.count >= this.options.dailyQuota) {
      const windowStart = state.windowStart ?? now;
      return {
        allowed: false,
        reason: 'quota',
        retryAfterMs: Math.max(0, windowStart + this.options.windowMs - now),
      };
    }

    return { allowed: true, remaining: this.options.dailyQuota - state.count };
  }

  /**
   * Record one accepted turn. Call only after committing to process it.
   */
  consume(userId: string): RateLimitState {
    const now = this.now();
    let state = this.states.get(userId);

    if (!state) {
      state = { windowStart: null, count: 0, lastTurnAt: null };
      this.states.set(userId, state);
    }

    this.resetWindowIfElapsed(userId, state, now);

    if (state.windowStart === null) {
      state.windowStart = now;
    }
    state.count++;
    state.lastTurnAt = now;

    logger.debug('Rate limit turn recorded', {
      userId,
      count: state.count,
      quota: this.options.dailyQuota,
    });

    return { ...state };
  }

  /**
   * Snapshot of a user's usage, undefined if the user never had an accepted turn
   */
  getState(userId: string): RateLimitState | undefined {
    const state = this.states.get(userId);
    return state ? { ...state } : undefined;
  }

  /**
   * Drop users whose window and cooldown have both elapsed.
   * Their next check behaves exactly like a first-time user.
   */
  purgeIdle(): number {
    const now = this.now();
    let purged = 0;

    for (const [userId, state] of this.states) {
      const windowOver =
        state.windowStart === null || now - state.windowStart >= this.options.windowMs;
      const cooldownOver =
        state.lastTurnAt === null || now - state.lastTurnAt >= this.options.cooldownMs;

      if (windowOver && cooldownOver) {
        this.states.delete(userId);
        purged++;
      }
    }

    if (purged > 0) {
      logger.debug('Purged idle rate limit state', { purged, remaining: this.states.size });
    }

    return purged;
  }

  size(): number {
    return this.states.size;
  }

  private resetWindowIfElapsed(userId: string, state: RateLimitState, now: number): void {
    if (state.windowStart !== null && now - state.windowStart >= this.options.windowMs) {
      logger.debug('Rate limit window reset', { userId, previousCount: state.count });
      state.windowStart = now;
      state.count = 0;
    }
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }
}
