/**
 * Rate Limit Module Exports
 */

export { RateLimiter } from './services';
export { rateLimitConfig } from './config';
export type {
  RateLimitDecision,
  RateLimitReason,
  RateLimitState,
  RateLimiterOptions,
} from './types';
