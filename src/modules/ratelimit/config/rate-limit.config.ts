/**
 * Rate Limit Configuration
 * Daily quota and inter-turn cooldown per user
 */

import { readIntSetting } from '@/shared/config';

export const rateLimitConfig = {
  // Accepted turns per window
  dailyQuota: readIntSetting('RATE_LIMIT_DAILY_QUOTA', 15),

  // Minimum spacing between two accepted turns (45s)
  cooldownMs: readIntSetting('RATE_LIMIT_COOLDOWN_SECONDS', 45) * 1000,

  // Fixed quota window (24h)
  windowMs: 24 * 60 * 60 * 1000,
} as const;
