/**
 * Retry Configuration
 *
 * Connect failures are retried at most once, and only when the failure
 * is classified as retryable (network, timeout, 5xx).
 */

import { readIntSetting } from '@/shared/config';

export const agentRetryConfig = {
  // Additional connect attempts after the first failure
  connectRetries: Math.min(readIntSetting('AGENT_CONNECT_RETRIES', 1), 1),

  // Delay before the retry
  connectRetryDelay: readIntSetting('AGENT_CONNECT_RETRY_DELAY_MS', 500),

  // Handshake statuses worth retrying
  retryableStatusCodes: new Set<number>([408, 429, 500, 502, 503, 504]),
} as const;
