/**
 * Timeout Configuration
 * Connection, reply-wait and session lifetime bounds
 */

import { readIntSetting } from '@/shared/config';

export const agentTimeoutConfig = {
  // Handshake bound for the agent WebSocket (10s)
  connectTimeout: readIntSetting('AGENT_CONNECT_TIMEOUT_MS', 10000),

  // Longest wait for a turn's reply (10s)
  replyTimeout: readIntSetting('REPLY_TIMEOUT_MS', 10000),

  // Quiet period after the final text before audio counts as complete
  audioSettle: readIntSetting('AUDIO_SETTLE_MS', 750),

  // Grace period for a locally initiated close handshake
  closeTimeout: 2000,

  // Idle sessions are ended after 30 min
  sessionIdleTimeout: readIntSetting('SESSION_IDLE_TIMEOUT_MS', 1800000),

  // Sweep interval for idle sessions (5 min)
  cleanupInterval: readIntSetting('SESSION_CLEANUP_INTERVAL_MS', 300000),

  // Per-session bound during shutdown
  shutdownTimeoutPerSession: 5000,
} as const;
