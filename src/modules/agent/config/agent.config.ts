/**
 * Agent Service Configuration
 *
 * Endpoint and credentials come from the environment; everything else is
 * an operational default.
 */

import { env, readIntSetting } from '@/shared/config';

export const agentConfig = {
  // WebSocket endpoint of the conversational agent service
  wsUrl: env.AGENT_WS_URL,

  // Agent to converse with (sent as `agent_id` query parameter)
  agentId: env.AGENT_ID,

  // Optional API key (sent as `xi-api-key` header)
  apiKey: env.AGENT_API_KEY || '',

  // Transport-level ping, 0 disables
  keepaliveInterval: readIntSetting('AGENT_KEEPALIVE_INTERVAL_MS', 15000),

  // Inbound events kept while nobody is reading
  maxQueuedEvents: 2000,
} as const;
