/**
 * Cartesia TTS Configuration
 *
 * Used only when the agent streams no audio for a turn. The API key comes
 * from the environment; voice and model can be overridden there too.
 */

import { env, readIntSetting } from '@/shared/config';

export const cartesiaConfig = {
  apiKey: env.CARTESIA_API_KEY || '',

  // Fallback is opt-in
  enabled: env.TTS_FALLBACK_ENABLED,

  model: process.env.CARTESIA_MODEL || 'sonic-2',
  voiceId: process.env.CARTESIA_VOICE_ID || 'c961b81c-a935-4c17-bfb3-ba2239de8c2f',

  // Raw PCM so the result drops straight into the assembler
  sampleRate: 16000,
  encoding: 'pcm_s16le',
  language: 'en',

  // Request bound (seconds, per the SDK's request options)
  requestTimeoutSeconds: readIntSetting('CARTESIA_TIMEOUT_SECONDS', 8),

  // Pause after a 429 before calling again
  rateLimitBackoffMs: readIntSetting('CARTESIA_RATE_LIMIT_BACKOFF_MS', 5000),

  // Cartesia rejects longer transcripts
  maxTextLength: 5000,
} as const;
