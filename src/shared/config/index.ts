/**
 * Shared Configuration
 * Centralized environment access for the whole service
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseInt(process.env.PORT || '3001', 10),
  CORS_ORIGIN: process.env.CORS_ORIGIN || '*',

  // Agent service
  AGENT_WS_URL: process.env.AGENT_WS_URL || '',
  AGENT_ID: process.env.AGENT_ID || '',
  AGENT_API_KEY: process.env.AGENT_API_KEY,

  // Speech synthesis fallback
  CARTESIA_API_KEY: process.env.CARTESIA_API_KEY,
  TTS_FALLBACK_ENABLED: process.env.TTS_FALLBACK_ENABLED === 'true',

  // Front-end copy
  CHAT_GREETING: process.env.CHAT_GREETING || 'Hello! How can I help you today?',

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

/**
 * Validate required environment variables
 */
export function validateEnv(): void {
  const required: (keyof typeof env)[] = ['PORT', 'AGENT_WS_URL', 'AGENT_ID'];

  const missing = required.filter((key) => !env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  if (env.TTS_FALLBACK_ENABLED && !env.CARTESIA_API_KEY) {
    throw new Error('TTS_FALLBACK_ENABLED requires CARTESIA_API_KEY');
  }
}

/**
 * Read a positive integer setting, falling back when unset or invalid
 */
export function readIntSetting(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Check if running in production mode
 */
export const isProduction = env.NODE_ENV === 'production';

/**
 * Check if running in test mode
 */
export const isTest = env.NODE_ENV === 'test';
