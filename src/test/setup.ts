/**
 * Vitest Setup File
 * Global test configuration and setup
 */

import dotenv from 'dotenv';

// Load environment variables from .env file for tests
dotenv.config();

// Placeholder credentials so config modules load without a real .env
if (!process.env.AGENT_ID) {
  process.env.AGENT_ID = 'test-agent';
}

if (!process.env.AGENT_API_KEY) {
  process.env.AGENT_API_KEY = 'test-agent-key';
}

if (!process.env.CARTESIA_API_KEY) {
  process.env.CARTESIA_API_KEY = 'test-cartesia-key';
}

if (!process.env.PORT) {
  process.env.PORT = '3001';
}

if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = 'test';
}

// Keep test output quiet unless explicitly requested
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
