import express from 'express';
import { createServer } from 'http';
import cors from 'cors';
import { env, validateEnv } from '@/shared/config';
import { logger } from '@/shared/utils';
import { agentConfig } from '@/modules/agent';
import { RateLimiter, rateLimitConfig } from '@/modules/ratelimit';
import { createSpeechSynthesizer } from '@/modules/tts';
import { ConversationController, SessionRegistry } from '@/modules/conversation';
import { createChatRouter, chatErrorHandler } from '@/modules/gateway';

// Validate environment variables
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', error instanceof Error ? error : { error });
  process.exit(1);
}

const rateLimiter = new RateLimiter();
const synthesizer = createSpeechSynthesizer();

const registry = new SessionRegistry({
  endpoint: { url: agentConfig.wsUrl, agentId: agentConfig.agentId },
  credentials: { apiKey: agentConfig.apiKey || undefined },
  rateLimiter,
  synthesizer,
});
const conversationController = new ConversationController(registry);

// Create Express app
const app = express();

// Middleware
app.use(cors({ origin: env.CORS_ORIGIN }));
app.use(express.json());

app.use(
  createChatRouter(conversationController, {
    greeting: env.CHAT_GREETING,
    dailyQuota: rateLimitConfig.dailyQuota,
  })
);
app.use(chatErrorHandler);

// Create HTTP server
const httpServer = createServer(app);

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    // Step 1: Stop accepting new requests
    await new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        logger.warn('HTTP server force closed after timeout');
        resolve();
      }, 5000);

      httpServer.close(() => {
        clearTimeout(forceTimer);
        logger.info('HTTP server closed');
        resolve();
      });
    });

    // Step 2: End every conversation session
    await conversationController.shutdown();

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', error instanceof Error ? error : { error });
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
httpServer.listen(env.PORT, () => {
  logger.info('Agent relay backend started', {
    port: env.PORT,
    environment: env.NODE_ENV,
    agentId: agentConfig.agentId,
    dailyQuota: rateLimitConfig.dailyQuota,
    cooldownSeconds: rateLimitConfig.cooldownMs / 1000,
    ttsFallback: synthesizer !== null,
  });
});
