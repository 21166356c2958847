/**
 * Chat Routes
 * HTTP surface for the chat front-end
 *
 *   POST   /users/:userId/session   start (or restart) a session
 *   POST   /users/:userId/turns     { text } → agent reply
 *   DELETE /users/:userId/session   end the session
 *   GET    /health
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/shared/utils';
import type { ConversationController } from '@/modules/conversation';
import {
  presentBeginError,
  presentInvalidRequest,
  presentReply,
  presentTurnError,
} from '../utils';
import type { ChatGatewayOptions, ErrorPresentation } from '../types';

const MAX_USER_ID_LENGTH = 128;

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to error middleware
function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

function sendError(res: Response, presentation: ErrorPresentation): void {
  if (presentation.retryAfterSeconds !== undefined) {
    res.setHeader('Retry-After', String(presentation.retryAfterSeconds));
  }
  res.status(presentation.status).json({
    error: {
      code: presentation.code,
      message: presentation.message,
      retryAfterSeconds: presentation.retryAfterSeconds,
    },
  });
}

function readUserId(req: Request): string | null {
  const userId = (req.params.userId || '').trim();
  if (!userId || userId.length > MAX_USER_ID_LENGTH) {
    return null;
  }
  return userId;
}

export function createChatRouter(
  controller: ConversationController,
  options: ChatGatewayOptions
): Router {
  const router = Router();

  router.post(
    '/users/:userId/session',
    handle(async (req, res) => {
      const userId = readUserId(req);
      if (!userId) {
        sendError(res, presentInvalidRequest('Invalid user id.'));
        return;
      }

      const result = await controller.beginSession(userId);
      if (!result.ok) {
        sendError(res, presentBeginError(result.error));
        return;
      }
      res.status(201).json({ greeting: options.greeting });
    })
  );

  router.post(
    '/users/:userId/turns',
    handle(async (req, res) => {
      const userId = readUserId(req);
      if (!userId) {
        sendError(res, presentInvalidRequest('Invalid user id.'));
        return;
      }

      const body: unknown = req.body;
      const text =
        typeof body === 'object' && body !== null && 'text' in body ? body.text : undefined;
      if (typeof text !== 'string') {
        sendError(res, presentInvalidRequest('Request body must include a text field.'));
        return;
      }

      const result = await controller.submitTurn(userId, text);
      if (!result.ok) {
        sendError(res, presentTurnError(result.error, options.dailyQuota));
        return;
      }
      res.json(presentReply(result.value));
    })
  );

  router.delete(
    '/users/:userId/session',
    handle(async (req, res) => {
      const userId = readUserId(req);
      if (!userId) {
        sendError(res, presentInvalidRequest('Invalid user id.'));
        return;
      }

      await controller.endSession(userId);
      res.status(204).end();
    })
  );

  router.get('/health', (_req, res) => {
    const metrics = controller.getMetrics();
    res.status(metrics.isShuttingDown ? 503 : 200).json({
      status: metrics.isShuttingDown ? 'shutting_down' : 'ok',
      uptime: process.uptime(),
      sessions: metrics,
    });
  });

  return router;
}

/**
 * Last-resort error middleware
 */
export function chatErrorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  logger.error('Unhandled gateway error', error instanceof Error ? error : { error });
  res.status(500).json({
    error: { code: 'INTERNAL', message: 'Something went wrong. Please try again.' },
  });
}
