/**
 * Conversation Controller
 * Public API for front-end collaborators (only exported interface of the
 * conversation module besides its types)
 */

import { logger } from '@/shared/utils';
import { ok, err } from '@/shared/types';
import type { Result } from '@/shared/types';
import { AgentConnectError } from '@/modules/agent';
import type { SessionRegistry, RegistryMetrics } from '../services';
import {
  AgentBackendError,
  ConnectionLostError,
  InvalidTurnError,
  NoReplyError,
  RateLimitedError,
  SessionEndedError,
  SessionNotActiveError,
  SessionNotFoundError,
} from '../types';
import type { BeginError, Reply, TurnError } from '../types';

function isTurnError(error: unknown): error is TurnError {
  return (
    error instanceof AgentBackendError ||
    error instanceof NoReplyError ||
    error instanceof RateLimitedError ||
    error instanceof ConnectionLostError ||
    error instanceof SessionEndedError ||
    error instanceof SessionNotActiveError ||
    error instanceof SessionNotFoundError ||
    error instanceof InvalidTurnError
  );
}

function isBeginError(error: unknown): error is BeginError {
  return error instanceof AgentConnectError || error instanceof SessionEndedError;
}

export class ConversationController {
  constructor(private readonly registry: SessionRegistry) {}

  /**
   * Start (or restart) the user's session
   *
   * @example
   * ```typescript
   * const started = await conversationController.beginSession(userId);
   * if (!started.ok) showError(started.error.code);
   * ```
   */
  async beginSession(userId: string): Promise<Result<void, BeginError>> {
    try {
      await this.registry.begin(userId);
      return ok(undefined);
    } catch (error) {
      if (isBeginError(error)) {
        logger.warn('Conversation controller: begin failed', { userId, code: error.code });
        return err(error);
      }
      logger.error('Conversation controller: unexpected begin failure', { userId, error });
      throw error;
    }
  }

  /**
   * Send one turn and wait for the agent's reply
   */
  async submitTurn(userId: string, text: string): Promise<Result<Reply, TurnError>> {
    try {
      return ok(await this.registry.submitTurn(userId, text));
    } catch (error) {
      if (isTurnError(error)) {
        return err(error);
      }
      logger.error('Conversation controller: unexpected turn failure', { userId, error });
      throw error;
    }
  }

  /**
   * End the user's session; succeeds when there is none
   */
  async endSession(userId: string): Promise<Result<void, never>> {
    const ended = await this.registry.end(userId);
    logger.info('Conversation controller: session end requested', { userId, ended });
    return ok(undefined);
  }

  hasSession(userId: string): boolean {
    return this.registry.has(userId);
  }

  getMetrics(): RegistryMetrics {
    return this.registry.getMetrics();
  }

  shutdown(): Promise<void> {
    return this.registry.shutdown();
  }
}
