/**
 * Conversation Error Types
 * Per-turn and per-session failures surfaced to the front-end collaborator.
 * Messages are for logs; the gateway owns user-facing wording.
 */

import { AppError } from '@/shared/errors';
import type { AgentConnectError } from '@/modules/agent';
import type { RateLimitReason } from '@/modules/ratelimit';

export class ConversationError extends AppError {}

/**
 * The agent reported an explicit failure for a turn
 */
export class AgentBackendError extends ConversationError {
  readonly backendCode: string | null;
  readonly fatal: boolean;

  constructor(message: string, backendCode: string | null = null, fatal = false) {
    super('BACKEND_ERROR', message);
    this.backendCode = backendCode;
    this.fatal = fatal;
  }
}

/**
 * Neither final text nor an error arrived before the reply timeout
 */
export class NoReplyError extends ConversationError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('NO_REPLY', `No reply from agent within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class RateLimitedError extends ConversationError {
  readonly reason: RateLimitReason;
  readonly retryAfterMs: number;

  constructor(reason: RateLimitReason, retryAfterMs: number) {
    super('RATE_LIMITED', `Turn denied (${reason}), retry after ${retryAfterMs}ms`);
    this.reason = reason;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ConnectionLostError extends ConversationError {
  readonly closeCode: number | null;

  constructor(message = 'Agent connection lost', closeCode: number | null = null, options?: { cause?: unknown }) {
    super('CONNECTION_LOST', message, options);
    this.closeCode = closeCode;
  }
}

export class SessionEndedError extends ConversationError {
  constructor(message = 'Session ended') {
    super('SESSION_ENDED', message);
  }
}

export class SessionNotActiveError extends ConversationError {
  readonly state: string;

  constructor(state: string) {
    super('SESSION_NOT_ACTIVE', `Session is ${state}, not active`);
    this.state = state;
  }
}

export class SessionNotFoundError extends ConversationError {
  constructor(userId: string) {
    super('SESSION_NOT_FOUND', `No session for user ${userId}`);
  }
}

export class InvalidTurnError extends ConversationError {
  constructor(message: string) {
    super('INVALID_TURN', message);
  }
}

export type TurnError =
  | AgentBackendError
  | NoReplyError
  | RateLimitedError
  | ConnectionLostError
  | SessionEndedError
  | SessionNotActiveError
  | SessionNotFoundError
  | InvalidTurnError;

export type BeginError = AgentConnectError | SessionEndedError;
