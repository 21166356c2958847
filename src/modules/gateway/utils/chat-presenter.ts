/**
 * Chat Presenter
 * Turns replies and conversation errors into what the chat front-end shows.
 * This is the only place user-facing wording lives.
 */

import { AgentConnectError, AgentErrorType } from '@/modules/agent';
import {
  AgentBackendError,
  InvalidTurnError,
  NoReplyError,
  RateLimitedError,
  SessionNotActiveError,
  SessionNotFoundError,
  SessionState,
} from '@/modules/conversation';
import type { BeginError, Reply, TurnError } from '@/modules/conversation';
import type { ErrorPresentation, ReplyPayload } from '../types';

const AGENT_UNAVAILABLE = "Sorry, I'm having trouble connecting to the Agent.";

export function presentReply(reply: Reply): ReplyPayload {
  return {
    text: reply.text,
    sequence: reply.sequence,
    conversationId: reply.conversationId,
    audio: reply.audio
      ? {
          format: reply.audio.format.label,
          encoding: reply.audio.format.encoding,
          sampleRate: reply.audio.format.sampleRate,
          data: reply.audio.data.toString('base64'),
          durationMs: reply.audio.durationMs,
        }
      : null,
  };
}

export function presentTurnError(error: TurnError, dailyQuota: number): ErrorPresentation {
  if (error instanceof RateLimitedError) {
    const retryAfterSeconds = Math.max(1, Math.ceil(error.retryAfterMs / 1000));
    const message =
      error.reason === 'quota'
        ? `You have used all ${dailyQuota} responses for the day. ` +
          'Please wait 24 hours from your first usage to continue.'
        : `Please wait ${retryAfterSeconds} seconds before sending another message.`;
    return { status: 429, code: error.code, message, retryAfterSeconds };
  }

  if (error instanceof SessionNotActiveError && error.state === SessionState.AWAITING_REPLY) {
    return {
      status: 409,
      code: error.code,
      message: 'Please wait for the current reply before sending another message.',
    };
  }

  if (error instanceof SessionNotActiveError || error instanceof SessionNotFoundError) {
    return { status: 409, code: error.code, message: 'Please start a session first.' };
  }

  if (error instanceof InvalidTurnError) {
    return { status: 400, code: error.code, message: 'Please send a non-empty message.' };
  }

  if (error instanceof NoReplyError) {
    return {
      status: 504,
      code: error.code,
      message: 'The agent did not reply in time. Please try again.',
    };
  }

  if (error instanceof AgentBackendError) {
    return { status: 502, code: error.code, message: AGENT_UNAVAILABLE };
  }

  // ConnectionLostError, SessionEndedError
  return {
    status: 503,
    code: error.code,
    message: 'The conversation was interrupted. Please start a new session.',
  };
}

export function presentBeginError(error: BeginError): ErrorPresentation {
  if (error instanceof AgentConnectError) {
    // Rejected credentials are a server-side configuration fault
    const status = error.type === AgentErrorType.AUTH ? 502 : 503;
    return { status, code: error.code, message: AGENT_UNAVAILABLE };
  }
  return {
    status: 503,
    code: error.code,
    message: 'The service is restarting. Please try again shortly.',
  };
}

export function presentInvalidRequest(message: string): ErrorPresentation {
  return { status: 400, code: 'INVALID_REQUEST', message };
}
