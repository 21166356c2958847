/**
 * Conversation Session Types
 */

import type { AudioBuffer } from '@/modules/audio';
import type { AgentCredentials, AgentEndpoint, AgentTransportFactory } from '@/modules/agent';
import type { RateLimiter } from '@/modules/ratelimit';
import type { SpeechSynthesizer } from '@/modules/tts';

export enum SessionState {
  IDLE = 'idle',
  CONNECTING = 'connecting',
  ACTIVE = 'active',
  AWAITING_REPLY = 'awaiting_reply',
  CLOSING = 'closing',
  CLOSED = 'closed',
}

/**
 * One completed turn as delivered to the front-end
 */
export interface Reply {
  text: string;
  /** null for text-only turns */
  audio: AudioBuffer | null;
  sequence: number;
  conversationId: string | null;
}

export interface TurnRequest {
  sequence: number;
  text: string;
  submittedAt: number;
}

export interface SessionTimings {
  replyTimeoutMs: number;
  audioSettleMs: number;
  connectRetries: number;
  connectRetryDelayMs: number;
}

export interface ConversationSessionOptions extends Partial<SessionTimings> {
  userId: string;
  sessionId?: string;
  endpoint: AgentEndpoint;
  credentials: AgentCredentials;
  rateLimiter: RateLimiter;
  transportFactory?: AgentTransportFactory;
  /** Fallback audio source for turns that stream no audio */
  synthesizer?: SpeechSynthesizer | null;
  /** Called once when the session reaches `closed`, whatever the cause */
  onClosed?: (session: ConversationSessionHandle) => void;
}

/**
 * The part of a session the registry relies on after it closes
 */
export interface ConversationSessionHandle {
  readonly sessionId: string;
  readonly userId: string;
}

export interface SessionMetrics {
  turnsSubmitted: number;
  turnsCompleted: number;
  turnsFailed: number;
  audioChunks: number;
  keepaliveProbes: number;
  interruptions: number;
  staleEvents: number;
  unrecognizedEvents: number;
}

export interface SessionSnapshot {
  sessionId: string;
  userId: string;
  state: SessionState;
  conversationId: string | null;
  audioFormat: string;
  createdAt: number;
  lastActivityAt: number;
  metrics: SessionMetrics;
}
