/**
 * Conversation Module Exports
 */

export { ConversationController } from './controllers';
export { SessionRegistry, ConversationSession } from './services';
export type { SessionRegistryOptions, RegistryMetrics } from './services';

export {
  SessionState,
  ConversationError,
  AgentBackendError,
  NoReplyError,
  RateLimitedError,
  ConnectionLostError,
  SessionEndedError,
  SessionNotActiveError,
  SessionNotFoundError,
  InvalidTurnError,
} from './types';
export type { Reply, TurnRequest, TurnError, BeginError, SessionSnapshot, SessionTimings } from './types';
