export { SessionState } from './session.types';
export type {
  Reply,
  TurnRequest,
  SessionTimings,
  ConversationSessionOptions,
  ConversationSessionHandle,
  SessionMetrics,
  SessionSnapshot,
} from './session.types';
export {
  ConversationError,
  AgentBackendError,
  NoReplyError,
  RateLimitedError,
  ConnectionLostError,
  SessionEndedError,
  SessionNotActiveError,
  SessionNotFoundError,
  InvalidTurnError,
} from './error.types';
export type { TurnError, BeginError } from './error.types';
