export type {
  AgentEvent,
  AgentEventType,
  InitMetadataEvent,
  TextPartialEvent,
  TextFinalEvent,
  AudioChunkEvent,
  InterruptionEvent,
  KeepaliveProbeEvent,
  BackendErrorEvent,
  UnrecognizedEvent,
  UnrecognizedReason,
  UserTurnMessage,
  KeepaliveAckMessage,
  OutboundAgentEvent,
} from './agent-events.types';
export type {
  AgentConnectionState,
  AgentEndpoint,
  AgentCredentials,
  AgentCloseInfo,
  AgentConnectionMetrics,
  AgentConnectionOptions,
  AgentTransport,
  AgentTransportFactory,
} from './connection.types';
export { AgentErrorType, AgentConnectError, AgentConnectionClosedError } from './error.types';
export type { ClassifiedConnectError } from './error.types';
