/**
 * Agent Module Exports
 * Transport and wire types for the agent service
 */

export { AgentConnection, createAgentConnection } from './services';
export { decodeAgentEvent } from './handlers';
export { classifyConnectError, isFatalConnectError } from './utils';
export { agentConfig, agentTimeoutConfig, agentRetryConfig } from './config';
export { AgentErrorType, AgentConnectError, AgentConnectionClosedError } from './types';
export type {
  AgentEvent,
  AgentEventType,
  AudioChunkEvent,
  BackendErrorEvent,
  OutboundAgentEvent,
  AgentConnectionState,
  AgentEndpoint,
  AgentCredentials,
  AgentCloseInfo,
  AgentConnectionOptions,
  AgentTransport,
  AgentTransportFactory,
} from './types';
