/**
 * Agent Connection Types
 */

import type { AgentEvent, OutboundAgentEvent } from './agent-events.types';

export type AgentConnectionState = 'idle' | 'connecting' | 'open' | 'closing' | 'closed';

export interface AgentEndpoint {
  url: string;
  agentId: string;
}

export interface AgentCredentials {
  apiKey?: string;
}

export interface AgentCloseInfo {
  code: number | null;
  reason: string;
  /** True when close() was called on our side */
  initiatedLocally: boolean;
}

export interface AgentConnectionMetrics {
  eventsReceived: number;
  eventsSent: number;
  keepalivesAnswered: number;
  droppedEvents: number;
}

export interface AgentConnectionOptions {
  connectionId?: string;
  connectTimeoutMs?: number;
  keepaliveIntervalMs?: number;
  closeTimeoutMs?: number;
  maxQueuedEvents?: number;
}

/**
 * Duplex transport to the agent service. One instance per session;
 * once closed it is never reused.
 */
export interface AgentTransport {
  readonly connectionId: string;
  readonly state: AgentConnectionState;
  readonly closeInfo: AgentCloseInfo | null;
  connect(endpoint: AgentEndpoint, credentials: AgentCredentials): Promise<void>;
  send(event: OutboundAgentEvent): void;
  /** Decoded inbound events in arrival order; ends when the connection closes */
  receive(): AsyncIterable<AgentEvent>;
  close(): Promise<void>;
}

export type AgentTransportFactory = () => AgentTransport;
