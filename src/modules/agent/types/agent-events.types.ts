/**
 * Agent Wire Event Types
 * JSON events exchanged with the agent service over the duplex connection
 */

// ============================================================================
// Inbound (agent → us), decoded
// ============================================================================

export interface InitMetadataEvent {
  type: 'init_metadata';
  conversationId: string | null;
  /** Output format exactly as declared, e.g. `pcm_16000` */
  audioFormat: string | null;
}

export interface TextPartialEvent {
  type: 'text_partial';
  text: string;
  turnSequence: number | null;
}

export interface TextFinalEvent {
  type: 'text_final';
  text: string;
  turnSequence: number | null;
}

export interface AudioChunkEvent {
  type: 'audio_chunk';
  audio: Buffer;
  turnSequence: number | null;
}

export interface InterruptionEvent {
  type: 'interruption';
  turnSequence: number | null;
}

export interface KeepaliveProbeEvent {
  type: 'keepalive_probe';
  id: string | number;
}

export interface BackendErrorEvent {
  type: 'backend_error';
  message: string;
  code: string | null;
  /** Backend says the conversation cannot continue */
  fatal: boolean;
  turnSequence: number | null;
}

export type UnrecognizedReason = 'malformed_json' | 'not_an_object' | 'unknown_type' | 'invalid_payload';

export interface UnrecognizedEvent {
  type: 'unrecognized';
  reason: UnrecognizedReason;
  /** Raw `type` tag when one was present */
  rawType: string | null;
  preview: string;
}

export type AgentEvent =
  | InitMetadataEvent
  | TextPartialEvent
  | TextFinalEvent
  | AudioChunkEvent
  | InterruptionEvent
  | KeepaliveProbeEvent
  | BackendErrorEvent
  | UnrecognizedEvent;

export type AgentEventType = AgentEvent['type'];

// ============================================================================
// Outbound (us → agent), wire shape
// ============================================================================

export interface UserTurnMessage {
  type: 'user_turn';
  text: string;
  sequence: number;
}

export interface KeepaliveAckMessage {
  type: 'keepalive_ack';
  id: string | number;
}

export type OutboundAgentEvent = UserTurnMessage | KeepaliveAckMessage;
