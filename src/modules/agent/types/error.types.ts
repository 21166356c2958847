/**
 * Agent Error Types
 */

import { AppError } from '@/shared/errors';

export enum AgentErrorType {
  AUTH = 'auth',
  NETWORK = 'network',
  TIMEOUT = 'timeout',
  PROTOCOL = 'protocol',
}

export interface ClassifiedConnectError {
  type: AgentErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
}

/**
 * Failure establishing the agent stream (auth rejected, unreachable,
 * handshake timeout, unexpected handshake response)
 */
export class AgentConnectError extends AppError {
  readonly type: AgentErrorType;
  readonly statusCode?: number;
  readonly retryable: boolean;

  constructor(classified: ClassifiedConnectError, options?: { cause?: unknown }) {
    super('CONNECT_FAILED', classified.message, options);
    this.type = classified.type;
    this.statusCode = classified.statusCode;
    this.retryable = classified.retryable;
  }
}

/**
 * Send attempted on a connection that is not open
 */
export class AgentConnectionClosedError extends AppError {
  constructor(message = 'Agent connection is not open') {
    super('CONNECTION_CLOSED', message);
  }
}
