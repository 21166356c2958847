/**
 * Agent Connect Error Classifier
 * Classifies failures establishing the agent WebSocket for retry decisions
 */

import { agentRetryConfig } from '../config';
import { AgentErrorType } from '../types';
import type { ClassifiedConnectError } from '../types';

interface ErrorWithStatus {
  message?: unknown;
  statusCode?: unknown;
  status?: unknown;
  code?: unknown;
}

function hasErrorFields(error: unknown): error is ErrorWithStatus {
  return typeof error === 'object' && error !== null;
}

function extractStatusCode(error: ErrorWithStatus): number | undefined {
  for (const candidate of [error.statusCode, error.status, error.code]) {
    if (typeof candidate === 'number' && candidate >= 100 && candidate < 600) {
      return candidate;
    }
  }
  return undefined;
}

function extractMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (hasErrorFields(error) && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Classify a handshake status code
 */
export function classifyHandshakeStatus(statusCode: number, detail = ''): ClassifiedConnectError {
  const suffix = detail ? `: ${detail}` : '';

  if (statusCode === 401 || statusCode === 403) {
    return {
      type: AgentErrorType.AUTH,
      message: `Agent service rejected credentials (HTTP ${statusCode})${suffix}`,
      statusCode,
      retryable: false,
    };
  }

  return {
    type: AgentErrorType.PROTOCOL,
    message: `Unexpected handshake response (HTTP ${statusCode})${suffix}`,
    statusCode,
    retryable: agentRetryConfig.retryableStatusCodes.has(statusCode),
  };
}

/**
 * Classify any connect failure
 */
export function classifyConnectError(error: unknown): ClassifiedConnectError {
  if (!error) {
    return {
      type: AgentErrorType.NETWORK,
      message: 'Unknown connection error',
      retryable: true,
    };
  }

  const message = extractMessage(error);
  const statusCode = hasErrorFields(error) ? extractStatusCode(error) : undefined;

  if (statusCode !== undefined) {
    return classifyHandshakeStatus(statusCode, message);
  }

  const lowerMessage = message.toLowerCase();

  if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
    return {
      type: AgentErrorType.TIMEOUT,
      message: `Agent handshake timed out: ${message}`,
      retryable: true,
    };
  }

  if (
    lowerMessage.includes('unauthorized') ||
    lowerMessage.includes('forbidden') ||
    lowerMessage.includes('invalid api key')
  ) {
    return {
      type: AgentErrorType.AUTH,
      message: `Agent service rejected credentials: ${message}`,
      retryable: false,
    };
  }

  if (lowerMessage.includes('invalid url') || lowerMessage.includes('invalid protocol')) {
    return {
      type: AgentErrorType.PROTOCOL,
      message: `Invalid agent endpoint: ${message}`,
      retryable: false,
    };
  }

  // econnrefused, enotfound, econnreset, socket hang up, ...
  return {
    type: AgentErrorType.NETWORK,
    message: `Agent service unreachable: ${message}`,
    retryable: true,
  };
}

/**
 * Credential failures are never retried
 */
export function isFatalConnectError(error: ClassifiedConnectError): boolean {
  return error.type === AgentErrorType.AUTH || !error.retryable;
}
