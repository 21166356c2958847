/**
 * Agent Connection Service
 * Owns one duplex WebSocket to the agent service for one conversation session.
 *
 * Lifecycle: idle → connecting → open → closing → closed
 * (connecting → closed on failure). A closed connection is never reused.
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { ClientRequest, IncomingMessage } from 'http';
import { logger, generateId } from '@/shared/utils';
import type { Logger } from '@/shared/utils';
import { agentConfig, agentTimeoutConfig } from '../config';
import { decodeAgentEvent } from '../handlers';
import { classifyConnectError, classifyHandshakeStatus } from '../utils';
import {
  AgentConnectError,
  AgentConnectionClosedError,
  AgentErrorType,
} from '../types';
import type {
  AgentCloseInfo,
  AgentConnectionMetrics,
  AgentConnectionOptions,
  AgentConnectionState,
  AgentCredentials,
  AgentEndpoint,
  AgentEvent,
  AgentTransport,
  OutboundAgentEvent,
} from '../types';

const NORMAL_CLOSURE = 1000;

const TURN_DECIDING_EVENTS: ReadonlySet<AgentEvent['type']> = new Set<AgentEvent['type']>([
  'init_metadata',
  'text_final',
  'interruption',
  'backend_error',
]);

/**
 * Build the agent WebSocket URL (`agent_id` query parameter)
 */
export function buildAgentUrl(endpoint: AgentEndpoint): string {
  const url = new URL(endpoint.url);
  if (endpoint.agentId) {
    url.searchParams.set('agent_id', endpoint.agentId);
  }
  return url.toString();
}

export class AgentConnection implements AgentTransport {
  readonly connectionId: string;
  readonly metrics: AgentConnectionMetrics = {
    eventsReceived: 0,
    eventsSent: 0,
    keepalivesAnswered: 0,
    droppedEvents: 0,
  };

  private currentState: AgentConnectionState = 'idle';
  private ws: WebSocket | null = null;
  private lastCloseInfo: AgentCloseInfo | null = null;
  private closeRequested = false;
  private closing: Promise<void> | null = null;

  // Receive loop plumbing (single reader)
  private inbox: AgentEvent[] = [];
  private wakeReader: (() => void) | null = null;
  private reading = false;

  private keepAliveInterval?: NodeJS.Timeout;
  private readonly connectTimeoutMs: number;
  private readonly keepaliveIntervalMs: number;
  private readonly closeTimeoutMs: number;
  private readonly maxQueuedEvents: number;
  private readonly log: Logger;

  constructor(options: AgentConnectionOptions = {}) {
    this.connectionId = options.connectionId ?? generateId();
    this.connectTimeoutMs = options.connectTimeoutMs ?? agentTimeoutConfig.connectTimeout;
    this.keepaliveIntervalMs = options.keepaliveIntervalMs ?? agentConfig.keepaliveInterval;
    this.closeTimeoutMs = options.closeTimeoutMs ?? agentTimeoutConfig.closeTimeout;
    this.maxQueuedEvents = options.maxQueuedEvents ?? agentConfig.maxQueuedEvents;
    this.log = logger.child({ connectionId: this.connectionId });
  }

  get state(): AgentConnectionState {
    return this.currentState;
  }

  get closeInfo(): AgentCloseInfo | null {
    return this.lastCloseInfo;
  }

  /**
   * Open the WebSocket. Rejects with AgentConnectError on auth rejection,
   * network failure, handshake timeout or unexpected handshake response.
   */
  async connect(endpoint: AgentEndpoint, credentials: AgentCredentials): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new AgentConnectError({
        type: AgentErrorType.PROTOCOL,
        message: `Agent connection cannot be reused (state: ${this.currentState})`,
        retryable: false,
      });
    }

    this.currentState = 'connecting';
    this.log.info('Connecting to agent service', { agentId: endpoint.agentId });

    try {
      const url = buildAgentUrl(endpoint);
      const ws = await this.openSocket(url, credentials);

      if (this.closeRequested) {
        ws.terminate();
        throw new AgentConnectError({
          type: AgentErrorType.NETWORK,
          message: 'Agent connection closed while connecting',
          retryable: false,
        });
      }

      this.attachListeners(ws);
      this.currentState = 'open';
      this.startKeepAlive();

      this.log.info('Connected to agent service');
    } catch (error) {
      const connectError =
        error instanceof AgentConnectError
          ? error
          : new AgentConnectError(classifyConnectError(error), { cause: error });

      this.markClosed(null, connectError.message);
      this.log.warn('Agent connection failed', {
        type: connectError.type,
        statusCode: connectError.statusCode,
        retryable: connectError.retryable,
        message: connectError.message,
      });
      throw connectError;
    }
  }

  /**
   * Serialize and send one outbound event
   */
  send(event: OutboundAgentEvent): void {
    const ws = this.ws;
    if (this.currentState !== 'open' || !ws || ws.readyState !== WebSocket.OPEN) {
      throw new AgentConnectionClosedError(
        `Cannot send ${event.type}: agent connection is ${this.currentState}`
      );
    }

    ws.send(JSON.stringify(event), (error) => {
      if (error) {
        this.log.warn('Agent send failed', { eventType: event.type, error: error.message });
      }
    });
    this.metrics.eventsSent++;
  }

  /**
   * Decoded inbound events in arrival order. Ends once the connection is
   * closing/closed and the queue is drained. Only one reader at a time.
   */
  async *receive(): AsyncGenerator<AgentEvent> {
    if (this.reading) {
      throw new Error('Agent connection already has an active reader');
    }
    this.reading = true;

    try {
      while (true) {
        const next = this.inbox.shift();
        if (next) {
          yield next;
          continue;
        }
        if (this.currentState === 'closing' || this.currentState === 'closed') {
          return;
        }
        await new Promise<void>((resolve) => {
          this.wakeReader = resolve;
        });
      }
    } finally {
      this.reading = false;
      this.wakeReader = null;
    }
  }

  /**
   * Close the connection. Safe to call repeatedly.
   */
  close(): Promise<void> {
    if (this.currentState === 'closed') {
      return Promise.resolve();
    }
    if (this.closing) {
      return this.closing;
    }

    this.closeRequested = true;
    const ws = this.ws;

    if (!ws || ws.readyState === WebSocket.CLOSED) {
      this.markClosed(NORMAL_CLOSURE, 'closed locally');
      return Promise.resolve();
    }

    this.currentState = 'closing';
    this.stopKeepAlive();
    this.wake();

    this.closing = new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        this.log.warn('Agent close handshake timed out, terminating');
        ws.terminate();
      }, this.closeTimeoutMs);

      ws.once('close', () => {
        clearTimeout(forceTimer);
        resolve();
      });

      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else {
        ws.close(NORMAL_CLOSURE, 'session ended');
      }
    });

    return this.closing;
  }

  private openSocket(url: string, credentials: AgentCredentials): Promise<WebSocket> {
    const headers: Record<string, string> = {};
    if (credentials.apiKey) {
      headers['xi-api-key'] = credentials.apiKey;
    }

    return new Promise<WebSocket>((resolve, reject) => {
      const ws = new WebSocket(url, { headers });
      this.ws = ws;
      let settled = false;

      const cleanup = () => {
        clearTimeout(timeout);
        ws.off('open', onOpen);
        ws.off('error', onError);
        ws.off('unexpected-response', onUnexpectedResponse);
        ws.off('close', onClose);
      };

      const fail = (error: AgentConnectError) => {
        if (settled) return;
        settled = true;
        cleanup();
        // Aborting a handshake emits 'error' once more
        ws.on('error', (lateError: Error) => {
          this.log.debug('Error after failed handshake', { error: lateError.message });
        });
        if (ws.readyState !== WebSocket.CLOSED) {
          ws.terminate();
        }
        reject(error);
      };

      const onOpen = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve(ws);
      };

      const onError = (error: Error) => {
        fail(new AgentConnectError(classifyConnectError(error), { cause: error }));
      };

      const onUnexpectedResponse = (_request: ClientRequest, response: IncomingMessage) => {
        fail(
          new AgentConnectError(
            classifyHandshakeStatus(response.statusCode ?? 0, response.statusMessage ?? '')
          )
        );
      };

      const onClose = (code: number) => {
        fail(
          new AgentConnectError({
            type: AgentErrorType.NETWORK,
            message: `Agent socket closed during handshake (code ${code})`,
            retryable: true,
          })
        );
      };

      const timeout = setTimeout(() => {
        fail(
          new AgentConnectError({
            type: AgentErrorType.TIMEOUT,
            message: `Agent handshake timed out after ${this.connectTimeoutMs}ms`,
            retryable: true,
          })
        );
      }, this.connectTimeoutMs);

      ws.on('open', onOpen);
      ws.on('error', onError);
      ws.on('unexpected-response', onUnexpectedResponse);
      ws.on('close', onClose);
    });
  }

  private attachListeners(ws: WebSocket): void {
    ws.on('message', (data: RawData, isBinary: boolean) => {
      this.handleFrame(data, isBinary);
    });

    ws.on('error', (error: Error) => {
      // 'close' always follows; that is where state changes
      this.log.warn('Agent socket error', { error: error.message });
    });

    ws.on('close', (code: number, reason: Buffer) => {
      this.markClosed(code, reason.toString('utf8'));
    });
  }

  private handleFrame(data: RawData, isBinary: boolean): void {
    this.metrics.eventsReceived++;
    const event = decodeAgentEvent(data, isBinary);

    // Answered before the probe is queued, so the ack precedes any other
    // outbound traffic on this connection
    if (event.type === 'keepalive_probe') {
      this.answerKeepalive(event.id);
    }

    // Events that decide a turn's outcome are queued past the cap
    if (this.inbox.length >= this.maxQueuedEvents && !TURN_DECIDING_EVENTS.has(event.type)) {
      this.metrics.droppedEvents++;
      this.log.warn('Agent event queue full, dropping event', {
        eventType: event.type,
        queued: this.inbox.length,
      });
      return;
    }

    this.inbox.push(event);
    this.wake();
  }

  private answerKeepalive(id: string | number): void {
    try {
      this.send({ type: 'keepalive_ack', id });
      this.metrics.keepalivesAnswered++;
      this.log.debug('Answered keepalive probe', { id });
    } catch (error) {
      this.log.warn('Could not answer keepalive probe', {
        id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private startKeepAlive(): void {
    this.stopKeepAlive();
    if (this.keepaliveIntervalMs <= 0) {
      return;
    }

    this.keepAliveInterval = setInterval(() => {
      const ws = this.ws;
      if (ws && ws.readyState === WebSocket.OPEN) {
        ws.ping();
      }
    }, this.keepaliveIntervalMs);
  }

  private stopKeepAlive(): void {
    if (this.keepAliveInterval) {
      clearInterval(this.keepAliveInterval);
      this.keepAliveInterval = undefined;
    }
  }

  private markClosed(code: number | null, reason: string): void {
    if (this.currentState === 'closed') {
      return;
    }

    this.currentState = 'closed';
    this.lastCloseInfo = { code, reason, initiatedLocally: this.closeRequested };
    this.stopKeepAlive();
    this.wake();

    this.log.info('Agent connection closed', {
      code,
      reason,
      initiatedLocally: this.closeRequested,
      metrics: this.metrics,
    });
  }

  private wake(): void {
    const wakeReader = this.wakeReader;
    this.wakeReader = null;
    if (wakeReader) {
      wakeReader();
    }
  }
}

/**
 * Default transport factory used by sessions
 */
export function createAgentConnection(options: AgentConnectionOptions = {}): AgentConnection {
  return new AgentConnection(options);
}
