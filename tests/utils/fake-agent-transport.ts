/**
 * In-memory AgentTransport for session and registry tests
 *
 * Tests push decoded events with emit(); receive() ends once the transport
 * is closed from either side, like the real connection.
 */

import { AgentConnectError, AgentConnectionClosedError, AgentErrorType } from '@/modules/agent';
import type {
  AgentCloseInfo,
  AgentConnectionState,
  AgentCredentials,
  AgentEndpoint,
  AgentEvent,
  AgentTransport,
  OutboundAgentEvent,
} from '@/modules/agent';

export interface FakeTransportOptions {
  connectionId?: string;
  /** connect() rejects with this */
  connectError?: unknown;
  /** connect() stays pending until releaseConnect() or close() */
  holdConnect?: boolean;
  /** Answer every user turn with this text-final */
  autoReply?: (text: string) => string;
}

export class FakeAgentTransport implements AgentTransport {
  readonly connectionId: string;
  readonly sent: OutboundAgentEvent[] = [];
  connectedTo: { endpoint: AgentEndpoint; credentials: AgentCredentials } | null = null;
  closeCalls = 0;

  private currentState: AgentConnectionState = 'idle';
  private lastCloseInfo: AgentCloseInfo | null = null;
  private inbox: AgentEvent[] = [];
  private wakeReader: (() => void) | null = null;
  private pendingConnect: { resolve: () => void; reject: (error: unknown) => void } | null = null;

  constructor(private readonly options: FakeTransportOptions = {}) {
    this.connectionId = options.connectionId ?? 'fake-connection';
  }

  get state(): AgentConnectionState {
    return this.currentState;
  }

  get closeInfo(): AgentCloseInfo | null {
    return this.lastCloseInfo;
  }

  connect(endpoint: AgentEndpoint, credentials: AgentCredentials): Promise<void> {
    this.connectedTo = { endpoint, credentials };

    if (this.options.connectError !== undefined) {
      this.currentState = 'closed';
      return Promise.reject(this.options.connectError);
    }

    if (this.options.holdConnect) {
      this.currentState = 'connecting';
      return new Promise<void>((resolve, reject) => {
        this.pendingConnect = { resolve, reject };
      });
    }

    this.currentState = 'open';
    return Promise.resolve();
  }

  releaseConnect(): void {
    const pending = this.pendingConnect;
    this.pendingConnect = null;
    if (pending) {
      this.currentState = 'open';
      pending.resolve();
    }
  }

  send(event: OutboundAgentEvent): void {
    if (this.currentState !== 'open') {
      throw new AgentConnectionClosedError();
    }
    this.sent.push(event);
    if (event.type === 'user_turn' && this.options.autoReply) {
      this.emit({
        type: 'text_final',
        text: this.options.autoReply(event.text),
        turnSequence: event.sequence,
      });
    }
  }

  async *receive(): AsyncGenerator<AgentEvent> {
    while (true) {
      const next = this.inbox.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.currentState === 'closed') {
        return;
      }
      await new Promise<void>((resolve) => {
        this.wakeReader = resolve;
      });
    }
  }

  close(): Promise<void> {
    this.closeCalls++;
    const pending = this.pendingConnect;
    this.pendingConnect = null;
    if (pending) {
      pending.reject(
        new AgentConnectError({
          type: AgentErrorType.NETWORK,
          message: 'Agent connection closed while connecting',
          retryable: false,
        })
      );
    }
    this.markClosed({ code: 1000, reason: 'closed locally', initiatedLocally: true });
    return Promise.resolve();
  }

  /** Queue an inbound event */
  emit(event: AgentEvent): void {
    this.inbox.push(event);
    this.wake();
  }

  /** Simulate the remote side dropping the connection */
  drop(code: number, reason: string): void {
    this.markClosed({ code, reason, initiatedLocally: false });
  }

  private markClosed(info: AgentCloseInfo): void {
    if (this.currentState === 'closed') {
      return;
    }
    this.currentState = 'closed';
    this.lastCloseInfo = info;
    this.wake();
  }

  private wake(): void {
    const wakeReader = this.wakeReader;
    this.wakeReader = null;
    if (wakeReader) {
      wakeReader();
    }
  }
}

/** Let queued events reach the session's receive loop */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
