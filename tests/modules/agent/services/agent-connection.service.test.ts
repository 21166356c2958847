import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MockWebSocket } from '../../../utils/ws-mock';
import { AgentConnection, buildAgentUrl } from '@/modules/agent/services';
import { AgentConnectError, AgentConnectionClosedError, AgentErrorType } from '@/modules/agent/types';
import type { AgentEvent } from '@/modules/agent/types';

vi.mock('ws', async () => {
  const { MockWebSocket: Socket } = await import('../../../utils/ws-mock');
  return { WebSocket: Socket, default: Socket };
});

const endpoint = { url: 'wss://agent.test/convai', agentId: 'agent-1' };
const credentials = { apiKey: 'test-secret' };

function createConnection(overrides: { connectTimeoutMs?: number; maxQueuedEvents?: number } = {}) {
  return new AgentConnection({
    connectionId: 'conn-test',
    keepaliveIntervalMs: 0,
    closeTimeoutMs: 50,
    ...overrides,
  });
}

async function openConnection(connection: AgentConnection): Promise<MockWebSocket> {
  const connecting = connection.connect(endpoint, credentials);
  const socket = MockWebSocket.latest();
  socket.simulateOpen();
  await connecting;
  return socket;
}

async function collect(events: AsyncIterable<AgentEvent>): Promise<AgentEvent[]> {
  const received: AgentEvent[] = [];
  for await (const event of events) {
    received.push(event);
  }
  return received;
}

describe('buildAgentUrl', () => {
  it('should add the agent id as a query parameter', () => {
    expect(buildAgentUrl(endpoint)).toBe('wss://agent.test/convai?agent_id=agent-1');
  });

  it('should leave the URL alone without an agent id', () => {
    expect(buildAgentUrl({ url: 'wss://agent.test/convai', agentId: '' })).toBe(
      'wss://agent.test/convai'
    );
  });
});

describe('AgentConnection', () => {
  beforeEach(() => {
    MockWebSocket.reset();
  });

  describe('connect', () => {
    it('should open the socket with the API key header', async () => {
      const connection = createConnection();
      const socket = await openConnection(connection);

      expect(socket.url).toBe('wss://agent.test/convai?agent_id=agent-1');
      expect(socket.options.headers).toEqual({ 'xi-api-key': 'test-secret' });
      expect(connection.state).toBe('open');
    });

    it('should omit the header without an API key', async () => {
      const connection = createConnection();
      const connecting = connection.connect(endpoint, {});
      MockWebSocket.latest().simulateOpen();
      await connecting;

      expect(MockWebSocket.latest().options.headers).toEqual({});
    });

    it('should classify a 401 handshake response as an auth failure', async () => {
      const connection = createConnection();
      const connecting = connection.connect(endpoint, credentials);
      const socket = MockWebSocket.latest();
      socket.simulateUnexpectedResponse(401, 'Unauthorized');

      const error = await connecting.catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(AgentConnectError);
      expect(error).toMatchObject({
        code: 'CONNECT_FAILED',
        type: AgentErrorType.AUTH,
        statusCode: 401,
        retryable: false,
      });
      expect(socket.terminate).toHaveBeenCalledTimes(1);
      expect(connection.state).toBe('closed');
    });

    it('should classify socket errors', async () => {
      const connection = createConnection();
      const connecting = connection.connect(endpoint, credentials);
      MockWebSocket.latest().emit('error', new Error('getaddrinfo ENOTFOUND agent.test'));

      await expect(connecting).rejects.toMatchObject({
        type: AgentErrorType.NETWORK,
        retryable: true,
      });
    });

    it('should time out a handshake that never completes', async () => {
      const connection = createConnection({ connectTimeoutMs: 20 });

      await expect(connection.connect(endpoint, credentials)).rejects.toMatchObject({
        type: AgentErrorType.TIMEOUT,
        message: 'Agent handshake timed out after 20ms',
      });
      expect(connection.state).toBe('closed');
    });

    it('should refuse to be reused', async () => {
      const connection = createConnection();
      await openConnection(connection);
      await connection.close();

      await expect(connection.connect(endpoint, credentials)).rejects.toThrow(
        'Agent connection cannot be reused (state: closed)'
      );
    });

    it('should fail the connect when closed during the handshake', async () => {
      const connection = createConnection();
      const connecting = connection.connect(endpoint, credentials);
      const socket = MockWebSocket.latest();

      const closing = connection.close();

      await expect(connecting).rejects.toBeInstanceOf(AgentConnectError);
      await closing;
      expect(socket.terminate).toHaveBeenCalled();
      expect(connection.state).toBe('closed');
      expect(connection.closeInfo?.initiatedLocally).toBe(true);
    });
  });

  describe('send', () => {
    it('should serialize outbound events', async () => {
      const connection = createConnection();
      const socket = await openConnection(connection);

      connection.send({ type: 'user_turn', text: 'Hello', sequence: 1 });

      expect(socket.sentMessages()).toEqual([{ type: 'user_turn', text: 'Hello', sequence: 1 }]);
      expect(connection.metrics.eventsSent).toBe(1);
    });

    it('should throw when the connection is not open', () => {
      const connection = createConnection();

      expect(() => connection.send({ type: 'user_turn', text: 'Hello', sequence: 1 })).toThrow(
        AgentConnectionClosedError
      );
    });
  });

  describe('receive', () => {
    it('should yield decoded events in order and end after close', async () => {
      const connection = createConnection();
      const socket = await openConnection(connection);
      const received = collect(connection.receive());

      socket.simulateMessage({ type: 'text_partial', text: 'Hi', turn_sequence: 1 });
      socket.simulateBinary(Buffer.from([1, 2]));
      socket.simulateMessage({ type: 'text_final', text: 'Hi there', turn_sequence: 1 });
      await connection.close();

      expect(await received).toEqual([
        { type: 'text_partial', text: 'Hi', turnSequence: 1 },
        { type: 'audio_chunk', audio: Buffer.from([1, 2]), turnSequence: null },
        { type: 'text_final', text: 'Hi there', turnSequence: 1 },
      ]);
    });

    it('should answer keepalive probes before queuing them', async () => {
      const connection = createConnection();
      const socket = await openConnection(connection);

      socket.simulateMessage({ type: 'keepalive_probe', id: 'probe-1' });

      expect(socket.sentMessages()).toEqual([{ type: 'keepalive_ack', id: 'probe-1' }]);
      expect(connection.metrics.keepalivesAnswered).toBe(1);

      const received = collect(connection.receive());
      await connection.close();
      expect(await received).toEqual([{ type: 'keepalive_probe', id: 'probe-1' }]);
    });

    it('should allow only one reader', async () => {
      const connection = createConnection();
      await openConnection(connection);
      const first = collect(connection.receive());

      await expect(connection.receive().next()).rejects.toThrow(
        'Agent connection already has an active reader'
      );

      await connection.close();
      await first;
    });

    it('should drop streaming events once the queue is full', async () => {
      const connection = createConnection({ maxQueuedEvents: 2 });
      const socket = await openConnection(connection);

      socket.simulateMessage({ type: 'text_partial', text: 'a', turn_sequence: 1 });
      socket.simulateMessage({ type: 'text_partial', text: 'b', turn_sequence: 1 });
      socket.simulateMessage({ type: 'text_partial', text: 'c', turn_sequence: 1 });

      expect(connection.metrics.droppedEvents).toBe(1);

      const received = collect(connection.receive());
      await connection.close();
      expect((await received).length).toBe(2);
    });

    it('should keep turn-deciding events when the queue is full', async () => {
      const connection = createConnection({ maxQueuedEvents: 1 });
      const socket = await openConnection(connection);

      socket.simulateMessage({ type: 'text_partial', text: 'a', turn_sequence: 1 });
      socket.simulateMessage({ type: 'text_partial', text: 'b', turn_sequence: 1 });
      socket.simulateMessage({ type: 'text_final', text: 'ab', turn_sequence: 1 });
      socket.simulateMessage({ type: 'interruption', turn_sequence: 1 });

      expect(connection.metrics.droppedEvents).toBe(1);

      const received = collect(connection.receive());
      await connection.close();
      expect((await received).map((event) => event.type)).toEqual([
        'text_partial',
        'text_final',
        'interruption',
      ]);
    });

    it('should end when the remote side closes', async () => {
      const connection = createConnection();
      const socket = await openConnection(connection);
      const received = collect(connection.receive());

      socket.simulateClose(1011, 'internal error');

      expect(await received).toEqual([]);
      expect(connection.state).toBe('closed');
      expect(connection.closeInfo).toEqual({
        code: 1011,
        reason: 'internal error',
        initiatedLocally: false,
      });
    });
  });

  describe('close', () => {
    it('should be idempotent', async () => {
      const connection = createConnection();
      const socket = await openConnection(connection);

      const first = connection.close();
      const second = connection.close();
      await Promise.all([first, second]);
      await connection.close();

      expect(first).toBe(second);
      expect(socket.close).toHaveBeenCalledTimes(1);
      expect(socket.close).toHaveBeenCalledWith(1000, 'session ended');
      expect(connection.closeInfo).toEqual({
        code: 1000,
        reason: 'session ended',
        initiatedLocally: true,
      });
    });

    it('should close immediately when never connected', async () => {
      const connection = createConnection();

      await connection.close();

      expect(connection.state).toBe('closed');
      expect(MockWebSocket.instances).toHaveLength(0);
    });

    it('should terminate when the close handshake stalls', async () => {
      const connection = createConnection();
      const socket = await openConnection(connection);
      socket.close.mockImplementation(() => {
        socket.readyState = MockWebSocket.CLOSING;
      });

      await connection.close();

      expect(socket.terminate).toHaveBeenCalledTimes(1);
      expect(connection.state).toBe('closed');
    });
  });
});
