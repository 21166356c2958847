/**
 * Session Registry Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { FakeAgentTransport, flush } from '../../../utils/fake-agent-transport';
import type { FakeTransportOptions } from '../../../utils/fake-agent-transport';
import { SessionRegistry } from '@/modules/conversation/services';
import {
  SessionEndedError,
  SessionNotFoundError,
  SessionState,
} from '@/modules/conversation/types';
import { AgentConnectError, AgentErrorType } from '@/modules/agent';
import type { AgentConnectionState } from '@/modules/agent';
import { RateLimiter } from '@/modules/ratelimit';

const DAY = 24 * 60 * 60 * 1000;
const endpoint = { url: 'wss://agent.test/convai', agentId: 'agent-1' };

interface Harness {
  registry: SessionRegistry;
  transports: FakeAgentTransport[];
  /** States of earlier transports at the moment each transport was created */
  priorStates: AgentConnectionState[][];
  latest: () => FakeAgentTransport;
}

const registries: SessionRegistry[] = [];

function createHarness(
  connectErrors: unknown[] = [],
  transportOptions: FakeTransportOptions = {}
): Harness {
  const transports: FakeAgentTransport[] = [];
  const priorStates: AgentConnectionState[][] = [];

  const registry = new SessionRegistry({
    endpoint,
    credentials: { apiKey: 'test-secret' },
    rateLimiter: new RateLimiter({ dailyQuota: 15, cooldownMs: 0, windowMs: DAY }),
    transportFactory: () => {
      priorStates.push(transports.map((transport) => transport.state));
      const transport = new FakeAgentTransport({
        ...transportOptions,
        connectionId: `conn-${transports.length + 1}`,
        connectError: connectErrors.shift(),
      });
      transports.push(transport);
      return transport;
    },
    timings: { replyTimeoutMs: 200, audioSettleMs: 20, connectRetries: 0, connectRetryDelayMs: 10 },
    idleTimeoutMs: 1000,
    startCleanupTimer: false,
  });
  registries.push(registry);

  return {
    registry,
    transports,
    priorStates,
    latest: () => {
      const transport = transports[transports.length - 1];
      if (!transport) {
        throw new Error('No transport created');
      }
      return transport;
    },
  };
}

describe('SessionRegistry', () => {
  afterEach(async () => {
    await Promise.all(registries.map((registry) => registry.shutdown()));
    registries.length = 0;
  });

  describe('begin', () => {
    it('should create an active session for the user', async () => {
      const { registry } = createHarness();

      const session = await registry.begin('u1');

      expect(session.state).toBe(SessionState.ACTIVE);
      expect(registry.get('u1')).toBe(session);
      expect(registry.getMetrics()).toMatchObject({
        activeSessions: 1,
        totalSessionsCreated: 1,
        peakConcurrentSessions: 1,
      });
    });

    it('should close the previous session before connecting a new one', async () => {
      const { registry, priorStates } = createHarness();

      const first = await registry.begin('u1');
      const second = await registry.begin('u1');

      expect(priorStates[1]).toEqual(['closed']);
      expect(first.state).toBe(SessionState.CLOSED);
      expect(registry.get('u1')).toBe(second);
      expect(registry.getMetrics()).toMatchObject({
        activeSessions: 1,
        totalSessionsCreated: 2,
        totalSessionsClosed: 1,
      });
    });

    it('should keep users apart', async () => {
      const { registry } = createHarness();

      await registry.begin('u1');
      await registry.begin('u2');

      expect(registry.size()).toBe(2);
      expect(registry.listSessions().map((snapshot) => snapshot.userId)).toEqual(['u1', 'u2']);
    });

    it('should not register a session whose connect failed', async () => {
      const authError = new AgentConnectError({
        type: AgentErrorType.AUTH,
        message: 'Agent service rejected credentials (HTTP 401)',
        statusCode: 401,
        retryable: false,
      });
      const { registry } = createHarness([authError]);

      await expect(registry.begin('u1')).rejects.toBe(authError);

      expect(registry.has('u1')).toBe(false);
      expect(registry.getMetrics()).toMatchObject({ connectFailures: 1, totalSessionsClosed: 0 });
    });

    it('should fail an in-flight turn when the user begins again', async () => {
      const { registry, priorStates } = createHarness();
      const first = await registry.begin('u1');

      const reply = registry.submitTurn('u1', 'Hello');
      const outcome = expect(reply).rejects.toBeInstanceOf(SessionEndedError);
      await flush();
      expect(first.state).toBe(SessionState.AWAITING_REPLY);

      const second = await registry.begin('u1');

      await outcome;
      expect(priorStates[1]).toEqual(['closed']);
      expect(first.state).toBe(SessionState.CLOSED);
      expect(registry.get('u1')).toBe(second);
    });
  });

  describe('submitTurn', () => {
    it('should reject users without a session', async () => {
      const { registry } = createHarness();

      await expect(registry.submitTurn('u1', 'Hello')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('should route the turn to the user session', async () => {
      const { registry, latest } = createHarness();
      await registry.begin('u1');

      const reply = registry.submitTurn('u1', 'Hello');
      await flush();
      expect(registry.getMetrics().awaitingReply).toBe(1);

      latest().emit({ type: 'text_final', text: 'Hi', turnSequence: 1 });

      await expect(reply).resolves.toMatchObject({ text: 'Hi', audio: null, sequence: 1 });
    });

    it('should wait for a begin that is still connecting', async () => {
      const { registry, latest } = createHarness();

      const begun = registry.begin('u1');
      const reply = registry.submitTurn('u1', 'Hello');
      await begun;
      await flush();

      expect(latest().sent).toEqual([{ type: 'user_turn', text: 'Hello', sequence: 1 }]);
      latest().emit({ type: 'text_final', text: 'Hi', turnSequence: 1 });
      await expect(reply).resolves.toMatchObject({ text: 'Hi' });
    });
  });

  describe('end', () => {
    it('should end the session and report whether there was one', async () => {
      const { registry, latest } = createHarness();
      await registry.begin('u1');

      await expect(registry.end('u1')).resolves.toBe(true);
      await expect(registry.end('u1')).resolves.toBe(false);

      expect(registry.has('u1')).toBe(false);
      expect(latest().closeCalls).toBe(1);
    });

    it('should drop sessions that closed on their own', async () => {
      const { registry, latest } = createHarness();
      await registry.begin('u1');

      latest().drop(1006, 'abnormal closure');
      await flush();

      expect(registry.has('u1')).toBe(false);
      expect(registry.getMetrics().totalSessionsClosed).toBe(1);
    });
  });

  describe('sweepIdle', () => {
    it('should end sessions idle past the timeout', async () => {
      const { registry } = createHarness();
      const session = await registry.begin('u1');

      await expect(registry.sweepIdle(session.lastActivityAt + 999)).resolves.toBe(0);
      await expect(registry.sweepIdle(session.lastActivityAt + 1000)).resolves.toBe(1);

      expect(registry.has('u1')).toBe(false);
      expect(registry.getMetrics().idleSessionsEnded).toBe(1);
    });

    it('should keep sessions waiting for a reply', async () => {
      const { registry, latest } = createHarness();
      const session = await registry.begin('u1');

      const reply = registry.submitTurn('u1', 'Hello');
      await flush();

      await expect(registry.sweepIdle(session.lastActivityAt + 5000)).resolves.toBe(0);
      expect(registry.has('u1')).toBe(true);

      latest().emit({ type: 'text_final', text: 'Hi', turnSequence: null });
      await reply;
    });
  });

  describe('shutdown', () => {
    it('should end every session and refuse new ones', async () => {
      const { registry } = createHarness();
      const first = await registry.begin('u1');
      const second = await registry.begin('u2');

      await registry.shutdown();

      expect(first.state).toBe(SessionState.CLOSED);
      expect(second.state).toBe(SessionState.CLOSED);
      expect(registry.size()).toBe(0);
      expect(registry.getMetrics().isShuttingDown).toBe(true);
      await expect(registry.begin('u3')).rejects.toBeInstanceOf(SessionEndedError);
    });

    it('should close a session whose connect finishes after shutdown started', async () => {
      const { registry, latest } = createHarness([], { holdConnect: true });

      const begun = registry.begin('u1');
      const outcome = expect(begun).rejects.toBeInstanceOf(SessionEndedError);
      await flush();
      expect(latest().state).toBe('connecting');

      await registry.shutdown();
      latest().releaseConnect();

      await outcome;
      expect(registry.has('u1')).toBe(false);
      expect(latest().state).toBe('closed');
      expect(latest().closeCalls).toBe(1);
    });
  });
});
