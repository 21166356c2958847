/**
 * Chat Routes Tests
 * Exercises the router over a loopback HTTP server
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express from 'express';
import { createServer } from 'http';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { FakeAgentTransport } from '../../../utils/fake-agent-transport';
import { ConversationController, SessionRegistry } from '@/modules/conversation';
import { RateLimiter } from '@/modules/ratelimit';
import { createChatRouter, chatErrorHandler } from '@/modules/gateway';

const DAY = 24 * 60 * 60 * 1000;

describe('Chat Routes', () => {
  let server: Server;
  let controller: ConversationController;
  let baseUrl: string;

  beforeEach(async () => {
    const registry = new SessionRegistry({
      endpoint: { url: 'wss://agent.test/convai', agentId: 'agent-1' },
      credentials: { apiKey: 'test-secret' },
      rateLimiter: new RateLimiter({
        dailyQuota: 15,
        cooldownMs: 45000,
        windowMs: DAY,
        now: () => 1_700_000_000_000,
      }),
      transportFactory: () => new FakeAgentTransport({ autoReply: (text) => `You said: ${text}` }),
      timings: { replyTimeoutMs: 500, audioSettleMs: 10, connectRetries: 0 },
      startCleanupTimer: false,
    });
    controller = new ConversationController(registry);

    const app = express();
    app.use(express.json());
    app.use(createChatRouter(controller, { greeting: 'Hello! How can I help?', dailyQuota: 15 }));
    app.use(chatErrorHandler);

    server = createServer(app);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server did not bind to a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await controller.shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function post(path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it('should start a session and return the greeting', async () => {
    const response = await post('/users/u1/session');

    expect(response.status).toBe(201);
    expect(await response.json()).toEqual({ greeting: 'Hello! How can I help?' });
    expect(controller.hasSession('u1')).toBe(true);
  });

  it('should return the agent reply for a turn', async () => {
    await post('/users/u1/session');

    const response = await post('/users/u1/turns', { text: 'hi' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      text: 'You said: hi',
      sequence: 1,
      conversationId: null,
      audio: null,
    });
  });

  it('should reject a turn without text', async () => {
    await post('/users/u1/session');

    const response = await post('/users/u1/turns', { message: 'hi' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Request body must include a text field.' },
    });
  });

  it('should ask for a session first', async () => {
    const response = await post('/users/u2/turns', { text: 'hi' });

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({
      error: { code: 'SESSION_NOT_FOUND', message: 'Please start a session first.' },
    });
  });

  it('should send Retry-After during the cooldown', async () => {
    await post('/users/u1/session');
    await post('/users/u1/turns', { text: 'one' });

    const response = await post('/users/u1/turns', { text: 'two' });

    expect(response.status).toBe(429);
    expect(response.headers.get('retry-after')).toBe('45');
    expect(await response.json()).toEqual({
      error: {
        code: 'RATE_LIMITED',
        message: 'Please wait 45 seconds before sending another message.',
        retryAfterSeconds: 45,
      },
    });
  });

  it('should end the session', async () => {
    await post('/users/u1/session');

    const response = await fetch(`${baseUrl}/users/u1/session`, { method: 'DELETE' });

    expect(response.status).toBe(204);
    expect(controller.hasSession('u1')).toBe(false);
  });

  it('should report health with session metrics', async () => {
    await post('/users/u1/session');

    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', sessions: { activeSessions: 1 } });
  });
});
