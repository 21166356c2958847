import { describe, it, expect } from 'vitest';
import { validate, version } from 'uuid';
import { generateId } from '@/shared/utils';
import { AgentConnection } from '@/modules/agent';
import { ConversationSession } from '@/modules/conversation';
import { RateLimiter } from '@/modules/ratelimit';

describe('generateId', () => {
  it('should produce distinct UUIDv7 strings', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateId()));

    expect(ids.size).toBe(50);
    for (const id of ids) {
      expect(validate(id)).toBe(true);
      expect(version(id)).toBe(7);
    }
  });

  it('should sort in creation order', () => {
    const first = generateId();
    const second = generateId();

    expect(first < second).toBe(true);
  });

  it('should back the default connection and session ids', () => {
    const connection = new AgentConnection();
    const session = new ConversationSession({
      userId: 'user-1',
      endpoint: { url: 'wss://agent.test/convai', agentId: 'agent-1' },
      credentials: {},
      rateLimiter: new RateLimiter(),
    });

    expect(version(connection.connectionId)).toBe(7);
    expect(version(session.sessionId)).toBe(7);
  });
});
