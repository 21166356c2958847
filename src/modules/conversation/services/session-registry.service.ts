/**
 * Session Registry Service
 * Owns the user → session map. Every operation for one user runs in that
 * user's lane, so a begin/end can never interleave with another operation
 * touching the same half-built or half-torn-down session.
 */

import { logger } from '@/shared/utils';
import { isTest } from '@/shared/config';
import { agentTimeoutConfig } from '@/modules/agent';
import type { AgentCredentials, AgentEndpoint, AgentTransportFactory } from '@/modules/agent';
import { RateLimiter } from '@/modules/ratelimit';
import type { SpeechSynthesizer } from '@/modules/tts';
import { ConversationSession } from './conversation-session';
import { KeyedMutex } from '../utils';
import { SessionEndedError, SessionNotFoundError, SessionState } from '../types';
import type { ConversationSessionHandle, Reply, SessionSnapshot, SessionTimings } from '../types';

export interface SessionRegistryOptions {
  endpoint: AgentEndpoint;
  credentials: AgentCredentials;
  rateLimiter?: RateLimiter;
  transportFactory?: AgentTransportFactory;
  synthesizer?: SpeechSynthesizer | null;
  timings?: Partial<SessionTimings>;
  idleTimeoutMs?: number;
  cleanupIntervalMs?: number;
  shutdownTimeoutPerSessionMs?: number;
  /** Defaults to on outside test mode */
  startCleanupTimer?: boolean;
}

export interface RegistryMetrics {
  activeSessions: number;
  awaitingReply: number;
  peakConcurrentSessions: number;
  totalSessionsCreated: number;
  totalSessionsClosed: number;
  connectFailures: number;
  idleSessionsEnded: number;
  rateLimitedUsers: number;
  isShuttingDown: boolean;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, ConversationSession>();
  /** Sessions that were ever registered; only these count as closed */
  private readonly registered = new WeakSet<ConversationSessionHandle>();
  private readonly lanes = new KeyedMutex();
  private readonly rateLimiter: RateLimiter;
  private readonly idleTimeoutMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly shutdownTimeoutPerSessionMs: number;
  private cleanupTimer?: NodeJS.Timeout;
  private isShuttingDown = false;

  private peakConcurrentSessions = 0;
  private totalSessionsCreated = 0;
  private totalSessionsClosed = 0;
  private connectFailures = 0;
  private idleSessionsEnded = 0;

  constructor(private readonly options: SessionRegistryOptions) {
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.idleTimeoutMs = options.idleTimeoutMs ?? agentTimeoutConfig.sessionIdleTimeout;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? agentTimeoutConfig.cleanupInterval;
    this.shutdownTimeoutPerSessionMs =
      options.shutdownTimeoutPerSessionMs ?? agentTimeoutConfig.shutdownTimeoutPerSession;

    // Don't start cleanup timer in test mode (prevents tests from hanging)
    if (options.startCleanupTimer ?? !isTest) {
      this.startCleanupTimer();
    }
  }

  /**
   * Start a session for `userId`, tearing down any prior one first
   */
  begin(userId: string): Promise<ConversationSession> {
    return this.lanes.runExclusive(userId, async () => {
      if (this.isShuttingDown) {
        throw new SessionEndedError('Service is shutting down');
      }

      const prior = this.sessions.get(userId);
      if (prior) {
        logger.info('Replacing existing session', { userId, sessionId: prior.sessionId });
        this.sessions.delete(userId);
        await prior.end();
      }

      const session = new ConversationSession({
        userId,
        endpoint: this.options.endpoint,
        credentials: this.options.credentials,
        rateLimiter: this.rateLimiter,
        transportFactory: this.options.transportFactory,
        synthesizer: this.options.synthesizer,
        ...this.options.timings,
        onClosed: (closed) => this.handleSessionClosed(closed),
      });
      this.totalSessionsCreated++;

      try {
        await session.begin();
      } catch (error) {
        this.connectFailures++;
        throw error;
      }

      // shutdown() ran while the connect was pending and will not see this session
      if (this.isShuttingDown) {
        logger.info('Closing session connected during shutdown', {
          userId,
          sessionId: session.sessionId,
        });
        await session.end();
        throw new SessionEndedError('Service is shutting down');
      }

      this.sessions.set(userId, session);
      this.registered.add(session);
      this.peakConcurrentSessions = Math.max(this.peakConcurrentSessions, this.sessions.size);
      return session;
    });
  }

  /**
   * Submit a turn for `userId`. The lane is held only while the turn is
   * issued; the wait for the reply happens outside it.
   */
  async submitTurn(userId: string, text: string): Promise<Reply> {
    const { reply } = await this.lanes.runExclusive(userId, () => {
      const session = this.sessions.get(userId);
      if (!session) {
        throw new SessionNotFoundError(userId);
      }
      return { reply: session.issueTurn(text) };
    });
    return reply;
  }

  /**
   * End the user's session. Resolves false when there was none.
   */
  end(userId: string): Promise<boolean> {
    return this.lanes.runExclusive(userId, async () => {
      const session = this.sessions.get(userId);
      if (!session) {
        return false;
      }
      this.sessions.delete(userId);
      await session.end();
      return true;
    });
  }

  get(userId: string): ConversationSession | undefined {
    return this.sessions.get(userId);
  }

  has(userId: string): boolean {
    return this.sessions.has(userId);
  }

  size(): number {
    return this.sessions.size;
  }

  getMetrics(): RegistryMetrics {
    let awaitingReply = 0;
    for (const session of this.sessions.values()) {
      if (session.state === SessionState.AWAITING_REPLY) {
        awaitingReply++;
      }
    }

    return {
      activeSessions: this.sessions.size,
      awaitingReply,
      peakConcurrentSessions: this.peakConcurrentSessions,
      totalSessionsCreated: this.totalSessionsCreated,
      totalSessionsClosed: this.totalSessionsClosed,
      connectFailures: this.connectFailures,
      idleSessionsEnded: this.idleSessionsEnded,
      rateLimitedUsers: this.rateLimiter.size(),
      isShuttingDown: this.isShuttingDown,
    };
  }

  listSessions(): SessionSnapshot[] {
    return Array.from(this.sessions.values(), (session) => session.getSnapshot());
  }

  /**
   * End sessions idle past the timeout and drop idle rate-limit state
   */
  async sweepIdle(now = Date.now()): Promise<number> {
    const idleUsers = Array.from(this.sessions.values())
      .filter((session) => session.isIdle(now, this.idleTimeoutMs))
      .map((session) => session.userId);

    const results = await Promise.all(
      idleUsers.map((userId) =>
        this.lanes.runExclusive(userId, async () => {
          const session = this.sessions.get(userId);
          // Re-check inside the lane; a turn or a new begin may have happened
          if (!session || !session.isIdle(now, this.idleTimeoutMs)) {
            return false;
          }
          this.sessions.delete(userId);
          await session.end();
          return true;
        })
      )
    );

    const ended = results.filter(Boolean).length;
    this.idleSessionsEnded += ended;
    const purged = this.rateLimiter.purgeIdle();

    if (ended > 0 || purged > 0) {
      logger.info('Idle cleanup completed', {
        sessionsEnded: ended,
        rateLimitStatesPurged: purged,
        activeSessions: this.sessions.size,
      });
    }
    return ended;
  }

  /**
   * End every session, each bounded by the per-session shutdown timeout
   */
  async shutdown(): Promise<void> {
    logger.info('Session registry shutdown initiated', { activeSessions: this.sessions.size });
    this.isShuttingDown = true;

    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }

    const shutdownPromises = Array.from(this.sessions.values()).map(async (session) => {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(
          () => reject(new Error('Shutdown timeout')),
          this.shutdownTimeoutPerSessionMs
        );
      });

      try {
        await Promise.race([session.end(), timeout]);
      } catch (error) {
        logger.error('Failed to close session during shutdown', {
          sessionId: session.sessionId,
          userId: session.userId,
          error: error instanceof Error ? error.message : String(error),
        });
      } finally {
        clearTimeout(timer);
      }
    });

    await Promise.allSettled(shutdownPromises);
    this.sessions.clear();

    logger.info('Session registry shutdown complete', {
      totalSessionsCreated: this.totalSessionsCreated,
      totalSessionsClosed: this.totalSessionsClosed,
    });
  }

  private handleSessionClosed(session: ConversationSessionHandle): void {
    if (!this.registered.has(session)) {
      // begin() failed or was abandoned
      return;
    }
    this.registered.delete(session);
    this.totalSessionsClosed++;
    if (this.sessions.get(session.userId) === session) {
      // Closed on its own (connection lost, fatal backend error)
      this.sessions.delete(session.userId);
      logger.info('Removed self-closed session', {
        userId: session.userId,
        sessionId: session.sessionId,
      });
    }
  }

  private startCleanupTimer(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
    }

    this.cleanupTimer = setInterval(() => {
      this.sweepIdle().catch((error: unknown) => {
        logger.error('Idle cleanup failed', error instanceof Error ? error : { error });
      });
    }, this.cleanupIntervalMs);

    logger.info('Session cleanup timer started', { intervalMs: this.cleanupIntervalMs });
  }
}
