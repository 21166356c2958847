/**
 * Conversation Session
 * One user's conversation with the agent service over one connection.
 *
 * States: idle → connecting → active ⇄ awaiting_reply → closing → closed
 * (connecting → closed when the connection cannot be established).
 *
 * A turn completes when its final text has arrived and no audio chunk has
 * followed for `audioSettleMs`, or right away for text-only agents.
 */

import { logger, generateId } from '@/shared/utils';
import type { Logger } from '@/shared/utils';
import {
  AgentConnectError,
  agentRetryConfig,
  agentTimeoutConfig,
  classifyConnectError,
  createAgentConnection,
} from '@/modules/agent';
import type {
  AgentCredentials,
  AgentEndpoint,
  AgentEvent,
  AgentTransport,
  AgentTransportFactory,
} from '@/modules/agent';
import { AudioAssembler, UNDECLARED_AUDIO_FORMAT, parseAudioFormat } from '@/modules/audio';
import type { AudioBuffer, AudioFormat } from '@/modules/audio';
import type { RateLimiter } from '@/modules/ratelimit';
import type { SpeechSynthesizer } from '@/modules/tts';
import {
  AgentBackendError,
  ConnectionLostError,
  ConversationError,
  InvalidTurnError,
  NoReplyError,
  RateLimitedError,
  SessionEndedError,
  SessionNotActiveError,
  SessionState,
} from '../types';
import type {
  ConversationSessionHandle,
  ConversationSessionOptions,
  Reply,
  SessionMetrics,
  SessionSnapshot,
  SessionTimings,
  TurnRequest,
} from '../types';

interface PendingTurn {
  request: TurnRequest;
  /** Final text, null until `text_final` (or again after an interruption) */
  text: string | null;
  superseded: boolean;
  /** Fallback synthesis in flight; agent events other than interruptions are ignored */
  synthesizing: boolean;
  replyTimer: NodeJS.Timeout | null;
  settleTimer: NodeJS.Timeout | null;
  resolve: (reply: Reply) => void;
  reject: (error: ConversationError) => void;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ConversationSession implements ConversationSessionHandle {
  readonly sessionId: string;
  readonly userId: string;
  readonly createdAt = Date.now();

  private currentState = SessionState.IDLE;
  private transport: AgentTransport | null = null;
  private receiveLoop: Promise<void> | null = null;
  private ending: Promise<void> | null = null;
  private pending: PendingTurn | null = null;
  private lastReply: Reply | null = null;
  private nextSequence = 1;
  private conversationId: string | null = null;
  private audioFormat: AudioFormat = UNDECLARED_AUDIO_FORMAT;
  private lastActivity = Date.now();
  private closedNotified = false;

  private readonly assembler: AudioAssembler;
  private readonly endpoint: AgentEndpoint;
  private readonly credentials: AgentCredentials;
  private readonly rateLimiter: RateLimiter;
  private readonly transportFactory: AgentTransportFactory;
  private readonly synthesizer: SpeechSynthesizer | null;
  private readonly timings: SessionTimings;
  private readonly onClosed?: (session: ConversationSessionHandle) => void;
  private readonly log: Logger;

  private readonly metrics: SessionMetrics = {
    turnsSubmitted: 0,
    turnsCompleted: 0,
    turnsFailed: 0,
    audioChunks: 0,
    keepaliveProbes: 0,
    interruptions: 0,
    staleEvents: 0,
    unrecognizedEvents: 0,
  };

  constructor(options: ConversationSessionOptions) {
    this.sessionId = options.sessionId ?? generateId();
    this.userId = options.userId;
    this.endpoint = options.endpoint;
    this.credentials = options.credentials;
    this.rateLimiter = options.rateLimiter;
    this.transportFactory = options.transportFactory ?? (() => createAgentConnection());
    this.synthesizer = options.synthesizer ?? null;
    this.onClosed = options.onClosed;
    this.timings = {
      replyTimeoutMs: options.replyTimeoutMs ?? agentTimeoutConfig.replyTimeout,
      audioSettleMs: options.audioSettleMs ?? agentTimeoutConfig.audioSettle,
      connectRetries: options.connectRetries ?? agentRetryConfig.connectRetries,
      connectRetryDelayMs: options.connectRetryDelayMs ?? agentRetryConfig.connectRetryDelay,
    };
    this.log = logger.child({ sessionId: this.sessionId, userId: this.userId });
    this.assembler = new AudioAssembler({ sessionId: this.sessionId });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  /**
   * Connect to the agent service and start consuming its events.
   * Rejects with AgentConnectError, or SessionEndedError when end() won the race.
   */
  async begin(): Promise<void> {
    if (this.currentState !== SessionState.IDLE) {
      throw new SessionNotActiveError(this.currentState);
    }

    this.setState(SessionState.CONNECTING);
    this.log.info('Starting conversation session', { agentId: this.endpoint.agentId });

    let transport: AgentTransport;
    try {
      transport = await this.connectWithRetry();
    } catch (error) {
      if (this.isShuttingDown()) {
        throw new SessionEndedError('Session ended while connecting');
      }
      this.setState(SessionState.CLOSED);
      this.notifyClosed();
      throw error;
    }

    if (this.isShuttingDown()) {
      await transport.close();
      throw new SessionEndedError('Session ended while connecting');
    }

    this.setState(SessionState.ACTIVE);
    this.touch();
    this.receiveLoop = this.runReceiveLoop(transport);
    this.log.info('Conversation session active', { connectionId: transport.connectionId });
  }

  /**
   * Send one user turn and wait for the agent's reply
   */
  submitTurn(text: string): Promise<Reply> {
    try {
      return this.issueTurn(text);
    } catch (error) {
      return Promise.reject(error);
    }
  }

  /**
   * Validate and send a turn. Rejections that happen before any network
   * I/O (not active, empty text, rate limited) or while sending are thrown
   * synchronously; the returned promise settles with the turn's outcome.
   */
  issueTurn(text: string): Promise<Reply> {
    if (this.currentState !== SessionState.ACTIVE) {
      throw new SessionNotActiveError(this.currentState);
    }

    const trimmed = text.trim();
    if (!trimmed) {
      throw new InvalidTurnError('Turn text is empty');
    }

    const decision = this.rateLimiter.check(this.userId);
    if (!decision.allowed) {
      this.log.info('Turn rate limited', {
        reason: decision.reason,
        retryAfterMs: decision.retryAfterMs,
      });
      throw new RateLimitedError(decision.reason, decision.retryAfterMs);
    }

    const transport = this.transport;
    if (!transport) {
      throw new ConnectionLostError('Session has no agent connection');
    }

    const request: TurnRequest = {
      sequence: this.nextSequence++,
      text: trimmed,
      submittedAt: Date.now(),
    };

    try {
      transport.send({ type: 'user_turn', text: request.text, sequence: request.sequence });
    } catch (error) {
      this.log.warn('Sending turn failed', { sequence: request.sequence });
      throw new ConnectionLostError('Agent connection is not open', null, { cause: error });
    }

    this.rateLimiter.consume(this.userId);
    this.assembler.reset();
    this.metrics.turnsSubmitted++;
    this.touch();
    this.setState(SessionState.AWAITING_REPLY);

    this.log.info('Turn submitted', {
      sequence: request.sequence,
      textLength: request.text.length,
      remaining: decision.remaining - 1,
    });

    return new Promise<Reply>((resolve, reject) => {
      const turn: PendingTurn = {
        request,
        text: null,
        superseded: false,
        synthesizing: false,
        replyTimer: null,
        settleTimer: null,
        resolve,
        reject,
      };
      turn.replyTimer = setTimeout(() => this.handleReplyTimeout(turn), this.timings.replyTimeoutMs);
      this.pending = turn;
    });
  }

  /**
   * Close the connection. Any outstanding turn fails with SessionEndedError.
   */
  end(): Promise<void> {
    if (this.currentState === SessionState.CLOSED) {
      return Promise.resolve();
    }
    if (!this.ending) {
      this.log.info('Ending conversation session');
      this.ending = this.terminate(new SessionEndedError(), true);
    }
    return this.ending;
  }

  /**
   * Last delivered reply
   */
  currentReply(): Reply | null {
    return this.lastReply;
  }

  isIdle(now: number, idleTimeoutMs: number): boolean {
    return this.currentState === SessionState.ACTIVE && now - this.lastActivity >= idleTimeoutMs;
  }

  getSnapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      userId: this.userId,
      state: this.currentState,
      conversationId: this.conversationId,
      audioFormat: this.audioFormat.label,
      createdAt: this.createdAt,
      lastActivityAt: this.lastActivity,
      metrics: { ...this.metrics },
    };
  }

  private async connectWithRetry(): Promise<AgentTransport> {
    let attempt = 0;

    while (true) {
      const transport = this.transportFactory();
      this.transport = transport;

      try {
        await transport.connect(this.endpoint, this.credentials);
        return transport;
      } catch (error) {
        const connectError =
          error instanceof AgentConnectError
            ? error
            : new AgentConnectError(classifyConnectError(error), { cause: error });

        if (
          !connectError.retryable ||
          attempt >= this.timings.connectRetries ||
          this.isShuttingDown()
        ) {
          this.log.error('Agent connection failed', {
            type: connectError.type,
            statusCode: connectError.statusCode,
            attempts: attempt + 1,
            message: connectError.message,
          });
          throw connectError;
        }

        attempt++;
        this.log.warn('Agent connection failed, retrying', {
          type: connectError.type,
          attempt,
          delayMs: this.timings.connectRetryDelayMs,
        });
        await delay(this.timings.connectRetryDelayMs);

        if (this.isShuttingDown()) {
          throw connectError;
        }
      }
    }
  }

  private async runReceiveLoop(transport: AgentTransport): Promise<void> {
    try {
      for await (const event of transport.receive()) {
        if (this.isShuttingDown()) {
          break;
        }
        this.handleEvent(event);
      }
    } catch (error) {
      this.log.error('Agent receive loop failed', error instanceof Error ? error : { error });
    }

    if (!this.isShuttingDown()) {
      this.handleConnectionLost(transport);
    }
  }

  private handleEvent(event: AgentEvent): void {
    switch (event.type) {
      case 'init_metadata':
        this.conversationId = event.conversationId;
        this.audioFormat = parseAudioFormat(event.audioFormat);
        this.assembler.configure(this.audioFormat);
        this.log.info('Agent conversation initialized', {
          conversationId: event.conversationId,
          audioFormat: this.audioFormat.label,
          encoding: this.audioFormat.encoding,
        });
        return;

      case 'keepalive_probe':
        // Acknowledged by the connection before it reaches us
        this.metrics.keepaliveProbes++;
        return;

      case 'unrecognized':
        this.metrics.unrecognizedEvents++;
        this.log.warn('Skipping unrecognized agent event', {
          reason: event.reason,
          rawType: event.rawType,
          preview: event.preview,
        });
        return;

      case 'text_partial': {
        const turn = this.turnFor(event.turnSequence);
        if (turn) {
          turn.superseded = false;
          this.log.debug('Agent partial text', { length: event.text.length });
        }
        return;
      }

      case 'text_final': {
        const turn = this.turnFor(event.turnSequence);
        if (!turn) return;
        turn.superseded = false;
        turn.text = event.text;
        this.scheduleCompletion(turn);
        return;
      }

      case 'audio_chunk': {
        const turn = this.turnFor(event.turnSequence);
        if (!turn) return;
        turn.superseded = false;
        this.metrics.audioChunks++;
        this.assembler.append(event.audio);
        if (turn.text !== null) {
          this.scheduleCompletion(turn);
        }
        return;
      }

      case 'interruption': {
        // Also applies while synthesis runs, so the superseded text is never voiced
        const turn = this.turnFor(event.turnSequence, true);
        if (!turn) return;
        this.metrics.interruptions++;
        this.clearSettleTimer(turn);
        this.assembler.reset();
        turn.text = null;
        turn.superseded = true;
        this.log.info('Turn interrupted by agent', {
          sequence: turn.request.sequence,
          duringSynthesis: turn.synthesizing,
        });
        return;
      }

      case 'backend_error':
        this.handleBackendError(event.message, event.code, event.fatal, event.turnSequence);
        return;
    }
  }

  /**
   * The outstanding turn an event belongs to, or null when it should be
   * ignored (no turn, stale sequence, fallback synthesis in flight unless
   * `duringSynthesis`)
   */
  private turnFor(turnSequence: number | null, duringSynthesis = false): PendingTurn | null {
    const turn = this.pending;
    if (!turn || (turn.synthesizing && !duringSynthesis)) {
      return null;
    }
    if (turnSequence !== null && turnSequence !== turn.request.sequence) {
      this.metrics.staleEvents++;
      this.log.debug('Dropping event for another turn', {
        eventSequence: turnSequence,
        currentSequence: turn.request.sequence,
      });
      return null;
    }
    return turn;
  }

  private handleBackendError(
    message: string,
    code: string | null,
    fatal: boolean,
    turnSequence: number | null
  ): void {
    const error = new AgentBackendError(message, code, fatal);
    this.log.warn('Agent reported an error', { message, code, fatal });

    if (fatal) {
      this.ending = this.terminate(error, false);
      return;
    }

    const turn = this.turnFor(turnSequence);
    if (turn) {
      this.failTurn(turn, error);
    }
  }

  private scheduleCompletion(turn: PendingTurn): void {
    this.clearSettleTimer(turn);

    if (this.audioFormat.encoding === 'none') {
      this.completeTurn(turn);
      return;
    }

    turn.settleTimer = setTimeout(() => this.completeTurn(turn), this.timings.audioSettleMs);
  }

  private completeTurn(turn: PendingTurn): void {
    if (this.pending !== turn || turn.text === null || turn.superseded) {
      return;
    }
    const text = turn.text;
    const result = this.assembler.finalize();

    if (result.status === 'ready') {
      this.deliver(turn, text, result.audio);
      return;
    }

    if (result.status === 'overflow') {
      this.log.warn('Turn audio discarded after overflow', { byteLength: result.byteLength });
    }

    if (result.status === 'empty' && this.synthesizer) {
      turn.synthesizing = true;
      this.clearSettleTimer(turn);
      this.synthesizeFallback(turn, text, this.synthesizer).catch((error: unknown) => {
        this.log.error('Fallback synthesis crashed', error instanceof Error ? error : { error });
        turn.synthesizing = false;
        if (!turn.superseded) {
          this.deliver(turn, text, null);
        }
      });
      return;
    }

    this.deliver(turn, text, null);
  }

  private async synthesizeFallback(
    turn: PendingTurn,
    text: string,
    synthesizer: SpeechSynthesizer
  ): Promise<void> {
    const result = await synthesizer.synthesize(text);
    turn.synthesizing = false;
    if (this.pending !== turn) {
      return;
    }
    if (turn.superseded) {
      // Interrupted meanwhile; wait for the agent's next answer or the reply timeout
      this.log.info('Discarding synthesized audio for an interrupted turn', {
        sequence: turn.request.sequence,
      });
      return;
    }

    if (result.status === 'failed') {
      this.deliver(turn, text, null);
      return;
    }

    this.assembler.appendComplete(result.audio, result.format);
    const assembled = this.assembler.finalize();
    this.deliver(turn, text, assembled.status === 'ready' ? assembled.audio : null);
  }

  private handleReplyTimeout(turn: PendingTurn): void {
    if (this.pending !== turn) {
      return;
    }

    if (turn.text !== null) {
      this.log.warn('Reply audio incomplete at timeout, delivering text only', {
        sequence: turn.request.sequence,
        fragments: this.assembler.fragmentCount,
      });
      this.deliver(turn, turn.text, null);
      return;
    }

    this.log.warn('No reply before timeout', {
      sequence: turn.request.sequence,
      timeoutMs: this.timings.replyTimeoutMs,
    });
    this.failTurn(turn, new NoReplyError(this.timings.replyTimeoutMs));
  }

  private deliver(turn: PendingTurn, text: string, audio: AudioBuffer | null): void {
    if (this.pending !== turn) {
      return;
    }

    const reply: Reply = {
      text,
      audio,
      sequence: turn.request.sequence,
      conversationId: this.conversationId,
    };

    this.finishTurn(turn);
    this.lastReply = reply;
    this.metrics.turnsCompleted++;

    this.log.info('Turn completed', {
      sequence: reply.sequence,
      textLength: text.length,
      audioBytes: audio ? audio.byteLength : 0,
      latencyMs: Date.now() - turn.request.submittedAt,
    });
    turn.resolve(reply);
  }

  private failTurn(turn: PendingTurn, error: ConversationError): void {
    if (this.pending !== turn) {
      return;
    }
    this.finishTurn(turn);
    this.metrics.turnsFailed++;
    this.log.info('Turn failed', { sequence: turn.request.sequence, code: error.code });
    turn.reject(error);
  }

  /**
   * Clear timers and partial state; back to `active` unless closing
   */
  private finishTurn(turn: PendingTurn): void {
    if (turn.replyTimer) {
      clearTimeout(turn.replyTimer);
      turn.replyTimer = null;
    }
    this.clearSettleTimer(turn);
    this.pending = null;
    this.assembler.reset();
    this.touch();

    if (this.currentState === SessionState.AWAITING_REPLY) {
      this.setState(SessionState.ACTIVE);
    }
  }

  private clearSettleTimer(turn: PendingTurn): void {
    if (turn.settleTimer) {
      clearTimeout(turn.settleTimer);
      turn.settleTimer = null;
    }
  }

  private handleConnectionLost(transport: AgentTransport): void {
    const info = transport.closeInfo;
    this.log.warn('Agent connection lost', {
      code: info?.code ?? null,
      reason: info?.reason ?? '',
    });

    this.setState(SessionState.CLOSING);
    if (this.pending) {
      this.failTurn(
        this.pending,
        new ConnectionLostError(
          info?.reason ? `Agent connection lost: ${info.reason}` : 'Agent connection lost',
          info?.code ?? null
        )
      );
    }
    this.setState(SessionState.CLOSED);
    this.notifyClosed();

    // No-op when the remote side already closed it
    transport.close().catch((error: unknown) => {
      this.log.warn('Error closing agent connection', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  /**
   * Fail the outstanding turn, close the connection and reach `closed`.
   * `awaitLoop` is false when called from inside the receive loop.
   */
  private async terminate(turnError: ConversationError, awaitLoop: boolean): Promise<void> {
    this.setState(SessionState.CLOSING);

    if (this.pending) {
      this.failTurn(this.pending, turnError);
    }

    const transport = this.transport;
    if (transport) {
      try {
        await transport.close();
      } catch (error) {
        this.log.warn('Error closing agent connection', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (awaitLoop && this.receiveLoop) {
      await this.receiveLoop;
    }

    this.setState(SessionState.CLOSED);
    this.notifyClosed();
  }

  private isShuttingDown(): boolean {
    return this.currentState === SessionState.CLOSING || this.currentState === SessionState.CLOSED;
  }

  private notifyClosed(): void {
    if (this.closedNotified) {
      return;
    }
    this.closedNotified = true;
    this.log.info('Conversation session closed', { metrics: this.metrics });
    if (this.onClosed) {
      this.onClosed(this);
    }
  }

  private touch(): void {
    this.lastActivity = Date.now();
  }

  private setState(next: SessionState): void {
    if (this.currentState === next) {
      return;
    }
    this.log.debug('Session state change', { from: this.currentState, to: next });
    this.currentState = next;
  }
}
