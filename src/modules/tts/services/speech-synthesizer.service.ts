/**
 * Speech Synthesizer Service
 * Cartesia `tts.bytes` request/response synthesis, the fallback audio
 * source for turns where the agent streams no audio.
 */

import { CartesiaClient } from '@cartesia/cartesia-js';
import { logger } from '@/shared/utils';
import { parseAudioFormat } from '@/modules/audio';
import { cartesiaConfig } from '../config';
import { classifySynthesisError, collectAudioBytes } from '../utils';
import { SynthesisFailureKind } from '../types';
import type {
  SynthesisFailure,
  SpeechSynthesizer,
  SynthesisResult,
  SynthesizerMetrics,
} from '../types';

export interface CartesiaSynthesizerOptions {
  apiKey?: string;
  rateLimitBackoffMs?: number;
  now?: () => number;
}

export class CartesiaSpeechSynthesizer implements SpeechSynthesizer {
  private client: CartesiaClient | null = null;
  private backoffUntil = 0;
  private readonly apiKey: string;
  private readonly rateLimitBackoffMs: number;
  private readonly now: () => number;
  private readonly metrics: SynthesizerMetrics = {
    requests: 0,
    failures: 0,
    skipped: 0,
    bytesSynthesized: 0,
  };

  constructor(options: CartesiaSynthesizerOptions = {}) {
    this.apiKey = options.apiKey ?? cartesiaConfig.apiKey;
    this.rateLimitBackoffMs = options.rateLimitBackoffMs ?? cartesiaConfig.rateLimitBackoffMs;
    this.now = options.now ?? Date.now;
  }

  async synthesize(text: string): Promise<SynthesisResult> {
    const transcript = text.trim();

    if (!transcript) {
      return this.fail({ kind: SynthesisFailureKind.INVALID_TEXT, message: 'Empty text' });
    }

    if (transcript.length > cartesiaConfig.maxTextLength) {
      return this.fail({
        kind: SynthesisFailureKind.INVALID_TEXT,
        message: `Text exceeds ${cartesiaConfig.maxTextLength} characters`,
      });
    }

    const waitMs = this.backoffUntil - this.now();
    if (waitMs > 0) {
      this.metrics.skipped++;
      logger.debug('Skipping speech synthesis during rate-limit back-off', { waitMs });
      return {
        status: 'failed',
        error: { kind: SynthesisFailureKind.RATE_LIMITED, message: `Backing off for ${waitMs}ms` },
      };
    }

    this.metrics.requests++;
    const startTime = this.now();

    try {
      const response: unknown = await this.getClient().tts.bytes(
        {
          modelId: cartesiaConfig.model,
          transcript,
          voice: { mode: 'id', id: cartesiaConfig.voiceId },
          language: cartesiaConfig.language,
          outputFormat: {
            container: 'raw',
            encoding: cartesiaConfig.encoding,
            sampleRate: cartesiaConfig.sampleRate,
          },
        },
        { timeoutInSeconds: cartesiaConfig.requestTimeoutSeconds }
      );

      const audio = await collectAudioBytes(response);
      if (audio.length === 0) {
        return this.fail({ kind: SynthesisFailureKind.TRANSIENT, message: 'Synthesis returned no audio' });
      }

      this.metrics.bytesSynthesized += audio.length;
      logger.info('Fallback speech synthesized', {
        textLength: transcript.length,
        bytes: audio.length,
        durationMs: this.now() - startTime,
      });

      return {
        status: 'ok',
        audio,
        format: parseAudioFormat(`pcm_${cartesiaConfig.sampleRate}`),
      };
    } catch (error) {
      return this.fail(classifySynthesisError(error));
    }
  }

  getMetrics(): SynthesizerMetrics {
    return { ...this.metrics };
  }

  private fail(error: SynthesisFailure): SynthesisResult {
    this.metrics.failures++;
    const meta = { kind: error.kind, statusCode: error.statusCode, message: error.message };

    if (error.kind === SynthesisFailureKind.RATE_LIMITED) {
      this.backoffUntil = this.now() + this.rateLimitBackoffMs;
      logger.warn('Speech synthesis rate limited', { ...meta, backoffMs: this.rateLimitBackoffMs });
    } else if (error.kind === SynthesisFailureKind.CONFIG) {
      logger.error('Speech synthesis failed', meta);
    } else {
      logger.warn('Speech synthesis failed', meta);
    }
    return { status: 'failed', error };
  }

  private getClient(): CartesiaClient {
    if (!this.client) {
      this.client = new CartesiaClient({ apiKey: this.apiKey });
    }
    return this.client;
  }
}

/**
 * Synthesizer used by sessions, or null when the fallback is disabled
 */
export function createSpeechSynthesizer(): SpeechSynthesizer | null {
  if (!cartesiaConfig.enabled || !cartesiaConfig.apiKey) {
    return null;
  }
  return new CartesiaSpeechSynthesizer();
}
