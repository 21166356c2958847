/**
 * Audio Assembler
 * Collects one turn's audio fragments in arrival order and produces a
 * single buffer tagged with the declared format. Performs no transcoding.
 */

import { logger } from '@/shared/utils';
import { FRAGMENT_LOG_FREQUENCY, MAX_TURN_AUDIO_BYTES } from '../constants/audio.constants';
import { calculateDurationMs, UNDECLARED_AUDIO_FORMAT } from '../utils';
import type { AudioAssemblyResult, AudioFormat } from '../types';

export interface AudioAssemblerOptions {
  format?: AudioFormat;
  maxBytes?: number;
  /** Correlation id for logs */
  sessionId?: string;
}

export class AudioAssembler {
  private fragments: Buffer[] = [];
  private totalBytes = 0;
  private overflowed = false;
  private declaredFormat: AudioFormat;
  private singleBufferFormat: AudioFormat | null = null;
  private readonly maxBytes: number;
  private readonly sessionId?: string;

  constructor(options: AudioAssemblerOptions = {}) {
    this.declaredFormat = options.format ?? UNDECLARED_AUDIO_FORMAT;
    this.maxBytes = options.maxBytes ?? MAX_TURN_AUDIO_BYTES;
    this.sessionId = options.sessionId;
  }

  /**
   * Format the assembled buffer will be declared with
   */
  get format(): AudioFormat {
    return this.singleBufferFormat ?? this.declaredFormat;
  }

  get fragmentCount(): number {
    return this.fragments.length;
  }

  get byteLength(): number {
    return this.totalBytes;
  }

  /**
   * Change the declared format (from session negotiation). Takes effect for
   * the next assembled buffer.
   */
  configure(format: AudioFormat): void {
    this.declaredFormat = format;
  }

  /**
   * Discard everything gathered for the current turn
   */
  reset(): void {
    this.fragments = [];
    this.totalBytes = 0;
    this.overflowed = false;
    this.singleBufferFormat = null;
  }

  /**
   * Append one fragment. Returns false once the turn exceeded maxBytes;
   * the turn then finalizes as `overflow`.
   */
  append(fragment: Uint8Array): boolean {
    if (this.overflowed) {
      return false;
    }
    if (fragment.length === 0) {
      return true;
    }

    if (this.totalBytes + fragment.length > this.maxBytes) {
      this.overflowed = true;
      logger.warn('Turn audio exceeded maximum size, dropping remainder', {
        sessionId: this.sessionId,
        byteLength: this.totalBytes,
        maxBytes: this.maxBytes,
      });
      return false;
    }

    this.fragments.push(Buffer.from(fragment));
    this.totalBytes += fragment.length;

    if (this.fragments.length % FRAGMENT_LOG_FREQUENCY === 0) {
      logger.debug('Audio fragments buffered', {
        sessionId: this.sessionId,
        fragments: this.fragments.length,
        byteLength: this.totalBytes,
      });
    }
    return true;
  }

  /**
   * Replace the turn's audio with one complete buffer (speech synthesis
   * fallback, where audio is not streamed).
   */
  appendComplete(buffer: Uint8Array, format?: AudioFormat): void {
    this.reset();
    this.singleBufferFormat = format ?? null;
    this.append(buffer);
  }

  /**
   * Concatenate fragments in arrival order
   */
  finalize(): AudioAssemblyResult {
    if (this.overflowed) {
      return { status: 'overflow', byteLength: this.totalBytes };
    }
    if (this.fragments.length === 0) {
      return { status: 'empty' };
    }

    const format = this.format;
    const data = Buffer.concat(this.fragments, this.totalBytes);

    return {
      status: 'ready',
      audio: {
        data,
        format,
        byteLength: data.length,
        fragmentCount: this.fragments.length,
        durationMs: calculateDurationMs(data.length, format),
      },
    };
  }
}
