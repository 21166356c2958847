/**
 * Speech Synthesis Types
 */

import type { AudioFormat } from '@/modules/audio';
import type { SynthesisFailure } from './error.types';

export type SynthesisResult =
  | { status: 'ok'; audio: Buffer; format: AudioFormat }
  | { status: 'failed'; error: SynthesisFailure };

/**
 * Request/response speech synthesis. Never rejects; failures come back
 * as `{ status: 'failed' }`.
 */
export interface SpeechSynthesizer {
  synthesize(text: string): Promise<SynthesisResult>;
}

export interface SynthesizerMetrics {
  requests: number;
  failures: number;
  /** Calls answered without a request during a rate-limit back-off */
  skipped: number;
  bytesSynthesized: number;
}
