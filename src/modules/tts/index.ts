/**
 * TTS Module Exports
 * Fallback speech synthesis behind the SpeechSynthesizer interface
 */

export { CartesiaSpeechSynthesizer, createSpeechSynthesizer } from './services';
export { SynthesisFailureKind } from './types';
export type { SpeechSynthesizer, SynthesisResult, SynthesizerMetrics, SynthesisFailure } from './types';
