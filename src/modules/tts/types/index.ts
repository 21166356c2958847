export { SynthesisFailureKind } from './error.types';
export type { SynthesisFailure } from './error.types';
export type { SpeechSynthesizer, SynthesisResult, SynthesizerMetrics } from './speech.types';
