/**
 * Audio Module Exports
 */

export { AudioAssembler } from './services';
export type { AudioAssemblerOptions } from './services';
export {
  parseAudioFormat,
  calculateDurationMs,
  UNDECLARED_AUDIO_FORMAT,
  NO_AUDIO_FORMAT,
} from './utils';
export type { AudioEncoding, AudioFormat, AudioBuffer, AudioAssemblyResult } from './types';
