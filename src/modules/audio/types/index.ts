export type { AudioEncoding, AudioFormat, AudioBuffer, AudioAssemblyResult } from './audio.types';
