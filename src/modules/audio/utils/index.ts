export {
  parseAudioFormat,
  calculateDurationMs,
  UNDECLARED_AUDIO_FORMAT,
  NO_AUDIO_FORMAT,
} from './audio-format';
