/**
 * Audio format helpers
 * Parses backend-declared output formats such as `pcm_16000`,
 * `ulaw_8000` or `mp3_44100_128` without guessing unknown ones.
 */

import { BYTES_PER_SAMPLE } from '../constants/audio.constants';
import type { AudioEncoding, AudioFormat } from '../types';

/** Used until the backend declares its format */
export const UNDECLARED_AUDIO_FORMAT: AudioFormat = {
  encoding: 'opaque',
  sampleRate: null,
  channels: 1,
  label: 'undeclared',
};

/** Declared by text-only agents */
export const NO_AUDIO_FORMAT: AudioFormat = {
  encoding: 'none',
  sampleRate: null,
  channels: 0,
  label: 'none',
};

const PREFIX_ENCODINGS = new Map<string, AudioEncoding>([
  ['pcm', 'pcm_s16le'],
  ['ulaw', 'ulaw'],
  ['alaw', 'alaw'],
  ['mp3', 'mp3'],
  ['opus', 'opus'],
]);

/**
 * Parse a declared format string. Anything not recognized is kept as
 * `opaque` with the original label.
 */
export function parseAudioFormat(declared: string | null | undefined): AudioFormat {
  const label = (declared || '').trim();
  if (!label) {
    return UNDECLARED_AUDIO_FORMAT;
  }
  if (label.toLowerCase() === 'none') {
    return NO_AUDIO_FORMAT;
  }

  const [prefix, rateText, bitrateText] = label.toLowerCase().split('_');
  const encoding = PREFIX_ENCODINGS.get(prefix);
  const sampleRate = rateText !== undefined ? parseInt(rateText, 10) : NaN;

  if (!encoding || !Number.isFinite(sampleRate) || sampleRate <= 0) {
    return { encoding: 'opaque', sampleRate: null, channels: 1, label };
  }

  const format: AudioFormat = { encoding, sampleRate, channels: 1, label };
  const bitrate = bitrateText !== undefined ? parseInt(bitrateText, 10) : NaN;
  if (Number.isFinite(bitrate) && bitrate > 0) {
    format.bitrate = bitrate;
  }
  return format;
}

/**
 * Playback duration for sample-based encodings, null otherwise
 */
export function calculateDurationMs(byteLength: number, format: AudioFormat): number | null {
  if (format.sampleRate === null || format.channels <= 0) {
    return null;
  }
  if (format.encoding !== 'pcm_s16le' && format.encoding !== 'ulaw' && format.encoding !== 'alaw') {
    return null;
  }
  const bytesPerSample = BYTES_PER_SAMPLE[format.encoding];
  const samples = byteLength / bytesPerSample / format.channels;
  return Math.round((samples / format.sampleRate) * 1000);
}
