/**
 * Audio Constants
 * Shared values for assembling agent reply audio
 */

/**
 * Upper bound for one turn's assembled audio (8 MB, roughly 4 minutes of 16kHz PCM)
 */
export const MAX_TURN_AUDIO_BYTES = 8 * 1024 * 1024;

/**
 * Bytes per sample for each PCM-style encoding
 */
export const BYTES_PER_SAMPLE: Record<'pcm_s16le' | 'ulaw' | 'alaw', number> = {
  pcm_s16le: 2,
  ulaw: 1,
  alaw: 1,
};

/**
 * Log every Nth appended fragment
 */
export const FRAGMENT_LOG_FREQUENCY = 50;
