/**
 * Audio Types
 */

/**
 * Sample layouts the assembler can describe. `opaque` means the backend
 * declared something we do not interpret; `none` means no audio track.
 */
export type AudioEncoding = 'pcm_s16le' | 'ulaw' | 'alaw' | 'mp3' | 'opus' | 'opaque' | 'none';

export interface AudioFormat {
  encoding: AudioEncoding;
  /** Hz, null when the container carries its own rate or it is unknown */
  sampleRate: number | null;
  channels: number;
  /** Kbps for compressed containers */
  bitrate?: number;
  /** Format string exactly as declared by the backend */
  label: string;
}

/**
 * A finished turn's audio, ready for a delivery collaborator to transcode
 */
export interface AudioBuffer {
  data: Buffer;
  format: AudioFormat;
  byteLength: number;
  fragmentCount: number;
  /** Playback duration, only known for sample-based encodings */
  durationMs: number | null;
}

export type AudioAssemblyResult =
  | { status: 'ready'; audio: AudioBuffer }
  | { status: 'empty' }
  | { status: 'overflow'; byteLength: number };
