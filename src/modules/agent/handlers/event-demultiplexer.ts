/**
 * Event Demultiplexer
 * Decodes one raw agent frame into the closed AgentEvent union.
 *
 * Never throws: malformed or unknown frames become `unrecognized` events
 * so one bad frame cannot end a healthy turn.
 */

import type { RawData } from 'ws';
import type {
  AgentEvent,
  BackendErrorEvent,
  UnrecognizedEvent,
  UnrecognizedReason,
} from '../types';

const PREVIEW_CHARS = 120;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

type WireObject = Record<string, unknown>;

function isWireObject(value: unknown): value is WireObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: WireObject, key: string): string | null {
  const value = source[key];
  return typeof value === 'string' ? value : null;
}

function readSequence(source: WireObject): number | null {
  const value = source.turn_sequence;
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

function unrecognized(
  reason: UnrecognizedReason,
  raw: string,
  rawType: string | null = null
): UnrecognizedEvent {
  return { type: 'unrecognized', reason, rawType, preview: preview(raw) };
}

/**
 * Normalize ws RawData (Buffer, ArrayBuffer or fragments) into one Buffer
 */
export function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

function decodeBackendError(frame: WireObject): BackendErrorEvent {
  const rawCode = frame.code;
  const code =
    typeof rawCode === 'string' || typeof rawCode === 'number' ? String(rawCode) : null;
  const message = readString(frame, 'message') || code || 'Unknown agent error';

  return {
    type: 'backend_error',
    message,
    code,
    fatal: frame.fatal === true,
    turnSequence: readSequence(frame),
  };
}

/**
 * Decode a raw frame. Binary frames are audio fragments; text frames are
 * JSON objects tagged by `type`.
 */
export function decodeAgentEvent(raw: RawData | string, isBinary = false): AgentEvent {
  if (isBinary && typeof raw !== 'string') {
    const audio = rawDataToBuffer(raw);
    if (audio.length === 0) {
      return unrecognized('invalid_payload', '<empty binary frame>', 'audio_chunk');
    }
    return { type: 'audio_chunk', audio, turnSequence: null };
  }

  const text = typeof raw === 'string' ? raw : rawDataToBuffer(raw).toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return unrecognized('malformed_json', text);
  }

  if (!isWireObject(parsed)) {
    return unrecognized('not_an_object', text);
  }

  const rawType = readString(parsed, 'type');
  const eventType = (rawType || '').trim().toLowerCase();

  switch (eventType) {
    case 'init_metadata':
      return {
        type: 'init_metadata',
        conversationId: readString(parsed, 'conversation_id'),
        audioFormat: readString(parsed, 'agent_output_audio_format'),
      };

    case 'text_partial':
    case 'text_final': {
      const value = readString(parsed, 'text');
      if (value === null) {
        return unrecognized('invalid_payload', text, rawType);
      }
      const turnSequence = readSequence(parsed);
      return eventType === 'text_final'
        ? { type: 'text_final', text: value, turnSequence }
        : { type: 'text_partial', text: value, turnSequence };
    }

    case 'audio_chunk': {
      const encoded = (readString(parsed, 'audio_base64') || '').trim();
      if (!encoded || !BASE64_PATTERN.test(encoded)) {
        return unrecognized('invalid_payload', text, rawType);
      }
      return {
        type: 'audio_chunk',
        audio: Buffer.from(encoded, 'base64'),
        turnSequence: readSequence(parsed),
      };
    }

    case 'interruption':
      return { type: 'interruption', turnSequence: readSequence(parsed) };

    case 'keepalive_probe': {
      const id = parsed.id;
      if (typeof id === 'string' && id.length > 0) {
        return { type: 'keepalive_probe', id };
      }
      if (typeof id === 'number' && Number.isFinite(id)) {
        return { type: 'keepalive_probe', id };
      }
      return unrecognized('invalid_payload', text, rawType);
    }

    case 'backend_error':
      return decodeBackendError(parsed);

    default:
      return unrecognized('unknown_type', text, rawType);
  }
}
