/**
 * Cartesia Error Classifier
 * Sorts SDK failures by what the synthesizer does next
 */

import { SynthesisFailureKind } from '../types';
import type { SynthesisFailure } from '../types';

interface CartesiaErrorFields {
  message?: unknown;
  statusCode?: unknown;
  code?: unknown;
}

function hasErrorFields(error: unknown): error is CartesiaErrorFields {
  return typeof error === 'object' && error !== null;
}

// The SDK's CartesiaError carries `statusCode`; fetch-level errors sometimes a numeric `code`
function readStatusCode(error: CartesiaErrorFields): number | undefined {
  for (const candidate of [error.statusCode, error.code]) {
    if (typeof candidate === 'number' && candidate > 0) {
      return candidate;
    }
  }
  return undefined;
}

function readMessage(error: unknown): string {
  if (typeof error === 'string' && error) {
    return error;
  }
  if (hasErrorFields(error) && typeof error.message === 'string' && error.message) {
    return error.message;
  }
  return 'Unknown error';
}

export function classifySynthesisError(error: unknown): SynthesisFailure {
  const message = readMessage(error);
  const statusCode = hasErrorFields(error) ? readStatusCode(error) : undefined;

  if (statusCode === undefined) {
    return { kind: SynthesisFailureKind.TRANSIENT, message };
  }

  if (statusCode === 401 || statusCode === 403) {
    return {
      kind: SynthesisFailureKind.CONFIG,
      message: `Cartesia rejected the API key (HTTP ${statusCode})`,
      statusCode,
    };
  }

  if (statusCode === 429) {
    return { kind: SynthesisFailureKind.RATE_LIMITED, message: 'Cartesia rate limit exceeded', statusCode };
  }

  if (statusCode >= 400 && statusCode < 500) {
    return {
      kind: SynthesisFailureKind.CONFIG,
      message: `Cartesia rejected the request: ${message}`,
      statusCode,
    };
  }

  return { kind: SynthesisFailureKind.TRANSIENT, message: `Cartesia error: ${message}`, statusCode };
}
