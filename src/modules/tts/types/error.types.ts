/**
 * Speech Synthesis Failure Types
 */

export enum SynthesisFailureKind {
  /** Blank or over-long transcript; nothing was sent */
  INVALID_TEXT = 'invalid_text',
  /** Key or request rejected; every turn fails the same way until the config changes */
  CONFIG = 'config',
  /** Provider returned 429; the synthesizer backs off */
  RATE_LIMITED = 'rate_limited',
  /** Network, timeout, server error or an empty response */
  TRANSIENT = 'transient',
}

/**
 * Why a fallback synthesis produced no audio. The session delivers the
 * reply as text either way.
 */
export interface SynthesisFailure {
  kind: SynthesisFailureKind;
  message: string;
  statusCode?: number;
}
