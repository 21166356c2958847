/**
 * Chat Gateway Types
 * JSON shapes returned to the chat front-end
 */

export interface ErrorPresentation {
  status: number;
  code: string;
  /** Shown to the user as-is */
  message: string;
  retryAfterSeconds?: number;
}

export interface AudioPayload {
  format: string;
  encoding: string;
  sampleRate: number | null;
  /** base64 */
  data: string;
  durationMs: number | null;
}

export interface ReplyPayload {
  text: string;
  sequence: number;
  conversationId: string | null;
  audio: AudioPayload | null;
}

export interface ChatGatewayOptions {
  greeting: string;
  dailyQuota: number;
}
