/**
 * Chat Gateway Module Exports
 */

export { createChatRouter, chatErrorHandler } from './routes';
export { presentReply, presentTurnError, presentBeginError } from './utils';
export type { ChatGatewayOptions, ErrorPresentation, ReplyPayload, AudioPayload } from './types';
