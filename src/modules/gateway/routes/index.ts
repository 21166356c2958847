export { createChatRouter, chatErrorHandler } from './chat.routes';
