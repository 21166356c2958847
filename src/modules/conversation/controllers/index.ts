export { ConversationController } from './conversation.controller';
