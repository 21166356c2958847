export { ConversationSession } from './conversation-session';
export { SessionRegistry } from './session-registry.service';
export type { SessionRegistryOptions, RegistryMetrics } from './session-registry.service';
