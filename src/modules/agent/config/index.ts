export { agentConfig } from './agent.config';
export { agentTimeoutConfig } from './timeout.config';
export { agentRetryConfig } from './retry.config';
