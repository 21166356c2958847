export { AgentConnection, createAgentConnection, buildAgentUrl } from './agent-connection.service';
