export { createCommandAgent, agentEnvironment } from './command-agent.js';
export type { AgentProcess, SpawnAgentProcess, CommandAgentOptions } from './command-agent.js';
