// Process runner
export { runAgent } from './run-agent.js';
export type { RunAgentOptions, SignalSource } from './run-agent.js';
