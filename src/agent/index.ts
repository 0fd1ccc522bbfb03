// Agent lifecycle
export { createAgent } from './agent.js';
export type {
  Agent,
  AgentContext,
  AgentHooks,
  AgentTimeouts,
  CreateAgentOptions,
  FrozenAgentConfig,
  RunOutcome,
} from './types.js';

export { createBackgroundTaskManager } from './background-tasks.js';
export type {
  BackgroundTaskManager,
  BackgroundTaskManagerOptions,
  SpawnOptions,
  TaskHandle,
  TaskOutcome,
  TaskStatus,
  TaskWork,
} from './background-tasks.js';
