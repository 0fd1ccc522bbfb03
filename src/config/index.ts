// ─── Schemas ────────────────────────────────────────────────────
export {
  agentConfigSchema,
  handlerOverwritePolicySchema,
  logLevelSchema,
  LOG_LEVELS,
} from './schema.js';
export type { AgentConfig, AgentConfigInput, HandlerOverwritePolicy } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  applyEnvOverrides,
  deepMerge,
  loadAgentConfig,
  parseAgentConfig,
  resolveEnvVars,
} from './loader.js';
export type { LoadAgentConfigOptions } from './loader.js';
