/**
 * Zod schemas for validating agent configuration.
 * `AgentConfig` is the validated value the agent consumes; `AgentConfigInput`
 * is what callers may pass before defaults are applied.
 */
import { z } from 'zod';

// ─── Log Level ──────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

/** Accepts any casing ("INFO", "Info") and normalizes to lower case. */
export const logLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toLowerCase() : value),
  z.enum(LOG_LEVELS),
);

// ─── Agent Config ───────────────────────────────────────────────

/**
 * Schema for a single agent's configuration.
 * Service URLs map logical service names to transport addresses.
 */
export const agentConfigSchema = z.object({
  name: z.string().min(1, 'Agent name cannot be empty'),
  communicatorType: z.string().min(1, 'Communicator type cannot be empty').default('http'),
  communicatorOptions: z.record(z.unknown()).default({}),
  serviceUrls: z.record(z.string().min(1, 'Service URL cannot be empty')).default({}),
  logLevel: logLevelSchema.default('info'),
  /** Directories scanned for communicator plugins when the type is not registered. */
  pluginPaths: z.array(z.string().min(1)).default([]),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type AgentConfigInput = z.input<typeof agentConfigSchema>;

// ─── Handler Overwrite Policy ───────────────────────────────────

/**
 * What happens when a handler is registered twice for the same method.
 * Shared by every communicator's options schema.
 */
export const handlerOverwritePolicySchema = z.enum(['warn', 'error', 'allow']).default('warn');

export type HandlerOverwritePolicy = z.infer<typeof handlerOverwritePolicySchema>;
