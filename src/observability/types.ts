// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component: string;
  agentName?: string;
  /** Machine-readable event name, e.g. `agent.started`. */
  event?: string;
  error?: string;
  [key: string]: unknown;
}
