// ─── Lifecycle ──────────────────────────────────────────────────

/**
 * Agent lifecycle state.
 * `created → starting → running → stopping → stopped`, with `failed` reachable from `starting`.
 */
export type LifecycleState =
  | 'created'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'failed';

// ─── Payloads ───────────────────────────────────────────────────

/** Structured parameters carried by requests and notifications. */
export type MessageParams = Record<string, unknown>;
