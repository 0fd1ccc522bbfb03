/**
 * Agent lifecycle types.
 *
 * An agent moves through `created → starting → running → stopping → stopped`
 * and can be restarted from `stopped`. A failed start leaves it `failed`.
 */
import type { LifecycleState } from '@/core/types.js';
import type { AgentConfig, AgentConfigInput } from '@/config/schema.js';
import type { Logger } from '@/observability/logger.js';
import type { Communicator, CommunicatorRegistry } from '@/communication/types.js';
import type { SpawnOptions, TaskHandle, TaskWork } from './background-tasks.js';

// ─── Config ──────────────────────────────────────────────────────

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** Validated configuration, frozen once the agent owns it. */
export type FrozenAgentConfig = DeepReadonly<AgentConfig>;

// ─── Hooks ───────────────────────────────────────────────────────

/** What hooks can reach while the agent is alive. */
export interface AgentContext {
  readonly name: string;
  readonly config: FrozenAgentConfig;
  readonly logger: Logger;
  /** The communicator in use for this lifecycle. */
  readonly communicator: Communicator;
  spawn<T>(work: TaskWork<T>, options?: SpawnOptions): TaskHandle<T>;
}

/**
 * User code plugged into the lifecycle.
 *
 * `setup` runs after the communicator starts; a throw fails `start()`.
 * `run` is the main task: it should return when `signal` aborts. Returning
 * early is normal termination and the agent does not restart it.
 * `shutdown` always runs during `stop()`, after `run` was cancelled.
 */
export interface AgentHooks {
  setup(context: AgentContext): Promise<void> | void;
  run(context: AgentContext, signal: AbortSignal): Promise<void> | void;
  shutdown(context: AgentContext): Promise<void> | void;
}

/** How the most recent main task ended. */
export type RunOutcome =
  | { readonly status: 'completed' }
  | { readonly status: 'cancelled' }
  | { readonly status: 'failed'; readonly error: Error };

// ─── Agent ───────────────────────────────────────────────────────

export interface Agent {
  readonly name: string;
  readonly config: FrozenAgentConfig;
  readonly state: LifecycleState;
  readonly communicator: Communicator;
  readonly logger: Logger;
  /** Tasks spawned through `spawn` that have not settled yet. */
  readonly backgroundTaskCount: number;

  /** Start the communicator, run `setup`, then schedule `run`. */
  start(): Promise<void>;
  /** Tear down. A no-op unless the agent is starting, running or stopping. */
  stop(): Promise<void>;
  /** Replace the communicator. Not allowed while starting, running or stopping. */
  setCommunicator(communicator: Communicator): void;
  /** Track background work owned by this agent. Only while starting or running; throws CancelledError while stopping. */
  spawn<T>(work: TaskWork<T>, options?: SpawnOptions): TaskHandle<T>;
  /** Resolves when the most recent main task settles. Never rejects once one was scheduled. */
  waitForRun(): Promise<RunOutcome>;
}

export interface AgentTimeouts {
  /** How long a cancelled task (main or background) may take to settle. */
  cancelGraceMs: number;
  /** Upper bound for the `shutdown` hook. */
  shutdownTimeoutMs: number;
  /** Upper bound for `Communicator.stop()`. */
  communicatorStopTimeoutMs: number;
}

export interface CreateAgentOptions {
  /** Raw or already validated configuration. */
  config: AgentConfigInput;
  /** Overrides `config.name`. */
  name?: string;
  hooks: AgentHooks;
  registry: CommunicatorRegistry;
  /** Use this communicator instead of resolving `config.communicatorType`. */
  communicator?: Communicator;
  /** Defaults to a pino logger at `config.logLevel`. */
  logger?: Logger;
  /** Called when `run` throws for a reason other than cancellation. */
  onRunFailed?: (error: Error) => void;
  timeouts?: Partial<AgentTimeouts>;
}
