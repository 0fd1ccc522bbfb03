/**
 * Agent lifecycle controller.
 *
 * Drives `setup → run → shutdown` around a communicator resolved from the
 * registry. Teardown always cancels background work and the main task, runs
 * `shutdown`, and stops the communicator, whatever the hooks did.
 */
import { CancelledError, isCancellationError, waitAtMost } from '@/core/cancellation.js';
import { LifecycleError, toError } from '@/core/errors.js';
import type { LifecyclePhase } from '@/core/errors.js';
import { unwrap } from '@/core/result.js';
import type { LifecycleState } from '@/core/types.js';
import { parseAgentConfig } from '@/config/loader.js';
import type { AgentConfig } from '@/config/schema.js';
import type { Communicator, CommunicatorRegistry } from '@/communication/types.js';
import { createLogger } from '@/observability/logger.js';
import type { Logger } from '@/observability/logger.js';
import type { LogContext } from '@/observability/types.js';
import { createBackgroundTaskManager } from './background-tasks.js';
import type { AgentContext, Agent, AgentTimeouts, CreateAgentOptions, FrozenAgentConfig, RunOutcome } from './types.js';

const DEFAULT_TIMEOUTS: AgentTimeouts = {
  cancelGraceMs: 5_000,
  shutdownTimeoutMs: 10_000,
  communicatorStopTimeoutMs: 10_000,
};

interface MainTask {
  controller: AbortController;
  outcome: Promise<RunOutcome>;
}

// ─── Helpers ────────────────────────────────────────────────────

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Copy plain objects and arrays; anything else (functions, buffers, instances) is shared as is. */
function copyPlain(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(copyPlain);
  if (isPlainRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, nested]) => [key, copyPlain(nested)]));
  }
  return value;
}

/** Freeze plain objects and arrays, leaving other values untouched. */
function freezePlain(value: unknown): void {
  if (!Array.isArray(value) && !isPlainRecord(value)) return;
  for (const nested of Object.values(value)) {
    freezePlain(nested);
  }
  Object.freeze(value);
}

function buildConfig(options: CreateAgentOptions): FrozenAgentConfig {
  const input = options.name === undefined ? options.config : { ...options.config, name: options.name };
  const parsed = unwrap(parseAgentConfig(input));
  // Copies so freezing never reaches objects the caller still holds.
  const config: AgentConfig = {
    ...parsed,
    communicatorOptions: Object.fromEntries(
      Object.entries(parsed.communicatorOptions).map(([key, value]) => [key, copyPlain(value)]),
    ),
    serviceUrls: { ...parsed.serviceUrls },
    pluginPaths: [...parsed.pluginPaths],
  };
  freezePlain(config);
  return config;
}

async function resolveCommunicator(
  config: FrozenAgentConfig,
  registry: CommunicatorRegistry,
  logger: Logger,
): Promise<Communicator> {
  const typeId = config.communicatorType;
  if (!registry.has(typeId) && config.pluginPaths.length > 0) {
    logger.info('Communicator type not registered, scanning plugin paths', {
      component: 'agent',
      agentName: config.name,
      event: 'agent.plugin_fallback',
      communicatorType: typeId,
      pluginPaths: config.pluginPaths,
    });
    await registry.discoverPlugins({ paths: [...config.pluginPaths] });
  }

  return registry.resolve(typeId, {
    agentName: config.name,
    serviceUrls: config.serviceUrls,
    options: config.communicatorOptions,
    logger,
  });
}

// ─── Factory ────────────────────────────────────────────────────

/**
 * Create an agent in state `created`.
 *
 * @throws ConfigurationError for invalid configuration or an unknown communicator type
 * @throws DependencyError when the communicator type needs a package that is not installed
 */
export async function createAgent(options: CreateAgentOptions): Promise<Agent> {
  const config = buildConfig(options);
  const { name } = config;
  const { hooks, onRunFailed } = options;
  const timeouts: AgentTimeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
  const logger = (options.logger ?? createLogger({ level: config.logLevel, name: 'agentry' })).child({
    agentName: name,
  });

  let communicator = options.communicator ?? (await resolveCommunicator(config, options.registry, logger));
  let state: LifecycleState = 'created';
  let mainTask: MainTask | undefined;
  let starting: Promise<void> | undefined;
  let stopping: Promise<void> | undefined;

  const tasks = createBackgroundTaskManager({
    logger,
    cancelGraceMs: timeouts.cancelGraceMs,
    agentName: name,
  });

  function logContext(event: string, extra: Record<string, unknown> = {}): LogContext {
    return { component: 'agent', agentName: name, event, ...extra };
  }

  function transition(next: LifecycleState): void {
    logger.debug('Agent state changed', logContext('agent.state_changed', { from: state, to: next }));
    state = next;
  }

  function lifecycleError(phase: LifecyclePhase, message: string, cause?: Error): LifecycleError {
    return new LifecycleError({ agentName: name, phase, message, cause, context: { state } });
  }

  const context: AgentContext = {
    name,
    config,
    logger,
    get communicator() {
      return communicator;
    },
    spawn: (work, spawnOptions) => agent.spawn(work, spawnOptions),
  };

  // ─── Main Task ────────────────────────────────────────────────

  function reportRunFailure(error: Error): void {
    if (!onRunFailed) return;
    try {
      onRunFailed(error);
    } catch (callbackError) {
      logger.error(
        'onRunFailed callback threw',
        logContext('agent.run_failed_callback_error', { error: toError(callbackError).message }),
      );
    }
  }

  function scheduleRun(): MainTask {
    const controller = new AbortController();
    const outcome = Promise.resolve()
      .then(() => hooks.run(context, controller.signal))
      .then(
        (): RunOutcome => {
          if (controller.signal.aborted) return { status: 'cancelled' };
          logger.info('Agent run completed', logContext('agent.run_completed'));
          return { status: 'completed' };
        },
        (error: unknown): RunOutcome => {
          if (isCancellationError(error, controller.signal)) return { status: 'cancelled' };
          const cause = toError(error);
          if (controller.signal.aborted) {
            logger.warn('Agent run failed during cancellation', logContext('agent.run_failed', { error: cause.message }));
          } else {
            logger.error('Agent run failed', logContext('agent.run_failed', { error: cause.message }));
            reportRunFailure(cause);
          }
          return { status: 'failed', error: cause };
        },
      );
    return { controller, outcome };
  }

  // ─── Bounded Steps ────────────────────────────────────────────

  /** Run a teardown step; failures and timeouts are logged, never thrown. */
  async function attempt(
    step: string,
    event: string,
    work: () => Promise<void> | void,
    timeoutMs: number,
  ): Promise<void> {
    const guarded = Promise.resolve()
      .then(work)
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error(`Agent ${step} failed`, logContext(`${event}_failed`, {
            error: toError(error).message,
          }));
        },
      );
    const waited = await waitAtMost(guarded, timeoutMs);
    if (waited.timedOut) {
      logger.warn(`Agent ${step} timed out`, logContext(`${event}_timeout`, { timeoutMs }));
    }
  }

  // ─── Transitions ──────────────────────────────────────────────

  async function startLifecycle(): Promise<void> {
    transition('starting');
    logger.info('Agent starting', logContext('agent.starting', { communicatorType: communicator.type }));

    try {
      await communicator.start();
    } catch (error) {
      const cause = toError(error);
      transition('failed');
      logger.error('Agent communicator failed to start', logContext('agent.start_failed', {
        phase: 'communicator-start',
        error: cause.message,
      }));
      throw lifecycleError('communicator-start', 'failed to start its communicator', cause);
    }

    try {
      await hooks.setup(context);
    } catch (error) {
      const cause = toError(error);
      logger.error('Agent setup failed', logContext('agent.start_failed', { phase: 'setup', error: cause.message }));
      await tasks.cancelAll();
      await attempt('communicator stop', 'agent.communicator_stop', () => communicator.stop(), timeouts.communicatorStopTimeoutMs);
      transition('failed');
      throw lifecycleError('setup', 'failed during setup', cause);
    }

    mainTask = scheduleRun();
    transition('running');
    logger.info('Agent started', logContext('agent.started'));
  }

  async function teardown(): Promise<void> {
    transition('stopping');
    logger.info('Agent stopping', logContext('agent.stopping', { backgroundTasks: tasks.size }));

    await tasks.cancelAll();

    const run = mainTask;
    if (run) {
      run.controller.abort(new CancelledError(`Agent "${name}" is stopping`));
      const waited = await waitAtMost(run.outcome, timeouts.cancelGraceMs);
      if (waited.timedOut) {
        logger.warn('Agent run ignored cancellation', logContext('agent.run_abandoned', {
          graceMs: timeouts.cancelGraceMs,
        }));
      }
    }

    await attempt('shutdown', 'agent.shutdown', () => hooks.shutdown(context), timeouts.shutdownTimeoutMs);
    await attempt('communicator stop', 'agent.communicator_stop', () => communicator.stop(), timeouts.communicatorStopTimeoutMs);

    transition('stopped');
    logger.info('Agent stopped', logContext('agent.stopped'));
  }

  // ─── Agent ────────────────────────────────────────────────────

  const agent: Agent = {
    name,
    config,
    logger,

    get state() {
      return state;
    },

    get communicator() {
      return communicator;
    },

    get backgroundTaskCount() {
      return tasks.size;
    },

    async start() {
      switch (state) {
        case 'starting':
          throw lifecycleError('start', 'is already starting');
        case 'running':
          throw lifecycleError('start', 'is already running');
        case 'stopping':
          throw lifecycleError('start', 'is stopping');
        case 'failed':
          throw lifecycleError('start', 'failed and cannot be restarted');
        case 'created':
        case 'stopped':
          break;
      }

      const pending = startLifecycle();
      starting = pending;
      try {
        await pending;
      } finally {
        starting = undefined;
      }
    },

    async stop() {
      if (starting) {
        // A failed start is reported to the caller of start(); stop only cares where it landed.
        await starting.then(
          () => undefined,
          () => undefined,
        );
      }
      if (stopping) return stopping;
      if (state !== 'running') return;

      const pending = teardown();
      stopping = pending;
      try {
        await pending;
      } finally {
        stopping = undefined;
      }
    },

    setCommunicator(next) {
      if (state === 'starting' || state === 'running' || state === 'stopping') {
        throw lifecycleError('configure', `cannot replace its communicator while ${state}`);
      }
      logger.info('Agent communicator replaced', logContext('agent.communicator_replaced', {
        previousType: communicator.type,
        communicatorType: next.type,
      }));
      communicator = next;
    },

    spawn(work, spawnOptions) {
      // Work fanned out while tearing down is cancelled work, not a failure of its caller.
      if (state === 'stopping') {
        throw new CancelledError(`Agent "${name}" is stopping; background task not spawned`);
      }
      if (state !== 'starting' && state !== 'running') {
        throw lifecycleError('run', `cannot spawn background tasks while ${state}`);
      }
      return tasks.spawn(work, spawnOptions);
    },

    async waitForRun() {
      if (!mainTask) {
        throw lifecycleError('run', 'has not scheduled a run yet');
      }
      return mainTask.outcome;
    },
  };

  return agent;
}
