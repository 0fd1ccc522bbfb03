/**
 * Agent runner — owns the "who calls stop()" duty for a process.
 *
 * Starts the agent, waits for a termination signal (or a failed main task),
 * then stops it and reports how the main task ended.
 */
import type { Agent, RunOutcome } from '@/agent/types.js';
import { waitAtMost } from '@/core/cancellation.js';
import type { Logger } from '@/observability/logger.js';

type SignalListener = (signal: NodeJS.Signals) => void;

/** The part of `process` the runner needs. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface RunAgentOptions {
  /** Defaults to SIGINT and SIGTERM. */
  signals?: NodeJS.Signals[];
  /** Stop as soon as the main task fails. Defaults to true. */
  stopOnRunFailure?: boolean;
  /** Defaults to `process`. */
  processLike?: SignalSource;
  /** Defaults to the agent's logger. */
  logger?: Logger;
}

/**
 * Run `agent` until a signal arrives or its main task fails, then stop it.
 * Rejects only when `start()` fails; listeners are removed either way.
 */
export async function runAgent(agent: Agent, options: RunAgentOptions = {}): Promise<RunOutcome> {
  const {
    signals = ['SIGINT', 'SIGTERM'],
    stopOnRunFailure = true,
    processLike = process,
    logger = agent.logger,
  } = options;

  let requestStop: (reason: string) => void = () => undefined;
  const stopRequested = new Promise<string>((resolve) => {
    requestStop = resolve;
  });

  const onSignal: SignalListener = (signal) => {
    logger.info('Received signal, stopping agent', {
      component: 'runner',
      agentName: agent.name,
      event: 'runner.signal',
      signal,
    });
    requestStop(signal);
  };

  for (const signal of signals) {
    processLike.on(signal, onSignal);
  }

  try {
    await agent.start();

    void agent.waitForRun().then((outcome) => {
      if (outcome.status === 'failed' && stopOnRunFailure) {
        requestStop('run-failed');
      }
    });

    const reason = await stopRequested;
    await agent.stop();
    logger.info('Agent runner finished', {
      component: 'runner',
      agentName: agent.name,
      event: 'runner.finished',
      reason,
    });

    // An abandoned main task never settles; it was cancelled as far as the runner is concerned.
    const settled = await waitAtMost(agent.waitForRun(), 0);
    return settled.timedOut ? { status: 'cancelled' } : settled.value;
  } finally {
    for (const signal of signals) {
      processLike.off(signal, onSignal);
    }
  }
}
