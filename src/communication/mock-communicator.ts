/**
 * In-process communicator for tests.
 *
 * Records every outbound message, answers requests from queued expectations,
 * and can be linked to other mock communicators so agents talk to each
 * other without a network.
 */
import { isDeepStrictEqual } from 'node:util';
import type { HandlerOverwritePolicy } from '@/config/schema.js';
import { toError } from '@/core/errors.js';
import type { MessageParams } from '@/core/types.js';
import { createLogger } from '@/observability/logger.js';
import type { Logger } from '@/observability/logger.js';
import { CommunicationError } from './errors.js';
import { createHandlerTable } from './handler-table.js';
import { validateResponse } from './response-validation.js';
import type { Communicator } from './types.js';

// ─── Types ───────────────────────────────────────────────────────

export type MessageKind = 'request' | 'notification';

/** An outbound message recorded by the mock. */
export interface SentMessage {
  kind: MessageKind;
  target: string;
  method: string;
  params: MessageParams;
}

export interface ExpectRequestOptions {
  /** Match only when the params are deeply equal. Omit to match any params. */
  params?: MessageParams;
  /** Value returned to the caller. */
  response?: unknown;
  /** Reject the request with this error instead of responding. */
  error?: Error;
}

export interface MockCommunicator extends Communicator {
  /** Every outbound message, in send order. */
  readonly sentMessages: readonly SentMessage[];
  readonly isStarted: boolean;
  readonly startCount: number;
  readonly stopCount: number;
  /** Queue a response for the next matching request. */
  expectRequest(target: string, method: string, options?: ExpectRequestOptions): void;
  /** Queue an expected notification. */
  expectNotification(target: string, method: string, params?: MessageParams): void;
  /** Invoke a registered handler as if a message had arrived. */
  triggerHandler(method: string, params?: MessageParams, options?: { sender?: string; notification?: boolean }): Promise<unknown>;
  /** Route unmatched messages addressed to `other.agentName` to its handlers, and vice versa. */
  link(other: MockCommunicator): void;
  /** Methods with a registered handler. */
  handlerMethods(): string[];
  /** Throw if any expectation is unmet or any message was unexpected. */
  verify(): void;
  /** Forget expectations, recorded messages and counters. Handlers and links stay. */
  reset(): void;
}

export interface MockCommunicatorOptions {
  agentName: string;
  logger?: Logger;
  handlerOverwrite?: HandlerOverwritePolicy;
  /** Make `start()` reject with this error. */
  startError?: Error;
  /** Make `stop()` reject with this error. */
  stopError?: Error;
}

interface Expectation {
  kind: MessageKind;
  target: string;
  method: string;
  params?: MessageParams;
  response?: unknown;
  error?: Error;
}

// ─── Factory ─────────────────────────────────────────────────────

/** Create a mock communicator for `agentName`. */
export function createMockCommunicator(options: MockCommunicatorOptions): MockCommunicator {
  const { agentName } = options;
  const logger = options.logger ?? createLogger({ name: 'mock-communicator', level: 'silent' });
  const handlers = createHandlerTable({
    logger,
    owner: agentName,
    policy: options.handlerOverwrite,
  });
  const linked = new Map<string, MockCommunicator>();

  let expectations: Expectation[] = [];
  let sent: SentMessage[] = [];
  let unexpected: SentMessage[] = [];
  let started = false;
  let startCount = 0;
  let stopCount = 0;

  function takeExpectation(message: SentMessage): Expectation | undefined {
    const index = expectations.findIndex(
      (e) =>
        e.kind === message.kind &&
        e.target === message.target &&
        e.method === message.method &&
        (e.params === undefined || isDeepStrictEqual(e.params, message.params)),
    );
    if (index === -1) return undefined;
    const [match] = expectations.splice(index, 1);
    return match;
  }

  const communicator: MockCommunicator = {
    type: 'mock',
    agentName,

    get sentMessages() {
      return sent;
    },
    get isStarted() {
      return started;
    },
    get startCount() {
      return startCount;
    },
    get stopCount() {
      return stopCount;
    },

    async start() {
      startCount++;
      if (options.startError) throw options.startError;
      started = true;
      logger.debug('Mock communicator started', { component: 'mock-communicator', agentName });
    },

    async stop() {
      stopCount++;
      started = false;
      if (options.stopError) throw options.stopError;
      logger.debug('Mock communicator stopped', { component: 'mock-communicator', agentName });
    },

    async sendRequest(target, method, params = {}, requestOptions = {}) {
      const message: SentMessage = { kind: 'request', target, method, params };
      sent.push(message);

      const expectation = takeExpectation(message);
      if (expectation) {
        if (expectation.error) throw expectation.error;
        return validateResponse(expectation.response, requestOptions.responseSchema, target, method);
      }

      const peer = linked.get(target);
      if (peer) {
        const result = await peer.triggerHandler(method, params, { sender: agentName });
        return validateResponse(result, requestOptions.responseSchema, target, method);
      }

      unexpected.push(message);
      throw new CommunicationError({
        message: `Unexpected request "${method}" to service "${target}"`,
        target,
        code: 'UNEXPECTED_MESSAGE',
        details: { method },
      });
    },

    async sendNotification(target, method, params = {}) {
      const message: SentMessage = { kind: 'notification', target, method, params };
      sent.push(message);

      const matched = takeExpectation(message) !== undefined;
      const peer = linked.get(target);
      if (peer) {
        try {
          await peer.triggerHandler(method, params, { sender: agentName, notification: true });
        } catch (error) {
          logger.warn('Linked notification handler failed', {
            component: 'mock-communicator',
            agentName,
            target,
            method,
            error: toError(error).message,
          });
        }
      } else if (!matched) {
        unexpected.push(message);
      }
    },

    registerHandler(method, handler) {
      handlers.register(method, handler);
    },

    async triggerHandler(method, params = {}, triggerOptions = {}) {
      return handlers.dispatch(params, {
        method,
        sender: triggerOptions.sender,
        notification: triggerOptions.notification ?? false,
      });
    },

    link(other) {
      if (linked.get(other.agentName) === other) return;
      linked.set(other.agentName, other);
      other.link(communicator);
    },

    handlerMethods() {
      return handlers.methods();
    },

    expectRequest(target, method, expectOptions = {}) {
      expectations.push({ kind: 'request', target, method, ...expectOptions });
    },

    expectNotification(target, method, params) {
      expectations.push({ kind: 'notification', target, method, params });
    },

    verify() {
      const problems = [
        ...expectations.map((e) => `expected ${e.kind} "${e.method}" to "${e.target}" was not sent`),
        ...unexpected.map((m) => `unexpected ${m.kind} "${m.method}" to "${m.target}"`),
      ];
      if (problems.length > 0) {
        throw new Error(
          `Mock communicator "${agentName}" verification failed:\n${problems.map((p) => `  - ${p}`).join('\n')}`,
        );
      }
    },

    reset() {
      expectations = [];
      sent = [];
      unexpected = [];
      startCount = 0;
      stopCount = 0;
    },
  };

  return communicator;
}
