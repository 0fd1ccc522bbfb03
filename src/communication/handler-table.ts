/**
 * Method → handler table shared by the built-in communicators.
 * Applies the handler overwrite policy and dispatches inbound messages.
 */
import { ConfigurationError } from '@/core/errors.js';
import type { HandlerOverwritePolicy } from '@/config/schema.js';
import type { MessageParams } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { MethodNotFoundError } from './errors.js';
import type { HandlerContext, RequestHandler } from './types.js';

export interface HandlerTable {
  /** Install a handler, applying the overwrite policy when one already exists. */
  register(method: string, handler: RequestHandler): void;
  get(method: string): RequestHandler | undefined;
  has(method: string): boolean;
  methods(): string[];
  /** Invoke the handler for `context.method`; MethodNotFoundError if none. */
  dispatch(params: MessageParams, context: HandlerContext): Promise<unknown>;
}

export interface HandlerTableOptions {
  logger: Logger;
  /** Agent name, for log context. */
  owner: string;
  policy?: HandlerOverwritePolicy;
}

/** Create an empty handler table. */
export function createHandlerTable(options: HandlerTableOptions): HandlerTable {
  const { logger, owner, policy = 'warn' } = options;
  const handlers = new Map<string, RequestHandler>();

  return {
    register(method, handler) {
      if (handlers.has(method)) {
        if (policy === 'error') {
          throw new ConfigurationError(`Handler for method "${method}" is already registered`, {
            agentName: owner,
            method,
          });
        }
        if (policy === 'warn') {
          logger.warn('Replacing existing handler', {
            component: 'handler-table',
            agentName: owner,
            event: 'handler.replaced',
            method,
          });
        }
      }
      handlers.set(method, handler);
    },

    get(method) {
      return handlers.get(method);
    },

    has(method) {
      return handlers.has(method);
    },

    methods() {
      return [...handlers.keys()];
    },

    async dispatch(params, context) {
      const handler = handlers.get(context.method);
      if (!handler) {
        throw new MethodNotFoundError(context.method, owner);
      }
      return await handler(params, context);
    },
  };
}
