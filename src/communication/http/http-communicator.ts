/**
 * HTTP communicator.
 *
 * Outbound: JSON envelopes POSTed with `fetch`, correlated by id, bounded by
 * `AbortSignal.timeout`. Inbound (only when `port` is set): a Fastify server
 * dispatching envelopes to the registered handlers.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { handlerOverwritePolicySchema } from '@/config/schema.js';
import { AgentryError, ConfigurationError, toError } from '@/core/errors.js';
import type { MessageParams } from '@/core/types.js';
import {
  CommunicationError,
  MethodNotFoundError,
  ServiceNotFoundError,
  TimeoutError,
} from '../errors.js';
import { createHandlerTable } from '../handler-table.js';
import { validateResponse } from '../response-validation.js';
import type { Communicator, CommunicatorContext } from '../types.js';

// ─── Options ────────────────────────────────────────────────────

export const httpCommunicatorOptionsSchema = z.object({
  /** Listen for inbound messages on this port. Omit for a client-only communicator; 0 picks a free port. */
  port: z.number().int().min(0).max(65_535).optional(),
  host: z.string().min(1).default('127.0.0.1'),
  path: z.string().startsWith('/', 'path must start with "/"').default('/rpc'),
  defaultTimeoutMs: z.number().int().positive().default(30_000),
  handlerOverwrite: handlerOverwritePolicySchema,
});

export type HttpCommunicatorOptions = z.infer<typeof httpCommunicatorOptionsSchema>;

// ─── Wire Envelopes ─────────────────────────────────────────────

export const requestEnvelopeSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['request', 'notification']),
  method: z.string().min(1),
  params: z.record(z.unknown()).default({}),
  sender: z.string().optional(),
});

export type RequestEnvelope = z.infer<typeof requestEnvelopeSchema>;

const responseEnvelopeSchema = z.object({
  id: z.string().nullable().optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
});

export type ResponseEnvelope = z.infer<typeof responseEnvelopeSchema>;

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ECONNRESET', 'EAI_AGAIN']);

// ─── Communicator ───────────────────────────────────────────────

export interface HttpCommunicator extends Communicator {
  /** Base URL of the inbound server while started, e.g. `http://127.0.0.1:54321`. */
  readonly url: string | undefined;
  readonly options: Readonly<HttpCommunicatorOptions>;
}

/** Parse raw communicator options, throwing ConfigurationError on invalid input. */
export function parseHttpOptions(raw: Readonly<Record<string, unknown>>): HttpCommunicatorOptions {
  const parsed = httpCommunicatorOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid http communicator options: ${summary}`, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

/** Create an HTTP communicator for one agent. */
export function createHttpCommunicator(context: CommunicatorContext): HttpCommunicator {
  const { agentName, serviceUrls } = context;
  const options = parseHttpOptions(context.options);
  const logger = context.logger.child({ communicator: 'http' });
  const handlers = createHandlerTable({ logger, owner: agentName, policy: options.handlerOverwrite });

  const pendingNotifications = new Set<Promise<void>>();
  const notificationControllers = new Set<AbortController>();
  let server: FastifyInstance | undefined;
  let url: string | undefined;

  function endpointFor(target: string): string {
    const base = serviceUrls[target];
    if (base === undefined) {
      throw new ServiceNotFoundError(target);
    }
    return `${base.replace(/\/+$/, '')}${options.path}`;
  }

  async function post(
    target: string,
    endpoint: string,
    envelope: RequestEnvelope,
    signal: AbortSignal,
    timeoutMs: number,
  ): Promise<ResponseEnvelope> {
    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(envelope),
        signal,
      });
    } catch (error) {
      throw toTransportError(error, target, envelope.method, timeoutMs);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isNamed(error, 'TimeoutError')) {
        throw new TimeoutError(target, envelope.method, timeoutMs);
      }
      throw new CommunicationError({
        message: `Service "${target}" returned a non-JSON response (HTTP ${response.status})`,
        target,
        statusCode: 502,
        cause: toError(error),
        details: { method: envelope.method, httpStatus: response.status },
      });
    }

    const parsed = responseEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new CommunicationError({
        message: `Service "${target}" returned an invalid response envelope (HTTP ${response.status})`,
        target,
        details: { method: envelope.method, httpStatus: response.status },
      });
    }

    const reply = parsed.data;
    if (reply.error) {
      if (reply.error.code === 'METHOD_NOT_FOUND') {
        throw new MethodNotFoundError(envelope.method, target);
      }
      throw new CommunicationError({
        message: `Service "${target}" failed to handle "${envelope.method}": ${reply.error.message}`,
        target,
        code: 'REMOTE_ERROR',
        details: { method: envelope.method, remoteCode: reply.error.code, httpStatus: response.status },
      });
    }
    if (!response.ok) {
      throw new CommunicationError({
        message: `Service "${target}" responded with HTTP ${response.status}`,
        target,
        details: { method: envelope.method, httpStatus: response.status },
      });
    }
    return reply;
  }

  async function handleInbound(body: unknown): Promise<{ status: number; reply: ResponseEnvelope }> {
    const parsed = requestEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      const summary = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return {
        status: 400,
        reply: { id: null, error: { code: 'INVALID_ENVELOPE', message: `Invalid message envelope: ${summary}` } },
      };
    }

    const envelope = parsed.data;
    const notification = envelope.kind === 'notification';
    try {
      const result = await handlers.dispatch(envelope.params, {
        method: envelope.method,
        sender: envelope.sender,
        notification,
      });
      return { status: 200, reply: { id: envelope.id, result: notification ? null : (result ?? null) } };
    } catch (error) {
      if (error instanceof MethodNotFoundError) {
        logger.warn('Inbound message for unknown method', {
          component: 'http-communicator',
          agentName,
          method: envelope.method,
          sender: envelope.sender,
        });
        return { status: 404, reply: { id: envelope.id, error: { code: error.code, message: error.message } } };
      }
      const cause = toError(error);
      logger.error('Handler failed', {
        component: 'http-communicator',
        agentName,
        method: envelope.method,
        error: cause.message,
      });
      return {
        status: 500,
        reply: {
          id: envelope.id,
          error: { code: cause instanceof AgentryError ? cause.code : 'HANDLER_ERROR', message: cause.message },
        },
      };
    }
  }

  function buildServer(): FastifyInstance {
    const instance = Fastify({ logger: false });

    instance.setErrorHandler(async (error, _request, reply) => {
      const status = error.statusCode !== undefined && error.statusCode < 500 ? 400 : 500;
      await reply.status(status).send({
        id: null,
        error: { code: status === 400 ? 'INVALID_ENVELOPE' : 'INTERNAL_ERROR', message: error.message },
      });
    });

    instance.post(options.path, async (request, reply) => {
      const { status, reply: body } = await handleInbound(request.body);
      return reply.status(status).send(body);
    });

    return instance;
  }

  const communicator: HttpCommunicator = {
    type: 'http',
    agentName,
    options,

    get url() {
      return url;
    },

    async start() {
      if (server || options.port === undefined) return;

      const instance = buildServer();
      try {
        await instance.listen({ port: options.port, host: options.host });
      } catch (error) {
        await instance.close();
        throw new CommunicationError({
          message: `Failed to start HTTP server on ${options.host}:${options.port}: ${toError(error).message}`,
          code: 'SERVER_START_FAILED',
          statusCode: 500,
          cause: toError(error),
        });
      }

      server = instance;
      const port = instance.addresses()[0]?.port ?? options.port;
      url = `http://${options.host}:${port}`;
      logger.info('HTTP communicator listening', {
        component: 'http-communicator',
        agentName,
        event: 'communicator.listening',
        url,
      });
    },

    async stop() {
      for (const controller of notificationControllers) {
        controller.abort();
      }
      await Promise.allSettled([...pendingNotifications]);

      if (server) {
        const instance = server;
        server = undefined;
        url = undefined;
        await instance.close();
        logger.info('HTTP communicator stopped', {
          component: 'http-communicator',
          agentName,
          event: 'communicator.stopped',
        });
      }
    },

    async sendRequest(target, method, params = {}, requestOptions = {}) {
      const endpoint = endpointFor(target);
      const timeoutMs = requestOptions.timeoutMs ?? options.defaultTimeoutMs;
      const envelope: RequestEnvelope = { id: nanoid(), kind: 'request', method, params, sender: agentName };

      logger.debug('Sending request', { component: 'http-communicator', agentName, target, method, id: envelope.id });
      const reply = await post(target, endpoint, envelope, AbortSignal.timeout(timeoutMs), timeoutMs);
      return validateResponse(reply.result, requestOptions.responseSchema, target, method);
    },

    async sendNotification(target, method, params: MessageParams = {}) {
      const endpoint = endpointFor(target);
      const envelope: RequestEnvelope = { id: nanoid(), kind: 'notification', method, params, sender: agentName };
      const timeoutMs = options.defaultTimeoutMs;
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(new TimeoutError(target, method, timeoutMs)), timeoutMs);

      const delivery = post(target, endpoint, envelope, controller.signal, timeoutMs)
        .then(() => undefined)
        .catch((error: unknown) => {
          // Aborted by stop(): the agent is going away, nothing to report.
          if (controller.signal.aborted && !(controller.signal.reason instanceof TimeoutError)) return;
          logger.warn('Notification delivery failed', {
            component: 'http-communicator',
            agentName,
            target,
            method,
            error: toError(error).message,
          });
        })
        .finally(() => {
          clearTimeout(timer);
          notificationControllers.delete(controller);
          pendingNotifications.delete(delivery);
        });

      notificationControllers.add(controller);
      pendingNotifications.add(delivery);
    },

    registerHandler(method, handler) {
      handlers.register(method, handler);
    },
  };

  return communicator;
}

// ─── Helpers ────────────────────────────────────────────────────

function isNamed(error: unknown, name: string): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === name;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

function toTransportError(error: unknown, target: string, method: string, timeoutMs: number): Error {
  if (isNamed(error, 'TimeoutError')) {
    return new TimeoutError(target, method, timeoutMs);
  }
  const cause = toError(error);
  const networkCode = errorCode(cause.cause) ?? errorCode(cause);
  if (networkCode !== undefined && UNREACHABLE_CODES.has(networkCode)) {
    return new ServiceNotFoundError(target, networkCode, cause);
  }
  return new CommunicationError({
    message: `Request "${method}" to service "${target}" failed: ${cause.message}`,
    target,
    cause,
    details: { method },
  });
}
