/**
 * Transport-level error classes.
 * Raised by communicator implementations and passed through the core unchanged.
 */
import { AgentryError } from '@/core/errors.js';

/** Generic failure while talking to another service. */
export class CommunicationError extends AgentryError {
  public readonly target?: string;

  constructor(params: {
    message: string;
    target?: string;
    code?: string;
    statusCode?: number;
    cause?: Error;
    details?: Record<string, unknown>;
  }) {
    super({
      message: params.message,
      code: params.code ?? 'COMMUNICATION_ERROR',
      statusCode: params.statusCode ?? 502,
      cause: params.cause,
      context: { target: params.target, ...params.details },
    });
    this.name = 'CommunicationError';
    this.target = params.target;
  }
}

/** Thrown when the target service is unknown or cannot be reached. */
export class ServiceNotFoundError extends CommunicationError {
  constructor(target: string, reason?: string, cause?: Error) {
    super({
      message: reason
        ? `Service "${target}" is unreachable: ${reason}`
        : `Service "${target}" is not configured`,
      target,
      code: 'SERVICE_NOT_FOUND',
      statusCode: 404,
      cause,
    });
    this.name = 'ServiceNotFoundError';
  }
}

/** Thrown when the target service has no handler for the requested method. */
export class MethodNotFoundError extends CommunicationError {
  constructor(method: string, target?: string) {
    super({
      message: target
        ? `Method "${method}" not found on service "${target}"`
        : `Method "${method}" not found`,
      target,
      code: 'METHOD_NOT_FOUND',
      statusCode: 404,
      details: { method },
    });
    this.name = 'MethodNotFoundError';
  }
}

/** Thrown when a request receives no response within its timeout. */
export class TimeoutError extends CommunicationError {
  public readonly timeoutMs: number;

  constructor(target: string, method: string, timeoutMs: number) {
    super({
      message: `Request "${method}" to service "${target}" timed out after ${timeoutMs}ms`,
      target,
      code: 'REQUEST_TIMEOUT',
      statusCode: 504,
      details: { method, timeoutMs },
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
