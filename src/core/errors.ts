/**
 * Base error class for all agentry errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class AgentryError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'AgentryError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
  }
}

/** Thrown when configuration is invalid or cannot be resolved (e.g. unknown communicator type). */
export class ConfigurationError extends AgentryError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({
      message,
      code: 'CONFIGURATION_ERROR',
      statusCode: 400,
      cause,
      context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when a known communicator type needs an optional package that is not installed.
 * Fix by installing the package, not by changing configuration.
 */
export class DependencyError extends AgentryError {
  public readonly dependency: string;
  public readonly installHint: string;

  constructor(params: {
    typeId: string;
    dependency: string;
    installHint: string;
    cause?: Error;
  }) {
    super({
      message:
        `Communicator type "${params.typeId}" requires the optional dependency "${params.dependency}", ` +
        `which is not installed. Install it with: ${params.installHint}`,
      code: 'DEPENDENCY_MISSING',
      statusCode: 500,
      cause: params.cause,
      context: {
        typeId: params.typeId,
        dependency: params.dependency,
        installHint: params.installHint,
      },
    });
    this.name = 'DependencyError';
    this.dependency = params.dependency;
    this.installHint = params.installHint;
  }
}

/** Lifecycle phases that can fail. */
export type LifecyclePhase =
  | 'start'
  | 'communicator-start'
  | 'setup'
  | 'run'
  | 'stop'
  | 'configure';

/** Thrown when a lifecycle precondition is violated or a start phase fails. */
export class LifecycleError extends AgentryError {
  public readonly phase: LifecyclePhase;

  constructor(params: {
    agentName: string;
    phase: LifecyclePhase;
    message: string;
    cause?: Error;
    context?: Record<string, unknown>;
  }) {
    const causeMessage = params.cause ? `: ${params.cause.message}` : '';
    super({
      message: `Agent "${params.agentName}" ${params.message}${causeMessage}`,
      code: 'LIFECYCLE_ERROR',
      statusCode: 409,
      cause: params.cause,
      context: { agentName: params.agentName, phase: params.phase, ...params.context },
    });
    this.name = 'LifecycleError';
    this.phase = params.phase;
  }
}

/** Thrown when a communicator factory fails for a reason other than configuration or a missing package. */
export class CommunicatorCreationError extends AgentryError {
  constructor(typeId: string, message: string, cause?: Error) {
    super({
      message: `Failed to create communicator "${typeId}": ${message}`,
      code: 'COMMUNICATOR_CREATION_FAILED',
      statusCode: 500,
      cause,
      context: { typeId },
    });
    this.name = 'CommunicatorCreationError';
  }
}

/** Thrown when input or response validation (Zod) fails. */
export class ValidationError extends AgentryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
