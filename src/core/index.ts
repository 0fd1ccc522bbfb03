// Core module — shared types, errors, results, cancellation
export type { LifecycleState, MessageParams } from './types.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, unwrap } from './result.js';

export {
  AgentryError,
  ConfigurationError,
  DependencyError,
  LifecycleError,
  CommunicatorCreationError,
  ValidationError,
  toError,
} from './errors.js';
export type { LifecyclePhase } from './errors.js';

export { CancelledError, isCancellationError, throwIfCancelled, waitAtMost } from './cancellation.js';
export type { BoundedWait } from './cancellation.js';
