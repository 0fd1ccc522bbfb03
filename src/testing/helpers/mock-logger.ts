/**
 * Logger double for unit tests.
 */
import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Logger } from '@/observability/logger.js';

export interface MockLogger extends Logger {
  debug: Mock<Logger['debug']>;
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
  fatal: Mock<Logger['fatal']>;
  child: Mock<Logger['child']>;
}

/** A Logger whose methods are spies; `child()` returns the same instance. */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    fatal: vi.fn<Logger['fatal']>(),
    child: vi.fn<Logger['child']>(() => logger),
  };
  return logger;
}

/** Messages logged at `level`, in call order. */
export function loggedMessages(logger: MockLogger, level: Exclude<keyof Logger, 'child'>): string[] {
  return logger[level].mock.calls.map(([msg]) => msg);
}
