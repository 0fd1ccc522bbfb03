import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '@/core/errors.js';
import { createMockLogger, loggedMessages } from '@/testing/helpers/mock-logger.js';
import { MethodNotFoundError } from './errors.js';
import { createHandlerTable } from './handler-table.js';

describe('createHandlerTable', () => {
  it('dispatches to the registered handler with params and context', async () => {
    const table = createHandlerTable({ logger: createMockLogger(), owner: 'alpha' });
    const handler = vi.fn((params: Record<string, unknown>) => ({ echoed: params['value'] }));
    table.register('echo', handler);

    const result = await table.dispatch({ value: 7 }, { method: 'echo', sender: 'beta', notification: false });

    expect(result).toEqual({ echoed: 7 });
    expect(handler).toHaveBeenCalledWith(
      { value: 7 },
      { method: 'echo', sender: 'beta', notification: false },
    );
  });

  it('awaits async handlers', async () => {
    const table = createHandlerTable({ logger: createMockLogger(), owner: 'alpha' });
    table.register('slow', async () => Promise.resolve('done'));

    await expect(table.dispatch({}, { method: 'slow', notification: false })).resolves.toBe('done');
  });

  it('throws MethodNotFoundError for unknown methods', async () => {
    const table = createHandlerTable({ logger: createMockLogger(), owner: 'alpha' });

    const dispatched = table.dispatch({}, { method: 'missing', notification: false });

    await expect(dispatched).rejects.toBeInstanceOf(MethodNotFoundError);
    await expect(dispatched).rejects.toThrow('Method "missing" not found on service "alpha"');
  });

  it('replaces and warns by default', async () => {
    const logger = createMockLogger();
    const table = createHandlerTable({ logger, owner: 'alpha' });
    table.register('m', () => 1);
    table.register('m', () => 2);

    await expect(table.dispatch({}, { method: 'm', notification: false })).resolves.toBe(2);
    expect(loggedMessages(logger, 'warn')).toEqual(['Replacing existing handler']);
  });

  it('rejects a second registration under the error policy', () => {
    const table = createHandlerTable({ logger: createMockLogger(), owner: 'alpha', policy: 'error' });
    table.register('m', () => 1);

    expect(() => table.register('m', () => 2)).toThrow(ConfigurationError);
    expect(table.get('m')?.({}, { method: 'm', notification: false })).toBe(1);
  });

  it('replaces silently under the allow policy', () => {
    const logger = createMockLogger();
    const table = createHandlerTable({ logger, owner: 'alpha', policy: 'allow' });
    table.register('m', () => 1);
    table.register('m', () => 2);

    expect(logger.warn).not.toHaveBeenCalled();
    expect(table.methods()).toEqual(['m']);
    expect(table.has('m')).toBe(true);
  });
});
