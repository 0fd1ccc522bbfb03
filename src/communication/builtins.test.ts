import { describe, it, expect } from 'vitest';
import { createMockLogger } from '@/testing/helpers/mock-logger.js';
import { createDefaultRegistry } from './builtins.js';
import type { CommunicatorContext } from './types.js';

describe('createDefaultRegistry', () => {
  const logger = createMockLogger();
  const context: CommunicatorContext = { agentName: 'alpha', serviceUrls: {}, options: {}, logger };

  it('registers the built-in types', () => {
    const registry = createDefaultRegistry({ logger });

    expect(registry.listTypes()).toEqual(['http', 'mcp-sse', 'mcp-stdio', 'mock']);
    expect(registry.getEntry('mcp-sse')).toMatchObject({
      source: 'builtin',
      dependency: '@modelcontextprotocol/sdk',
      installHint: 'npm install @modelcontextprotocol/sdk',
    });
  });

  it('resolves the http communicator', async () => {
    const communicator = await createDefaultRegistry({ logger }).resolve('http', context);

    expect(communicator.type).toBe('http');
    expect(communicator.agentName).toBe('alpha');
  });

  it('resolves the mock communicator with the configured overwrite policy', async () => {
    const communicator = await createDefaultRegistry({ logger }).resolve('mock', {
      ...context,
      options: { handlerOverwrite: 'error' },
    });
    communicator.registerHandler('ping', () => 'pong');

    expect(communicator.type).toBe('mock');
    expect(() => communicator.registerHandler('ping', () => 'again')).toThrow(
      'Handler for method "ping" is already registered',
    );
  });

  it('passes invalid http options through as ConfigurationError', async () => {
    await expect(
      createDefaultRegistry({ logger }).resolve('http', { ...context, options: { port: -1 } }),
    ).rejects.toThrow('Invalid http communicator options: port: Number must be greater than or equal to 0');
  });
});
