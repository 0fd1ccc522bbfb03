/**
 * Built-in communicator types. Each factory imports its implementation on
 * first resolution, keeping unused transports (and their packages) unloaded.
 */
import type { Logger } from '@/observability/logger.js';
import { createCommunicatorRegistry } from './registry.js';
import type { CommunicatorRegistry } from './types.js';

const MCP_INSTALL_HINT = 'npm install @modelcontextprotocol/sdk';

/** Register `http`, `mock`, `mcp-sse` and `mcp-stdio` on `registry`. */
export function registerBuiltinCommunicators(registry: CommunicatorRegistry): void {
  registry.register(
    'http',
    async (context) => {
      const { createHttpCommunicator } = await import('./http/http-communicator.js');
      return createHttpCommunicator(context);
    },
    { source: 'builtin', description: 'JSON envelopes over HTTP (fetch client, optional Fastify server)' },
  );

  registry.register(
    'mock',
    async (context) => {
      const { createMockCommunicator } = await import('./mock-communicator.js');
      const handlerOverwrite = context.options['handlerOverwrite'];
      return createMockCommunicator({
        agentName: context.agentName,
        logger: context.logger,
        handlerOverwrite:
          handlerOverwrite === 'error' || handlerOverwrite === 'allow' ? handlerOverwrite : 'warn',
      });
    },
    { source: 'builtin', description: 'In-process communicator for tests' },
  );

  for (const transport of ['sse', 'stdio'] as const) {
    registry.register(
      `mcp-${transport}`,
      async (context) => {
        const { createMcpCommunicator } = await import('./mcp/mcp-communicator.js');
        return createMcpCommunicator(context, transport);
      },
      {
        source: 'builtin',
        dependency: '@modelcontextprotocol/sdk',
        installHint: MCP_INSTALL_HINT,
        description: `Model Context Protocol client over ${transport.toUpperCase()}`,
      },
    );
  }
}

/** A registry pre-populated with the built-in communicators. */
export function createDefaultRegistry(options: { logger: Logger }): CommunicatorRegistry {
  const registry = createCommunicatorRegistry(options);
  registerBuiltinCommunicators(registry);
  return registry;
}
