/**
 * MCP communicator — the client side of the Model Context Protocol.
 *
 * Each target service is an MCP server reached over SSE or a stdio
 * subprocess. Connections open on first use and close on `stop()`. The SDK is
 * an optional dependency, imported only when this communicator is created.
 */
import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';
import { handlerOverwritePolicySchema } from '@/config/schema.js';
import { ConfigurationError, toError } from '@/core/errors.js';
import type { MessageParams } from '@/core/types.js';
import {
  CommunicationError,
  MethodNotFoundError,
  ServiceNotFoundError,
  TimeoutError,
} from '../errors.js';
import { createHandlerTable } from '../handler-table.js';
import { importOptional } from '../registry.js';
import { validateResponse } from '../response-validation.js';
import type { Communicator, CommunicatorContext } from '../types.js';

export const MCP_SDK_PACKAGE = '@modelcontextprotocol/sdk';

/** JSON-RPC error code the SDK uses for request timeouts. */
const MCP_REQUEST_TIMEOUT = -32001;

// ─── Options ────────────────────────────────────────────────────

const stdioServerSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Extra environment for the subprocess, merged over the current environment. */
  env: z.record(z.string()).optional(),
});

export type StdioServerConfig = z.infer<typeof stdioServerSchema>;

export const mcpCommunicatorOptionsSchema = z.object({
  /** stdio servers by service name; takes precedence over `stdio:` service URLs. */
  servers: z.record(stdioServerSchema).default({}),
  connectTimeoutMs: z.number().int().positive().default(30_000),
  defaultTimeoutMs: z.number().int().positive().default(30_000),
  handlerOverwrite: handlerOverwritePolicySchema,
});

export type McpCommunicatorOptions = z.infer<typeof mcpCommunicatorOptionsSchema>;

export type McpTransportKind = 'sse' | 'stdio';

// ─── Method Routing ─────────────────────────────────────────────

/** An MCP operation addressed by a communicator method name. */
export type McpOperation =
  | { kind: 'tool/list' }
  | { kind: 'tool/call'; name: string }
  | { kind: 'prompt/list' }
  | { kind: 'prompt/get'; name: string }
  | { kind: 'resource/list' }
  | { kind: 'resource/read'; uri: string };

/**
 * Parse a method name such as `tool/call/search` or `resource/read/file:///a.txt`.
 * Returns `undefined` for anything that is not an MCP operation.
 */
export function parseMcpMethod(method: string): McpOperation | undefined {
  if (method === 'tool/list' || method === 'prompt/list' || method === 'resource/list') {
    return { kind: method };
  }
  const withArgument: Array<[prefix: string, build: (arg: string) => McpOperation]> = [
    ['tool/call/', (name) => ({ kind: 'tool/call', name })],
    ['prompt/get/', (name) => ({ kind: 'prompt/get', name })],
    ['resource/read/', (uri) => ({ kind: 'resource/read', uri })],
  ];
  for (const [prefix, build] of withArgument) {
    if (method.startsWith(prefix) && method.length > prefix.length) {
      return build(method.slice(prefix.length));
    }
  }
  return undefined;
}

/** Prompt arguments are strings on the wire. */
function toPromptArguments(params: MessageParams): Record<string, string> {
  const args: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    args[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return args;
}

// ─── Communicator ───────────────────────────────────────────────

export interface McpCommunicator extends Communicator {
  readonly transport: McpTransportKind;
  /** Services with an open (or opening) connection. */
  connectedServices(): string[];
}

interface SdkModules {
  Client: typeof Client;
  createTransport(target: string): Transport;
}

/**
 * Create an MCP communicator. Imports the SDK first, so a missing package
 * surfaces as DependencyError when the communicator is resolved.
 */
export async function createMcpCommunicator(
  context: CommunicatorContext,
  transport: McpTransportKind,
): Promise<McpCommunicator> {
  const typeId = `mcp-${transport}`;
  const parsed = mcpCommunicatorOptionsSchema.safeParse(context.options);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${typeId} communicator options: ${summary}`);
  }
  const options = parsed.data;
  const sdk = await loadSdk(typeId, transport, context, options);
  return buildMcpCommunicator(context, transport, options, sdk);
}

async function loadSdk(
  typeId: string,
  transport: McpTransportKind,
  context: CommunicatorContext,
  options: McpCommunicatorOptions,
): Promise<SdkModules> {
  const importSdk = <T>(loader: () => Promise<T>): Promise<T> =>
    importOptional(loader, { typeId, packageName: MCP_SDK_PACKAGE });

  const { Client: ClientClass } = await importSdk(() => import('@modelcontextprotocol/sdk/client/index.js'));

  if (transport === 'sse') {
    const { SSEClientTransport } = await importSdk(() => import('@modelcontextprotocol/sdk/client/sse.js'));
    return {
      Client: ClientClass,
      createTransport(target) {
        const url = context.serviceUrls[target];
        if (url === undefined) throw new ServiceNotFoundError(target);
        return new SSEClientTransport(new URL(url));
      },
    };
  }

  const { StdioClientTransport } = await importSdk(() => import('@modelcontextprotocol/sdk/client/stdio.js'));
  return {
    Client: ClientClass,
    createTransport(target) {
      const server = resolveStdioServer(target, context.serviceUrls, options.servers);
      return new StdioClientTransport({
        command: server.command,
        args: server.args,
        env: server.env ? { ...currentEnv(), ...server.env } : undefined,
        stderr: 'pipe',
      });
    },
  };
}

/** Find the subprocess for `target`: an explicit server entry, or a `stdio:<command> <args…>` URL. */
export function resolveStdioServer(
  target: string,
  serviceUrls: Readonly<Record<string, string>>,
  servers: Readonly<Record<string, StdioServerConfig>>,
): StdioServerConfig {
  const configured = servers[target];
  if (configured) return configured;

  const url = serviceUrls[target];
  if (url?.startsWith('stdio:')) {
    const [command, ...args] = url.slice('stdio:'.length).trim().split(/\s+/);
    if (command) return { command, args };
  }
  throw new ServiceNotFoundError(target);
}

function currentEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

function buildMcpCommunicator(
  context: CommunicatorContext,
  transportKind: McpTransportKind,
  options: McpCommunicatorOptions,
  sdk: SdkModules,
): McpCommunicator {
  const { agentName } = context;
  const logger = context.logger.child({ communicator: `mcp-${transportKind}` });
  const handlers = createHandlerTable({ logger, owner: agentName, policy: options.handlerOverwrite });
  const connections = new Map<string, Promise<Client>>();
  const pendingNotifications = new Set<Promise<void>>();
  let stopping = false;

  async function connect(target: string): Promise<Client> {
    const transport = sdk.createTransport(target);
    const client = new sdk.Client({ name: agentName, version: '1.0.0' }, { capabilities: {} });

    logger.info('Connecting to MCP server', {
      component: 'mcp-communicator',
      agentName,
      target,
      transport: transportKind,
    });
    // The client owns transport.onclose; its own hook runs after pending requests are rejected.
    client.onclose = () => {
      connections.delete(target);
      logger.info('MCP server disconnected', { component: 'mcp-communicator', agentName, target });
    };
    try {
      await client.connect(transport, { timeout: options.connectTimeoutMs });
    } catch (error) {
      const cause = toError(error);
      throw new ServiceNotFoundError(target, cause.message, cause);
    }
    return client;
  }

  function connection(target: string): Promise<Client> {
    const existing = connections.get(target);
    if (existing) return existing;

    const opening = connect(target);
    connections.set(target, opening);
    void opening.catch(() => connections.delete(target));
    return opening;
  }

  async function call(client: Client, operation: McpOperation, params: MessageParams, timeoutMs: number): Promise<unknown> {
    const requestOptions = { timeout: timeoutMs };
    switch (operation.kind) {
      case 'tool/list':
        return (await client.listTools(undefined, requestOptions)).tools;
      case 'tool/call':
        return await client.callTool({ name: operation.name, arguments: params }, undefined, requestOptions);
      case 'prompt/list':
        return (await client.listPrompts(undefined, requestOptions)).prompts;
      case 'prompt/get':
        return await client.getPrompt(
          { name: operation.name, arguments: toPromptArguments(params) },
          requestOptions,
        );
      case 'resource/list':
        return (await client.listResources(undefined, requestOptions)).resources;
      case 'resource/read':
        return (await client.readResource({ uri: operation.uri }, requestOptions)).contents;
    }
  }

  async function execute(target: string, method: string, params: MessageParams, timeoutMs: number): Promise<unknown> {
    const operation = parseMcpMethod(method);
    if (!operation) throw new MethodNotFoundError(method, target);

    const client = await connection(target);
    try {
      return await call(client, operation, params, timeoutMs);
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === MCP_REQUEST_TIMEOUT) {
        throw new TimeoutError(target, method, timeoutMs);
      }
      const cause = toError(error);
      throw new CommunicationError({
        message: `MCP request "${method}" to service "${target}" failed: ${cause.message}`,
        target,
        cause,
        details: { method },
      });
    }
  }

  return {
    type: `mcp-${transportKind}`,
    agentName,
    transport: transportKind,

    connectedServices() {
      return [...connections.keys()];
    },

    async start() {
      stopping = false;
      logger.debug('MCP communicator ready', {
        component: 'mcp-communicator',
        agentName,
        handlers: handlers.methods(),
      });
    },

    async stop() {
      stopping = true;
      const open = [...connections.entries()];
      connections.clear();
      for (const [target, pending] of open) {
        try {
          const client = await pending;
          await client.close();
        } catch (error) {
          logger.warn('Failed to close MCP connection', {
            component: 'mcp-communicator',
            agentName,
            target,
            error: toError(error).message,
          });
        }
      }
      // Closing the clients rejects whatever is still in flight.
      await Promise.allSettled([...pendingNotifications]);
      logger.info('MCP communicator stopped', {
        component: 'mcp-communicator',
        agentName,
        event: 'communicator.stopped',
        closed: open.length,
      });
    },

    async sendRequest(target, method, params = {}, requestOptions = {}) {
      const timeoutMs = requestOptions.timeoutMs ?? options.defaultTimeoutMs;
      const result = await execute(target, method, params, timeoutMs);
      return validateResponse(result, requestOptions.responseSchema, target, method);
    },

    async sendNotification(target, method, params = {}) {
      if (!parseMcpMethod(method)) throw new MethodNotFoundError(method, target);

      const delivery = execute(target, method, params, options.defaultTimeoutMs)
        .then(() => undefined)
        .catch((error: unknown) => {
          if (stopping) return;
          logger.warn('MCP notification failed', {
            component: 'mcp-communicator',
            agentName,
            target,
            method,
            error: toError(error).message,
          });
        })
        .finally(() => pendingNotifications.delete(delivery));
      pendingNotifications.add(delivery);
    },

    registerHandler(method, handler) {
      // MCP clients serve no inbound calls; handlers stay local (triggerable in tests).
      handlers.register(method, handler);
    },
  };
}
