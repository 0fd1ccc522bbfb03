// Communication module — capability contract, registry, built-in transports
export type {
  Communicator,
  CommunicatorContext,
  CommunicatorFactory,
  CommunicatorRegistry,
  CommunicatorSource,
  DiscoverPluginsOptions,
  DiscoveryReport,
  EntryPointSource,
  HandlerContext,
  PluginEntryPoint,
  PluginEntryPointFn,
  PluginRegistrar,
  RegisterOptions,
  RegistryEntry,
  RequestHandler,
  SendRequestOptions,
} from './types.js';
export { PLUGIN_ENTRY_POINT } from './types.js';

export {
  CommunicationError,
  ServiceNotFoundError,
  MethodNotFoundError,
  TimeoutError,
} from './errors.js';

export { createHandlerTable } from './handler-table.js';
export type { HandlerTable, HandlerTableOptions } from './handler-table.js';

export {
  createCommunicatorRegistry,
  importOptional,
  missingModuleOf,
  packageNameOf,
} from './registry.js';
export type { CommunicatorRegistryOptions } from './registry.js';

export { createDefaultRegistry, registerBuiltinCommunicators } from './builtins.js';
export { createPackageEntryPointSource } from './package-entry-points.js';
export type { PackageEntryPointSourceOptions } from './package-entry-points.js';

export { createMockCommunicator } from './mock-communicator.js';
export type {
  ExpectRequestOptions,
  MockCommunicator,
  MockCommunicatorOptions,
  SentMessage,
} from './mock-communicator.js';

export { createHttpCommunicator, httpCommunicatorOptionsSchema } from './http/http-communicator.js';
export type { HttpCommunicator, HttpCommunicatorOptions } from './http/http-communicator.js';

// The MCP communicator is reached through the registry only, keeping its SDK optional.
export type { McpCommunicator, McpCommunicatorOptions } from './mcp/mcp-communicator.js';
