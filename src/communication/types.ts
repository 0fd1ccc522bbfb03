/**
 * Communicator capability contract.
 * Every transport (HTTP, MCP, mock, plugins) implements `Communicator`; the agent
 * lifecycle depends on nothing else.
 */
import type { z } from 'zod';
import type { MessageParams } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';

// ─── Handlers ──────────────────────────────────────────────────

/** Metadata passed to a handler alongside the request parameters. */
export interface HandlerContext {
  /** Method the handler was invoked for. */
  method: string;
  /** Name of the sending agent, when the transport knows it. */
  sender?: string;
  /** True for notifications, whose result is discarded. */
  notification: boolean;
}

/** Handles one inbound method. The return value is sent back as the response result. */
export type RequestHandler = (
  params: MessageParams,
  context: HandlerContext,
) => unknown;

// ─── Requests ──────────────────────────────────────────────────

/** Per-request options for `sendRequest`. */
export interface SendRequestOptions<T = unknown> {
  /** Fail with TimeoutError if no response arrives in time. Defaults to the communicator's own default. */
  timeoutMs?: number;
  /** Validate the response; a mismatch fails with ValidationError. */
  responseSchema?: z.ZodType<T, z.ZodTypeDef, unknown>;
}

// ─── Communicator ──────────────────────────────────────────────

/** The capability set the agent lifecycle relies on. */
export interface Communicator {
  /** Type identifier this instance was registered under (e.g. "http"). */
  readonly type: string;
  /** Name of the owning agent. */
  readonly agentName: string;
  /** Acquire whatever is needed to send and receive. Atomic success/failure. */
  start(): Promise<void>;
  /** Release everything `start()` acquired. Safe after a partial start. */
  stop(): Promise<void>;
  /** Request/response exchange with another service. */
  sendRequest<T = unknown>(
    targetService: string,
    method: string,
    params?: MessageParams,
    options?: SendRequestOptions<T>,
  ): Promise<T>;
  /** Fire-and-forget. Resolves once the notification is enqueued locally. */
  sendNotification(targetService: string, method: string, params?: MessageParams): Promise<void>;
  /** Install the handler for an inbound method (one per method). */
  registerHandler(method: string, handler: RequestHandler): void;
}

// ─── Factories ─────────────────────────────────────────────────

/** Everything a factory needs to build a communicator for one agent. */
export interface CommunicatorContext {
  agentName: string;
  serviceUrls: Readonly<Record<string, string>>;
  options: Readonly<Record<string, unknown>>;
  logger: Logger;
}

/**
 * Builds a communicator. Factories perform any heavy or optional import
 * themselves, so unused transports never load.
 */
export type CommunicatorFactory = (
  context: CommunicatorContext,
) => Communicator | Promise<Communicator>;

/** Where a registry entry came from. */
export type CommunicatorSource = 'builtin' | 'plugin' | 'runtime';

/** Options accepted by `CommunicatorRegistry.register`. */
export interface RegisterOptions {
  source?: CommunicatorSource;
  /** Plugin file or package that registered the entry. */
  origin?: string;
  /** Optional package the factory imports, for DependencyError reporting. */
  dependency?: string;
  /** Command that installs `dependency`. */
  installHint?: string;
  description?: string;
}

/** A registered communicator type. */
export interface RegistryEntry {
  readonly typeId: string;
  readonly factory: CommunicatorFactory;
  readonly source: CommunicatorSource;
  readonly origin?: string;
  readonly dependency?: string;
  readonly installHint?: string;
  readonly description?: string;
}

// ─── Plugins ───────────────────────────────────────────────────

/** The narrow registry surface handed to plugins. */
export interface PluginRegistrar {
  register(typeId: string, factory: CommunicatorFactory, options?: Omit<RegisterOptions, 'source' | 'origin'>): void;
}

/** Name of the function a plugin module exports. */
export const PLUGIN_ENTRY_POINT = 'registerCommunicators';

/** Signature of a plugin module's entry point. */
export type PluginEntryPointFn = (registrar: PluginRegistrar) => void | Promise<void>;

/** A plugin declared by an installed package, supplied by the runner. */
export interface PluginEntryPoint {
  /** Stable identifier (usually the package name) used for idempotent discovery. */
  id: string;
  /** Import the plugin module. */
  load(): Promise<unknown>;
}

/** Enumerates installed packages' declared plugin entry points. */
export type EntryPointSource = () => PluginEntryPoint[] | Promise<PluginEntryPoint[]>;

/** Inputs to plugin discovery. */
export interface DiscoverPluginsOptions {
  /** Directories to scan for plugin modules. */
  paths?: readonly string[];
  /** Installed-package entry points. */
  entryPoints?: EntryPointSource;
}

/** What a discovery pass did. */
export interface DiscoveryReport {
  /** Origins loaded in this pass. */
  loaded: string[];
  /** Origins skipped because an earlier pass already loaded them. */
  skipped: string[];
  /** Origins that failed to load or register. */
  failed: Array<{ origin: string; error: string }>;
}

// ─── Registry ──────────────────────────────────────────────────

/** Lookup from communicator type identifier to factory. */
export interface CommunicatorRegistry {
  /** Insert or overwrite an entry. Last registration wins. */
  register(typeId: string, factory: CommunicatorFactory, options?: RegisterOptions): void;
  has(typeId: string): boolean;
  getEntry(typeId: string): RegistryEntry | undefined;
  /** Registered type identifiers, sorted. */
  listTypes(): string[];
  /** Build a communicator; see DependencyError / ConfigurationError for failure kinds. */
  resolve(typeId: string, context: CommunicatorContext): Promise<Communicator>;
  /** Load plugins from directories and installed packages. Idempotent. */
  discoverPlugins(options: DiscoverPluginsOptions): Promise<DiscoveryReport>;
  /** Remove every entry and forget loaded plugins. Intended for tests. */
  clear(): void;
}
