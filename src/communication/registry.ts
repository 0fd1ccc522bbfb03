/**
 * Communicator registry — maps type identifiers to lazy factories.
 *
 * Factories import their transport only when resolved, so an optional
 * package that is not installed fails only the agents that ask for it.
 */
import {
  AgentryError,
  CommunicatorCreationError,
  ConfigurationError,
  DependencyError,
  toError,
} from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { extractEntryPoint, scanPluginDirectories } from './plugin-discovery.js';
import type { PluginModuleRef } from './plugin-discovery.js';
import type {
  Communicator,
  CommunicatorRegistry,
  DiscoveryReport,
  PluginRegistrar,
  RegistryEntry,
} from './types.js';

// ─── Missing Modules ────────────────────────────────────────────

const MODULE_NOT_FOUND_CODES = new Set(['ERR_MODULE_NOT_FOUND', 'MODULE_NOT_FOUND']);
const MISSING_SPECIFIER = /Cannot find (?:package|module) '([^']+)'/;

/** Package name of an import specifier: `@scope/pkg/sub.js` → `@scope/pkg`. */
export function packageNameOf(specifier: string): string {
  if (specifier.startsWith('.') || specifier.startsWith('/')) return specifier;
  const segments = specifier.split('/');
  const count = specifier.startsWith('@') ? 2 : 1;
  return segments.slice(0, count).join('/');
}

/**
 * If `error` (or its cause) is a module-not-found failure, return the missing
 * package name; otherwise `undefined`.
 */
export function missingModuleOf(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    const code = 'code' in current ? current.code : undefined;
    if (typeof code === 'string' && MODULE_NOT_FOUND_CODES.has(code)) {
      const specifier = MISSING_SPECIFIER.exec(current.message)?.[1];
      return specifier ? packageNameOf(specifier) : 'unknown';
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Import an optional package, turning module-not-found into DependencyError.
 *
 * @example
 * const { Client } = await importOptional(
 *   () => import('@modelcontextprotocol/sdk/client/index.js'),
 *   { typeId: 'mcp-sse', packageName: '@modelcontextprotocol/sdk' },
 * );
 */
export async function importOptional<T>(
  loader: () => Promise<T>,
  options: { typeId: string; packageName: string; installHint?: string },
): Promise<T> {
  try {
    return await loader();
  } catch (error) {
    if (missingModuleOf(error) === undefined) throw error;
    throw new DependencyError({
      typeId: options.typeId,
      dependency: options.packageName,
      installHint: options.installHint ?? `npm install ${options.packageName}`,
      cause: toError(error),
    });
  }
}

// ─── Registry ───────────────────────────────────────────────────

export interface CommunicatorRegistryOptions {
  logger: Logger;
}

/** Create an empty registry. See `createDefaultRegistry` for one with the built-ins. */
export function createCommunicatorRegistry(options: CommunicatorRegistryOptions): CommunicatorRegistry {
  const { logger } = options;
  const entries = new Map<string, RegistryEntry>();
  const loadedOrigins = new Set<string>();

  const registry: CommunicatorRegistry = {
    register(typeId, factory, registerOptions = {}) {
      if (!typeId) {
        throw new ConfigurationError('Communicator type identifier cannot be empty');
      }
      const previous = entries.get(typeId);
      const entry: RegistryEntry = {
        typeId,
        factory,
        source: registerOptions.source ?? 'runtime',
        origin: registerOptions.origin,
        dependency: registerOptions.dependency,
        installHint: registerOptions.installHint,
        description: registerOptions.description,
      };
      entries.set(typeId, entry);

      if (previous) {
        logger.info('Communicator type overwritten', {
          component: 'communicator-registry',
          event: 'registry.overwritten',
          typeId,
          previousSource: previous.source,
          previousOrigin: previous.origin,
          source: entry.source,
          origin: entry.origin,
        });
      } else {
        logger.debug('Communicator type registered', {
          component: 'communicator-registry',
          event: 'registry.registered',
          typeId,
          source: entry.source,
        });
      }
    },

    has(typeId) {
      return entries.has(typeId);
    },

    getEntry(typeId) {
      return entries.get(typeId);
    },

    listTypes() {
      return [...entries.keys()].sort();
    },

    async resolve(typeId, context): Promise<Communicator> {
      const entry = entries.get(typeId);
      if (!entry) {
        const availableTypes = registry.listTypes();
        throw new ConfigurationError(
          `Communicator type "${typeId}" not found. Available types: ${availableTypes.join(', ') || '(none)'}`,
          { typeId, availableTypes },
        );
      }

      try {
        return await entry.factory(context);
      } catch (error) {
        throw classifyFactoryError(entry, error);
      }
    },

    async discoverPlugins({ paths = [], entryPoints }) {
      const report: DiscoveryReport = { loaded: [], skipped: [], failed: [] };

      const scan = await scanPluginDirectories(paths, logger);
      report.failed.push(...scan.failed);
      const candidates: PluginModuleRef[] = [...scan.modules];

      if (entryPoints) {
        try {
          for (const entryPoint of await entryPoints()) {
            candidates.push({ origin: `package:${entryPoint.id}`, load: entryPoint.load });
          }
        } catch (error) {
          const message = toError(error).message;
          logger.warn('Plugin entry points could not be enumerated', {
            component: 'communicator-registry',
            event: 'plugins.entry_points_failed',
            error: message,
          });
          report.failed.push({ origin: 'entry-points', error: message });
        }
      }

      for (const candidate of candidates) {
        if (loadedOrigins.has(candidate.origin)) {
          report.skipped.push(candidate.origin);
          continue;
        }
        try {
          await loadPlugin(candidate);
          loadedOrigins.add(candidate.origin);
          report.loaded.push(candidate.origin);
        } catch (error) {
          const message = toError(error).message;
          logger.warn('Failed to load communicator plugin', {
            component: 'communicator-registry',
            event: 'plugins.load_failed',
            origin: candidate.origin,
            error: message,
          });
          report.failed.push({ origin: candidate.origin, error: message });
        }
      }

      logger.info('Plugin discovery finished', {
        component: 'communicator-registry',
        event: 'plugins.discovered',
        loaded: report.loaded.length,
        skipped: report.skipped.length,
        failed: report.failed.length,
      });
      return report;
    },

    clear() {
      entries.clear();
      loadedOrigins.clear();
    },
  };

  async function loadPlugin(candidate: PluginModuleRef): Promise<void> {
    const mod = await candidate.load();
    const entryPoint = extractEntryPoint(mod);
    if (!entryPoint) {
      throw new ConfigurationError('Plugin does not export a registerCommunicators function', {
        origin: candidate.origin,
      });
    }
    const registrar: PluginRegistrar = {
      register: (typeId, factory, pluginOptions) =>
        registry.register(typeId, factory, {
          ...pluginOptions,
          source: 'plugin',
          origin: candidate.origin,
        }),
    };
    await entryPoint(registrar);
  }

  return registry;
}

function classifyFactoryError(entry: RegistryEntry, error: unknown): AgentryError {
  if (error instanceof ConfigurationError || error instanceof DependencyError) {
    return error;
  }
  const missing = missingModuleOf(error);
  if (missing !== undefined) {
    const dependency = entry.dependency ?? missing;
    return new DependencyError({
      typeId: entry.typeId,
      dependency,
      installHint: entry.installHint ?? `npm install ${dependency}`,
      cause: toError(error),
    });
  }
  const cause = toError(error);
  return new CommunicatorCreationError(entry.typeId, cause.message, cause);
}
