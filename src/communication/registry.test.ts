import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CommunicatorCreationError,
  ConfigurationError,
  DependencyError,
} from '@/core/errors.js';
import { createMockLogger, loggedMessages } from '@/testing/helpers/mock-logger.js';
import type { MockLogger } from '@/testing/helpers/mock-logger.js';
import {
  createCommunicatorRegistry,
  importOptional,
  missingModuleOf,
  packageNameOf,
} from './registry.js';
import type {
  Communicator,
  CommunicatorContext,
  CommunicatorRegistry,
  PluginRegistrar,
} from './types.js';

// ─── Helpers ─────────────────────────────────────────────────────

const pluginsDir = (name: string): string =>
  fileURLToPath(new URL(`../testing/fixtures/plugins/${name}`, import.meta.url));

function stubCommunicator(type: string, agentName: string): Communicator {
  return {
    type,
    agentName,
    start: vi.fn(async () => {}),
    stop: vi.fn(async () => {}),
    sendRequest: async <T>(): Promise<T> => {
      throw new Error('not used');
    },
    sendNotification: vi.fn(async () => {}),
    registerHandler: vi.fn(),
  };
}

function moduleNotFound(specifier: string): Error {
  return Object.assign(
    new Error(`Cannot find package '${specifier}' imported from /srv/app/transport.js`),
    { code: 'ERR_MODULE_NOT_FOUND' },
  );
}

// ─── Tests ───────────────────────────────────────────────────────

describe('createCommunicatorRegistry', () => {
  let logger: MockLogger;
  let registry: CommunicatorRegistry;
  let context: CommunicatorContext;

  beforeEach(() => {
    logger = createMockLogger();
    registry = createCommunicatorRegistry({ logger });
    context = { agentName: 'alpha', serviceUrls: {}, options: {}, logger };
  });

  describe('register', () => {
    it('lists registered types in sorted order', () => {
      registry.register('zeta', () => stubCommunicator('zeta', 'x'));
      registry.register('beta', () => stubCommunicator('beta', 'x'));

      expect(registry.listTypes()).toEqual(['beta', 'zeta']);
      expect(registry.has('beta')).toBe(true);
      expect(registry.has('gamma')).toBe(false);
    });

    it('lets the last registration win and logs the overwrite', async () => {
      registry.register('demo', () => stubCommunicator('first', 'alpha'), { source: 'builtin' });
      registry.register('demo', () => stubCommunicator('second', 'alpha'));

      const communicator = await registry.resolve('demo', context);

      expect(communicator.type).toBe('second');
      expect(registry.getEntry('demo')?.source).toBe('runtime');
      expect(loggedMessages(logger, 'info')).toEqual(['Communicator type overwritten']);
    });

    it('rejects an empty type identifier', () => {
      expect(() => registry.register('', () => stubCommunicator('', 'x'))).toThrow(
        'Communicator type identifier cannot be empty',
      );
    });
  });

  describe('resolve', () => {
    it('passes the context to the factory', async () => {
      const factory = vi.fn((ctx: CommunicatorContext) => stubCommunicator('demo', ctx.agentName));
      registry.register('demo', factory);

      const communicator = await registry.resolve('demo', context);

      expect(factory).toHaveBeenCalledWith(context);
      expect(communicator.agentName).toBe('alpha');
    });

    it('fails with ConfigurationError listing known types for an unknown type', async () => {
      registry.register('http', () => stubCommunicator('http', 'x'));
      registry.register('mock', () => stubCommunicator('mock', 'x'));

      const resolving = registry.resolve('carrier-pigeon', context);

      await expect(resolving).rejects.toBeInstanceOf(ConfigurationError);
      await expect(resolving).rejects.toThrow(
        'Communicator type "carrier-pigeon" not found. Available types: http, mock',
      );
    });

    it('reports an empty registry', async () => {
      await expect(registry.resolve('http', context)).rejects.toThrow(
        'Communicator type "http" not found. Available types: (none)',
      );
    });

    it('turns a missing module into DependencyError with an install hint', async () => {
      registry.register('grpc', () => {
        throw moduleNotFound('@example/grpc-transport/client.js');
      });

      const error: unknown = await registry.resolve('grpc', context).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DependencyError);
      if (!(error instanceof DependencyError)) return;
      expect(error.dependency).toBe('@example/grpc-transport');
      expect(error.installHint).toBe('npm install @example/grpc-transport');
      expect(error.message).toBe(
        'Communicator type "grpc" requires the optional dependency "@example/grpc-transport", ' +
          'which is not installed. Install it with: npm install @example/grpc-transport',
      );
    });

    it('prefers the dependency and hint declared on the entry', async () => {
      registry.register(
        'mqtt',
        () => {
          throw moduleNotFound('mqtt-core');
        },
        { dependency: 'mqtt', installHint: 'npm install mqtt@5' },
      );

      const error: unknown = await registry.resolve('mqtt', context).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DependencyError);
      if (!(error instanceof DependencyError)) return;
      expect(error.dependency).toBe('mqtt');
      expect(error.installHint).toBe('npm install mqtt@5');
    });

    it('passes ConfigurationError from the factory through unchanged', async () => {
      const original = new ConfigurationError('port must be a number');
      registry.register('http', () => {
        throw original;
      });

      await expect(registry.resolve('http', context)).rejects.toBe(original);
    });

    it('wraps any other factory failure in CommunicatorCreationError', async () => {
      registry.register('flaky', async () => Promise.reject(new Error('boom')));

      const resolving = registry.resolve('flaky', context);

      await expect(resolving).rejects.toBeInstanceOf(CommunicatorCreationError);
      await expect(resolving).rejects.toThrow('Failed to create communicator "flaky": boom');
    });
  });

  describe('discoverPlugins', () => {
    it('loads named and default entry points from files and index directories', async () => {
      const dir = pluginsDir('basic');

      const report = await registry.discoverPlugins({ paths: [dir] });

      expect(report.loaded).toEqual([
        `${dir}/default-plugin/index.mjs`,
        `${dir}/echo-plugin.mjs`,
      ]);
      expect(report.failed).toEqual([]);
      expect(registry.listTypes()).toEqual(['default-fixture', 'echo-fixture']);
      expect(registry.getEntry('echo-fixture')).toMatchObject({
        source: 'plugin',
        origin: `${dir}/echo-plugin.mjs`,
        description: 'Echo communicator used by plugin discovery tests',
      });
    });

    it('resolves a communicator registered by a plugin', async () => {
      await registry.discoverPlugins({ paths: [pluginsDir('basic')] });

      const communicator = await registry.resolve('echo-fixture', context);

      await expect(communicator.sendRequest('anyone', 'ping', { n: 1 })).resolves.toEqual({
        method: 'ping',
        params: { n: 1 },
      });
    });

    it('skips plugins already loaded by an earlier pass', async () => {
      const dir = pluginsDir('basic');
      await registry.discoverPlugins({ paths: [dir] });

      const second = await registry.discoverPlugins({ paths: [dir] });

      expect(second.loaded).toEqual([]);
      expect(second.skipped).toEqual([`${dir}/default-plugin/index.mjs`, `${dir}/echo-plugin.mjs`]);
    });

    it('reports failing plugins without throwing', async () => {
      const dir = pluginsDir('broken');

      const report = await registry.discoverPlugins({ paths: [dir] });

      expect(report.loaded).toEqual([]);
      expect(report.failed).toEqual([
        {
          origin: `${dir}/no-entry.mjs`,
          error: 'Plugin does not export a registerCommunicators function',
        },
        { origin: `${dir}/throws.mjs`, error: 'plugin exploded' },
      ]);
      expect(loggedMessages(logger, 'warn')).toEqual([
        'Failed to load communicator plugin',
        'Failed to load communicator plugin',
      ]);
    });

    it('reports a missing directory', async () => {
      const dir = pluginsDir('does-not-exist');

      const report = await registry.discoverPlugins({ paths: [dir] });

      expect(report.failed).toHaveLength(1);
      expect(report.failed[0]?.origin).toBe(dir);
      expect(report.failed[0]?.error).toMatch(/^Plugin directory could not be read: ENOENT/);
    });

    it('loads plugins from package entry points', async () => {
      const registerCommunicators = vi.fn((registrar: PluginRegistrar) => {
        registrar.register('pkg-fixture', () => stubCommunicator('pkg-fixture', 'alpha'));
      });

      const report = await registry.discoverPlugins({
        entryPoints: () => [{ id: 'example-transport', load: async () => ({ registerCommunicators }) }],
      });

      expect(report.loaded).toEqual(['package:example-transport']);
      expect(registry.getEntry('pkg-fixture')).toMatchObject({
        source: 'plugin',
        origin: 'package:example-transport',
      });
    });

    it('reports an entry-point source that throws', async () => {
      const report = await registry.discoverPlugins({
        entryPoints: () => {
          throw new Error('package.json unreadable');
        },
      });

      expect(report.failed).toEqual([{ origin: 'entry-points', error: 'package.json unreadable' }]);
    });
  });

  describe('clear', () => {
    it('removes entries and forgets loaded plugins', async () => {
      const dir = pluginsDir('basic');
      await registry.discoverPlugins({ paths: [dir] });

      registry.clear();
      const report = await registry.discoverPlugins({ paths: [dir] });

      expect(report.loaded).toHaveLength(2);
      expect(report.skipped).toEqual([]);
    });
  });
});

describe('importOptional', () => {
  it('returns the module when it loads', async () => {
    await expect(
      importOptional(async () => Promise.resolve({ ready: true }), {
        typeId: 'demo',
        packageName: 'demo-transport',
      }),
    ).resolves.toEqual({ ready: true });
  });

  it('converts module-not-found into DependencyError', async () => {
    const loading = importOptional(async () => Promise.reject(moduleNotFound('demo-transport')), {
      typeId: 'demo',
      packageName: 'demo-transport',
    });

    await expect(loading).rejects.toBeInstanceOf(DependencyError);
    await expect(loading).rejects.toThrow('Install it with: npm install demo-transport');
  });

  it('rethrows other failures', async () => {
    const failure = new Error('syntax error in module');

    await expect(
      importOptional(async () => Promise.reject(failure), {
        typeId: 'demo',
        packageName: 'demo-transport',
      }),
    ).rejects.toBe(failure);
  });
});

describe('missingModuleOf', () => {
  it('finds the package in a nested cause', () => {
    const wrapped = new Error('factory failed', { cause: moduleNotFound('ws') });

    expect(missingModuleOf(wrapped)).toBe('ws');
  });

  it('ignores unrelated errors', () => {
    expect(missingModuleOf(new Error('nope'))).toBeUndefined();
    expect(missingModuleOf('text')).toBeUndefined();
  });
});

describe('packageNameOf', () => {
  it('keeps scope and name only', () => {
    expect(packageNameOf('@scope/pkg/dist/index.js')).toBe('@scope/pkg');
    expect(packageNameOf('pkg/sub')).toBe('pkg');
    expect(packageNameOf('./local.js')).toBe('./local.js');
  });
});
