/**
 * Enumerates communicator plugins declared by installed npm packages.
 *
 * A package opts in from its own package.json:
 *
 *   "agentry": { "communicators": "./dist/register.js" }
 *
 * The module it names exports `registerCommunicators(registrar)`.
 */
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { ConfigurationError, toError } from '@/core/errors.js';
import type { EntryPointSource, PluginEntryPoint } from './types.js';

const projectManifestSchema = z.object({
  dependencies: z.record(z.string()).optional(),
  optionalDependencies: z.record(z.string()).optional(),
});

const pluginManifestSchema = z.object({
  agentry: z.object({ communicators: z.string().min(1) }).optional(),
});

export interface PackageEntryPointSourceOptions {
  /** Directory holding the project's package.json and node_modules. */
  projectRoot: string;
}

async function readJson(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8');
  return JSON.parse(content) as unknown;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Build an entry-point source for `discoverPlugins` from the project's dependencies. */
export function createPackageEntryPointSource(options: PackageEntryPointSourceOptions): EntryPointSource {
  const projectRoot = resolve(options.projectRoot);

  return async () => {
    const manifestPath = join(projectRoot, 'package.json');
    let manifest: z.infer<typeof projectManifestSchema>;
    try {
      manifest = projectManifestSchema.parse(await readJson(manifestPath));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read project manifest ${manifestPath}: ${toError(error).message}`,
        { manifestPath },
        toError(error),
      );
    }

    const packageNames = Object.keys({
      ...manifest.dependencies,
      ...manifest.optionalDependencies,
    }).sort();

    const entryPoints: PluginEntryPoint[] = [];
    for (const name of packageNames) {
      const packageDir = join(projectRoot, 'node_modules', name);
      let declared: z.infer<typeof pluginManifestSchema>;
      try {
        declared = pluginManifestSchema.parse(await readJson(join(packageDir, 'package.json')));
      } catch (error) {
        // Optional dependencies may legitimately be absent.
        if (isMissingFile(error)) continue;
        throw error;
      }

      const modulePath = declared.agentry?.communicators;
      if (modulePath === undefined) continue;
      const moduleUrl = pathToFileURL(join(packageDir, modulePath)).href;
      entryPoints.push({ id: name, load: () => import(moduleUrl) });
    }
    return entryPoints;
  };
}
