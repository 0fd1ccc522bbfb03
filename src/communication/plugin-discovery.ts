/**
 * Locates communicator plugin modules on disk and extracts their entry point.
 *
 * A plugin is a `.js`, `.mjs` or `.cjs` file (or a directory with an
 * `index.js` / `index.mjs`) exporting `registerCommunicators(registrar)`,
 * either by name or as the default export.
 */
import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Logger } from '@/observability/logger.js';
import { PLUGIN_ENTRY_POINT } from './types.js';
import type { PluginEntryPointFn } from './types.js';

const PLUGIN_EXTENSIONS = new Set(['.js', '.mjs', '.cjs']);
const INDEX_FILES = ['index.js', 'index.mjs'];

/** A plugin module found on disk, not yet imported. */
export interface PluginModuleRef {
  /** Absolute file path; doubles as the plugin's identity. */
  origin: string;
  load(): Promise<unknown>;
}

export interface PluginScanResult {
  modules: PluginModuleRef[];
  failed: Array<{ origin: string; error: string }>;
}

function isEntryPointFn(value: unknown): value is PluginEntryPointFn {
  return typeof value === 'function';
}

/**
 * Pull the `registerCommunicators` function out of an imported module.
 * Accepts a named export, a default function export, or a default object carrying it.
 */
export function extractEntryPoint(mod: unknown): PluginEntryPointFn | undefined {
  if (typeof mod !== 'object' || mod === null) return undefined;

  if (PLUGIN_ENTRY_POINT in mod && isEntryPointFn(mod[PLUGIN_ENTRY_POINT])) {
    return mod[PLUGIN_ENTRY_POINT];
  }

  if ('default' in mod) {
    const fallback = mod.default;
    if (isEntryPointFn(fallback)) return fallback;
    if (
      typeof fallback === 'object' &&
      fallback !== null &&
      PLUGIN_ENTRY_POINT in fallback &&
      isEntryPointFn(fallback[PLUGIN_ENTRY_POINT])
    ) {
      return fallback[PLUGIN_ENTRY_POINT];
    }
  }

  return undefined;
}

function moduleRef(path: string): PluginModuleRef {
  return {
    origin: path,
    load: () => import(pathToFileURL(path).href),
  };
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Scan directories for plugin modules, in sorted order per directory.
 * Missing or unreadable directories are reported in `failed` and logged.
 */
export async function scanPluginDirectories(
  paths: readonly string[],
  logger: Logger,
): Promise<PluginScanResult> {
  const result: PluginScanResult = { modules: [], failed: [] };

  for (const rawPath of paths) {
    const dir = resolve(rawPath);
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Plugin directory could not be read', {
        component: 'plugin-discovery',
        event: 'plugins.directory_unreadable',
        path: dir,
        error: message,
      });
      result.failed.push({ origin: dir, error: `Plugin directory could not be read: ${message}` });
      continue;
    }

    const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of sorted) {
      if (entry.name.startsWith('.') || entry.name.startsWith('_')) continue;
      const fullPath = join(dir, entry.name);

      if (entry.isFile() && PLUGIN_EXTENSIONS.has(extname(entry.name))) {
        result.modules.push(moduleRef(fullPath));
        continue;
      }

      if (entry.isDirectory()) {
        for (const indexName of INDEX_FILES) {
          const indexPath = join(fullPath, indexName);
          if (await isFile(indexPath)) {
            result.modules.push(moduleRef(indexPath));
            break;
          }
        }
      }
    }
  }

  return result;
}
