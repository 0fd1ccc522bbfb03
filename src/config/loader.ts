/**
 * Configuration loader — reads an optional JSON config file, resolves
 * environment variable placeholders, overlays environment variables and
 * validates the result with Zod.
 */
import { readFile } from 'node:fs/promises';

import { parse as parseDotenv } from 'dotenv';

import { ConfigurationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, isErr, ok } from '@/core/result.js';

import { agentConfigSchema } from './schema.js';
import type { AgentConfig } from './schema.js';

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Recursively resolves environment variable placeholders in an object.
 * Replaces strings matching the pattern `${VAR_NAME}` with the value
 * of the corresponding environment variable.
 *
 * @throws ConfigurationError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigurationError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

// ─── Helpers ────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Recursively merge two objects; `override` wins, nested objects merge. */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

function parseJsonVariable(name: string, raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    throw new ConfigurationError(`Invalid JSON in ${name}`, { variableName: name });
  }
}

function parseJsonObjectVariable(name: string, raw: string): Record<string, unknown> {
  const parsed = parseJsonVariable(name, raw);
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`${name} must be a JSON object`, { variableName: name });
  }
  return parsed;
}

/** Parse a value as JSON, falling back to the raw string. */
function parseLooseValue(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}

// ─── Environment Overlay ────────────────────────────────────────

/**
 * Overlay agent settings from environment variables onto `base`.
 *
 * Recognized (each optionally prefixed with `<prefix>_`): AGENT_NAME, LOG_LEVEL,
 * COMMUNICATOR_TYPE, SERVICE_URLS (JSON object), SERVICE_URL_<NAME>,
 * COMMUNICATOR_OPTIONS (JSON object, deep-merged), COMMUNICATOR_OPTION_<NAME>
 * and PLUGIN_PATHS (JSON array).
 */
export function applyEnvOverrides(
  base: Record<string, unknown>,
  env: Env,
  prefix = '',
): Record<string, unknown> {
  const p = prefix ? `${prefix}_` : '';
  const config: Record<string, unknown> = { ...base };

  const name = env[`${p}AGENT_NAME`];
  if (name) config['name'] = name;

  const logLevel = env[`${p}LOG_LEVEL`];
  if (logLevel) config['logLevel'] = logLevel;

  const communicatorType = env[`${p}COMMUNICATOR_TYPE`];
  if (communicatorType) config['communicatorType'] = communicatorType;

  let serviceUrls: Record<string, unknown> = isPlainObject(config['serviceUrls'])
    ? { ...config['serviceUrls'] }
    : {};
  const serviceUrlsJson = env[`${p}SERVICE_URLS`];
  if (serviceUrlsJson) {
    serviceUrls = parseJsonObjectVariable(`${p}SERVICE_URLS`, serviceUrlsJson);
  }

  let communicatorOptions: Record<string, unknown> = isPlainObject(config['communicatorOptions'])
    ? { ...config['communicatorOptions'] }
    : {};
  const optionsJson = env[`${p}COMMUNICATOR_OPTIONS`];
  if (optionsJson) {
    communicatorOptions = deepMerge(
      communicatorOptions,
      parseJsonObjectVariable(`${p}COMMUNICATOR_OPTIONS`, optionsJson),
    );
  }

  const serviceUrlPrefix = `${p}SERVICE_URL_`;
  const optionPrefix = `${p}COMMUNICATOR_OPTION_`;
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (key.startsWith(serviceUrlPrefix)) {
      serviceUrls[key.slice(serviceUrlPrefix.length).toLowerCase()] = value;
    } else if (key.startsWith(optionPrefix)) {
      communicatorOptions[key.slice(optionPrefix.length).toLowerCase()] = parseLooseValue(value);
    }
  }

  config['serviceUrls'] = serviceUrls;
  config['communicatorOptions'] = communicatorOptions;

  const pluginPaths = env[`${p}PLUGIN_PATHS`];
  if (pluginPaths) {
    const parsed = parseJsonVariable(`${p}PLUGIN_PATHS`, pluginPaths);
    if (!Array.isArray(parsed)) {
      throw new ConfigurationError(`${p}PLUGIN_PATHS must be a JSON array`, {
        variableName: `${p}PLUGIN_PATHS`,
      });
    }
    config['pluginPaths'] = parsed;
  }

  return config;
}

// ─── Validation ─────────────────────────────────────────────────

/** Validate raw agent configuration, applying defaults. */
export function parseAgentConfig(input: unknown): Result<AgentConfig, ConfigurationError> {
  const validation = agentConfigSchema.safeParse(input);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
    return err(new ConfigurationError(`Configuration validation failed: ${summary}`, { issues }));
  }
  return ok(validation.data);
}

// ─── Configuration Loader ───────────────────────────────────────

export interface LoadAgentConfigOptions {
  /** Path to a JSON configuration file. Optional; environment alone may suffice. */
  filePath?: string;
  /** Environment to read. Defaults to `process.env`. */
  env?: Env;
  /** Prefix for environment variables, e.g. `WORKER` reads `WORKER_AGENT_NAME`. */
  prefix?: string;
  /** A dotenv file whose variables sit beneath `env`. A missing file is ignored. */
  envFile?: string;
}

async function readEnvFile(envFile: string): Promise<Result<Env, ConfigurationError>> {
  try {
    return ok(parseDotenv(await readFile(envFile, 'utf-8')));
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') return ok({});
    return err(
      new ConfigurationError(`Failed to read environment file: ${envFile}`, {
        envFile,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }
}

/**
 * Loads and validates an agent configuration.
 *
 * 0. Reads the dotenv file (if given) beneath the environment
 * 1. Reads the JSON file from disk (if given)
 * 2. Resolves `${VAR}` placeholders
 * 3. Overlays environment variables (highest precedence)
 * 4. Validates against the Zod schema
 */
export async function loadAgentConfig(
  options: LoadAgentConfigOptions = {},
): Promise<Result<AgentConfig, ConfigurationError>> {
  const { filePath, prefix = '', envFile } = options;

  // 0. Layer the dotenv file under the environment
  let env: Env = options.env ?? process.env;
  if (envFile !== undefined) {
    const fromFile = await readEnvFile(envFile);
    if (isErr(fromFile)) return fromFile;
    env = { ...fromFile.value, ...env };
  }

  // 1. Read the file
  let parsed: unknown = {};
  if (filePath !== undefined) {
    let fileContent: string;
    try {
      fileContent = await readFile(filePath, 'utf-8');
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
      if (code === 'ENOENT') {
        return err(
          new ConfigurationError(`Configuration file not found: ${filePath}`, {
            filePath,
            errorCode: 'ENOENT',
          }),
        );
      }
      return err(
        new ConfigurationError(`Failed to read configuration file: ${filePath}`, {
          filePath,
          errorCode: code,
          errorMessage: error instanceof Error ? error.message : String(error),
        }),
      );
    }

    try {
      parsed = JSON.parse(fileContent) as unknown;
    } catch {
      return err(new ConfigurationError('Invalid JSON in configuration file', { filePath }));
    }

    if (!isPlainObject(parsed)) {
      return err(new ConfigurationError('Configuration file must contain a JSON object', { filePath }));
    }
  }

  // 2–3. Resolve placeholders, overlay environment
  let merged: Record<string, unknown>;
  try {
    const resolved = resolveEnvVars(parsed, env);
    merged = applyEnvOverrides(isPlainObject(resolved) ? resolved : {}, env, prefix);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return err(error);
    }
    return err(
      new ConfigurationError('Failed to apply environment configuration', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 4. Validate with Zod
  return parseAgentConfig(merged);
}
