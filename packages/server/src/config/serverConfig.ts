/**
 * @fileoverview Server configuration loading from YAML.
 * Validates, applies environment overrides, and caches the result.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/** Longest move timeout a Node timer can hold (2^31 - 1 ms) */
export const MAX_MOVE_TIMEOUT_SECONDS = 2_147_483;

const ServerConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(5000),
  moveTimeoutSeconds: z.coerce
    .number()
    .positive()
    .finite()
    .max(MAX_MOVE_TIMEOUT_SECONDS)
    .default(30),
  bufferSize: z.coerce.number().int().positive().default(1024),
  logLevel: LogLevelSchema.default('info'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/** Configuration used when no file and no environment overrides are given. */
export const DEFAULT_SERVER_CONFIG: ServerConfig = ServerConfigSchema.parse({});

let cachedConfig: ServerConfig | null = null;

/**
 * Read the YAML file, or an empty object when the default file is absent.
 * An explicitly configured path must exist.
 */
function readConfigFile(configPath: string, explicit: boolean): unknown {
  if (!existsSync(configPath)) {
    if (explicit) {
      throw new Error(`Invalid server configuration: ${configPath} does not exist`);
    }
    return {};
  }
  const parsed: unknown = parseYaml(readFileSync(configPath, 'utf8'));
  return parsed ?? {};
}

/**
 * Environment variables that override file values.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  const mapping: Array<[string, keyof ServerConfig]> = [
    ['HOST', 'host'],
    ['PORT', 'port'],
    ['MOVE_TIMEOUT_SECONDS', 'moveTimeoutSeconds'],
    ['LOG_LEVEL', 'logLevel'],
  ];
  for (const [variable, key] of mapping) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      overrides[key] = value;
    }
  }
  return overrides;
}

/**
 * Load and validate the server configuration.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/server.yaml relative to cwd (project root)
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const explicitPath = env['CONFIG_PATH'];
  const configPath = explicitPath ?? join(process.cwd(), 'config/server.yaml');

  const fileValues = readConfigFile(configPath, explicitPath !== undefined);
  if (typeof fileValues !== 'object' || fileValues === null || Array.isArray(fileValues)) {
    throw new Error(`Invalid server configuration: ${configPath} must contain a mapping`);
  }

  const result = ServerConfigSchema.safeParse({ ...fileValues, ...readEnvOverrides(env) });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid server configuration: ${details}`);
  }

  cachedConfig = result.data;
  return result.data;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
