/**
 * Configuration Loader
 *
 * Loads and validates configuration files.
 * Supports JSON and JSONC (with comments).
 * Uses Zod for runtime validation.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { type ParseError, parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';
import { ConfigError } from './errors.js';
import { createSilentLogger, type Logger } from './logger.js';
import {
  type BridgeConfig,
  formatConfigError,
  type RegistryConnection,
  safeParseConfig,
  safeParseRegistryConnection
} from './schemas.js';
import { expandConfig, type GetEnv, validateEnvironmentVariables } from './utils/env-expander.js';

export type LoadedConfig = {
  path: string;
  exists: boolean;
  data: BridgeConfig;
};

export type LoadConfigOptions = {
  logger?: Logger;
  getEnv?: GetEnv;
  cwd?: string;
};

/**
 * Load configuration from file
 *
 * A missing file yields the defaults. Every other problem is a ConfigError
 * naming the file.
 */
export async function loadBridgeConfig(
  configPath: string,
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const logger = options.logger ?? createSilentLogger();
  const getEnv = options.getEnv ?? ((key: string) => process.env[key]);
  const absolutePath = isAbsolute(configPath)
    ? configPath
    : resolve(options.cwd ?? process.cwd(), configPath);

  if (!existsSync(absolutePath)) {
    logger.debug(`Config file not found: ${absolutePath}, using defaults`);
    return { path: absolutePath, exists: false, data: parseConfigData({}) };
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read configuration file ${absolutePath}`, { cause: error });
  }

  const errors: ParseError[] = [];
  const rawData: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  const [firstError] = errors;
  if (firstError) {
    throw new ConfigError(
      `Invalid JSON in configuration file ${absolutePath}: ${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`
    );
  }

  validateEnvironmentVariables(rawData, getEnv);
  const data = parseConfigData(expandConfig(rawData, getEnv));

  logger.debug(`Loaded, expanded, and validated config from ${absolutePath}`);
  return { path: absolutePath, exists: true, data };
}

function parseConfigData(raw: unknown): BridgeConfig {
  const parseResult = safeParseConfig(raw);
  if (!parseResult.success) {
    throw new ConfigError(formatConfigError(parseResult.error), { cause: parseResult.error });
  }
  return parseResult.data;
}

/**
 * Registry connection from NACOS_* environment variables
 *
 * `overrides` win over the environment.
 */
export function registryConnectionFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<RegistryConnection> = {}
): RegistryConnection {
  const fromEnv: Record<string, string> = {};
  const mapping = {
    serverAddr: 'NACOS_SERVER_ADDR',
    namespaceId: 'NACOS_NAMESPACE',
    username: 'NACOS_USERNAME',
    password: 'NACOS_PASSWORD',
    accessToken: 'NACOS_ACCESS_TOKEN'
  } as const;

  for (const [field, variable] of Object.entries(mapping)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      fromEnv[field] = value;
    }
  }

  return resolveRegistryConnection({ ...fromEnv, ...overrides });
}

/**
 * Fill defaults into a partial connection config
 */
export function resolveRegistryConnection(
  input: unknown = {}
): RegistryConnection {
  const result = safeParseRegistryConnection(input);
  if (!result.success) {
    throw new ConfigError(formatConfigError(result.error), { cause: result.error });
  }
  return result.data;
}
