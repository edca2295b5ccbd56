/**
 * Configuration Loader
 *
 * Layers defaults, an optional YAML file and environment variables, then
 * validates the result.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import {
  VarExportConfig,
  VarExportConfigSchema,
  ENV_OVERRIDES,
  CONFIG_PATH_ENV,
} from './types';
import { ConfigLoadError, ConfigValidationError } from './errors';

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): RawConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read config file: ${configPath}`,
      error instanceof Error ? error : undefined,
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to parse YAML in ${configPath}`,
      error instanceof Error ? error : undefined,
    );
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigLoadError(`Config file ${configPath} must contain a mapping`);
  }
  return parsed;
}

function convertEnvValue(value: string): string | boolean {
  const lowered = value.trim().toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  return value.trim();
}

function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const result: RawConfig = { ...config };

  for (const [variable, [section, key]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;

    const current = result[section];
    result[section] = {
      ...(isRecord(current) ? current : {}),
      [key]: convertEnvValue(value),
    };
  }

  return result;
}

/**
 * Load exporter configuration.
 *
 * @throws {ConfigLoadError} if the config file cannot be read or parsed
 * @throws {ConfigValidationError} if a value fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): VarExportConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env[CONFIG_PATH_ENV];

  const fromFile = configPath ? readConfigFile(configPath) : {};
  const merged = applyEnvOverrides(fromFile, env);

  const result = VarExportConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    const value = issue.path.reduce<unknown>(
      (node, segment) => (isRecord(node) ? node[String(segment)] : undefined),
      merged,
    );
    throw new ConfigValidationError(
      `Invalid configuration${field ? ` at ${field}` : ''}: ${issue.message}`,
      field,
      value,
    );
  }

  return result.data;
}
