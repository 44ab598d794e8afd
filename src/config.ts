/**
 * Configuration loading and management
 * Loads from an optional YAML config file with environment variable overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  type FileConfig,
  type LogLevel,
  type ServerConfig,
  DEFAULT_CONFIG,
  FileConfigSchema,
  LogLevelSchema,
  MAX_TIMEOUT_MS,
} from './types/config.js';
import { getConfigDirectory } from './utils/paths.js';

export const ENV_API_KEY = 'PINECONE_API_KEY';
export const ENV_ASSISTANT_HOST = 'PINECONE_ASSISTANT_HOST';
export const ENV_TIMEOUT_MS = 'PINECONE_TIMEOUT_MS';
export const ENV_LOG_LEVEL = 'LOG_LEVEL';
export const ENV_CONFIG_PATH = 'ASSISTANT_MCP_CONFIG_PATH';

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Config file search paths (in priority order), used when
 * ASSISTANT_MCP_CONFIG_PATH is not set
 *
 * 1. Project-local: .pinecone-assistant.yaml / .yml in the working directory
 * 2. Platform config dir: <config dir>/config.yaml
 */
export function getConfigSearchPaths(env: NodeJS.ProcessEnv, cwd: string): string[] {
  const paths: string[] = [];

  paths.push(join(cwd, '.pinecone-assistant.yaml'));
  paths.push(join(cwd, '.pinecone-assistant.yml'));

  const configDir = getConfigDirectory(env);
  paths.push(join(configDir, 'config.yaml'));
  paths.push(join(configDir, 'config.yml'));

  return paths;
}

function findConfigFile(env: NodeJS.ProcessEnv, cwd: string): string | null {
  const explicitPath = env[ENV_CONFIG_PATH];
  if (explicitPath) {
    const fullPath = resolve(cwd, explicitPath);
    // An explicit path that does not exist is a mistake, not a fallthrough
    if (!existsSync(fullPath)) {
      throw new ConfigError(`Config file not found: ${fullPath}`);
    }
    return fullPath;
  }

  for (const path of getConfigSearchPaths(env, cwd)) {
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

export function loadConfigFromFile(filePath: string): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load config from ${filePath}: ${reason}`, { cause: error });
  }

  // An empty file parses to null
  if (raw === null || raw === undefined) {
    return {};
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${filePath}: ${issues}`);
  }
  return parsed.data;
}

interface PartialServerConfig {
  pinecone: { apiKey?: string; assistantHost: string; timeoutMs: number };
  logging: { level: LogLevel };
}

function mergeConfigs(base: PartialServerConfig, override: FileConfig): PartialServerConfig {
  const pinecone = { ...base.pinecone };
  const { apiKey, assistantHost, timeoutMs } = override.pinecone ?? {};
  if (apiKey !== undefined) pinecone.apiKey = apiKey;
  if (assistantHost !== undefined) pinecone.assistantHost = assistantHost;
  if (timeoutMs !== undefined) pinecone.timeoutMs = timeoutMs;

  const logging = { ...base.logging };
  const level = override.logging?.level;
  if (level !== undefined) logging.level = level;

  return { pinecone, logging };
}

function applyEnvironmentOverrides(
  config: PartialServerConfig,
  env: NodeJS.ProcessEnv
): PartialServerConfig {
  const pinecone = { ...config.pinecone };
  const logging = { ...config.logging };

  const apiKey = env[ENV_API_KEY];
  if (apiKey) {
    pinecone.apiKey = apiKey;
  }

  const host = env[ENV_ASSISTANT_HOST];
  if (host) {
    pinecone.assistantHost = host;
  }

  const timeout = env[ENV_TIMEOUT_MS];
  if (timeout) {
    const timeoutMs = Number(timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
      throw new ConfigError(
        `Invalid ${ENV_TIMEOUT_MS}: ${timeout} (expected an integer from 1 to ${MAX_TIMEOUT_MS})`
      );
    }
    pinecone.timeoutMs = timeoutMs;
  }

  const level = env[ENV_LOG_LEVEL];
  if (level) {
    const parsed = LogLevelSchema.safeParse(level.toLowerCase());
    if (!parsed.success) {
      throw new ConfigError(`Invalid ${ENV_LOG_LEVEL}: ${level}`);
    }
    logging.level = parsed.data;
  }

  return { pinecone, logging };
}

/**
 * Load configuration: defaults, then config file, then environment.
 *
 * @throws ConfigError when no API key is configured or a config file is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let config: PartialServerConfig = {
    pinecone: { ...DEFAULT_CONFIG.pinecone },
    logging: { ...DEFAULT_CONFIG.logging },
  };

  const configPath = findConfigFile(env, cwd);
  if (configPath) {
    config = mergeConfigs(config, loadConfigFromFile(configPath));
  }

  config = applyEnvironmentOverrides(config, env);

  const { apiKey, assistantHost, timeoutMs } = config.pinecone;
  if (!apiKey) {
    throw new ConfigError(`Missing environment variable: ${ENV_API_KEY}`);
  }

  return {
    pinecone: { apiKey, assistantHost, timeoutMs },
    logging: config.logging,
  };
}
