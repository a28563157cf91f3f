/**
 * Configuration file support (YAML or JSON).
 *
 * A config file supplies defaults for the CLI flags; anything given on the
 * command line wins, and pattern lists from both are concatenated.
 */

import { readFileSync, existsSync } from 'fs';
import YAML from 'js-yaml';
import { ConfigError } from './errors.js';
import { isLogLevel, logger, type LogLevel } from './logger.js';
import { TIMESTAMP_POLICIES } from './timestamps.js';
import type { TimestampPolicy } from './types.js';

/** Environment variable naming a config file when --config is not given. */
export const CONFIG_ENV_VAR = 'ORGANIZE_BY_TIME_CONFIG';

export interface OrganizeConfig {
  outputDir?: string;
  strip: number;
  policy: TimestampPolicy;
  patterns: string[];
  notPatterns: string[];
  dryRun: boolean;
  force: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: OrganizeConfig = {
  strip: 0,
  policy: 'mtime',
  patterns: [],
  notPatterns: [],
  dryRun: false,
  force: false,
  logLevel: 'warn',
};

function cloneConfig(config: OrganizeConfig): OrganizeConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPolicy(value: unknown): value is TimestampPolicy {
  return typeof value === 'string' && (TIMESTAMP_POLICIES as readonly string[]).includes(value);
}

function toStringList(value: unknown): string[] | undefined {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value];
  }
  return undefined;
}

/**
 * Validate a parsed config document and merge it over the defaults.
 * Collects every problem before throwing.
 */
export function parseConfig(raw: unknown, source = 'config'): OrganizeConfig {
  if (raw === null || raw === undefined) {
    return cloneConfig(DEFAULT_CONFIG);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  const config = cloneConfig(DEFAULT_CONFIG);
  const errors: string[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;

    switch (key) {
      case 'outputDir':
        if (typeof value === 'string' && value.length > 0) config.outputDir = value;
        else errors.push('outputDir must be a non-empty string');
        break;
      case 'strip':
        if (typeof value === 'number' && Number.isInteger(value) && value >= 0) config.strip = value;
        else errors.push('strip must be a non-negative integer');
        break;
      case 'policy':
        if (isPolicy(value)) config.policy = value;
        else errors.push(`policy must be one of ${TIMESTAMP_POLICIES.join(', ')}`);
        break;
      case 'patterns':
      case 'notPatterns': {
        const list = toStringList(value);
        if (list) config[key] = list;
        else errors.push(`${key} must be a string or a list of strings`);
        break;
      }
      case 'dryRun':
      case 'force':
        if (typeof value === 'boolean') config[key] = value;
        else errors.push(`${key} must be a boolean`);
        break;
      case 'logLevel':
        if (isLogLevel(value)) config.logLevel = value;
        else errors.push('logLevel must be one of debug, info, warn, error');
        break;
      default:
        logger.warn(`Ignoring unknown config key: ${key}`, { source }, 'ConfigManager');
    }
  }

  if (errors.length > 0) {
    throw new ConfigError(`${source}: ${errors.join('; ')}`, { errors });
  }

  return config;
}

/**
 * Loads a config file once and hands out copies
 */
export class ConfigManager {
  private config: OrganizeConfig;
  private configPath?: string;

  constructor(configPath?: string) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  private loadConfig(): OrganizeConfig {
    if (!this.configPath) {
      return cloneConfig(DEFAULT_CONFIG);
    }

    if (!existsSync(this.configPath)) {
      throw new ConfigError(`Config file not found: ${this.configPath}`, { path: this.configPath });
    }

    const content = readFileSync(this.configPath, 'utf-8');
    let raw: unknown;

    try {
      if (this.configPath.endsWith('.json')) {
        raw = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        raw = YAML.load(content);
      } else {
        throw new Error('unsupported config format (use .yaml, .yml or .json)');
      }
    } catch (error) {
      throw new ConfigError(
        `Failed to parse ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: this.configPath },
      );
    }

    const config = parseConfig(raw, this.configPath);

    logger.info(
      `Loaded configuration from ${this.configPath}`,
      undefined,
      'ConfigManager'
    );

    return config;
  }

  getConfig(): OrganizeConfig {
    return cloneConfig(this.config);
  }
}
