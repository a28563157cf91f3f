#!/usr/bin/env node
/**
 * organize-by-time - move files into per-year folders
 *
 * Usage:
 *   organize-by-time --output-dir=OUTPUT [options] <directory>...
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';
import { ConfigManager, CONFIG_ENV_VAR, type OrganizeConfig } from './config.js';
import { InvalidInputError, PARTIAL_FAILURE_EXIT_CODE } from './errors.js';
import { handleError, isLogLevel, logger } from './logger.js';
import { organize } from './organizer.js';
import type { OrganizeOptions, TimestampPolicy } from './types.js';

export const VERSION = '1.0.0';

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export interface CliArgs {
  command: 'run' | 'help' | 'version';
  directories: string[];
  outputDir?: string;
  strip?: number;
  policy?: TimestampPolicy;
  patterns: string[];
  notPatterns: string[];
  /** Unset means "use the config file". */
  dryRun?: boolean;
  force?: boolean;
  verbose: boolean;
  configPath?: string;
}

const VALUE_OPTIONS: Record<string, string> = {
  '-O': '--output-dir',
  '--output-dir': '--output-dir',
  '-s': '--strip',
  '--strip': '--strip',
  '-p': '--pattern',
  '--pattern': '--pattern',
  '-P': '--not-pattern',
  '--not-pattern': '--not-pattern',
  '-c': '--config',
  '--config': '--config',
};

function parseStrip(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidInputError(`Invalid --strip value: ${value} (expected a non-negative integer)`);
  }
  return parseInt(value, 10);
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    command: 'run',
    directories: [],
    patterns: [],
    notPatterns: [],
    verbose: false,
  };

  let oldest = false;
  let newest = false;
  let i = 0;

  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--') {
      result.directories.push(...argv.slice(i + 1));
      break;
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq > 0 ? arg.slice(0, eq) : arg;
    const option = VALUE_OPTIONS[name];

    if (option) {
      let value: string | undefined;
      if (eq > 0) {
        value = arg.slice(eq + 1);
      } else {
        value = argv[++i];
      }
      if (value === undefined) {
        throw new InvalidInputError(`Missing value for ${option}`);
      }

      switch (option) {
        case '--output-dir':
          result.outputDir = value;
          break;
        case '--strip':
          result.strip = parseStrip(value);
          break;
        case '--pattern':
          result.patterns.push(value);
          break;
        case '--not-pattern':
          result.notPatterns.push(value);
          break;
        case '--config':
          result.configPath = value;
          break;
      }
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else if (arg === '--version') {
      if (result.command !== 'help') result.command = 'version';
    } else if (arg === '--oldest' || arg === '-o') {
      oldest = true;
    } else if (arg === '--newest' || arg === '-n') {
      newest = true;
    } else if (arg === '--dry-run' || arg === '-d') {
      result.dryRun = true;
    } else if (arg === '--no-dry-run') {
      result.dryRun = false;
    } else if (arg === '--force' || arg === '-f') {
      result.force = true;
    } else if (arg === '--no-force') {
      result.force = false;
    } else if (arg === '--verbose' || arg === '-v') {
      result.verbose = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new InvalidInputError(`Unknown argument: ${arg}`);
    } else {
      result.directories.push(arg);
    }

    i++;
  }

  if (oldest && newest) {
    throw new InvalidInputError("Can't specify both --oldest and --newest");
  }
  if (oldest) result.policy = 'oldest';
  if (newest) result.policy = 'newest';

  return result;
}

/**
 * Combine parsed flags with config file values. Flags win; pattern lists
 * from both sources are concatenated.
 */
export function resolveOptions(args: CliArgs, fileConfig: OrganizeConfig): OrganizeOptions {
  const outputDir = args.outputDir ?? fileConfig.outputDir;
  if (!outputDir) {
    throw new InvalidInputError('Missing required option: --output-dir');
  }
  if (args.directories.length === 0) {
    throw new InvalidInputError('Missing source directory');
  }

  return {
    directories: args.directories,
    outputDir,
    stripCount: args.strip ?? fileConfig.strip,
    policy: args.policy ?? fileConfig.policy,
    inclusionPatterns: [...fileConfig.patterns, ...args.patterns],
    exclusionPatterns: [...fileConfig.notPatterns, ...args.notPatterns],
    dryRun: args.dryRun ?? fileConfig.dryRun,
    force: args.force ?? fileConfig.force,
  };
}

export function formatHelp(): string {
  return `
organize-by-time - Move files into per-year folders by their timestamps

USAGE:
  organize-by-time --output-dir=OUTPUT [options] <directory>...
  organize-by-time (-h | --help)
  organize-by-time --version

OPTIONS:
  -O, --output-dir <path>     Output directory (required, or outputDir in config)
  -s, --strip <n>             Strip N leftmost directories (default: 0)
  -o, --oldest                Use the oldest of modified/created/accessed times
  -n, --newest                Use the newest of modified/created/accessed times
  -p, --pattern <glob>        Only consider files whose name matches (repeatable)
  -P, --not-pattern <glob>    Ignore files whose name matches (repeatable)
  -d, --dry-run               Only print, do not move any files
      --no-dry-run            Move files even if the config file sets dryRun
  -f, --force                 Overwrite files if a conflict is found
      --no-force              Keep existing files even if the config file sets force
  -c, --config <path>         YAML or JSON config file (or $${CONFIG_ENV_VAR})
  -v, --verbose               Log progress to stderr
  -h, --help                  Show this screen
      --version               Show version

Paths are kept relative to the parent of each source directory, so the
directory's own name is the first component --strip removes.

EXAMPLES:
  # Preview, ignoring backup and hidden files
  organize-by-time --dry-run --not-pattern='*~' --not-pattern='.*' --output-dir=output example

  # Drop the top directory and date by the oldest timestamp
  organize-by-time --oldest --strip=1 --output-dir=output example
`;
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Runs the CLI and returns the process exit code.
 */
export function run(argv: string[], env: NodeJS.ProcessEnv = process.env): number {
  try {
    const args = parseArgs(argv);

    if (args.command === 'help') {
      console.log(formatHelp());
      return 0;
    }
    if (args.command === 'version') {
      console.log(`organize-by-time v${VERSION}`);
      return 0;
    }

    const fileConfig = new ConfigManager(args.configPath ?? env[CONFIG_ENV_VAR]).getConfig();

    if (args.verbose) {
      logger.setMinLevel('info');
    } else if (isLogLevel(env.LOG_LEVEL)) {
      logger.setMinLevel(env.LOG_LEVEL);
    } else {
      logger.setMinLevel(fileConfig.logLevel);
    }

    const summary = organize(resolveOptions(args, fileConfig));

    if (summary.failed > 0) {
      logger.error(`total errors: ${summary.failed}`, undefined, 'cli');
      return PARTIAL_FAILURE_EXIT_CODE;
    }
    return 0;
  } catch (error) {
    return handleError(error, 'cli').statusCode;
  }
}

function isInvokedDirectly(): boolean {
  if (!process.argv[1]) return false;
  try {
    return fs.realpathSync(path.resolve(process.argv[1])) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isInvokedDirectly()) {
  loadEnv();
  process.exitCode = run(process.argv.slice(2));
}
