/**
 * Single-pass organizer: walk each source directory, pick every file's year
 * and move it under `outputDir/<year>/`.
 *
 * Paths are remapped relative to the parent of each source directory, so the
 * source directory's own name is the first segment that `stripCount` removes.
 */

import fs from 'node:fs';
import path from 'node:path';
import { DestinationExistsError, InvalidInputError, UnsupportedNameError } from './errors.js';
import { moveFile } from './file-mover.js';
import { listFiles } from './file-walker.js';
import { AppError, logger } from './logger.js';
import { remap } from './path-remapper.js';
import { FileFilter } from './pattern-matcher.js';
import { selectTimestamp } from './timestamps.js';
import type { FileFailure, OrganizeOptions, RemapConfig, RunSummary } from './types.js';

export function formatMoveLine(source: string, destination: string): string {
  return `move ${JSON.stringify(source)} ${JSON.stringify(destination)}`;
}

function assertDirectory(directory: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(directory);
  } catch {
    throw new InvalidInputError(`Source directory does not exist: ${directory}`, { directory });
  }
  if (!stats.isDirectory()) {
    throw new InvalidInputError(`Source path is not a directory: ${directory}`, { directory });
  }
}

/**
 * Checks everything that would make the whole run pointless. Throws before
 * any file is looked at.
 */
export function validateOptions(options: OrganizeOptions): FileFilter {
  if (options.directories.length === 0) {
    throw new InvalidInputError('At least one source directory is required');
  }
  if (!options.outputDir) {
    throw new InvalidInputError('An output directory is required (--output-dir)');
  }
  if (!Number.isInteger(options.stripCount) || options.stripCount < 0) {
    throw new InvalidInputError(`Strip count must be a non-negative integer, got ${options.stripCount}`);
  }

  for (const directory of options.directories) {
    assertDirectory(directory);
  }

  return new FileFilter(options.inclusionPatterns, options.exclusionPatterns);
}

function toFailure(source: string, destination: string | undefined, error: unknown): FileFailure {
  if (error instanceof AppError) {
    return { source, destination, code: error.code, message: error.message };
  }
  return {
    source,
    destination,
    code: 'MOVE_FAILED',
    message: error instanceof Error ? error.message : String(error),
  };
}

function processRoot(
  config: RemapConfig,
  options: OrganizeOptions,
  filter: FileFilter,
  summary: RunSummary,
): void {
  const rootAbs = path.resolve(config.root);
  const scanBase = path.dirname(rootAbs);

  // Files already moved into an output dir below the root must not be found again.
  const outputRelative = path.relative(rootAbs, path.resolve(config.outputDir));
  const outputInsideRoot =
    outputRelative !== '' &&
    outputRelative !== '..' &&
    !outputRelative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(outputRelative);
  const skipDirectories = outputInsideRoot ? [config.outputDir] : [];

  logger.info(`Scanning ${config.root}`, { outputDir: config.outputDir, strip: config.stripCount }, 'organizer');

  const onUnsupportedName = (source: string): void => {
    const error = new UnsupportedNameError(source);
    summary.failed++;
    summary.errors.push(toFailure(source, undefined, error));
    logger.error(`Error: ${JSON.stringify(source)}: ${error.message}`, undefined, 'organizer');
  };

  for (const source of listFiles(config.root, filter, { skipDirectories, onUnsupportedName })) {
    summary.scanned++;
    let destination: string | undefined;

    try {
      const timestamp = selectTimestamp(fs.statSync(source), options.policy);
      destination = remap(scanBase, source, timestamp, config.stripCount, config.outputDir).destination;

      console.log(formatMoveLine(source, destination));

      const outcome = moveFile(source, destination, { dryRun: options.dryRun, force: options.force });
      if (outcome.status === 'planned') {
        summary.planned++;
      } else {
        summary.moved++;
        if (outcome.overwritten) {
          logger.info(`Overwrote ${destination}`, { source }, 'organizer');
        }
      }
    } catch (error) {
      summary.failed++;
      const failure = toFailure(source, destination, error);
      summary.errors.push(failure);

      if (error instanceof DestinationExistsError) {
        logger.warn(`Skipped ${JSON.stringify(source)}: ${error.message}`, { destination }, 'organizer');
      } else {
        logger.error(
          `Error: dest: ${JSON.stringify(destination ?? source)}: ${failure.message}`,
          error instanceof Error ? error : undefined,
          'organizer',
        );
      }
    }
  }
}

/**
 * Runs the whole pass. Fatal configuration problems throw; per-file failures
 * are logged, counted in the summary, and do not stop the scan.
 */
export function organize(options: OrganizeOptions): RunSummary {
  const filter = validateOptions(options);
  const summary: RunSummary = { scanned: 0, moved: 0, planned: 0, failed: 0, errors: [] };

  for (const root of options.directories) {
    const config: RemapConfig = {
      root,
      outputDir: options.outputDir,
      stripCount: options.stripCount,
    };
    processRoot(config, options, filter, summary);
  }

  logger.info('Run complete', { ...summary, errors: summary.errors.length }, 'organizer');
  return summary;
}
