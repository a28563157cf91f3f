import fs from 'node:fs';
import path from 'node:path';
import { DestinationExistsError, FileMoveError } from './errors.js';
import type { MoveOptions, MoveOutcome } from './types.js';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Moves one regular file, creating the destination's parent directories.
 * Dry runs report the pair without touching the filesystem.
 *
 * @throws DestinationExistsError when the destination exists and `force` is off
 * @throws FileMoveError on any other filesystem failure
 */
export function moveFile(source: string, destination: string, options: MoveOptions): MoveOutcome {
  if (options.dryRun) {
    return { status: 'planned', source, destination, overwritten: false };
  }

  try {
    fs.mkdirSync(path.dirname(destination), { recursive: true });
  } catch (error) {
    throw new FileMoveError(
      source,
      destination,
      errnoCode(error),
      error instanceof Error ? error.message : String(error),
    );
  }

  // lstat: a dangling symlink at the destination still counts as taken.
  const exists = fs.lstatSync(destination, { throwIfNoEntry: false }) !== undefined;
  if (exists && !options.force) {
    throw new DestinationExistsError(source, destination);
  }

  try {
    fs.renameSync(source, destination);
  } catch (error) {
    throw new FileMoveError(
      source,
      destination,
      errnoCode(error),
      error instanceof Error ? error.message : String(error),
    );
  }

  return { status: 'moved', source, destination, overwritten: exists };
}
