/**
 * Destination path computation.
 *
 * `remap` never touches the filesystem: the same five inputs always give the
 * same result, which is what lets the organizer print a dry run that matches
 * the real run exactly.
 */

import path from 'node:path';
import { InvalidInputError } from './errors.js';
import type { RemapResult } from './types.js';

export function fourDigitYear(timestamp: Date): string {
  const year = timestamp.getFullYear();
  if (Number.isNaN(year)) {
    throw new InvalidInputError('Timestamp is not a valid date');
  }
  return String(year).padStart(4, '0');
}

/**
 * Path of `filePath` below `root`, split into segments. Throws when the file
 * is not strictly inside the root.
 */
export function relativeSegments(root: string, filePath: string): string[] {
  const relative = path.relative(root, filePath);

  if (
    relative === '' ||
    relative === '..' ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new InvalidInputError(`File is not under root: ${filePath}`, { root, filePath });
  }

  return relative.split(path.sep);
}

export function remap(
  root: string,
  filePath: string,
  timestamp: Date,
  stripCount: number,
  outputDir: string,
): RemapResult {
  if (!Number.isInteger(stripCount) || stripCount < 0) {
    throw new InvalidInputError(`Strip count must be a non-negative integer, got ${stripCount}`);
  }

  const segments = relativeSegments(root, filePath);
  const baseName = segments[segments.length - 1];
  const dirSegments = segments.slice(0, -1);

  // Clamped: never strips the file name itself.
  const keptSegments = dirSegments.slice(Math.min(stripCount, dirSegments.length));
  const year = fourDigitYear(timestamp);

  return {
    destination: path.join(outputDir, year, ...keptSegments, baseName),
    year,
    keptSegments,
    baseName,
  };
}
