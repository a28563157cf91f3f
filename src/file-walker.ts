import fs from 'node:fs';
import path from 'node:path';
import { logger } from './logger.js';
import type { FileFilter } from './pattern-matcher.js';

export interface ListFilesOptions {
  /** Directory trees that are never entered, e.g. an output dir inside the root. */
  skipDirectories?: string[];
  /**
   * Called for a file or directory whose on-disk name is not valid UTF-8. Such
   * entries cannot be addressed through a decoded path, so they are not
   * yielded or descended into. Defaults to a warning.
   */
  onUnsupportedName?: (entryPath: string) => void;
}

/** Decoded names in `directory` that do not round-trip to their raw bytes. */
function undecodableNames(directory: string): Set<string> {
  const lossy = new Set<string>();
  for (const raw of fs.readdirSync(directory, { encoding: 'buffer' })) {
    const decoded = raw.toString('utf8');
    if (!Buffer.from(decoded, 'utf8').equals(raw)) {
      lossy.add(decoded);
    }
  }
  return lossy;
}

function isInside(parentAbs: string, candidateAbs: string): boolean {
  const relative = path.relative(parentAbs, candidateAbs);
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

/**
 * Lazily walks `root` depth-first, yielding regular files whose basename the
 * filter accepts. Names are visited in sorted order, files of a directory
 * before its subdirectories. Every directory is descended into; patterns only
 * apply to file names. Symbolic links are not followed.
 *
 * Yielded paths are `path.join(root, relative)`, so a relative root gives
 * relative paths.
 */
export function* listFiles(
  root: string,
  filter: FileFilter,
  options: ListFilesOptions = {},
): Generator<string> {
  const skipped = (options.skipDirectories ?? []).map(dir => path.resolve(dir));
  const onUnsupportedName =
    options.onUnsupportedName ??
    ((entryPath: string) => logger.warn(`Skipping file name that is not valid UTF-8: ${entryPath}`, undefined, 'walker'));
  const stack: string[] = [''];

  while (stack.length > 0) {
    const currentRelativeDirectory = stack.pop() ?? '';
    const currentDirectory = currentRelativeDirectory
      ? path.join(root, currentRelativeDirectory)
      : root;

    let entries: fs.Dirent[];
    let lossy: Set<string>;
    try {
      entries = fs.readdirSync(currentDirectory, { withFileTypes: true });
      // Invalid UTF-8 bytes decode to U+FFFD; only then is the raw listing needed.
      lossy = entries.some(entry => entry.name.includes('\uFFFD'))
        ? undecodableNames(currentDirectory)
        : new Set<string>();
    } catch (error) {
      logger.warn(
        `Skipping unreadable directory: ${currentDirectory}`,
        { reason: error instanceof Error ? error.message : String(error) },
        'walker',
      );
      continue;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const subdirectories: string[] = [];
    for (const entry of entries) {
      const relativePath = currentRelativeDirectory
        ? path.join(currentRelativeDirectory, entry.name)
        : entry.name;

      if (lossy.has(entry.name)) {
        if (entry.isDirectory() || (entry.isFile() && filter.accepts(entry.name))) {
          onUnsupportedName(path.join(root, relativePath));
        }
        continue;
      }

      if (entry.isDirectory()) {
        const absolute = path.resolve(root, relativePath);
        if (!skipped.some(dir => isInside(dir, absolute))) {
          subdirectories.push(relativePath);
        }
        continue;
      }

      if (entry.isFile() && filter.accepts(entry.name)) {
        yield path.join(root, relativePath);
      }
    }

    for (let i = subdirectories.length - 1; i >= 0; i--) {
      stack.push(subdirectories[i]);
    }
  }
}
