/**
 * Basename matching for --pattern / --not-pattern
 */

import micromatch from 'micromatch';
import { PatternSyntaxError } from './errors.js';

export interface Matcher {
  readonly pattern: string;
  matches(basename: string): boolean;
}

// Shell-glob semantics: `*`, `?` and `[...]` only. Leading dots are not
// special, so `*~` also matches `.draft~`.
const GLOB_OPTIONS: micromatch.Options = {
  dot: true,
  nobrace: true,
  noextglob: true,
  nonegate: true,
  strictBrackets: true,
};

function compileGlob(pattern: string): (basename: string) => boolean {
  if (pattern.length === 0) {
    throw new PatternSyntaxError(pattern, 'pattern is empty');
  }

  try {
    return micromatch.matcher(pattern, GLOB_OPTIONS);
  } catch (error) {
    throw new PatternSyntaxError(pattern, error instanceof Error ? error.message : String(error));
  }
}

export class GlobMatcher implements Matcher {
  private readonly test: (basename: string) => boolean;

  constructor(readonly pattern: string) {
    this.test = compileGlob(pattern);
  }

  matches(basename: string): boolean {
    return this.test(basename);
  }
}

export function compilePatterns(patterns: string[]): Matcher[] {
  return patterns.map(pattern => new GlobMatcher(pattern));
}

/**
 * Include/exclude decision for a file name. With no inclusion patterns every
 * name is included; any exclusion match wins.
 */
export class FileFilter {
  private readonly include: Matcher[];
  private readonly exclude: Matcher[];

  constructor(inclusionPatterns: string[] = [], exclusionPatterns: string[] = []) {
    this.include = compilePatterns(inclusionPatterns);
    this.exclude = compilePatterns(exclusionPatterns);
  }

  accepts(basename: string): boolean {
    const included = this.include.length === 0 || this.include.some(matcher => matcher.matches(basename));
    if (!included) {
      return false;
    }
    return !this.exclude.some(matcher => matcher.matches(basename));
  }
}
