import type { TimestampPolicy } from './types.js';

export const TIMESTAMP_POLICIES: readonly TimestampPolicy[] = ['mtime', 'oldest', 'newest'];

/** The subset of `fs.Stats` the policies read. */
export interface FileTimes {
  mtimeMs: number;
  atimeMs: number;
  birthtimeMs: number;
}

/**
 * Candidate timestamps for the oldest/newest policies. Filesystems that do
 * not record a creation time report it as the epoch; it is left out then.
 */
export function candidateTimes(stats: FileTimes): number[] {
  const times = [stats.mtimeMs, stats.atimeMs];
  if (stats.birthtimeMs > 0) {
    times.push(stats.birthtimeMs);
  }
  return times;
}

export function selectTimestamp(stats: FileTimes, policy: TimestampPolicy): Date {
  switch (policy) {
    case 'oldest':
      return new Date(Math.min(...candidateTimes(stats)));
    case 'newest':
      return new Date(Math.max(...candidateTimes(stats)));
    case 'mtime':
    default:
      return new Date(stats.mtimeMs);
  }
}
