/**
 * Shared types for organize-by-time
 */

/** Which filesystem timestamp decides a file's year. */
export type TimestampPolicy = 'mtime' | 'oldest' | 'newest';

export interface RemapConfig {
  root: string;
  outputDir: string;
  stripCount: number;
}

export interface RemapResult {
  destination: string;
  year: string;
  keptSegments: string[];
  baseName: string;
}

export type MoveStatus = 'planned' | 'moved';

export interface MoveOptions {
  dryRun: boolean;
  force: boolean;
}

export interface MoveOutcome {
  status: MoveStatus;
  source: string;
  destination: string;
  overwritten: boolean;
}

export interface OrganizeOptions {
  directories: string[];
  outputDir: string;
  stripCount: number;
  policy: TimestampPolicy;
  inclusionPatterns: string[];
  exclusionPatterns: string[];
  dryRun: boolean;
  force: boolean;
}

export interface FileFailure {
  source: string;
  destination?: string;
  code: string;
  message: string;
}

export interface RunSummary {
  scanned: number;
  moved: number;
  planned: number;
  failed: number;
  errors: FileFailure[];
}
