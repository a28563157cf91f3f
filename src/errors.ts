import { AppError } from './logger.js';

/** Exit status for fatal usage and configuration problems. */
export const FATAL_EXIT_CODE = 2;

/** Exit status when at least one file could not be moved. */
export const PARTIAL_FAILURE_EXIT_CODE = 1;

/**
 * Bad arguments: a root that is missing or not a directory, a file outside
 * its root, a negative strip count.
 */
export class InvalidInputError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_INPUT', FATAL_EXIT_CODE, context);
    this.name = 'InvalidInputError';
  }
}

export class PatternSyntaxError extends AppError {
  constructor(
    public readonly pattern: string,
    reason: string,
  ) {
    super(`Invalid pattern "${pattern}": ${reason}`, 'PATTERN_SYNTAX', FATAL_EXIT_CODE, { pattern });
    this.name = 'PatternSyntaxError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', FATAL_EXIT_CODE, context);
    this.name = 'ConfigError';
  }
}

export class DestinationExistsError extends AppError {
  constructor(
    public readonly source: string,
    public readonly destination: string,
  ) {
    super('destination file already exists', 'DESTINATION_EXISTS', PARTIAL_FAILURE_EXIT_CODE, {
      source,
      destination,
    });
    this.name = 'DestinationExistsError';
  }
}

/**
 * Permission or other I/O failure while creating directories or renaming.
 */
export class FileMoveError extends AppError {
  constructor(
    public readonly source: string,
    public readonly destination: string,
    public readonly errno: string | undefined,
    cause: string,
  ) {
    super(cause, 'MOVE_FAILED', PARTIAL_FAILURE_EXIT_CODE, { source, destination, errno });
    this.name = 'FileMoveError';
  }
}

/** A name on disk that cannot be represented as a UTF-8 path string. */
export class UnsupportedNameError extends AppError {
  constructor(public readonly source: string) {
    super('file name is not valid UTF-8', 'UNSUPPORTED_NAME', PARTIAL_FAILURE_EXIT_CODE, { source });
    this.name = 'UnsupportedNameError';
  }
}
