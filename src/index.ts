/**
 * Library entry point for organize-by-time
 */

export { remap, fourDigitYear, relativeSegments } from './path-remapper.js';
export { selectTimestamp, candidateTimes, TIMESTAMP_POLICIES } from './timestamps.js';
export type { FileTimes } from './timestamps.js';
export { GlobMatcher, FileFilter, compilePatterns } from './pattern-matcher.js';
export type { Matcher } from './pattern-matcher.js';
export { listFiles } from './file-walker.js';
export type { ListFilesOptions } from './file-walker.js';
export { moveFile } from './file-mover.js';
export { organize, validateOptions, formatMoveLine } from './organizer.js';
export { ConfigManager, DEFAULT_CONFIG, parseConfig } from './config.js';
export type { OrganizeConfig } from './config.js';
export { Logger, logger, AppError, handleError } from './logger.js';
export type { LogLevel, LogEntry } from './logger.js';
export {
  InvalidInputError,
  PatternSyntaxError,
  ConfigError,
  DestinationExistsError,
  FileMoveError,
  UnsupportedNameError,
} from './errors.js';
export type * from './types.js';
