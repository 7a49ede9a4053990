/**
 * Types module - shared interfaces, errors and result helpers
 */

// Result type for the non-throwing API
export type { Result, Ok, Err } from './result';
export { ok, err, isOk, isErr, unwrap } from './result';

// Parse errors
export type { ArgParseErrorCode } from './parse-errors';
export {
  ArgParseError,
  ConversionError,
  ArgumentCountError,
  IllegalArityError,
  ConfigurationError,
  isArgParseError,
} from './parse-errors';

// Exit codes
export { ExitCode, getExitCodeDescription, exitCodeForError } from './exit-codes';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export {
  compareLogLevels,
  shouldLog,
  getEventLevel,
  DEFAULT_REDACT_PATTERNS,
  redactSecrets,
} from './logger';
