/**
 * Types module - shared interfaces and types
 */

export type { Result, Ok, Err } from './result';
export { ok, err, isOk, isErr, unwrap, unwrapOr } from './result';

export { ExitCode } from './exit-codes';

export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export {
  compareLogLevels,
  shouldLog,
  getEventLevel,
  DEFAULT_REDACT_PATTERNS,
  redactSecrets,
} from './logger';
