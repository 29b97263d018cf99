/**
 * Logger interface
 * Structured logging with event types and metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the registry lifecycle
 */
export type LogEventType =
  // Registration
  | 'definition_added'
  | 'definition_rejected'
  | 'validator_attached'
  // Parsing
  | 'parse_started'
  | 'option_matched'
  | 'positional_captured'
  | 'parse_completed'
  | 'parse_failed'
  // Lazy validation
  | 'validation_passed'
  | 'validation_failed'
  // Teardown
  | 'disposed'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Metadata attached to log events
 */
export interface LogMetadata {
  /** Program the registry parses for */
  program?: string;
  /** Long name of the argument the event concerns */
  argument?: string;
  /** Raw argv token the event concerns */
  token?: string;
  /** Position of the token in argv */
  index?: number;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
  /** Patterns to redact from log output */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations can write to the console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; its level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Merge context into every subsequent event
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * Get all logged events (for testing/diagnostics)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LEVEL_ORDER[a] - LEVEL_ORDER[b];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is logged at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
      return 'error';
    case 'warn':
    case 'definition_rejected':
    case 'validation_failed':
      return 'warn';
    case 'info':
    case 'parse_completed':
    // The error itself is returned to the caller, who decides how to report it
    case 'parse_failed':
      return 'info';
    default:
      return 'debug';
  }
}

/**
 * Secret-looking values that can show up in argv tokens
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  // key=value style credentials
  /(?:api[_-]?key|password|secret|token)=([^\s'"]{8,})/gi,
  // GitHub tokens
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Global regexes keep lastIndex between calls
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
