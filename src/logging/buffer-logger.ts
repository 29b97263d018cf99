/**
 * Buffer Logger implementation
 * For testing - stores events in memory without output
 */

import type { LogEvent, LogEventType, LogLevel, LoggerOptions } from '../types/logger';
import { StructuredLogger } from './structured-logger';

export class BufferLogger extends StructuredLogger {
  constructor(options: LoggerOptions = {}) {
    // Capture everything by default
    super(options, 'debug');
  }

  protected createSibling(): BufferLogger {
    return new BufferLogger(this.options);
  }

  protected write(_event: LogEvent): void {
    // Events are already stored by the base class
  }

  clear(): void {
    this.events = [];
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  getLastEvent(): LogEvent | undefined {
    return this.events[this.events.length - 1];
  }

  getEventsMatching(pattern: RegExp): LogEvent[] {
    return this.events.filter((e) => pattern.test(e.message));
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
