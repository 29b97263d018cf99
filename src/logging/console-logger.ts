/**
 * Console Logger implementation
 * Diagnostics go to stderr so they never mix with help or program output
 */

import type { Logger, LogEvent, LogLevel, LoggerOptions } from '../types/logger';
import { StructuredLogger } from './structured-logger';

const PLAIN_EVENT_TYPES = ['debug', 'info', 'warn', 'error'];

export class ConsoleLogger extends StructuredLogger {
  constructor(options: LoggerOptions = {}) {
    super(
      {
        includeTimestamp: true,
        jsonOutput: false,
        ...options,
      },
      'info'
    );
  }

  protected createSibling(): ConsoleLogger {
    return new ConsoleLogger(this.options);
  }

  protected write(event: LogEvent): void {
    const line = this.options.jsonOutput ? JSON.stringify(event) : this.formatPretty(event);

    if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  /**
   * Render an event as a single human-readable line
   */
  formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(this.getLevelLabel(event.level));

    if (!PLAIN_EVENT_TYPES.includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { program, argument, token, index } = event.metadata;
    const metaParts: string[] = [];
    if (program) metaParts.push(`program=${program}`);
    if (argument) metaParts.push(`arg=${argument}`);
    if (token) metaParts.push(`token=${token}`);
    if (index !== undefined) metaParts.push(`index=${index}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    return parts.join(' ');
  }

  private getLevelLabel(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return 'debug:';
      case 'info':
        return 'info:';
      case 'warn':
        return 'warning:';
      case 'error':
        return 'error:';
      default:
        return '-';
    }
  }
}

export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
