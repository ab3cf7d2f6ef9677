/**
 * Console Logger implementation
 * Pretty or JSON-lines output of structured pipeline events
 */

import { Logger, LogLevel, LogEvent, LoggerOptions } from '../types/logger';
import { StructuredLogger } from './structured-logger';

const PLAIN_EVENT_TYPES = new Set<string>(['debug', 'info', 'warn', 'error']);

/**
 * Console-based logger implementation
 */
export class ConsoleLogger extends StructuredLogger {
  constructor(options: LoggerOptions = {}) {
    super({ includeTimestamp: true, jsonOutput: false, ...options }, 'info');
  }

  protected createChild(): ConsoleLogger {
    return new ConsoleLogger(this.options);
  }

  protected emit(event: LogEvent): void {
    const line = this.options.jsonOutput ? JSON.stringify(event) : this.formatPretty(event);
    if (event.level === 'error') {
      console.error(line);
    } else if (event.level === 'warn' && !this.options.jsonOutput) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      parts.push(`[${event.timestamp}]`);
    }

    parts.push(this.getLevelIndicator(event.level));

    if (!PLAIN_EVENT_TYPES.has(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { workflowId, phaseId, context, attempt } = event.metadata;
    const metaParts: string[] = [];
    if (workflowId) metaParts.push(`workflow=${workflowId}`);
    if (phaseId) metaParts.push(`phase=${phaseId}`);
    if (context) metaParts.push(`context=${context}`);
    if (attempt !== undefined) metaParts.push(`attempt=${attempt}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    return parts.join(' ');
  }

  private getLevelIndicator(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return '🔍';
      case 'info':
        return 'ℹ️';
      case 'warn':
        return '⚠️';
      case 'error':
        return '❌';
    }
  }
}

/**
 * Create a console logger with optional options
 */
export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
