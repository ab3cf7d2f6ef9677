/**
 * Buffer Logger implementation
 * For testing - stores events in memory without output
 */

import { LogLevel, LogEventType, LogEvent, LoggerOptions } from '../types/logger';
import { StructuredLogger } from './structured-logger';

/**
 * Buffer-based logger for testing
 */
export class BufferLogger extends StructuredLogger {
  constructor(options: LoggerOptions = {}) {
    // Capture everything by default
    super(options, 'debug');
  }

  protected createChild(): BufferLogger {
    return new BufferLogger(this.options);
  }

  protected emit(): void {
    // events are kept by the base class only
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

/**
 * Create a buffer logger for testing
 */
export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
