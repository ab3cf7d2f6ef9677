/**
 * Shared logger behaviour: level filtering, context metadata, redaction
 * and event capture. Subclasses decide where events go.
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  levelForEvent,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';
import { Clock, SystemClock } from '../types/clock';

export abstract class StructuredLogger implements Logger {
  protected minLevel: LogLevel;
  protected context: Partial<LogMetadata> = {};
  protected events: LogEvent[] = [];
  protected readonly options: LoggerOptions;
  private readonly clock: Clock;

  constructor(options: LoggerOptions, defaultMinLevel: LogLevel) {
    this.minLevel = options.minLevel ?? defaultMinLevel;
    this.options = {
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
    this.clock = options.clock ?? new SystemClock();
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(levelForEvent(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = this.createChild();
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  /**
   * A fresh logger of the same kind with the same options
   */
  protected abstract createChild(): StructuredLogger;

  /**
   * Deliver an accepted event
   */
  protected abstract emit(event: LogEvent): void;

  private log(level: LogLevel, eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: this.clock.iso(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    };

    this.events.push(event);
    this.emit(event);
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }
    return merged;
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }
}
