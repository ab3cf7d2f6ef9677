/**
 * Logger interface
 * Structured logging with typed pipeline events and metadata
 */

import { Clock } from './clock';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the analyze → compose → execute pipeline
 */
export type LogEventType =
  // Analysis
  | 'analysis_started'
  | 'analysis_completed'
  // Composition
  | 'composition_started'
  | 'templates_loaded'
  | 'template_selected'
  | 'template_rejected'
  | 'composition_completed'
  | 'validation_failed'
  | 'workflow_repaired'
  // Execution lifecycle
  | 'workflow_started'
  | 'workflow_completed'
  | 'workflow_failed'
  | 'workflow_cancelled'
  // Phases
  | 'phase_started'
  | 'phase_completed'
  | 'phase_failed'
  | 'phase_skipped'
  | 'phase_timeout'
  | 'phase_retry'
  | 'context_transition'
  | 'recovery_action'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Metadata attached to every log event
 */
export interface LogMetadata {
  taskId?: string;
  workflowId?: string;
  phaseId?: string;
  context?: string;
  attempt?: number;
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
  includeTimestamp?: boolean;
  jsonOutput?: boolean;
  /** Patterns to redact from messages and string metadata */
  redactPatterns?: RegExp[];
  /** Source of event timestamps */
  clock?: Clock;
}

/**
 * Structured logger. Implementations write to the console or to a buffer (tests).
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
   * Merge metadata into every subsequent log
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a logger that shares settings and adds metadata
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Level an event type is emitted at
 */
export function levelForEvent(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'workflow_failed':
    case 'phase_failed':
      return 'error';
    case 'warn':
    case 'validation_failed':
    case 'template_rejected':
    case 'phase_timeout':
    case 'workflow_cancelled':
      return 'warn';
    case 'debug':
    case 'context_transition':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Secrets that may end up in task descriptions or phase inputs
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  /(?:AKIA|ABIA|ACCA|ASIA)[A-Z0-9]{16}/g,
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  /(?:password|secret|token|credential)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/**
 * Redact secrets from a string, keeping a short prefix for debugging
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // global regexes keep state between calls
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
