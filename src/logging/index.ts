/**
 * Logging module - structured logging implementations
 */

export { StructuredLogger } from './structured-logger';
export { ConsoleLogger, createConsoleLogger } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';

// Workflow summary
export { formatWorkflowResultMarkdown, formatDuration } from './workflow-summary';
