/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for typed error handling
export type { Result, Ok, Err } from './result';
export { ok, err, isOk, isErr, unwrapOr, map, partition } from './result';

// Errors
export type { ConductorErrorCode } from './errors';
export {
  ConductorError,
  TimeoutError,
  PhaseValidationError,
  ContextTransitionError,
  WorkflowDefinitionError,
  errorMessage,
} from './errors';

// Context names
export type { ContextName } from './context-name';
export { CONTEXT_NAMES, isContextName, contextRank, sortContexts } from './context-name';

// Data model
export type {
  ComplexityLevel,
  WorkflowStatus,
  PhaseStatus,
  ResultBag,
  Entity,
  TaskAnalysis,
  PhaseCondition,
  WorkflowPhase,
  ValidationSummary,
  WorkflowMetadata,
  WorkflowDefinition,
  ValidationResult,
  ContextSnapshot,
  WorkflowState,
  WorkflowMetrics,
  WorkflowResult,
  RecoveryAction,
  RecoveryActionType,
  TemplatePhase,
  WorkflowTemplate,
} from './models';

// Phase execution collaborators
export type {
  PhaseExecutor,
  PhaseExecutionOptions,
  ContextPolicyLoader,
  Escalation,
  EscalationHandler,
} from './phase-executor';

// Clock interface
export type { Clock, PendingTimeout } from './clock';
export { SystemClock, MockClock } from './clock';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export { shouldLog, levelForEvent, DEFAULT_REDACT_PATTERNS, redactSecrets } from './logger';

// Engine config
export type {
  EngineConfig,
  EngineConfigOverrides,
  AnalysisSettings,
  CompositionSettings,
  ExecutionSettings,
  LoggingSettings,
  ConfigSource,
} from './engine-config';
export { DEFAULT_CONFIG } from './engine-config';
