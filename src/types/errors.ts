/**
 * Error types
 * Everything thrown inside the engine derives from ConductorError so callers
 * and recovery strategies can branch on `code` instead of message text.
 */

export type ConductorErrorCode =
  | 'TIMEOUT'
  | 'PHASE_VALIDATION'
  | 'CONTEXT_TRANSITION'
  | 'WORKFLOW_DEFINITION';

/**
 * Base error for the engine
 */
export class ConductorError extends Error {
  readonly code: ConductorErrorCode;

  constructor(code: ConductorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConductorError';
    this.code = code;
  }
}

/**
 * An operation exceeded its time budget
 */
export class TimeoutError extends ConductorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message?: string) {
    super('TIMEOUT', message ?? `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Phase results did not satisfy the phase's output contract
 */
export class PhaseValidationError extends ConductorError {
  readonly phaseId: string;
  readonly problems: string[];

  constructor(phaseId: string, problems: string[]) {
    super('PHASE_VALIDATION', `Phase validation failed for ${phaseId}: ${problems.join('; ')}`);
    this.name = 'PhaseValidationError';
    this.phaseId = phaseId;
    this.problems = problems;
  }
}

/**
 * A context transition targeted an unknown context or its collaborator failed
 */
export class ContextTransitionError extends ConductorError {
  readonly fromContext: string | null;
  readonly toContext: string;

  constructor(fromContext: string | null, toContext: string, message: string, options?: { cause?: unknown }) {
    super('CONTEXT_TRANSITION', message, options);
    this.name = 'ContextTransitionError';
    this.fromContext = fromContext;
    this.toContext = toContext;
  }
}

/**
 * A workflow definition is structurally unusable
 */
export class WorkflowDefinitionError extends ConductorError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('WORKFLOW_DEFINITION', `Invalid workflow definition: ${problems.join('; ')}`);
    this.name = 'WorkflowDefinitionError';
    this.problems = problems;
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
