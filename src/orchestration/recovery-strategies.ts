/**
 * Error recovery strategies
 * A failed phase is classified, then the first strategy whose predicate
 * matches picks the recovery action. No match means abort.
 */

import { ConductorError, errorMessage } from '../types/errors';
import { ExecutionSettings } from '../types/engine-config';
import { RecoveryAction, WorkflowPhase, WorkflowState } from '../types/models';

export type PhaseFailureKind = 'timeout' | 'validation' | 'transition' | 'execution';

/**
 * A classified phase failure
 */
export interface PhaseFailure {
  kind: PhaseFailureKind;
  message: string;
  cause: unknown;
}

/**
 * What a strategy gets to look at
 */
export interface RecoveryContext {
  phase: Readonly<WorkflowPhase>;
  state: Readonly<WorkflowState>;
  /** Retries already made for this phase */
  attempt: number;
}

export interface RecoveryStrategy {
  name: string;
  matches(failure: PhaseFailure, context: RecoveryContext): boolean;
  action(failure: PhaseFailure, context: RecoveryContext): RecoveryAction;
}

export interface RecoveryDecision {
  /** Name of the matching strategy, or null when none matched */
  strategy: string | null;
  action: RecoveryAction;
}

function kindForCode(error: ConductorError): PhaseFailureKind {
  switch (error.code) {
    case 'TIMEOUT':
      return 'timeout';
    case 'PHASE_VALIDATION':
      return 'validation';
    case 'CONTEXT_TRANSITION':
      return 'transition';
    case 'WORKFLOW_DEFINITION':
      return 'execution';
  }
}

/**
 * Classify anything a phase threw
 */
export function classifyFailure(error: unknown): PhaseFailure {
  return {
    kind: error instanceof ConductorError ? kindForCode(error) : 'execution',
    message: errorMessage(error),
    cause: error,
  };
}

export function abortAction(reason: string): RecoveryAction {
  return { actionType: 'abort', parameters: {}, reason };
}

/**
 * Built-in strategies, in priority order
 */
export function defaultRecoveryStrategies(
  settings: Pick<ExecutionSettings, 'timeoutRetryAttempts' | 'backoffMultiplier'>
): RecoveryStrategy[] {
  return [
    {
      name: 'timeout_retry',
      matches: (failure) => failure.kind === 'timeout',
      action: () => ({
        actionType: 'retry',
        parameters: {
          maxAttempts: settings.timeoutRetryAttempts,
          backoffMultiplier: settings.backoffMultiplier,
        },
        reason: 'Phase timed out',
      }),
    },
    {
      name: 'validation_abort',
      matches: (failure) => failure.kind === 'validation',
      action: () => abortAction('Phase output failed validation'),
    },
    {
      name: 'critical_abort',
      matches: (failure) => /critical/i.test(failure.message),
      action: () => abortAction('Critical error'),
    },
    {
      name: 'transition_abort',
      matches: (failure) => failure.kind === 'transition',
      action: () => abortAction('Context transition failed'),
    },
  ];
}

/**
 * First matching strategy's action; abort when nothing matches or a strategy
 * throws
 */
export function selectRecoveryAction(
  strategies: readonly RecoveryStrategy[],
  failure: PhaseFailure,
  context: RecoveryContext
): RecoveryDecision {
  for (const strategy of strategies) {
    try {
      if (strategy.matches(failure, context)) {
        return { strategy: strategy.name, action: strategy.action(failure, context) };
      }
    } catch (error) {
      return {
        strategy: strategy.name,
        action: abortAction(`Recovery strategy ${strategy.name} failed: ${errorMessage(error)}`),
      };
    }
  }
  return { strategy: null, action: abortAction('No recovery strategy matched') };
}
