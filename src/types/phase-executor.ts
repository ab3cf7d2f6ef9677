/**
 * Phase execution collaborators
 * The orchestrator treats these as opaque; it only enforces the timeout and
 * the output contract of each phase.
 */

import { ContextName } from './context-name';
import { ResultBag, WorkflowPhase, WorkflowState } from './models';

/**
 * Per-attempt options handed to an executor
 */
export interface PhaseExecutionOptions {
  /** Aborted once the attempt times out or fails; executors stop work and reject */
  signal: AbortSignal;
}

/**
 * Performs the work of phases bound to one context
 */
export interface PhaseExecutor {
  /**
   * Run a phase and return its result bag
   * @param phase - Phase being executed
   * @param inputs - Prepared inputs (context data, propagated results, declared inputs)
   * @param state - Read-only view of the workflow state
   */
  execute(
    phase: Readonly<WorkflowPhase>,
    inputs: Readonly<ResultBag>,
    state: Readonly<WorkflowState>,
    options: PhaseExecutionOptions
  ): ResultBag | Promise<ResultBag>;

  /**
   * Called when execution switches into this executor's context
   */
  activate?(context: ContextName, state: Readonly<WorkflowState>): void | Promise<void>;
}

/**
 * Supplies context-specific policy data during a context transition
 */
export interface ContextPolicyLoader {
  load(context: ContextName): ResultBag | null | Promise<ResultBag | null>;
}

/**
 * A failure handed off by the escalate recovery action
 */
export interface Escalation {
  workflowId: string;
  phaseId: string;
  channel: string;
  reason: string;
  error: string;
}

export type EscalationHandler = (escalation: Escalation) => void | Promise<void>;
