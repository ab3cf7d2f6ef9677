/**
 * Workflow state machine
 * Phase and workflow status transitions with a single centralized table each.
 * A WorkflowState is created per execution and owned by that execution only.
 */

import { PhaseStatus, ResultBag, WorkflowState, WorkflowStatus } from '../types/models';

/**
 * Valid phase transitions
 * Key: current status, Value: statuses it may move to
 */
const PHASE_TRANSITIONS: Record<PhaseStatus, PhaseStatus[]> = {
  pending: ['running', 'skipped', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  // retried, or skipped by recovery
  failed: ['running', 'skipped'],
  skipped: [],
};

/**
 * Valid workflow transitions
 */
const WORKFLOW_TRANSITIONS: Record<WorkflowStatus, WorkflowStatus[]> = {
  pending: ['running', 'failed', 'cancelled'],
  running: ['completed', 'failed', 'cancelled', 'paused'],
  paused: ['running', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isValidPhaseTransition(from: PhaseStatus, to: PhaseStatus): boolean {
  return PHASE_TRANSITIONS[from].includes(to);
}

export function isValidWorkflowTransition(from: WorkflowStatus, to: WorkflowStatus): boolean {
  return WORKFLOW_TRANSITIONS[from].includes(to);
}

export function isTerminalPhaseStatus(status: PhaseStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'skipped';
}

export function isTerminalWorkflowStatus(status: WorkflowStatus): boolean {
  return WORKFLOW_TRANSITIONS[status].length === 0;
}

/**
 * Fresh state with every phase pending
 */
export function createWorkflowState(
  workflowId: string,
  phaseIds: readonly string[],
  initialContext: Readonly<ResultBag>,
  now: Date
): WorkflowState {
  return {
    workflowId,
    status: 'pending',
    currentPhase: null,
    currentContext: null,
    completedPhases: [],
    failedPhases: [],
    skippedPhases: [],
    phaseStatus: Object.fromEntries(phaseIds.map((id): [string, PhaseStatus] => [id, 'pending'])),
    phaseResults: {},
    contextData: { ...initialContext },
    contextSnapshots: {},
    errors: [],
    warnings: [],
    retryCount: 0,
    phaseDurationsMs: {},
    phaseQuality: {},
    startTime: now,
    endTime: null,
    lastUpdated: now,
  };
}

function remove(list: string[], id: string): void {
  const index = list.indexOf(id);
  if (index !== -1) {
    list.splice(index, 1);
  }
}

/**
 * Move a phase to a new status, keeping the completed/failed/skipped lists in
 * step. Returns false (and changes nothing) for an invalid transition.
 */
export function setPhaseStatus(state: WorkflowState, phaseId: string, to: PhaseStatus, now: Date): boolean {
  const from = state.phaseStatus[phaseId];
  if (from === undefined || !isValidPhaseTransition(from, to)) {
    return false;
  }

  state.phaseStatus[phaseId] = to;
  state.lastUpdated = now;
  if (from === 'failed') {
    remove(state.failedPhases, phaseId);
  }

  switch (to) {
    case 'running':
      state.currentPhase = phaseId;
      break;
    case 'completed':
      state.completedPhases.push(phaseId);
      break;
    case 'failed':
      state.failedPhases.push(phaseId);
      break;
    case 'skipped':
      state.skippedPhases.push(phaseId);
      break;
    case 'pending':
      break;
  }
  return true;
}

/**
 * Move the workflow to a new status. Returns false for an invalid transition.
 */
export function setWorkflowStatus(state: WorkflowState, to: WorkflowStatus, now: Date): boolean {
  if (!isValidWorkflowTransition(state.status, to)) {
    return false;
  }
  state.status = to;
  state.lastUpdated = now;
  if (isTerminalWorkflowStatus(to)) {
    state.endTime = now;
  }
  return true;
}

/**
 * Phase ids currently in a status, in definition order
 */
export function phasesWithStatus(state: Readonly<WorkflowState>, status: PhaseStatus): string[] {
  return Object.entries(state.phaseStatus)
    .filter(([, phaseStatus]) => phaseStatus === status)
    .map(([id]) => id);
}
