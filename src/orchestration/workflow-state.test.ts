/**
 * Tests for the workflow state machine
 */

import { describe, it, expect } from 'vitest';
import {
  createWorkflowState,
  isTerminalWorkflowStatus,
  isValidPhaseTransition,
  phasesWithStatus,
  setPhaseStatus,
  setWorkflowStatus,
} from './workflow-state';

const START = new Date('2025-01-01T00:00:00.000Z');
const LATER = new Date('2025-01-01T00:01:00.000Z');

describe('createWorkflowState', () => {
  it('should start every phase pending with a copy of the context', () => {
    const initial = { user: 'alice' };
    const state = createWorkflowState('wf', ['a', 'b'], initial, START);

    expect(state.status).toBe('pending');
    expect(state.phaseStatus).toEqual({ a: 'pending', b: 'pending' });
    expect(state.contextData).toEqual({ user: 'alice' });
    expect(state.contextData).not.toBe(initial);
    expect(state.startTime).toEqual(START);
    expect(state.endTime).toBeNull();
  });
});

describe('setPhaseStatus', () => {
  it('should track completed phases', () => {
    const state = createWorkflowState('wf', ['a'], {}, START);

    expect(setPhaseStatus(state, 'a', 'running', START)).toBe(true);
    expect(state.currentPhase).toBe('a');
    expect(setPhaseStatus(state, 'a', 'completed', LATER)).toBe(true);
    expect(state.completedPhases).toEqual(['a']);
    expect(state.lastUpdated).toEqual(LATER);
  });

  it('should move a retried phase out of the failed list', () => {
    const state = createWorkflowState('wf', ['a'], {}, START);
    setPhaseStatus(state, 'a', 'running', START);
    setPhaseStatus(state, 'a', 'failed', START);
    expect(state.failedPhases).toEqual(['a']);

    setPhaseStatus(state, 'a', 'running', START);
    expect(state.failedPhases).toEqual([]);

    setPhaseStatus(state, 'a', 'failed', START);
    setPhaseStatus(state, 'a', 'skipped', START);
    expect(state.failedPhases).toEqual([]);
    expect(state.skippedPhases).toEqual(['a']);
  });

  it('should reject invalid transitions and unknown phases', () => {
    const state = createWorkflowState('wf', ['a'], {}, START);
    setPhaseStatus(state, 'a', 'skipped', START);

    expect(setPhaseStatus(state, 'a', 'running', LATER)).toBe(false);
    expect(setPhaseStatus(state, 'missing', 'running', LATER)).toBe(false);
    expect(state.phaseStatus.a).toBe('skipped');
    expect(state.lastUpdated).toEqual(START);
  });

  it('should keep completed phases terminal', () => {
    expect(isValidPhaseTransition('completed', 'failed')).toBe(false);
    expect(isValidPhaseTransition('completed', 'running')).toBe(false);
  });
});

describe('setWorkflowStatus', () => {
  it('should set the end time on terminal statuses', () => {
    const state = createWorkflowState('wf', [], {}, START);

    expect(setWorkflowStatus(state, 'running', START)).toBe(true);
    expect(state.endTime).toBeNull();
    expect(setWorkflowStatus(state, 'completed', LATER)).toBe(true);
    expect(state.endTime).toEqual(LATER);
  });

  it('should not leave a terminal status', () => {
    const state = createWorkflowState('wf', [], {}, START);
    setWorkflowStatus(state, 'running', START);
    setWorkflowStatus(state, 'cancelled', START);

    expect(setWorkflowStatus(state, 'failed', LATER)).toBe(false);
    expect(state.status).toBe('cancelled');
    expect(isTerminalWorkflowStatus('cancelled')).toBe(true);
    expect(isTerminalWorkflowStatus('paused')).toBe(false);
  });

  it('should allow pausing and resuming', () => {
    const state = createWorkflowState('wf', [], {}, START);
    setWorkflowStatus(state, 'running', START);

    expect(setWorkflowStatus(state, 'paused', START)).toBe(true);
    expect(setWorkflowStatus(state, 'running', START)).toBe(true);
  });
});

describe('phasesWithStatus', () => {
  it('should list phases in definition order', () => {
    const state = createWorkflowState('wf', ['a', 'b', 'c'], {}, START);
    setPhaseStatus(state, 'b', 'running', START);

    expect(phasesWithStatus(state, 'pending')).toEqual(['a', 'c']);
    expect(phasesWithStatus(state, 'running')).toEqual(['b']);
  });
});
