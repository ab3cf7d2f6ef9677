/**
 * Tests for recovery strategy selection
 */

import { describe, it, expect } from 'vitest';
import {
  classifyFailure,
  defaultRecoveryStrategies,
  RecoveryContext,
  RecoveryStrategy,
  selectRecoveryAction,
} from './recovery-strategies';
import { ContextTransitionError, PhaseValidationError, TimeoutError } from '../types/errors';
import { createWorkflowState } from './workflow-state';
import { buildPhase } from '../../tests/fixtures/workflow-builders';

const context: RecoveryContext = {
  phase: buildPhase('p', 'implementation'),
  state: createWorkflowState('wf', ['p'], {}, new Date('2025-01-01T00:00:00.000Z')),
  attempt: 0,
};

const strategies = defaultRecoveryStrategies({ timeoutRetryAttempts: 2, backoffMultiplier: 1.5 });

describe('classifyFailure', () => {
  it('should classify engine errors by code', () => {
    expect(classifyFailure(new TimeoutError(1000)).kind).toBe('timeout');
    expect(classifyFailure(new PhaseValidationError('p', ['Missing output: x'])).kind).toBe('validation');
    expect(classifyFailure(new ContextTransitionError(null, 'design', 'boom')).kind).toBe('transition');
  });

  it('should treat anything else as an execution failure', () => {
    expect(classifyFailure(new Error('disk full'))).toMatchObject({ kind: 'execution', message: 'disk full' });
    expect(classifyFailure('plain string')).toMatchObject({ kind: 'execution', message: 'plain string' });
  });
});

describe('selectRecoveryAction', () => {
  it('should retry timeouts with the configured limits', () => {
    const decision = selectRecoveryAction(strategies, classifyFailure(new TimeoutError(1000)), context);

    expect(decision).toEqual({
      strategy: 'timeout_retry',
      action: {
        actionType: 'retry',
        parameters: { maxAttempts: 2, backoffMultiplier: 1.5 },
        reason: 'Phase timed out',
      },
    });
  });

  it('should abort on validation failures', () => {
    const decision = selectRecoveryAction(strategies, classifyFailure(new PhaseValidationError('p', [])), context);

    expect(decision.strategy).toBe('validation_abort');
    expect(decision.action.actionType).toBe('abort');
  });

  it('should abort on critical errors', () => {
    const decision = selectRecoveryAction(strategies, classifyFailure(new Error('CRITICAL: data loss')), context);

    expect(decision.strategy).toBe('critical_abort');
  });

  it('should abort on failed context transitions', () => {
    const failure = classifyFailure(new ContextTransitionError('design', 'release', 'policy store offline'));

    expect(selectRecoveryAction(strategies, failure, context).strategy).toBe('transition_abort');
  });

  it('should abort when nothing matches', () => {
    expect(selectRecoveryAction(strategies, classifyFailure(new Error('flaky network')), context)).toEqual({
      strategy: null,
      action: { actionType: 'abort', parameters: {}, reason: 'No recovery strategy matched' },
    });
  });

  it('should use the first matching strategy', () => {
    const custom: RecoveryStrategy[] = [
      {
        name: 'skip_everything',
        matches: () => true,
        action: () => ({ actionType: 'skip', parameters: {}, reason: 'optional work' }),
      },
      ...strategies,
    ];

    expect(selectRecoveryAction(custom, classifyFailure(new TimeoutError(5)), context).strategy).toBe(
      'skip_everything'
    );
  });

  it('should abort when a strategy throws', () => {
    const custom: RecoveryStrategy[] = [
      {
        name: 'lookup_owner',
        matches: () => {
          throw new Error('owner table missing');
        },
        action: () => ({ actionType: 'skip', parameters: {}, reason: 'never reached' }),
      },
      ...strategies,
    ];

    expect(selectRecoveryAction(custom, classifyFailure(new Error('disk full')), context)).toEqual({
      strategy: 'lookup_owner',
      action: {
        actionType: 'abort',
        parameters: {},
        reason: 'Recovery strategy lookup_owner failed: owner table missing',
      },
    });
  });
});
