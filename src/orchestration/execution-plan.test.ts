/**
 * Tests for execution planning
 */

import { describe, it, expect } from 'vitest';
import { buildExecutionPlan, definitionProblems, ExecutionStep } from './execution-plan';
import { buildPhase, buildWorkflow } from '../../tests/fixtures/workflow-builders';

function describeSteps(steps: ExecutionStep[]): string[] {
  return steps.map((step) =>
    step.kind === 'sequential' ? step.phase.phaseId : `${step.group}[${step.phases.map((p) => p.phaseId).join(',')}]`
  );
}

describe('definitionProblems', () => {
  it('should accept a well-formed workflow', () => {
    const workflow = buildWorkflow(
      [buildPhase('impl', 'implementation'), buildPhase('test', 'verification', { conditionExpression: 'run_tests' })],
      { test: ['impl'] }
    );

    expect(definitionProblems(workflow)).toEqual([]);
  });

  it('should reject a workflow without phases', () => {
    expect(definitionProblems(buildWorkflow([]))).toEqual(['Workflow has no phases']);
  });

  it('should report every structural problem', () => {
    const workflow = buildWorkflow(
      [
        buildPhase('a', 'implementation'),
        buildPhase('a', 'verification'),
        buildPhase('b', 'teleportation', { timeoutSeconds: 0, retryCount: -1, conditionExpression: 'a ==' }),
      ],
      { b: ['ghost'] }
    );

    expect(definitionProblems(workflow)).toEqual([
      'Duplicate phase id: a',
      'Unknown context in phase b: teleportation',
      'Invalid timeout in phase b: 0',
      'Invalid retry count in phase b: -1',
      'Invalid condition in phase b: Invalid condition expression: "a =="',
      'Unknown phase in dependencies: ghost',
    ]);
  });

  it('should report cycles', () => {
    const workflow = buildWorkflow([buildPhase('a', 'design'), buildPhase('b', 'implementation')], {
      a: ['b'],
      b: ['a'],
    });

    expect(definitionProblems(workflow)).toEqual(['Circular dependency: a -> b -> a']);
  });

  it('should reject parallel groups whose members depend on each other', () => {
    const workflow = buildWorkflow(
      [
        buildPhase('a', 'verification', { parallelGroup: 'g' }),
        buildPhase('b', 'documentation', { parallelGroup: 'g' }),
      ],
      { b: ['a'] }
    );

    expect(definitionProblems(workflow)).toEqual(['Parallel group g contains dependent phases: b depends on a']);
  });
});

describe('buildExecutionPlan', () => {
  it('should run a group at the position of its first member', () => {
    const workflow = buildWorkflow(
      [
        buildPhase('impl', 'implementation'),
        buildPhase('sec', 'security-review', { parallelGroup: 'parallel_group_1' }),
        buildPhase('test', 'verification', { parallelGroup: 'parallel_group_1' }),
        buildPhase('debug', 'debugging'),
        buildPhase('release', 'release'),
      ],
      { sec: ['impl'], test: ['impl'], debug: ['test'], release: ['test'] }
    );

    expect(describeSteps(buildExecutionPlan(workflow))).toEqual([
      'impl',
      'parallel_group_1[sec,test]',
      'debug',
      'release',
    ]);
  });

  it('should move a phase after the phases it depends on', () => {
    const workflow = buildWorkflow([buildPhase('release', 'release'), buildPhase('impl', 'implementation')], {
      release: ['impl'],
    });

    expect(describeSteps(buildExecutionPlan(workflow))).toEqual(['impl', 'release']);
  });

  it('should run a group of one as a single phase', () => {
    const workflow = buildWorkflow([buildPhase('docs', 'documentation', { parallelGroup: 'solo' })]);

    expect(buildExecutionPlan(workflow)).toEqual([{ kind: 'sequential', phase: workflow.phases[0] }]);
  });
});
