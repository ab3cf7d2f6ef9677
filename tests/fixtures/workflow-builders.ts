/**
 * Builders for workflow definitions used across orchestration tests
 */

import { WorkflowDefinition, WorkflowPhase } from '../../src/types/models';

export function buildPhase(phaseId: string, context: string, overrides: Partial<WorkflowPhase> = {}): WorkflowPhase {
  return {
    phaseId,
    context,
    name: phaseId,
    description: '',
    inputs: [],
    outputs: [],
    timeoutSeconds: 60,
    retryCount: 0,
    qualityGates: [],
    ...overrides,
  };
}

export function buildWorkflow(
  phases: WorkflowPhase[],
  dependencies: Record<string, string[]> = {},
  overrides: Partial<WorkflowDefinition> = {}
): WorkflowDefinition {
  return {
    workflowId: 'wf_test',
    name: 'Test workflow',
    description: 'Workflow built for a test',
    phases,
    dependencies,
    estimatedDuration: 30,
    qualityGates: [],
    metadata: { source: 'external' },
    createdAt: '2025-01-01T00:00:00.000Z',
    ...overrides,
  };
}
