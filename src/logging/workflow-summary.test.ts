/**
 * Tests for Workflow Summary
 */

import { describe, it, expect } from 'vitest';
import { formatWorkflowResultMarkdown, formatDuration } from './workflow-summary';
import { WorkflowResult } from '../types/models';
import { buildPhase, buildWorkflow } from '../../tests/fixtures/workflow-builders';

const result: WorkflowResult = {
  workflowId: 'wf_test',
  status: 'completed',
  results: { design: { summary: 'done' } },
  executionTimeSeconds: 65.4,
  phasesExecuted: ['design'],
  phasesFailed: [],
  phasesSkipped: ['ship'],
  errors: [],
  warnings: ['Release window closed'],
  metrics: {
    totalPhases: 2,
    completedPhases: 1,
    failedPhases: 0,
    skippedPhases: 1,
    successRate: 0.5,
    retryCount: 0,
    phaseDurationsMs: { design: 1500 },
  },
  qualityScore: 0.9,
  completedAt: '2025-01-01T00:01:05.400Z',
};

describe('formatWorkflowResultMarkdown', () => {
  it('should list phases in definition order with their names', () => {
    const definition = buildWorkflow([
      buildPhase('design', 'design', { name: 'Design' }),
      buildPhase('ship', 'release', { name: 'Ship' }),
    ]);

    expect(formatWorkflowResultMarkdown(result, definition).split('\n')).toEqual([
      '# Workflow Summary',
      '',
      '**Workflow ID:** wf_test',
      '**Status:** ✅ Completed',
      '**Duration:** 1m 5s',
      '**Success Rate:** 50%',
      '**Quality Score:** 0.90',
      '',
      '## Phases',
      '',
      '| Phase | Status | Duration |',
      '|-------|--------|----------|',
      '| Design (design) | completed | 1s |',
      '| Ship (release) | skipped | - |',
      '',
      '## Warnings',
      '',
      '- Release window closed',
      '',
      '---',
      '*Completed at 2025-01-01T00:01:05.400Z*',
      '',
    ]);
  });

  it('should list errors and fall back to phase ids', () => {
    const failed: WorkflowResult = {
      ...result,
      status: 'failed',
      phasesExecuted: [],
      phasesFailed: ['design'],
      errors: ['Phase Design failed: boom'],
      warnings: [],
      qualityScore: null,
    };

    const lines = formatWorkflowResultMarkdown(failed).split('\n');

    expect(lines).toContain('**Status:** ❌ Failed');
    expect(lines).toContain('| design | failed | 1s |');
    expect(lines).toContain('| ship | skipped | - |');
    expect(lines).toContain('- Phase Design failed: boom');
    expect(lines).not.toContain('## Warnings');
    expect(lines.some((line) => line.startsWith('**Quality Score:**'))).toBe(false);
  });
});

describe('formatDuration', () => {
  it.each([
    [999, '999ms'],
    [59_000, '59s'],
    [125_000, '2m 5s'],
    [3_720_000, '1h 2m'],
  ])('should format %d ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
