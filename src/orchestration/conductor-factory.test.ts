/**
 * Tests for Conductor Factory
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createConductor, createTestConductor } from './conductor-factory';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';

const BUG_REPORT = 'Fix critical login bug in authentication system';

describe('createTestConductor', () => {
  it('runs a task end to end on simulated executors', async () => {
    const { conductor, logger } = createTestConductor();

    const result = await conductor.runTask(BUG_REPORT);

    expect(result.status).toBe('completed');
    expect(result.phasesExecuted).toHaveLength(5);
    expect(result.phasesExecuted[0]).toMatch(/_phase_0_implementation$/);
    expect(result.phasesExecuted[4]).toMatch(/_phase_4_release$/);
    expect(result.metrics.successRate).toBe(1);
    expect(logger.hasEventType('analysis_completed')).toBe(true);
    expect(logger.hasEventType('composition_completed')).toBe(true);
    expect(logger.getLastEvent()?.eventType).toBe('workflow_completed');
  });

  it('hands the task to every phase', async () => {
    const seen: unknown[] = [];
    const { conductor } = createTestConductor({
      executors: {
        release: {
          execute: (phase, inputs) => {
            seen.push(inputs.task_description, inputs.ticket);
            return Object.fromEntries(phase.outputs.map((output) => [output, 'done']));
          },
        },
      },
    });

    await conductor.runTask(BUG_REPORT, { initialContext: { ticket: 'BUG-7' } });

    expect(seen).toEqual([BUG_REPORT, 'BUG-7']);
  });

  it('uses executors passed in', async () => {
    const { conductor } = createTestConductor({
      executors: {
        release: {
          execute: () => {
            throw new Error('critical: registry down');
          },
        },
      },
    });

    const result = await conductor.runTask(BUG_REPORT);

    expect(result.status).toBe('failed');
    expect(result.metrics.failureReason).toBe('Critical error: critical: registry down');
  });
});

describe('createConductor', () => {
  let tempDir: TempDirContext | undefined;

  afterEach(() => {
    tempDir?.cleanup();
    tempDir = undefined;
  });

  it('loads the repo config and its template directory', () => {
    tempDir = createTempDirContext();
    tempDir.writeFile(
      '.conductor/config.json',
      JSON.stringify({ composition: { templateDirectory: 'templates' }, logging: { minLevel: 'error' } })
    );
    tempDir.copyFixture('templates/bug-fix.yaml', 'templates/bug-fix.yaml');
    tempDir.copyFixture('templates/malformed.yaml', 'templates/malformed.yaml');

    const setup = createConductor({ workingDirectory: tempDir.path, homeDirectory: tempDir.path });

    expect(setup.config.composition.templateDirectory).toBe('templates');
    expect(setup.config.sources['composition.templateDirectory']).toBe('repo');
    expect(setup.templateFailures.map((f) => f.file)).toEqual(['malformed.yaml']);

    const workflow = setup.conductor.compose(setup.conductor.analyze(BUG_REPORT));
    expect(workflow.metadata.source).toBe('template');
    expect(workflow.metadata.templateId).toBe('bug-fix');
  });

  it('reports a missing template directory', () => {
    tempDir = createTempDirContext();

    const setup = createConductor({
      workingDirectory: tempDir.path,
      homeDirectory: tempDir.path,
      overrides: { composition: { templateDirectory: 'missing' }, logging: { minLevel: 'error' } },
    });

    expect(setup.templateFailures).toHaveLength(1);
    expect(setup.templateFailures[0].message).toMatch(/^Could not read template directory: /);
  });
});
