/**
 * workflow-conductor
 * Turns a free-text task into a dependency-ordered workflow across capability
 * contexts and drives it to completion.
 */

import { createConductor, ConductorFactoryOptions } from './orchestration/conductor-factory';
import { RunTaskOptions } from './orchestration/workflow-conductor';
import { WorkflowResult } from './types/models';

export * from './types';
export * from './config';
export * from './schemas';
export * from './logging';
export * from './analysis';
export * from './composition';
export * from './orchestration';

/**
 * Analyze, compose and execute a task with a conductor built from the
 * resolved configuration. Phases run on simulated executors unless real ones
 * are passed in `executors`.
 */
export function runTask(
  description: string,
  options: ConductorFactoryOptions & RunTaskOptions = {}
): Promise<WorkflowResult> {
  const { conductor } = createConductor(options);
  return conductor.runTask(description, options);
}
