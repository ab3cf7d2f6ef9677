/**
 * Execution planning
 * Checks that a definition can run at all, then fixes the order of steps:
 * single phases run on their own, members of a parallel group run together
 * at the position of the group's first member.
 */

import { isContextName } from '../types/context-name';
import { WorkflowDefinition, WorkflowPhase } from '../types/models';
import { isErr } from '../types/result';
import { dependsOn, findCycle, topologicalOrder, unknownReferences } from '../composition/dependency-graph';
import { resolvePhaseCondition } from './phase-condition';

export type ExecutionStep =
  | { kind: 'sequential'; phase: WorkflowPhase }
  | { kind: 'parallel'; group: string; phases: WorkflowPhase[] };

/**
 * Problems that make a definition impossible to execute. Empty when it can run.
 */
export function definitionProblems(workflow: Readonly<WorkflowDefinition>): string[] {
  const problems: string[] = [];
  if (workflow.phases.length === 0) {
    return ['Workflow has no phases'];
  }

  const seen = new Set<string>();
  for (const phase of workflow.phases) {
    if (seen.has(phase.phaseId)) {
      problems.push(`Duplicate phase id: ${phase.phaseId}`);
    }
    seen.add(phase.phaseId);

    if (!isContextName(phase.context)) {
      problems.push(`Unknown context in phase ${phase.phaseId}: ${phase.context}`);
    }
    if (!Number.isFinite(phase.timeoutSeconds) || phase.timeoutSeconds <= 0) {
      problems.push(`Invalid timeout in phase ${phase.phaseId}: ${phase.timeoutSeconds}`);
    }
    if (!Number.isInteger(phase.retryCount) || phase.retryCount < 0) {
      problems.push(`Invalid retry count in phase ${phase.phaseId}: ${phase.retryCount}`);
    }
    const condition = resolvePhaseCondition(phase);
    if (isErr(condition)) {
      problems.push(`Invalid condition in phase ${phase.phaseId}: ${condition.error}`);
    }
  }

  const ids = workflow.phases.map((phase) => phase.phaseId);
  for (const id of unknownReferences(ids, workflow.dependencies)) {
    problems.push(`Unknown phase in dependencies: ${id}`);
  }

  const cycle = findCycle(ids, workflow.dependencies);
  if (cycle) {
    problems.push(`Circular dependency: ${cycle.join(' -> ')}`);
  }

  const groups = new Map<string, string[]>();
  for (const phase of workflow.phases) {
    if (phase.parallelGroup !== undefined) {
      groups.set(phase.parallelGroup, [...(groups.get(phase.parallelGroup) ?? []), phase.phaseId]);
    }
  }
  for (const [group, members] of groups) {
    for (const a of members) {
      for (const b of members) {
        if (a !== b && dependsOn(a, b, workflow.dependencies)) {
          problems.push(`Parallel group ${group} contains dependent phases: ${a} depends on ${b}`);
        }
      }
    }
  }

  return problems;
}

/**
 * Steps in execution order. Phases are taken in dependency order, earliest
 * definition position first, so a composed workflow keeps its phase order.
 */
export function buildExecutionPlan(workflow: Readonly<WorkflowDefinition>): ExecutionStep[] {
  const byId = new Map(workflow.phases.map((phase) => [phase.phaseId, phase]));
  const order = topologicalOrder(
    workflow.phases.map((phase) => phase.phaseId),
    workflow.dependencies,
    (id) => byId.get(id)?.parallelGroup
  );

  const steps: ExecutionStep[] = [];
  const groupSteps = new Map<string, WorkflowPhase[]>();
  for (const id of order) {
    const phase = byId.get(id);
    if (!phase) {
      continue;
    }
    const group = phase.parallelGroup;
    if (group === undefined) {
      steps.push({ kind: 'sequential', phase });
      continue;
    }
    const members = groupSteps.get(group);
    if (members) {
      members.push(phase);
      continue;
    }
    const phases = [phase];
    groupSteps.set(group, phases);
    steps.push({ kind: 'parallel', group, phases });
  }

  // a group of one is just a phase
  return steps.map((step) =>
    step.kind === 'parallel' && step.phases.length === 1 ? { kind: 'sequential', phase: step.phases[0] } : step
  );
}
