/**
 * Workflow Summary
 * Markdown rendering of a terminal WorkflowResult
 */

import { PhaseStatus, WorkflowDefinition, WorkflowResult } from '../types/models';

const STATUS_LABELS: Record<string, string> = {
  completed: '✅ Completed',
  failed: '❌ Failed',
  cancelled: '⏹️ Cancelled',
};

/**
 * Render a workflow result as markdown
 * @param definition - When given, phases are listed in definition order with their names
 */
export function formatWorkflowResultMarkdown(
  result: WorkflowResult,
  definition?: WorkflowDefinition
): string {
  const lines: string[] = [
    '# Workflow Summary',
    '',
    `**Workflow ID:** ${result.workflowId}`,
    `**Status:** ${STATUS_LABELS[result.status] ?? result.status}`,
    `**Duration:** ${formatDuration(Math.round(result.executionTimeSeconds * 1000))}`,
    `**Success Rate:** ${formatPercent(result.metrics.successRate)}`,
  ];

  if (result.qualityScore !== null) {
    lines.push(`**Quality Score:** ${result.qualityScore.toFixed(2)}`);
  }

  lines.push('');
  lines.push('## Phases');
  lines.push('');
  lines.push('| Phase | Status | Duration |');
  lines.push('|-------|--------|----------|');

  for (const row of phaseRows(result, definition)) {
    const duration = result.metrics.phaseDurationsMs[row.phaseId];
    lines.push(
      `| ${row.label} | ${row.status} | ${duration === undefined ? '-' : formatDuration(duration)} |`
    );
  }

  if (result.errors.length > 0) {
    lines.push('');
    lines.push('## Errors');
    lines.push('');
    for (const error of result.errors) {
      lines.push(`- ${error}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push('');
    lines.push('## Warnings');
    lines.push('');
    for (const warning of result.warnings) {
      lines.push(`- ${warning}`);
    }
  }

  lines.push('');
  lines.push('---');
  lines.push(`*Completed at ${result.completedAt}*`);
  lines.push('');

  return lines.join('\n');
}

function phaseRows(
  result: WorkflowResult,
  definition?: WorkflowDefinition
): Array<{ phaseId: string; label: string; status: PhaseStatus }> {
  const statusOf = (phaseId: string): PhaseStatus => {
    if (result.phasesExecuted.includes(phaseId)) return 'completed';
    if (result.phasesFailed.includes(phaseId)) return 'failed';
    if (result.phasesSkipped.includes(phaseId)) return 'skipped';
    return 'pending';
  };

  if (definition) {
    return definition.phases.map((phase) => ({
      phaseId: phase.phaseId,
      label: `${phase.name} (${phase.context})`,
      status: statusOf(phase.phaseId),
    }));
  }

  return [...result.phasesExecuted, ...result.phasesFailed, ...result.phasesSkipped].map((phaseId) => ({
    phaseId,
    label: phaseId,
    status: statusOf(phaseId),
  }));
}

function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}
