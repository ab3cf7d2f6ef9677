/**
 * Workflow Composer
 * Turns a TaskAnalysis into a validated WorkflowDefinition: picks and
 * customizes a template when one matches well enough, otherwise synthesizes
 * one phase per required context from the context catalog. The result is
 * ordered, grouped for parallel execution, validated and repaired once.
 */

import { ContextName, isContextName } from '../types/context-name';
import {
  ComplexityLevel,
  TaskAnalysis,
  ValidationResult,
  WorkflowDefinition,
  WorkflowPhase,
  WorkflowTemplate,
} from '../types/models';
import { CompositionSettings, ExecutionSettings } from '../types/engine-config';
import { Logger } from '../types/logger';
import { Clock } from '../types/clock';
import { isErr } from '../types/result';
import {
  CONTEXT_CATALOG,
  categoryEntityTypes,
  getContextEntry,
  isParallelSafe,
  predecessorsOf,
  phaseTimeoutSeconds,
} from '../config/context-catalog';
import { compileCondition } from '../orchestration/phase-condition';
import { TemplateLibrary } from './template-library';
import {
  DependencyMap,
  dependsOn,
  findCycle,
  isWeaklyConnected,
  topologicalOrder,
  unknownReferences,
  weakComponents,
} from './dependency-graph';

export type ComposerSettings = CompositionSettings & Pick<ExecutionSettings, 'defaultRetryCount'>;

/**
 * Dependencies required by the WorkflowComposer
 */
export interface WorkflowComposerDependencies {
  logger: Logger;
  clock: Clock;
  /** Template matching is disabled without a library */
  templates?: TemplateLibrary;
}

export interface TemplateMatch {
  template: WorkflowTemplate;
  score: number;
}

const TEMPLATE_WEIGHTS = {
  contextOverlap: 0.4,
  category: 0.3,
  phaseCount: 0.2,
  successRate: 0.1,
};

const HIGH_SUCCESS_RATE = 0.8;

const PENALTIES = {
  invalidContext: 0.2,
  invalidCondition: 0.2,
  missingRelease: 0.1,
  missingVerification: 0.1,
  unknownReference: 0.2,
  disconnected: 0.3,
  cycle: 0.4,
};

function phaseCountFits(complexity: ComplexityLevel, count: number): boolean {
  switch (complexity) {
    case 'simple':
      return count <= 3;
    case 'medium':
      return count >= 3 && count <= 6;
    case 'complex':
      return count >= 5;
  }
}

export class WorkflowComposer {
  private readonly settings: ComposerSettings;
  private readonly deps: WorkflowComposerDependencies;

  constructor(settings: ComposerSettings, deps: WorkflowComposerDependencies) {
    this.settings = settings;
    this.deps = deps;
  }

  /**
   * Compose a workflow for an analysis. Never throws; a workflow that is still
   * invalid after repair is returned with its validation messages in metadata.
   */
  compose(analysis: TaskAnalysis): WorkflowDefinition {
    const workflowId = `workflow_${analysis.taskId}`;
    const logMeta = { taskId: analysis.taskId, workflowId };
    this.deps.logger.event('composition_started', 'Composing workflow', logMeta);

    const match = this.selectTemplate(analysis);
    const phases = match
      ? this.phasesFromTemplate(match.template, analysis, workflowId)
      : analysis.requiredContexts.map((context, index) =>
          this.contextPhase(context, analysis.complexity, workflowId, index)
        );

    const draft: WorkflowDefinition = {
      workflowId,
      name: match ? match.template.name : `Workflow for ${analysis.description.slice(0, 50)}`,
      description: analysis.description,
      phases,
      dependencies: this.buildDependencies(phases),
      estimatedDuration: this.estimateDuration(phases, analysis.complexity),
      qualityGates: this.qualityGates(analysis),
      metadata: {
        source: match ? 'template' : 'synthesized',
        ...(match ? { templateId: match.template.templateId } : {}),
        taskId: analysis.taskId,
        complexity: analysis.complexity,
        appliedRules: [],
      },
      createdAt: this.deps.clock.iso(),
    };

    const workflow = this.validateAndRepair(this.optimize(draft));

    this.deps.logger.event(
      'composition_completed',
      `Workflow composed: ${workflow.phases.length} phases, ${workflow.estimatedDuration}min estimated`,
      { ...logMeta, score: workflow.metadata.validation?.score, passed: workflow.metadata.validation?.passed }
    );
    return workflow;
  }

  /**
   * Best template scoring at or above the match threshold, if any
   */
  selectTemplate(analysis: TaskAnalysis): TemplateMatch | null {
    const templates = this.deps.templates?.list() ?? [];
    if (templates.length === 0) {
      return null;
    }

    let best: TemplateMatch | null = null;
    for (const template of templates) {
      const score = this.scoreTemplate(template, analysis);
      if (best === null || score > best.score) {
        best = { template, score };
      }
    }

    const meta = { taskId: analysis.taskId, templateId: best?.template.templateId, score: best?.score };
    if (best === null || best.score < this.settings.templateMatchThreshold) {
      this.deps.logger.event('template_rejected', 'No template matched; synthesizing phases', meta);
      return null;
    }
    this.deps.logger.event('template_selected', `Selected template ${best.template.name}`, meta);
    return best;
  }

  /**
   * Match score in [0, 1]: context overlap, category, phase count fit, success rate
   */
  scoreTemplate(template: WorkflowTemplate, analysis: TaskAnalysis): number {
    let score = 0;

    const templateContexts = new Set<string>(template.phases.map((phase) => phase.context));
    if (analysis.requiredContexts.length > 0) {
      const overlap = analysis.requiredContexts.filter((context) => templateContexts.has(context)).length;
      score += (overlap / analysis.requiredContexts.length) * TEMPLATE_WEIGHTS.contextOverlap;
    }

    const entityTypes = new Set(analysis.entities.map((entity) => entity.type));
    if (categoryEntityTypes(template.category).some((type) => entityTypes.has(type))) {
      score += TEMPLATE_WEIGHTS.category;
    }

    if (phaseCountFits(analysis.complexity, template.phases.length)) {
      score += TEMPLATE_WEIGHTS.phaseCount;
    }

    if (template.successRate > HIGH_SUCCESS_RATE) {
      score += TEMPLATE_WEIGHTS.successRate;
    }

    return Math.min(1, score);
  }

  /**
   * Reorder by the catalog's ordering rules, assign parallel groups, then
   * sort topologically. Dependencies are left untouched.
   */
  optimize(workflow: WorkflowDefinition): WorkflowDefinition {
    const { phases: ordered, appliedRules } = this.applyOrderingRules(workflow.phases);
    const grouped = this.assignParallelGroups(ordered, workflow.dependencies);

    const byId = new Map(grouped.map((phase) => [phase.phaseId, phase]));
    const order = topologicalOrder(
      grouped.map((phase) => phase.phaseId),
      workflow.dependencies,
      (id) => byId.get(id)?.parallelGroup
    );

    return {
      ...workflow,
      phases: order.map((id) => byId.get(id)).filter((phase): phase is WorkflowPhase => phase !== undefined),
      metadata: { ...workflow.metadata, appliedRules },
    };
  }

  /**
   * Score a workflow, starting at 1.0 and deducting per violation
   */
  validate(workflow: WorkflowDefinition): ValidationResult {
    const threshold = this.settings.validationPassThreshold;
    if (workflow.phases.length === 0) {
      return {
        passed: false,
        score: 0,
        messages: ['Workflow has no phases'],
        details: { workflowId: workflow.workflowId, phaseCount: 0 },
      };
    }

    const messages: string[] = [];
    let score = 1.0;

    for (const phase of workflow.phases) {
      if (!isContextName(phase.context)) {
        messages.push(`Invalid context in phase ${phase.name}: ${phase.context}`);
        score -= PENALTIES.invalidContext;
      }
      if (phase.conditionExpression !== undefined) {
        const condition = compileCondition(phase.conditionExpression);
        if (isErr(condition)) {
          messages.push(`Invalid condition in phase ${phase.name}: ${condition.error}`);
          score -= PENALTIES.invalidCondition;
        }
      }
    }

    const contexts = new Set(workflow.phases.map((phase) => phase.context));
    if (!contexts.has('release') && contexts.size > 1) {
      messages.push('Workflow missing release phase');
      score -= PENALTIES.missingRelease;
    }
    if (workflow.phases.length > 2 && !contexts.has('verification')) {
      messages.push('Workflow with more than two phases missing verification phase');
      score -= PENALTIES.missingVerification;
    }

    const ids = workflow.phases.map((phase) => phase.phaseId);
    const unknown = unknownReferences(ids, workflow.dependencies);
    for (const id of unknown) {
      messages.push(`Unknown phase in dependencies: ${id}`);
      score -= PENALTIES.unknownReference;
    }

    if (!isWeaklyConnected(ids, workflow.dependencies)) {
      messages.push('Workflow phases are not connected');
      score -= PENALTIES.disconnected;
    }

    const cycle = findCycle(ids, workflow.dependencies);
    if (cycle) {
      messages.push(`Circular dependency: ${cycle.join(' -> ')}`);
      score -= PENALTIES.cycle;
    }

    score = Math.max(0, Math.round(score * 100) / 100);
    return {
      passed: score >= threshold,
      score,
      messages,
      details: {
        workflowId: workflow.workflowId,
        phaseCount: workflow.phases.length,
        contexts: [...contexts],
        unknownReferences: unknown,
        cycle,
      },
    };
  }

  /**
   * Validate; on failure repair once and validate again. The outcome is
   * recorded in `metadata.validation`.
   */
  validateAndRepair(workflow: WorkflowDefinition): WorkflowDefinition {
    const logMeta = { taskId: workflow.metadata.taskId, workflowId: workflow.workflowId };
    const initial = this.validate(workflow);
    if (initial.passed) {
      return {
        ...workflow,
        metadata: {
          ...workflow.metadata,
          validation: { passed: true, score: initial.score, messages: initial.messages, repaired: false },
        },
      };
    }

    this.deps.logger.event('validation_failed', `Workflow validation failed: ${initial.messages.join('; ')}`, {
      ...logMeta,
      score: initial.score,
    });

    const repaired = this.optimize(this.repair(workflow));
    const result = this.validate(repaired);

    this.deps.logger.event(
      'workflow_repaired',
      `Workflow repaired: score ${initial.score} -> ${result.score}`,
      { ...logMeta, passed: result.passed, score: result.score }
    );

    return {
      ...repaired,
      metadata: {
        ...repaired.metadata,
        validation: { passed: result.passed, score: result.score, messages: result.messages, repaired: true },
      },
    };
  }

  /**
   * Dependencies from the catalog's predecessor table. A predecessor context
   * with no phase is skipped in favour of its own predecessors.
   */
  buildDependencies(phases: readonly WorkflowPhase[]): Record<string, string[]> {
    const byContext = new Map<string, string[]>();
    for (const phase of phases) {
      byContext.set(phase.context, [...(byContext.get(phase.context) ?? []), phase.phaseId]);
    }

    const dependencies: Record<string, string[]> = {};
    for (const phase of phases) {
      if (!isContextName(phase.context)) {
        continue;
      }
      const deps: string[] = [];
      const visited = new Set<ContextName>();
      const pending = [...predecessorsOf(phase.context)];
      while (pending.length > 0) {
        const context = pending.shift();
        if (context === undefined || visited.has(context)) {
          continue;
        }
        visited.add(context);
        const ids = byContext.get(context);
        if (ids) {
          deps.push(...ids.filter((id) => !deps.includes(id)));
        } else {
          pending.push(...predecessorsOf(context));
        }
      }
      if (deps.length > 0) {
        dependencies[phase.phaseId] = deps;
      }
    }
    return dependencies;
  }

  private phasesFromTemplate(template: WorkflowTemplate, analysis: TaskAnalysis, workflowId: string): WorkflowPhase[] {
    const required = new Set<string>(analysis.requiredContexts);

    const phases: WorkflowPhase[] = template.phases
      .filter((phase) => !phase.optional || required.has(phase.context))
      .map((phase) => ({
        phaseId: `${workflowId}_${phase.id}`,
        context: phase.context,
        name: phase.name,
        description: phase.description,
        inputs: [...phase.inputs],
        outputs: [...phase.outputs],
        ...(phase.condition !== undefined ? { conditionExpression: phase.condition } : {}),
        timeoutSeconds: phase.timeoutSeconds,
        retryCount: phase.retryCount,
        qualityGates: [...phase.qualityGates],
      }));

    const present = new Set(phases.map((phase) => phase.context));
    for (const context of analysis.requiredContexts) {
      if (!present.has(context)) {
        phases.push(this.contextPhase(context, analysis.complexity, workflowId, phases.length));
      }
    }
    return phases;
  }

  private contextPhase(
    context: ContextName,
    complexity: ComplexityLevel,
    workflowId: string,
    index: number,
    takenIds: ReadonlySet<string> = new Set()
  ): WorkflowPhase {
    let position = index;
    while (takenIds.has(`${workflowId}_phase_${position}_${context}`)) {
      position++;
    }
    const template = getContextEntry(context).phase;
    return {
      phaseId: `${workflowId}_phase_${position}_${context}`,
      context,
      name: template.name,
      description: template.description,
      inputs: [...template.inputs],
      outputs: [...template.outputs],
      timeoutSeconds: phaseTimeoutSeconds(context, complexity),
      retryCount: this.settings.defaultRetryCount,
      qualityGates: [...template.qualityGates],
    };
  }

  private estimateDuration(phases: readonly WorkflowPhase[], complexity: ComplexityLevel): number {
    const minutes = Math.floor(phases.reduce((total, phase) => total + phase.timeoutSeconds, 0) / 60);
    return Math.max(
      CONTEXT_CATALOG.minimumWorkflowMinutes,
      Math.floor(minutes * CONTEXT_CATALOG.durationFactors[complexity])
    );
  }

  private qualityGates(analysis: TaskAnalysis): string[] {
    const gates = ['basic_validation', 'error_free_execution'];
    if (analysis.complexity !== 'simple') {
      gates.push('comprehensive_testing', 'code_quality_check');
    }
    if (analysis.entities.some((entity) => entity.type === 'security')) {
      gates.push('security_validation');
    }
    if (analysis.entities.some((entity) => entity.type === 'performance')) {
      gates.push('performance_validation');
    }
    return gates;
  }

  private applyOrderingRules(phases: readonly WorkflowPhase[]): { phases: WorkflowPhase[]; appliedRules: string[] } {
    let ordered = [...phases];
    const appliedRules: string[] = [];
    const has = (context: string) => ordered.some((phase) => phase.context === context);
    const split = (context: string) => ({
      matching: ordered.filter((phase) => phase.context === context),
      others: ordered.filter((phase) => phase.context !== context),
    });

    for (const rule of CONTEXT_CATALOG.orderingRules) {
      switch (rule.kind) {
        case 'first': {
          if (!has(rule.context)) {
            continue;
          }
          const { matching, others } = split(rule.context);
          ordered = [...matching, ...others];
          break;
        }
        case 'last': {
          if (!has(rule.context)) {
            continue;
          }
          const { matching, others } = split(rule.context);
          ordered = [...others, ...matching];
          break;
        }
        case 'before': {
          if (!has(rule.first) || !has(rule.second)) {
            continue;
          }
          ordered = [
            ...ordered.filter((phase) => phase.context === rule.first),
            ...ordered.filter((phase) => phase.context !== rule.first && phase.context !== rule.second),
            ...ordered.filter((phase) => phase.context === rule.second),
          ];
          break;
        }
      }
      appliedRules.push(rule.name);
    }

    return { phases: ordered, appliedRules };
  }

  /**
   * Greedily group parallel-safe phases with no dependency path between any two members
   */
  private assignParallelGroups(phases: readonly WorkflowPhase[], dependencies: DependencyMap): WorkflowPhase[] {
    const result = phases.map((phase) => {
      const copy = { ...phase };
      delete copy.parallelGroup;
      return copy;
    });
    const candidate = (phase: WorkflowPhase) =>
      phase.parallelGroup === undefined && isContextName(phase.context) && isParallelSafe(phase.context);
    const independent = (a: WorkflowPhase, b: WorkflowPhase) =>
      !dependsOn(a.phaseId, b.phaseId, dependencies) && !dependsOn(b.phaseId, a.phaseId, dependencies);

    let groupCount = 0;
    result.forEach((phase, index) => {
      if (!candidate(phase)) {
        return;
      }
      const members = [phase];
      for (const other of result.slice(index + 1)) {
        if (candidate(other) && members.every((member) => independent(member, other))) {
          members.push(other);
        }
      }
      if (members.length > 1) {
        groupCount++;
        for (const member of members) {
          member.parallelGroup = `parallel_group_${groupCount}`;
        }
      }
    });
    return result;
  }

  /**
   * Targeted fixes for a failed validation: drop unusable phases and
   * conditions, add missing release and verification phases, rebuild
   * dependencies and chain disconnected parts together
   */
  private repair(workflow: WorkflowDefinition): WorkflowDefinition {
    const complexity = workflow.metadata.complexity ?? 'medium';
    const { workflowId } = workflow;

    const phases: WorkflowPhase[] = workflow.phases
      .filter((phase) => isContextName(phase.context))
      .map((phase) => {
        if (phase.conditionExpression === undefined || !isErr(compileCondition(phase.conditionExpression))) {
          return phase;
        }
        const copy = { ...phase };
        delete copy.conditionExpression;
        return copy;
      });

    const takenIds = () => new Set(phases.map((phase) => phase.phaseId));
    if (phases.length === 0) {
      phases.push(this.contextPhase('implementation', complexity, workflowId, 0));
    }

    const contexts = () => new Set(phases.map((phase) => phase.context));
    if (!contexts().has('release') && contexts().size > 1) {
      phases.push(this.contextPhase('release', complexity, workflowId, phases.length, takenIds()));
    }
    if (phases.length > 2 && !contexts().has('verification')) {
      phases.splice(
        phases.length - 1,
        0,
        this.contextPhase('verification', complexity, workflowId, phases.length, takenIds())
      );
    }

    const dependencies = this.buildDependencies(phases);
    const ids = takenIds();

    // Keep caller-supplied edges that still resolve and keep the graph acyclic
    for (const [id, deps] of Object.entries(workflow.dependencies)) {
      if (!ids.has(id)) {
        continue;
      }
      for (const dep of deps) {
        const current = dependencies[id] ?? [];
        if (!ids.has(dep) || dep === id || current.includes(dep) || dependsOn(dep, id, dependencies)) {
          continue;
        }
        dependencies[id] = [...current, dep];
      }
    }

    const order = topologicalOrder(
      phases.map((phase) => phase.phaseId),
      dependencies
    );
    const components = weakComponents(order, dependencies);
    for (let index = 1; index < components.length; index++) {
      const previous = components[index - 1];
      const head = components[index][0];
      dependencies[head] = [...(dependencies[head] ?? []), previous[previous.length - 1]];
    }

    return {
      ...workflow,
      phases,
      dependencies,
      estimatedDuration: this.estimateDuration(phases, complexity),
    };
  }
}
