/**
 * Workflow Conductor
 * Caller-facing entry point: analyze a task, compose a workflow for it and
 * execute that workflow. Each stage can also be used on its own.
 */

import { TaskAnalyzer, AnalysisContext } from '../analysis/task-analyzer';
import { WorkflowComposer } from '../composition/workflow-composer';
import { TemplateLibrary } from '../composition/template-library';
import { Clock } from '../types/clock';
import { EngineConfig } from '../types/engine-config';
import { Logger } from '../types/logger';
import { ResultBag, TaskAnalysis, WorkflowDefinition, WorkflowResult } from '../types/models';
import { ContextPolicyLoader, EscalationHandler } from '../types/phase-executor';
import { ContextOrchestrator } from './context-orchestrator';
import { PhaseExecutorResolver } from './executor-registry';
import { RecoveryStrategy } from './recovery-strategies';

export type ConductorSettings = Pick<EngineConfig, 'analysis' | 'composition' | 'execution'>;

/**
 * All dependencies required by the conductor
 */
export interface WorkflowConductorDependencies {
  logger: Logger;
  clock: Clock;
  executors: PhaseExecutorResolver;
  templates?: TemplateLibrary;
  policyLoader?: ContextPolicyLoader;
  recoveryStrategies?: RecoveryStrategy[];
  onEscalate?: EscalationHandler;
}

export interface RunTaskOptions {
  /** Environment hints for the analyzer (`project_size`, `team_experience`) */
  context?: AnalysisContext;
  /** Workflow-level data handed to every phase */
  initialContext?: ResultBag;
}

export class WorkflowConductor {
  readonly analyzer: TaskAnalyzer;
  readonly composer: WorkflowComposer;
  readonly orchestrator: ContextOrchestrator;

  constructor(settings: ConductorSettings, deps: WorkflowConductorDependencies) {
    const { logger, clock } = deps;
    this.analyzer = new TaskAnalyzer(settings.analysis, { logger, clock });
    this.composer = new WorkflowComposer(
      { ...settings.composition, defaultRetryCount: settings.execution.defaultRetryCount },
      { logger, clock, templates: deps.templates }
    );
    this.orchestrator = new ContextOrchestrator(settings.execution, {
      logger,
      clock,
      executors: deps.executors,
      policyLoader: deps.policyLoader,
      recoveryStrategies: deps.recoveryStrategies,
      onEscalate: deps.onEscalate,
    });
  }

  analyze(description: string, context: AnalysisContext = {}): TaskAnalysis {
    return this.analyzer.analyze(description, context);
  }

  compose(analysis: TaskAnalysis): WorkflowDefinition {
    return this.composer.compose(analysis);
  }

  execute(workflow: Readonly<WorkflowDefinition>, initialContext: Readonly<ResultBag> = {}): Promise<WorkflowResult> {
    return this.orchestrator.execute(workflow, initialContext);
  }

  /**
   * Analyze, compose and execute in one call
   */
  async runTask(description: string, options: RunTaskOptions = {}): Promise<WorkflowResult> {
    const analysis = this.analyze(description, options.context);
    const workflow = this.compose(analysis);
    return this.execute(workflow, {
      task_id: analysis.taskId,
      task_description: analysis.description,
      ...options.initialContext,
    });
  }
}
