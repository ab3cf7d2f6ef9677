/**
 * Context Orchestrator
 *
 * Executes a workflow definition phase by phase:
 * 1. Checks the definition can run at all
 * 2. Runs sequential phases in order and parallel groups concurrently
 * 3. Switches context before each phase and propagates earlier results
 * 4. Enforces phase timeouts and output contracts
 * 5. Applies recovery strategies to failed phases
 *
 * Every call to execute() owns a fresh WorkflowState, so concurrent runs
 * share nothing but the injected collaborators.
 */

import { Clock } from '../types/clock';
import { isContextName } from '../types/context-name';
import { ExecutionSettings } from '../types/engine-config';
import { ContextTransitionError, PhaseValidationError, errorMessage } from '../types/errors';
import { Logger, LogMetadata } from '../types/logger';
import {
  RecoveryAction,
  ResultBag,
  WorkflowDefinition,
  WorkflowPhase,
  WorkflowResult,
  WorkflowState,
} from '../types/models';
import { ContextPolicyLoader, EscalationHandler } from '../types/phase-executor';
import { isErr } from '../types/result';
import { buildExecutionPlan, definitionProblems } from './execution-plan';
import { PhaseExecutorResolver } from './executor-registry';
import { resolvePhaseCondition } from './phase-condition';
import {
  PhaseFailure,
  RecoveryStrategy,
  classifyFailure,
  defaultRecoveryStrategies,
  selectRecoveryAction,
} from './recovery-strategies';
import {
  createWorkflowState,
  phasesWithStatus,
  setPhaseStatus,
  setWorkflowStatus,
} from './workflow-state';

/**
 * All dependencies required by the orchestrator
 */
export interface ContextOrchestratorDependencies {
  logger: Logger;
  clock: Clock;
  executors: PhaseExecutorResolver;
  policyLoader?: ContextPolicyLoader;
  /** Replaces the built-in strategy list */
  recoveryStrategies?: RecoveryStrategy[];
  onEscalate?: EscalationHandler;
}

/**
 * Bookkeeping for one execute() call
 */
interface WorkflowRun {
  workflow: Readonly<WorkflowDefinition>;
  state: WorkflowState;
  failureReason?: string;
  /** Wakes the run loop while it waits out a pause */
  wake?: () => void;
}

type AttemptOutcome = { status: 'completed' } | { status: 'skipped' } | { status: 'failed'; failure: PhaseFailure };

const MISSING_OUTPUT_PENALTY = 0.2;
const REPORTED_ERROR_PENALTY = 0.3;

function policyKey(context: string): string {
  return `${context}_policy`;
}

export class ContextOrchestrator {
  private readonly strategies: RecoveryStrategy[];
  private readonly runs = new Map<string, Set<WorkflowRun>>();

  constructor(
    private readonly settings: ExecutionSettings,
    private readonly deps: ContextOrchestratorDependencies
  ) {
    this.strategies = deps.recoveryStrategies ?? defaultRecoveryStrategies(settings);
  }

  /**
   * Execute a workflow to a terminal status. Never throws: every failure ends
   * up in the result's errors.
   */
  async execute(workflow: Readonly<WorkflowDefinition>, initialContext: Readonly<ResultBag> = {}): Promise<WorkflowResult> {
    const { clock, logger } = this.deps;
    const state = createWorkflowState(
      workflow.workflowId,
      workflow.phases.map((phase) => phase.phaseId),
      initialContext,
      clock.now()
    );
    const run: WorkflowRun = { workflow, state };
    const meta: LogMetadata = { workflowId: workflow.workflowId };

    const problems = definitionProblems(workflow);
    if (problems.length > 0) {
      state.errors.push(...problems);
      this.skipPending(run);
      setWorkflowStatus(state, 'failed', clock.now());
      run.failureReason = 'Invalid workflow definition';
      logger.event('workflow_failed', `Workflow definition rejected: ${problems.join('; ')}`, meta);
      return this.buildResult(run);
    }

    this.register(run);
    try {
      setWorkflowStatus(state, 'running', clock.now());
      logger.event('workflow_started', `Executing workflow: ${workflow.name}`, {
        ...meta,
        phases: workflow.phases.length,
      });

      for (const step of buildExecutionPlan(workflow)) {
        await this.waitWhilePaused(run);
        if (state.status !== 'running') {
          break;
        }
        if (step.kind === 'sequential') {
          await this.runPhase(run, step.phase);
        } else {
          logger.debug(`Running parallel group ${step.group}`, { ...meta, group: step.group });
          const settled = await Promise.allSettled(step.phases.map((phase) => this.runPhase(run, phase)));
          const rejected = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
          if (rejected) {
            throw rejected.reason;
          }
        }
      }

      // a pause requested during the last step still holds
      await this.waitWhilePaused(run);
      this.skipPending(run);
      setWorkflowStatus(state, 'completed', clock.now());
    } catch (error) {
      state.errors.push(`Unexpected orchestration error: ${errorMessage(error)}`);
      for (const phaseId of phasesWithStatus(state, 'running')) {
        setPhaseStatus(state, phaseId, 'failed', clock.now());
      }
      this.skipPending(run);
      setWorkflowStatus(state, 'failed', clock.now());
      run.failureReason ??= errorMessage(error);
    } finally {
      this.unregister(run);
    }

    const summary = `${state.completedPhases.length}/${workflow.phases.length} phases completed`;
    switch (state.status) {
      case 'completed':
        logger.event('workflow_completed', `Workflow completed: ${summary}`, meta);
        break;
      case 'cancelled':
        logger.event('workflow_cancelled', `Workflow cancelled: ${summary}`, meta);
        break;
      default:
        logger.event('workflow_failed', `Workflow failed: ${run.failureReason ?? 'unknown reason'}`, meta);
    }
    return this.buildResult(run);
  }

  /**
   * Switch execution into a context: snapshot the outgoing context, activate
   * the executor and load the context's policy into contextData.
   * @throws ContextTransitionError when the context is unknown or a collaborator fails
   */
  async transitionContext(state: WorkflowState, to: string): Promise<void> {
    const from = state.currentContext;
    if (!isContextName(to)) {
      throw new ContextTransitionError(from, to, `Unknown context: ${to}`);
    }

    if (from !== null && from !== to) {
      state.contextSnapshots[from] = {
        context: from,
        capturedAt: this.deps.clock.iso(),
        completedPhases: [...state.completedPhases],
        contextData: { ...state.contextData },
      };
    }

    const executor = this.deps.executors.resolve(to);
    if (!executor) {
      throw new ContextTransitionError(from, to, `No executor registered for context: ${to}`);
    }

    try {
      await executor.activate?.(to, state);
      const policy = await this.deps.policyLoader?.load(to);
      if (policy) {
        state.contextData[policyKey(to)] = policy;
      }
    } catch (error) {
      throw new ContextTransitionError(from, to, `Context transition to ${to} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    state.currentContext = to;
    state.lastUpdated = this.deps.clock.now();
    this.deps.logger.event('context_transition', `Context transition: ${from ?? 'none'} -> ${to}`, {
      workflowId: state.workflowId,
      context: to,
    });
  }

  /**
   * Results of a completed phase, tagged for the phase receiving them.
   * Null when the source has no results to hand over.
   */
  propagateResults(state: Readonly<WorkflowState>, fromPhaseId: string, toPhaseId: string): ResultBag | null {
    const results = state.phaseResults[fromPhaseId];
    if (!results || Object.keys(results).length === 0) {
      return null;
    }
    return {
      ...results,
      _source_phase: fromPhaseId,
      _target_phase: toPhaseId,
      _propagated_at: this.deps.clock.iso(),
    };
  }

  /**
   * Ids of workflows with an execution in progress
   */
  getActiveWorkflowIds(): string[] {
    return [...this.runs.keys()];
  }

  /**
   * Request cancellation; phases already running finish, the rest are skipped
   */
  cancel(workflowId: string): boolean {
    return this.forEachRun(workflowId, (run) => {
      if (!setWorkflowStatus(run.state, 'cancelled', this.deps.clock.now())) {
        return false;
      }
      run.wake?.();
      return true;
    });
  }

  /**
   * Hold execution before the next step
   */
  pause(workflowId: string): boolean {
    return this.forEachRun(workflowId, (run) => setWorkflowStatus(run.state, 'paused', this.deps.clock.now()));
  }

  resume(workflowId: string): boolean {
    return this.forEachRun(workflowId, (run) => {
      if (!setWorkflowStatus(run.state, 'running', this.deps.clock.now())) {
        return false;
      }
      run.wake?.();
      return true;
    });
  }

  private forEachRun(workflowId: string, apply: (run: WorkflowRun) => boolean): boolean {
    let applied = false;
    for (const run of this.runs.get(workflowId) ?? []) {
      applied = apply(run) || applied;
    }
    return applied;
  }

  private register(run: WorkflowRun): void {
    const id = run.workflow.workflowId;
    const active = this.runs.get(id) ?? new Set<WorkflowRun>();
    active.add(run);
    this.runs.set(id, active);
  }

  private unregister(run: WorkflowRun): void {
    const id = run.workflow.workflowId;
    const active = this.runs.get(id);
    active?.delete(run);
    if (active?.size === 0) {
      this.runs.delete(id);
    }
  }

  private async waitWhilePaused(run: WorkflowRun): Promise<void> {
    while (run.state.status === 'paused') {
      await new Promise<void>((resolve) => {
        run.wake = resolve;
      });
      run.wake = undefined;
    }
  }

  private skipPending(run: WorkflowRun): void {
    for (const phaseId of phasesWithStatus(run.state, 'pending')) {
      setPhaseStatus(run.state, phaseId, 'skipped', this.deps.clock.now());
    }
  }

  /**
   * Run one phase, retrying and recovering until it settles
   */
  private async runPhase(run: WorkflowRun, phase: Readonly<WorkflowPhase>): Promise<void> {
    const { state } = run;
    const { clock, logger } = this.deps;
    const meta: LogMetadata = { workflowId: state.workflowId, phaseId: phase.phaseId, context: phase.context };
    // rollback restores only the key this phase's transitions write
    const ownKey = policyKey(phase.context);
    const hadPolicy = ownKey in state.contextData;
    const policyBefore = state.contextData[ownKey];
    let attempt = 0;

    for (;;) {
      const outcome = await this.attemptPhase(run, phase, attempt);
      if (outcome.status !== 'failed') {
        return;
      }

      const { failure } = outcome;
      const decision = selectRecoveryAction(this.strategies, failure, { phase, state, attempt });
      const { action } = decision;
      logger.event('recovery_action', `Recovery for ${phase.name}: ${action.actionType} (${action.reason})`, {
        ...meta,
        strategy: decision.strategy,
        attempt,
      });

      switch (action.actionType) {
        case 'retry':
        case 'rollback': {
          if (!this.canRetry(run, phase, action, attempt)) {
            return;
          }
          if (action.actionType === 'rollback') {
            if (hadPolicy) {
              state.contextData[ownKey] = policyBefore;
            } else {
              delete state.contextData[ownKey];
            }
            delete state.phaseResults[phase.phaseId];
          }
          const multiplier = action.actionType === 'retry' ? action.parameters.backoffMultiplier ** attempt : 1;
          const delayMs = this.settings.retryDelayMs * multiplier;
          attempt++;
          state.retryCount++;
          logger.event('phase_retry', `Retrying ${phase.name} (attempt ${attempt}) in ${delayMs}ms`, {
            ...meta,
            attempt,
          });
          await clock.delay(delayMs);
          continue;
        }
        case 'skip':
          setPhaseStatus(state, phase.phaseId, 'skipped', clock.now());
          logger.event('phase_skipped', `Skipped failed phase ${phase.name}: ${action.reason}`, meta);
          return;
        case 'escalate':
          await this.escalate(run, phase, failure, action.parameters.channel, action.reason);
          return;
        case 'abort':
          run.failureReason ??= `${action.reason}: ${failure.message}`;
          setWorkflowStatus(state, 'failed', clock.now());
          return;
      }
    }
  }

  /**
   * Whether another attempt is allowed; records why when it is not
   */
  private canRetry(
    run: WorkflowRun,
    phase: Readonly<WorkflowPhase>,
    action: Extract<RecoveryAction, { actionType: 'retry' | 'rollback' }>,
    attempt: number
  ): boolean {
    if (run.state.status !== 'running' && run.state.status !== 'paused') {
      return false;
    }
    const limit = Math.min(phase.retryCount, action.parameters.maxAttempts);
    if (attempt < limit) {
      return true;
    }
    if (limit > 0) {
      run.state.warnings.push(`Phase ${phase.name} failed after ${attempt} retries`);
    }
    return false;
  }

  private async escalate(
    run: WorkflowRun,
    phase: Readonly<WorkflowPhase>,
    failure: PhaseFailure,
    channel: string,
    reason: string
  ): Promise<void> {
    const { state } = run;
    state.warnings.push(`Phase ${phase.name} escalated to ${channel}: ${failure.message}`);
    if (!this.deps.onEscalate) {
      return;
    }
    try {
      await this.deps.onEscalate({
        workflowId: state.workflowId,
        phaseId: phase.phaseId,
        channel,
        reason,
        error: failure.message,
      });
    } catch (error) {
      state.warnings.push(`Escalation handler failed: ${errorMessage(error)}`);
    }
  }

  /**
   * One attempt: condition check, context switch, guarded execution, output check
   */
  private async attemptPhase(
    run: WorkflowRun,
    phase: Readonly<WorkflowPhase>,
    attempt: number
  ): Promise<AttemptOutcome> {
    const { state } = run;
    const { clock, logger } = this.deps;
    const meta: LogMetadata = { workflowId: state.workflowId, phaseId: phase.phaseId, context: phase.context };

    const condition = resolvePhaseCondition(phase);
    if (isErr(condition)) {
      return this.fail(run, phase, classifyFailure(new PhaseValidationError(phase.phaseId, [condition.error])), 0);
    }
    let conditionMet: boolean;
    try {
      conditionMet = !condition.value || condition.value(this.prepareInputs(run, phase));
    } catch (error) {
      return this.fail(run, phase, classifyFailure(error), 0);
    }
    if (!conditionMet) {
      setPhaseStatus(state, phase.phaseId, 'skipped', clock.now());
      logger.event('phase_skipped', `Condition not met for ${phase.name}`, meta);
      return { status: 'skipped' };
    }

    setPhaseStatus(state, phase.phaseId, 'running', clock.now());
    logger.event('phase_started', `Starting phase: ${phase.name}`, { ...meta, attempt });
    const startedAt = clock.timestamp();

    try {
      await this.transitionContext(state, phase.context);
      const inputs = this.prepareInputs(run, phase);
      const results = await this.invokeWithTimeout(phase, inputs, state);
      const quality = this.checkResults(phase, results, state);

      state.phaseResults[phase.phaseId] = results;
      state.phaseQuality[phase.phaseId] = quality;
      state.phaseDurationsMs[phase.phaseId] = clock.timestamp() - startedAt;
      setPhaseStatus(state, phase.phaseId, 'completed', clock.now());
      logger.event('phase_completed', `Completed phase: ${phase.name}`, {
        ...meta,
        durationMs: state.phaseDurationsMs[phase.phaseId],
      });
      return { status: 'completed' };
    } catch (error) {
      return this.fail(run, phase, classifyFailure(error), clock.timestamp() - startedAt);
    }
  }

  private fail(
    run: WorkflowRun,
    phase: Readonly<WorkflowPhase>,
    failure: PhaseFailure,
    durationMs: number
  ): AttemptOutcome {
    const { state } = run;
    const meta: LogMetadata = { workflowId: state.workflowId, phaseId: phase.phaseId, context: phase.context };

    state.phaseDurationsMs[phase.phaseId] = durationMs;
    setPhaseStatus(state, phase.phaseId, 'failed', this.deps.clock.now());

    if (failure.kind === 'timeout') {
      state.errors.push(`Phase timeout: ${phase.name} exceeded ${phase.timeoutSeconds}s`);
      const warning = `Consider increasing timeout for phase: ${phase.name}`;
      if (!state.warnings.includes(warning)) {
        state.warnings.push(warning);
      }
      this.deps.logger.event('phase_timeout', `Phase ${phase.name} timed out after ${phase.timeoutSeconds}s`, meta);
    } else {
      state.errors.push(`Phase ${phase.name} failed: ${failure.message}`);
      this.deps.logger.event('phase_failed', `Phase ${phase.name} failed: ${failure.message}`, meta);
    }
    return { status: 'failed', failure };
  }

  /**
   * Inputs for a phase: workflow context data, then the tagged results of
   * every completed phase as `previous_<id>`, then declared inputs taken from
   * the most recent completed phase that produced them
   */
  private prepareInputs(run: WorkflowRun, phase: Readonly<WorkflowPhase>): ResultBag {
    const { state } = run;
    const inputs: ResultBag = { ...state.contextData };

    for (const sourceId of state.completedPhases) {
      const propagated = this.propagateResults(state, sourceId, phase.phaseId);
      if (propagated) {
        inputs[`previous_${sourceId}`] = propagated;
      }
    }

    for (const name of phase.inputs) {
      if (name in inputs) {
        continue;
      }
      for (let i = state.completedPhases.length - 1; i >= 0; i--) {
        const results = state.phaseResults[state.completedPhases[i]];
        if (results && name in results) {
          inputs[name] = results[name];
          break;
        }
      }
    }
    return inputs;
  }

  private async invokeWithTimeout(
    phase: Readonly<WorkflowPhase>,
    inputs: ResultBag,
    state: WorkflowState
  ): Promise<ResultBag> {
    const context = phase.context;
    const executor = isContextName(context) ? this.deps.executors.resolve(context) : undefined;
    if (!executor) {
      throw new ContextTransitionError(state.currentContext, context, `No executor registered for context: ${context}`);
    }

    const controller = new AbortController();
    const timeout = this.deps.clock.timeout(
      phase.timeoutSeconds * 1000,
      `Phase timeout: ${phase.name} exceeded ${phase.timeoutSeconds}s`
    );
    const execution = Promise.resolve().then(() =>
      executor.execute(phase, inputs, state, { signal: controller.signal })
    );
    // an aborted executor still settles, after the outcome is decided
    void execution.catch((error: unknown) => {
      this.deps.logger.debug(`Phase ${phase.phaseId} settled after its outcome was decided: ${errorMessage(error)}`, {
        workflowId: state.workflowId,
        phaseId: phase.phaseId,
      });
    });

    try {
      return await Promise.race([execution, timeout.promise]);
    } catch (error) {
      // the attempt is over; its work must stop before any retry starts
      controller.abort(error);
      throw error;
    } finally {
      timeout.cancel();
    }
  }

  /**
   * Enforce the output contract; returns the phase quality score
   * @throws PhaseValidationError
   */
  private checkResults(phase: Readonly<WorkflowPhase>, results: unknown, state: WorkflowState): number {
    if (typeof results !== 'object' || results === null || Array.isArray(results)) {
      throw new PhaseValidationError(phase.phaseId, ['Phase returned no result bag']);
    }

    const missing = phase.outputs.filter((output) => !(output in results));
    const reportedErrors = 'error' in results || 'errors' in results;
    const quality = Math.max(
      0,
      1 - missing.length * MISSING_OUTPUT_PENALTY - (reportedErrors ? REPORTED_ERROR_PENALTY : 0)
    );
    state.phaseQuality[phase.phaseId] = Math.round(quality * 100) / 100;

    const problems = missing.map((output) => `Missing output: ${output}`);
    if (reportedErrors) {
      problems.push('Phase reported errors');
    }
    if (problems.length > 0) {
      throw new PhaseValidationError(phase.phaseId, problems);
    }
    return state.phaseQuality[phase.phaseId];
  }

  private buildResult(run: WorkflowRun): WorkflowResult {
    const { state, workflow } = run;
    const clock = this.deps.clock;
    const end = state.endTime ?? clock.now();
    const start = state.startTime ?? end;
    const total = workflow.phases.length;
    const qualities = Object.values(state.phaseQuality);

    return {
      workflowId: workflow.workflowId,
      status: state.status,
      results: Object.fromEntries(Object.entries(state.phaseResults).map(([id, bag]) => [id, { ...bag }])),
      executionTimeSeconds: (end.getTime() - start.getTime()) / 1000,
      phasesExecuted: [...state.completedPhases],
      phasesFailed: [...state.failedPhases],
      phasesSkipped: [...state.skippedPhases],
      errors: [...state.errors],
      warnings: [...state.warnings],
      metrics: {
        totalPhases: total,
        completedPhases: state.completedPhases.length,
        failedPhases: state.failedPhases.length,
        skippedPhases: state.skippedPhases.length,
        successRate: total > 0 ? state.completedPhases.length / total : 0,
        retryCount: state.retryCount,
        phaseDurationsMs: { ...state.phaseDurationsMs },
        ...(run.failureReason !== undefined ? { failureReason: run.failureReason } : {}),
      },
      qualityScore:
        qualities.length > 0
          ? Math.round((qualities.reduce((sum, score) => sum + score, 0) / qualities.length) * 100) / 100
          : null,
      completedAt: clock.iso(),
    };
  }
}
