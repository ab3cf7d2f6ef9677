/**
 * Orchestration module - executes workflow definitions across contexts
 */

export { ContextOrchestrator } from './context-orchestrator';
export type { ContextOrchestratorDependencies } from './context-orchestrator';

export {
  ContextExecutorRegistry,
  SimulatedPhaseExecutor,
  createSimulatedRegistry,
} from './executor-registry';
export type { PhaseExecutorResolver, SimulatedExecutorOptions } from './executor-registry';

export { buildExecutionPlan, definitionProblems } from './execution-plan';
export type { ExecutionStep } from './execution-plan';

export {
  classifyFailure,
  abortAction,
  defaultRecoveryStrategies,
  selectRecoveryAction,
} from './recovery-strategies';
export type {
  PhaseFailure,
  PhaseFailureKind,
  RecoveryContext,
  RecoveryStrategy,
  RecoveryDecision,
} from './recovery-strategies';

export { compileCondition, resolvePhaseCondition } from './phase-condition';

export {
  createWorkflowState,
  setPhaseStatus,
  setWorkflowStatus,
  isValidPhaseTransition,
  isValidWorkflowTransition,
  isTerminalPhaseStatus,
  isTerminalWorkflowStatus,
  phasesWithStatus,
} from './workflow-state';

export { WorkflowConductor } from './workflow-conductor';
export type { ConductorSettings, WorkflowConductorDependencies, RunTaskOptions } from './workflow-conductor';

export { createConductor, createTestConductor } from './conductor-factory';
export type {
  ConductorFactoryOptions,
  ConductorSetup,
  TestConductorOptions,
  TestConductorSetup,
  ExecutorOverrides,
} from './conductor-factory';
