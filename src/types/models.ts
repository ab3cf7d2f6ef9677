/**
 * Workflow data model
 * Shapes shared by the analyzer, the composer and the orchestrator.
 */

import { ContextName } from './context-name';

/**
 * Task complexity levels
 */
export type ComplexityLevel = 'simple' | 'medium' | 'complex';

/**
 * Workflow-level execution status
 */
export type WorkflowStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled' | 'paused';

/**
 * Phase-level execution status
 */
export type PhaseStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

/**
 * Bag of named values produced by (or fed into) a phase
 */
export type ResultBag = Record<string, unknown>;

/**
 * A candidate concept found in the task text
 */
export interface Entity {
  readonly name: string;
  /** feature, bug, component, api, database, ui, security, performance, prerequisite, ... */
  readonly type: string;
  /** Extraction confidence in [0, 1] */
  readonly confidence: number;
  readonly attributes: Readonly<Record<string, unknown>>;
}

/**
 * Structured intent extracted from a task description
 */
export interface TaskAnalysis {
  readonly taskId: string;
  readonly description: string;
  readonly entities: readonly Entity[];
  readonly complexity: ComplexityLevel;
  /** Ordered, duplicate-free */
  readonly requiredContexts: readonly ContextName[];
  /** Minutes, always > 0 */
  readonly estimatedDuration: number;
  readonly dependencies: readonly string[];
  readonly successCriteria: readonly string[];
  /** In [0, 1] */
  readonly confidence: number;
  readonly createdAt: string;
}

/**
 * Predicate deciding whether a phase runs, evaluated against its prepared inputs
 */
export type PhaseCondition = (inputs: Readonly<ResultBag>) => boolean;

/**
 * One unit of work bound to a single context
 */
export interface WorkflowPhase {
  /** Unique within the workflow */
  phaseId: string;
  /** Expected to be one of CONTEXT_NAMES; validation rejects anything else */
  context: string;
  name: string;
  description: string;
  inputs: string[];
  outputs: string[];
  condition?: PhaseCondition;
  /** Source text of the condition, when it was compiled from an expression */
  conditionExpression?: string;
  /** Hard execution limit, > 0 (fractions allowed) */
  timeoutSeconds: number;
  retryCount: number;
  qualityGates: string[];
  parallelGroup?: string;
}

/**
 * Validation outcome recorded by the composer
 */
export interface ValidationSummary {
  passed: boolean;
  score: number;
  messages: string[];
  repaired: boolean;
}

/**
 * Free-form workflow metadata with the fields the composer always records
 */
export interface WorkflowMetadata {
  source?: 'template' | 'synthesized' | 'external';
  templateId?: string;
  taskId?: string;
  complexity?: ComplexityLevel;
  appliedRules?: string[];
  validation?: ValidationSummary;
  [key: string]: unknown;
}

/**
 * Validated blueprint of a workflow. Never mutated by the orchestrator.
 */
export interface WorkflowDefinition {
  workflowId: string;
  name: string;
  description: string;
  phases: WorkflowPhase[];
  /** phaseId -> ids of the phases it depends on */
  dependencies: Record<string, string[]>;
  /** Minutes, > 0 */
  estimatedDuration: number;
  qualityGates: string[];
  metadata: WorkflowMetadata;
  createdAt: string;
}

/**
 * Result of validating a workflow definition
 */
export interface ValidationResult {
  passed: boolean;
  /** In [0, 1] */
  score: number;
  messages: string[];
  details: Record<string, unknown>;
}

/**
 * Snapshot of the outgoing context taken during a context transition
 */
export interface ContextSnapshot {
  context: string;
  capturedAt: string;
  completedPhases: string[];
  contextData: ResultBag;
}

/**
 * Mutable execution state, owned by exactly one orchestrator invocation
 */
export interface WorkflowState {
  workflowId: string;
  status: WorkflowStatus;
  currentPhase: string | null;
  currentContext: string | null;
  completedPhases: string[];
  failedPhases: string[];
  skippedPhases: string[];
  phaseStatus: Record<string, PhaseStatus>;
  phaseResults: Record<string, ResultBag>;
  contextData: ResultBag;
  contextSnapshots: Record<string, ContextSnapshot>;
  errors: string[];
  warnings: string[];
  retryCount: number;
  phaseDurationsMs: Record<string, number>;
  phaseQuality: Record<string, number>;
  startTime: Date | null;
  endTime: Date | null;
  lastUpdated: Date;
}

/**
 * Execution metrics reported with every result
 */
export interface WorkflowMetrics {
  totalPhases: number;
  completedPhases: number;
  failedPhases: number;
  skippedPhases: number;
  /** completed / total */
  successRate: number;
  retryCount: number;
  phaseDurationsMs: Record<string, number>;
  failureReason?: string;
}

/**
 * Terminal summary of a workflow execution
 */
export interface WorkflowResult {
  readonly workflowId: string;
  readonly status: WorkflowStatus;
  readonly results: Readonly<Record<string, ResultBag>>;
  readonly executionTimeSeconds: number;
  readonly phasesExecuted: readonly string[];
  readonly phasesFailed: readonly string[];
  readonly phasesSkipped: readonly string[];
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly metrics: WorkflowMetrics;
  readonly qualityScore: number | null;
  readonly completedAt: string;
}

/**
 * Recovery action chosen for a failed phase
 */
export type RecoveryAction =
  | {
      actionType: 'retry';
      parameters: { maxAttempts: number; backoffMultiplier: number };
      reason: string;
    }
  | {
      actionType: 'rollback';
      parameters: { maxAttempts: number };
      reason: string;
    }
  | { actionType: 'skip'; parameters: Record<string, never>; reason: string }
  | { actionType: 'escalate'; parameters: { channel: string }; reason: string }
  | { actionType: 'abort'; parameters: Record<string, never>; reason: string };

export type RecoveryActionType = RecoveryAction['actionType'];

/**
 * Phase skeleton inside a reusable template
 */
export interface TemplatePhase {
  id: string;
  context: ContextName;
  name: string;
  description: string;
  inputs: string[];
  outputs: string[];
  timeoutSeconds: number;
  retryCount: number;
  qualityGates: string[];
  condition?: string;
  /** Dropped when the analysis does not require this phase's context */
  optional: boolean;
}

/**
 * Pre-authored workflow skeleton
 */
export interface WorkflowTemplate {
  templateId: string;
  name: string;
  description: string;
  category: string;
  phases: TemplatePhase[];
  parameters: Record<string, unknown>;
  tags: string[];
  usageCount: number;
  /** Historical success rate in [0, 1] */
  successRate: number;
}
