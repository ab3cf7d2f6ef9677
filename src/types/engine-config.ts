/**
 * EngineConfig type
 * Single configuration object passed to the analyzer, composer and orchestrator
 */

import { LogLevel } from './logger';

/**
 * Task analysis thresholds
 */
export interface AnalysisSettings {
  /** Entities kept after ranking by confidence */
  maxEntities: number;
  /** Complexity score at which a task becomes medium */
  mediumThreshold: number;
  /** Complexity score at which a task becomes complex */
  complexThreshold: number;
}

/**
 * Workflow composition settings
 */
export interface CompositionSettings {
  /** Directory of .json/.yaml/.yml workflow templates; no templates when unset */
  templateDirectory?: string;
  /** Minimum score for a template to be accepted */
  templateMatchThreshold: number;
  /** Minimum validation score for a workflow to pass */
  validationPassThreshold: number;
}

/**
 * Phase execution and recovery settings
 */
export interface ExecutionSettings {
  /** Base delay before a retried attempt */
  retryDelayMs: number;
  /** Attempts allowed by the timeout retry strategy */
  timeoutRetryAttempts: number;
  backoffMultiplier: number;
  /** Retry count given to synthesized phases */
  defaultRetryCount: number;
}

export interface LoggingSettings {
  minLevel: LogLevel;
  jsonOutput: boolean;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'override' | 'repo' | 'user' | 'default';

/**
 * The complete effective configuration
 */
export interface EngineConfig {
  schemaVersion: '1.0.0';
  analysis: AnalysisSettings;
  composition: CompositionSettings;
  execution: ExecutionSettings;
  logging: LoggingSettings;
  workingDirectory: string;
  /** ISO 8601 */
  resolvedAt: string;
  /** Source of each resolved value, keyed `section.field` */
  sources: Record<string, ConfigSource>;
  /** Config files that were present but ignored */
  warnings: string[];
}

/**
 * Partial settings, as accepted from callers and config files
 */
export interface EngineConfigOverrides {
  analysis?: Partial<AnalysisSettings>;
  composition?: Partial<CompositionSettings>;
  execution?: Partial<ExecutionSettings>;
  logging?: Partial<LoggingSettings>;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Pick<EngineConfig, 'schemaVersion' | 'analysis' | 'composition' | 'execution' | 'logging'> = {
  schemaVersion: '1.0.0',
  analysis: {
    maxEntities: 20,
    mediumThreshold: 1.0,
    complexThreshold: 2.0,
  },
  composition: {
    templateMatchThreshold: 0.6,
    validationPassThreshold: 0.7,
  },
  execution: {
    retryDelayMs: 1000,
    timeoutRetryAttempts: 2,
    backoffMultiplier: 1.5,
    defaultRetryCount: 3,
  },
  logging: {
    minLevel: 'info',
    jsonOutput: false,
  },
};
