/**
 * Conductor Factory
 * Creates WorkflowConductor instances with real or test dependencies
 */

import { resolve } from 'path';
import { resolveConfig, defaultEngineSettings } from '../config/resolve-config';
import {
  InMemoryTemplateLibrary,
  TemplateLibrary,
  TemplateLoadFailure,
  loadTemplateDirectory,
} from '../composition/template-library';
import { createConsoleLogger } from '../logging/console-logger';
import { BufferLogger, createBufferLogger } from '../logging/buffer-logger';
import { MockClock, SystemClock, Clock } from '../types/clock';
import { CONTEXT_NAMES, ContextName } from '../types/context-name';
import { EngineConfig, EngineConfigOverrides } from '../types/engine-config';
import { Logger } from '../types/logger';
import { WorkflowTemplate } from '../types/models';
import { ContextPolicyLoader, EscalationHandler, PhaseExecutor } from '../types/phase-executor';
import { isErr } from '../types/result';
import { ContextExecutorRegistry, createSimulatedRegistry } from './executor-registry';
import { RecoveryStrategy } from './recovery-strategies';
import { WorkflowConductor } from './workflow-conductor';

/**
 * Executors to register; contexts left out run simulated
 */
export type ExecutorOverrides = Partial<Record<ContextName, PhaseExecutor>>;

/**
 * Options for creating a conductor with real dependencies
 */
export interface ConductorFactoryOptions {
  /** Directory config files and a relative template directory are resolved against */
  workingDirectory?: string;
  /** Where the user config is looked up; defaults to the home directory */
  homeDirectory?: string;
  overrides?: EngineConfigOverrides;
  executors?: ExecutorOverrides;
  policyLoader?: ContextPolicyLoader;
  recoveryStrategies?: RecoveryStrategy[];
  onEscalate?: EscalationHandler;
  /** Whether to use debug logging */
  debug?: boolean;
}

export interface ConductorSetup {
  conductor: WorkflowConductor;
  config: EngineConfig;
  logger: Logger;
  /** Template files that could not be used */
  templateFailures: TemplateLoadFailure[];
}

/**
 * Options for creating a conductor with test dependencies
 */
export interface TestConductorOptions {
  overrides?: EngineConfigOverrides;
  templates?: WorkflowTemplate[];
  executors?: ExecutorOverrides;
  recoveryStrategies?: RecoveryStrategy[];
}

/**
 * Exposes the test doubles for assertions
 */
export interface TestConductorSetup {
  conductor: WorkflowConductor;
  logger: BufferLogger;
  clock: MockClock;
  executors: ContextExecutorRegistry;
}

function buildRegistry(clock: Clock, overrides: ExecutorOverrides = {}): ContextExecutorRegistry {
  const registry = createSimulatedRegistry({ clock });
  for (const context of CONTEXT_NAMES) {
    const executor = overrides[context];
    if (executor) {
      registry.register(context, executor);
    }
  }
  return registry;
}

/**
 * Load the configured template directory, logging what was skipped
 */
function loadTemplates(
  directory: string | undefined,
  workingDirectory: string,
  logger: Logger
): { templates?: TemplateLibrary; failures: TemplateLoadFailure[] } {
  if (directory === undefined) {
    return { failures: [] };
  }

  const result = loadTemplateDirectory(resolve(workingDirectory, directory));
  if (isErr(result)) {
    logger.warn(result.error.message);
    return { failures: [result.error] };
  }

  const { library, failures } = result.value;
  for (const failure of failures) {
    logger.warn(`Skipped template ${failure.file}: ${failure.message}`);
  }
  logger.event('templates_loaded', `Loaded ${library.size} templates`, { directory, skipped: failures.length });
  return { templates: library, failures };
}

/**
 * Create a conductor with console logging, system time, resolved config and
 * the configured template directory
 */
export function createConductor(options: ConductorFactoryOptions = {}): ConductorSetup {
  const workingDirectory = options.workingDirectory ?? process.cwd();
  const config = resolveConfig(options.overrides, workingDirectory, { homeDirectory: options.homeDirectory });

  const logger = createConsoleLogger({
    minLevel: options.debug ? 'debug' : config.logging.minLevel,
    jsonOutput: config.logging.jsonOutput,
  });
  for (const warning of config.warnings) {
    logger.warn(warning);
  }

  const clock = new SystemClock();
  const { templates, failures } = loadTemplates(config.composition.templateDirectory, workingDirectory, logger);

  const conductor = new WorkflowConductor(config, {
    logger,
    clock,
    executors: buildRegistry(clock, options.executors),
    templates,
    policyLoader: options.policyLoader,
    recoveryStrategies: options.recoveryStrategies,
    onEscalate: options.onEscalate,
  });

  return { conductor, config, logger, templateFailures: failures };
}

/**
 * Create a conductor for tests: buffer logger, mock clock, no file lookups,
 * no retry delay unless overridden
 */
export function createTestConductor(options: TestConductorOptions = {}): TestConductorSetup {
  const settings = defaultEngineSettings({
    ...options.overrides,
    execution: { retryDelayMs: 0, ...options.overrides?.execution },
  });
  const clock = new MockClock();
  const logger = createBufferLogger({ clock });
  const executors = buildRegistry(clock, options.executors);

  const conductor = new WorkflowConductor(settings, {
    logger,
    clock,
    executors,
    templates: options.templates ? new InMemoryTemplateLibrary(options.templates) : undefined,
    recoveryStrategies: options.recoveryStrategies,
  });

  return { conductor, logger, clock, executors };
}
