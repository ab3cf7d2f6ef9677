/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * overrides > repo config > user config > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import {
  ConfigSource,
  DEFAULT_CONFIG,
  EngineConfig,
  EngineConfigOverrides,
} from '../types/engine-config';
import { parseConfigFile } from '../schemas/validators';

export const REPO_CONFIG_PATH = join('.conductor', 'config.json');
export const USER_CONFIG_PATH = join('.config', 'conductor', 'config.json');

export interface ResolveConfigOptions {
  /** Directory holding `.config/conductor/config.json`; defaults to the home directory */
  homeDirectory?: string;
  /** Timestamp recorded as `resolvedAt` */
  now?: Date;
}

/**
 * Load and validate a JSON config file if it exists
 */
function loadConfigFile(path: string, warnings: string[]): EngineConfigOverrides | null {
  if (!existsSync(path)) {
    return null;
  }
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    warnings.push(`Ignoring unreadable config file ${path}: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
  const result = parseConfigFile(content);
  if (!result.success || !result.data) {
    warnings.push(`Ignoring invalid config file ${path}: ${(result.errors ?? []).join('; ')}`);
    return null;
  }
  return result.data;
}

/**
 * Resolve configuration from all sources with explicit precedence
 * overrides > repo config > user config > defaults
 */
export function resolveConfig(
  overrides: EngineConfigOverrides = {},
  workingDirectory?: string,
  options: ResolveConfigOptions = {}
): EngineConfig {
  const cwd = workingDirectory ?? process.cwd();
  const warnings: string[] = [];

  const repoConfig = loadConfigFile(join(cwd, REPO_CONFIG_PATH), warnings);
  const userConfig = loadConfigFile(join(options.homeDirectory ?? homedir(), USER_CONFIG_PATH), warnings);

  // Track sources for debugging
  const sources: Record<string, ConfigSource> = {};

  function resolveValue<T>(
    key: string,
    override: T | undefined,
    repo: T | undefined,
    user: T | undefined,
    defaultVal: T
  ): T {
    if (override !== undefined) {
      sources[key] = 'override';
      return override;
    }
    if (repo !== undefined) {
      sources[key] = 'repo';
      return repo;
    }
    if (user !== undefined) {
      sources[key] = 'user';
      return user;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const { analysis, composition, execution, logging } = DEFAULT_CONFIG;

  return {
    schemaVersion: '1.0.0',

    analysis: {
      maxEntities: resolveValue(
        'analysis.maxEntities',
        overrides.analysis?.maxEntities,
        repoConfig?.analysis?.maxEntities,
        userConfig?.analysis?.maxEntities,
        analysis.maxEntities
      ),
      mediumThreshold: resolveValue(
        'analysis.mediumThreshold',
        overrides.analysis?.mediumThreshold,
        repoConfig?.analysis?.mediumThreshold,
        userConfig?.analysis?.mediumThreshold,
        analysis.mediumThreshold
      ),
      complexThreshold: resolveValue(
        'analysis.complexThreshold',
        overrides.analysis?.complexThreshold,
        repoConfig?.analysis?.complexThreshold,
        userConfig?.analysis?.complexThreshold,
        analysis.complexThreshold
      ),
    },

    composition: {
      templateDirectory: resolveValue<string | undefined>(
        'composition.templateDirectory',
        overrides.composition?.templateDirectory,
        repoConfig?.composition?.templateDirectory,
        userConfig?.composition?.templateDirectory,
        composition.templateDirectory
      ),
      templateMatchThreshold: resolveValue(
        'composition.templateMatchThreshold',
        overrides.composition?.templateMatchThreshold,
        repoConfig?.composition?.templateMatchThreshold,
        userConfig?.composition?.templateMatchThreshold,
        composition.templateMatchThreshold
      ),
      validationPassThreshold: resolveValue(
        'composition.validationPassThreshold',
        overrides.composition?.validationPassThreshold,
        repoConfig?.composition?.validationPassThreshold,
        userConfig?.composition?.validationPassThreshold,
        composition.validationPassThreshold
      ),
    },

    execution: {
      retryDelayMs: resolveValue(
        'execution.retryDelayMs',
        overrides.execution?.retryDelayMs,
        repoConfig?.execution?.retryDelayMs,
        userConfig?.execution?.retryDelayMs,
        execution.retryDelayMs
      ),
      timeoutRetryAttempts: resolveValue(
        'execution.timeoutRetryAttempts',
        overrides.execution?.timeoutRetryAttempts,
        repoConfig?.execution?.timeoutRetryAttempts,
        userConfig?.execution?.timeoutRetryAttempts,
        execution.timeoutRetryAttempts
      ),
      backoffMultiplier: resolveValue(
        'execution.backoffMultiplier',
        overrides.execution?.backoffMultiplier,
        repoConfig?.execution?.backoffMultiplier,
        userConfig?.execution?.backoffMultiplier,
        execution.backoffMultiplier
      ),
      defaultRetryCount: resolveValue(
        'execution.defaultRetryCount',
        overrides.execution?.defaultRetryCount,
        repoConfig?.execution?.defaultRetryCount,
        userConfig?.execution?.defaultRetryCount,
        execution.defaultRetryCount
      ),
    },

    logging: {
      minLevel: resolveValue(
        'logging.minLevel',
        overrides.logging?.minLevel,
        repoConfig?.logging?.minLevel,
        userConfig?.logging?.minLevel,
        logging.minLevel
      ),
      jsonOutput: resolveValue(
        'logging.jsonOutput',
        overrides.logging?.jsonOutput,
        repoConfig?.logging?.jsonOutput,
        userConfig?.logging?.jsonOutput,
        logging.jsonOutput
      ),
    },

    workingDirectory: cwd,
    resolvedAt: (options.now ?? new Date()).toISOString(),
    sources,
    warnings,
  };
}

/**
 * Settings only, with defaults filled in and no file lookups
 */
export function defaultEngineSettings(
  overrides: EngineConfigOverrides = {}
): Pick<EngineConfig, 'analysis' | 'composition' | 'execution' | 'logging'> {
  return {
    analysis: { ...DEFAULT_CONFIG.analysis, ...overrides.analysis },
    composition: { ...DEFAULT_CONFIG.composition, ...overrides.composition },
    execution: { ...DEFAULT_CONFIG.execution, ...overrides.execution },
    logging: { ...DEFAULT_CONFIG.logging, ...overrides.logging },
  };
}
