/**
 * Tests for Configuration Resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { resolveConfig, defaultEngineSettings, REPO_CONFIG_PATH, USER_CONFIG_PATH } from './resolve-config';
import { DEFAULT_CONFIG } from '../types/engine-config';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';

describe('resolveConfig', () => {
  let repo: TempDirContext;
  let home: TempDirContext;

  beforeEach(() => {
    repo = createTempDirContext();
    home = createTempDirContext();
  });

  afterEach(() => {
    repo.cleanup();
    home.cleanup();
  });

  it('should fall back to defaults without config files', () => {
    const config = resolveConfig({}, repo.path, {
      homeDirectory: home.path,
      now: new Date('2025-03-01T12:00:00.000Z'),
    });

    expect(config.execution).toEqual(DEFAULT_CONFIG.execution);
    expect(config.composition.templateDirectory).toBeUndefined();
    expect(config.sources['execution.retryDelayMs']).toBe('default');
    expect(config.workingDirectory).toBe(repo.path);
    expect(config.resolvedAt).toBe('2025-03-01T12:00:00.000Z');
    expect(config.warnings).toEqual([]);
  });

  it('should apply overrides over repo config over user config', () => {
    home.writeFile(USER_CONFIG_PATH, JSON.stringify({ execution: { retryDelayMs: 10, backoffMultiplier: 3 } }));
    repo.writeFile(REPO_CONFIG_PATH, JSON.stringify({ execution: { retryDelayMs: 20, defaultRetryCount: 1 } }));

    const config = resolveConfig({ execution: { defaultRetryCount: 5 } }, repo.path, { homeDirectory: home.path });

    expect(config.execution).toEqual({
      retryDelayMs: 20,
      timeoutRetryAttempts: 2,
      backoffMultiplier: 3,
      defaultRetryCount: 5,
    });
    expect(config.sources['execution.retryDelayMs']).toBe('repo');
    expect(config.sources['execution.backoffMultiplier']).toBe('user');
    expect(config.sources['execution.defaultRetryCount']).toBe('override');
    expect(config.sources['execution.timeoutRetryAttempts']).toBe('default');
  });

  it('should ignore an invalid config file with a warning', () => {
    repo.writeFile(REPO_CONFIG_PATH, JSON.stringify({ logging: { minLevel: 'loud' } }));

    const config = resolveConfig({}, repo.path, { homeDirectory: home.path });

    expect(config.logging.minLevel).toBe('info');
    expect(config.warnings).toHaveLength(1);
    const prefix = `Ignoring invalid config file ${join(repo.path, REPO_CONFIG_PATH)}: logging.minLevel: `;
    expect(config.warnings[0].startsWith(prefix)).toBe(true);
  });

  it('should report config files that are not JSON', () => {
    home.writeFile(USER_CONFIG_PATH, '{ not json');

    const config = resolveConfig({}, repo.path, { homeDirectory: home.path });

    expect(config.warnings[0]).toContain(': Invalid JSON: ');
  });
});

describe('defaultEngineSettings', () => {
  it('should merge overrides per section', () => {
    const settings = defaultEngineSettings({ composition: { templateMatchThreshold: 0.9 } });

    expect(settings.composition).toEqual({ templateMatchThreshold: 0.9, validationPassThreshold: 0.7 });
    expect(settings.analysis).toEqual(DEFAULT_CONFIG.analysis);
  });
});
