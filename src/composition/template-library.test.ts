/**
 * Tests for the workflow template library
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'node:path';
import {
  InMemoryTemplateLibrary,
  loadTemplateDirectory,
  parseTemplateDocument,
} from './template-library';
import { isErr, isOk } from '../types/result';
import { createTempDirContext, FIXTURES_DIR, TempDirContext } from '../../tests/utils/temp-directory';

describe('loadTemplateDirectory', () => {
  let tempDir: TempDirContext | undefined;

  afterEach(() => {
    tempDir?.cleanup();
    tempDir = undefined;
  });

  it('should load yaml and json templates and report the rest', () => {
    const result = loadTemplateDirectory(path.join(FIXTURES_DIR, 'templates'));
    if (!isOk(result)) {
      throw new Error(result.error.message);
    }
    const { library, failures } = result.value;

    expect(library.list().map((t) => t.templateId)).toEqual(['bug-fix', 'feature-development']);
    expect(failures.map((f) => f.file)).toEqual(['malformed.yaml', 'unknown-context.yml']);
    expect(failures[0].message).toMatch(/^Could not parse template: /);
    expect(failures[1].message).toMatch(/^Invalid template: phases\.0\.context: /);
  });

  it('should fill template defaults', () => {
    const result = loadTemplateDirectory(path.join(FIXTURES_DIR, 'templates'));
    if (!isOk(result)) {
      throw new Error(result.error.message);
    }
    const bugFix = result.value.library.get('bug-fix');
    const feature = result.value.library.get('feature-development');

    expect(bugFix?.successRate).toBe(0.9);
    expect(bugFix?.phases[1]).toEqual({
      id: 'fix',
      context: 'implementation',
      name: 'Fix',
      description: '',
      inputs: ['root_cause_analysis'],
      outputs: ['fixes'],
      timeoutSeconds: 900,
      retryCount: 3,
      qualityGates: [],
      optional: false,
    });
    expect(feature?.usageCount).toBe(0);
    expect(feature?.phases[0].name).toBe('stories');
    expect(feature?.phases[0].timeoutSeconds).toBe(300);
    expect(feature?.phases[4]).toMatchObject({ optional: true, condition: '!skip_docs' });
  });

  it('should return an error for a missing directory', () => {
    tempDir = createTempDirContext();
    const result = loadTemplateDirectory(path.join(tempDir.path, 'missing'));

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.message).toMatch(/^Could not read template directory: /);
    }
  });

  it('should read copied and hand-written files alike', () => {
    tempDir = createTempDirContext();
    tempDir.copyFixture('templates/bug-fix.yaml', 'a.YML');
    tempDir.writeFile('b.json', JSON.stringify({ templateId: 'b', phases: [{ id: 'p', context: 'release' }] }));

    const result = loadTemplateDirectory(tempDir.path);

    expect(isOk(result) && result.value.library.list().map((t) => t.templateId)).toEqual(['bug-fix', 'b']);
  });
});

describe('parseTemplateDocument', () => {
  it('should reject duplicate phase ids', () => {
    const result = parseTemplateDocument(
      'dup.json',
      JSON.stringify({
        templateId: 'dup',
        phases: [
          { id: 'p', context: 'design' },
          { id: 'p', context: 'implementation' },
        ],
      })
    );

    expect(result).toEqual({
      ok: false,
      error: { file: 'dup.json', message: 'Invalid template: phases.1.id: Duplicate phase id: p' },
    });
  });

  it('should report JSON syntax errors', () => {
    const result = parseTemplateDocument('bad.json', '{ "templateId": ');

    expect(isErr(result) && result.error.message.startsWith('Could not parse template: ')).toBe(true);
  });
});

describe('InMemoryTemplateLibrary', () => {
  it('should replace templates with the same id', () => {
    const template = {
      templateId: 't',
      name: 'First',
      description: '',
      category: 'general',
      phases: [],
      parameters: {},
      tags: [],
      usageCount: 0,
      successRate: 0,
    };
    const library = new InMemoryTemplateLibrary([template, { ...template, name: 'Second' }]);

    expect(library.size).toBe(1);
    expect(library.get('t')?.name).toBe('Second');
  });
});
