/**
 * Workflow template library
 * Read-only collection of pre-authored workflow skeletons. Templates are
 * loaded once from a directory of .json, .yaml and .yml documents; files that
 * fail to parse or validate are reported and skipped.
 */

import { readdirSync, readFileSync } from 'fs';
import { extname, join } from 'path';
import * as yaml from 'js-yaml';
import { WorkflowTemplate } from '../types/models';
import { Result, ok, err, partition } from '../types/result';
import { errorMessage } from '../types/errors';
import { validateWorkflowTemplate } from '../schemas/validators';

export const TEMPLATE_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;

/**
 * A template file that could not be used
 */
export interface TemplateLoadFailure {
  file: string;
  message: string;
}

export interface TemplateLibrary {
  list(): readonly WorkflowTemplate[];
  get(templateId: string): WorkflowTemplate | undefined;
}

/**
 * Template library backed by an in-memory list. Later templates replace
 * earlier ones with the same id.
 */
export class InMemoryTemplateLibrary implements TemplateLibrary {
  private readonly templates = new Map<string, WorkflowTemplate>();

  constructor(templates: readonly WorkflowTemplate[] = []) {
    for (const template of templates) {
      this.templates.set(template.templateId, template);
    }
  }

  list(): readonly WorkflowTemplate[] {
    return [...this.templates.values()];
  }

  get(templateId: string): WorkflowTemplate | undefined {
    return this.templates.get(templateId);
  }

  get size(): number {
    return this.templates.size;
  }
}

/**
 * Parse and validate one template document
 * @param file - File name, used for the format and in failure messages
 */
export function parseTemplateDocument(file: string, content: string): Result<WorkflowTemplate, TemplateLoadFailure> {
  let data: unknown;
  try {
    data = extname(file).toLowerCase() === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (e) {
    return err({ file, message: `Could not parse template: ${errorMessage(e)}` });
  }

  const result = validateWorkflowTemplate(data);
  if (!result.success || !result.data) {
    return err({ file, message: `Invalid template: ${(result.errors ?? []).join('; ')}` });
  }
  return ok(result.data);
}

/**
 * Load every template document in a directory (not recursive), in file name order
 */
export function loadTemplateDirectory(directory: string): Result<
  { library: InMemoryTemplateLibrary; failures: TemplateLoadFailure[] },
  TemplateLoadFailure
> {
  let entries: string[];
  try {
    entries = readdirSync(directory);
  } catch (e) {
    return err({ file: directory, message: `Could not read template directory: ${errorMessage(e)}` });
  }

  const files = entries
    .filter((name) => (TEMPLATE_EXTENSIONS as readonly string[]).includes(extname(name).toLowerCase()))
    .sort();

  const results = files.map((name): Result<WorkflowTemplate, TemplateLoadFailure> => {
    const path = join(directory, name);
    try {
      return parseTemplateDocument(name, readFileSync(path, 'utf-8'));
    } catch (e) {
      return err({ file: name, message: `Could not read template: ${errorMessage(e)}` });
    }
  });

  const { values, errors } = partition(results);
  return ok({ library: new InMemoryTemplateLibrary(values), failures: errors });
}
