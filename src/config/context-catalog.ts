/**
 * Context catalog
 * Per-context phase template, base timeout, predecessor contexts and parallel
 * safety, loaded once from context-catalog.json and frozen.
 */

import catalogData from './context-catalog.json';
import { ContextName } from '../types/context-name';
import { ComplexityLevel } from '../types/models';
import { ContextCatalog, ContextCatalogEntry, validateContextCatalog } from '../schemas/validators';
import { deepFreeze } from '../utils/deep-freeze';

function loadCatalog(): ContextCatalog {
  const result = validateContextCatalog(catalogData);
  if (!result.success || !result.data) {
    throw new Error(`Invalid context catalog: ${(result.errors ?? []).join('; ')}`);
  }
  return deepFreeze(result.data);
}

export const CONTEXT_CATALOG: Readonly<ContextCatalog> = loadCatalog();

export function getContextEntry(context: ContextName): Readonly<ContextCatalogEntry> {
  return CONTEXT_CATALOG.contexts[context];
}

/**
 * Contexts whose phases may share a parallel group
 */
export function isParallelSafe(context: ContextName): boolean {
  return getContextEntry(context).parallelSafe;
}

/**
 * Direct predecessor contexts from the catalog
 */
export function predecessorsOf(context: ContextName): readonly ContextName[] {
  return getContextEntry(context).predecessors;
}

/**
 * Phase timeout for a context, scaled by task complexity
 */
export function phaseTimeoutSeconds(context: ContextName, complexity: ComplexityLevel): number {
  return Math.round(getContextEntry(context).baseTimeoutSeconds * CONTEXT_CATALOG.timeoutFactors[complexity]);
}

/**
 * Entity types that count as a match for a template category
 */
export function categoryEntityTypes(category: string): readonly string[] {
  return CONTEXT_CATALOG.templateCategories[category] ?? [];
}
