/**
 * Capability contexts
 * The closed set of named capability domains a workflow phase can be bound to.
 */

/**
 * All valid context names, in canonical pipeline order
 */
export const CONTEXT_NAMES = [
  'requirements-analysis',
  'design',
  'implementation',
  'verification',
  'debugging',
  'documentation',
  'security-review',
  'optimization',
  'release',
] as const;

/**
 * A valid context name
 */
export type ContextName = (typeof CONTEXT_NAMES)[number];

/**
 * Check whether a string is one of the known context names
 */
export function isContextName(value: string): value is ContextName {
  return (CONTEXT_NAMES as readonly string[]).includes(value);
}

/**
 * Position of a context in the canonical order (used for stable sorting)
 */
export function contextRank(context: ContextName): number {
  return CONTEXT_NAMES.indexOf(context);
}

/**
 * Sort contexts into canonical order, dropping duplicates
 */
export function sortContexts(contexts: Iterable<ContextName>): ContextName[] {
  return [...new Set(contexts)].sort((a, b) => contextRank(a) - contextRank(b));
}
