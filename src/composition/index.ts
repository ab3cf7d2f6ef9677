/**
 * Composition module - turns a TaskAnalysis into a validated WorkflowDefinition
 */

export type { ComposerSettings, WorkflowComposerDependencies, TemplateMatch } from './workflow-composer';
export { WorkflowComposer } from './workflow-composer';
export type { TemplateLibrary, TemplateLoadFailure } from './template-library';
export {
  InMemoryTemplateLibrary,
  loadTemplateDirectory,
  parseTemplateDocument,
  TEMPLATE_EXTENSIONS,
} from './template-library';
export type { DependencyMap } from './dependency-graph';
export {
  unknownReferences,
  findCycle,
  dependsOn,
  weakComponents,
  isWeaklyConnected,
  topologicalOrder,
} from './dependency-graph';
