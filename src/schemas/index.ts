/**
 * Schemas module - zod validators for external and bundled data
 */

export type {
  SchemaValidationResult,
  ContextCatalog,
  ContextCatalogEntry,
  OrderingRule,
  Lexicon,
} from './validators';

export {
  validateConfigFile,
  parseConfigFile,
  validateWorkflowTemplate,
  validateWorkflowDefinition,
  parseWorkflowDefinition,
  validateContextCatalog,
  validateLexicon,
  // Zod schemas
  contextNameSchema,
  configFileSchema,
  workflowTemplateSchema,
  workflowDefinitionSchema,
  contextCatalogSchema,
  lexiconSchema,
} from './validators';
