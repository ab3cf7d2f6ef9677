/**
 * Schema Validation with Zod
 * Runtime validation for config files, workflow templates, workflow
 * definitions and the bundled data tables
 */

import { z } from 'zod';
import { CONTEXT_NAMES } from '../types/context-name';
import type { EngineConfigOverrides } from '../types/engine-config';
import type { WorkflowDefinition, WorkflowTemplate } from '../types/models';

/**
 * Schema validation result type
 */
export interface SchemaValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function runSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): SchemaValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`),
  };
}

function parseJson<T>(
  json: string,
  validate: (data: unknown) => SchemaValidationResult<T>
): SchemaValidationResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validate(data);
}

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

// =============================================================================
// Shared pieces
// =============================================================================

export const contextNameSchema = z.enum(CONTEXT_NAMES);

const complexitySchema = z.enum(['simple', 'medium', 'complex']);

const regexSchema = z.string().min(1).refine(isValidRegex, 'Invalid regular expression');

const byComplexity = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ simple: value, medium: value, complex: value });

// =============================================================================
// Engine config file (.conductor/config.json, ~/.config/conductor/config.json)
// =============================================================================

export const configFileSchema = z
  .object({
    analysis: z
      .object({
        maxEntities: z.number().int().positive(),
        mediumThreshold: z.number(),
        complexThreshold: z.number(),
      })
      .partial()
      .optional(),
    composition: z
      .object({
        templateDirectory: z.string().min(1),
        templateMatchThreshold: z.number().min(0).max(1),
        validationPassThreshold: z.number().min(0).max(1),
      })
      .partial()
      .optional(),
    execution: z
      .object({
        retryDelayMs: z.number().min(0),
        timeoutRetryAttempts: z.number().int().min(0),
        backoffMultiplier: z.number().min(1),
        defaultRetryCount: z.number().int().min(0),
      })
      .partial()
      .optional(),
    logging: z
      .object({
        minLevel: z.enum(['debug', 'info', 'warn', 'error']),
        jsonOutput: z.boolean(),
      })
      .partial()
      .optional(),
  })
  .strict();

/**
 * Validate the contents of an engine config file
 */
export function validateConfigFile(data: unknown): SchemaValidationResult<EngineConfigOverrides> {
  return runSchema(configFileSchema, data);
}

export function parseConfigFile(json: string): SchemaValidationResult<EngineConfigOverrides> {
  return parseJson(json, validateConfigFile);
}

// =============================================================================
// Workflow templates (.json / .yaml / .yml)
// =============================================================================

const templatePhaseSchema = z
  .object({
    id: z.string().min(1, 'Phase id cannot be empty'),
    context: contextNameSchema,
    name: z.string().min(1).optional(),
    description: z.string().default(''),
    inputs: z.array(z.string()).default([]),
    outputs: z.array(z.string()).default([]),
    timeoutSeconds: z.number().positive().default(300),
    retryCount: z.number().int().min(0).default(3),
    qualityGates: z.array(z.string()).default([]),
    condition: z.string().min(1).optional(),
    optional: z.boolean().default(false),
  })
  .transform((phase) => ({ ...phase, name: phase.name ?? phase.id }));

export const workflowTemplateSchema = z
  .object({
    templateId: z.string().min(1, 'Template id cannot be empty'),
    name: z.string().min(1).optional(),
    description: z.string().default(''),
    category: z.string().default('general'),
    phases: z.array(templatePhaseSchema).min(1, 'Template must define at least one phase'),
    parameters: z.record(z.unknown()).default({}),
    tags: z.array(z.string()).default([]),
    usageCount: z.number().int().min(0).default(0),
    successRate: z.number().min(0).max(1).default(0),
  })
  .superRefine((template, ctx) => {
    const seen = new Set<string>();
    template.phases.forEach((phase, index) => {
      if (seen.has(phase.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phases', index, 'id'],
          message: `Duplicate phase id: ${phase.id}`,
        });
      }
      seen.add(phase.id);
    });
  })
  .transform((template) => ({ ...template, name: template.name ?? template.templateId }));

/**
 * Validate a workflow template document
 */
export function validateWorkflowTemplate(data: unknown): SchemaValidationResult<WorkflowTemplate> {
  return runSchema(workflowTemplateSchema, data);
}

// =============================================================================
// Workflow definitions authored outside the composer
// =============================================================================

const workflowPhaseSchema = z.object({
  phaseId: z.string().min(1),
  context: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  inputs: z.array(z.string()).default([]),
  outputs: z.array(z.string()).default([]),
  conditionExpression: z.string().min(1).optional(),
  timeoutSeconds: z.number().positive(),
  retryCount: z.number().int().min(0).default(0),
  qualityGates: z.array(z.string()).default([]),
  parallelGroup: z.string().min(1).optional(),
});

const workflowMetadataSchema = z
  .object({
    source: z.enum(['template', 'synthesized', 'external']).optional(),
    templateId: z.string().optional(),
    taskId: z.string().optional(),
    complexity: complexitySchema.optional(),
    appliedRules: z.array(z.string()).optional(),
    validation: z
      .object({
        passed: z.boolean(),
        score: z.number(),
        messages: z.array(z.string()),
        repaired: z.boolean(),
      })
      .optional(),
  })
  .passthrough();

export const workflowDefinitionSchema = z
  .object({
    workflowId: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(''),
    phases: z.array(workflowPhaseSchema).min(1, 'Workflow must define at least one phase'),
    dependencies: z.record(z.array(z.string())).default({}),
    estimatedDuration: z.number().positive(),
    qualityGates: z.array(z.string()).default([]),
    metadata: workflowMetadataSchema.default({ source: 'external' }),
    createdAt: z.string().default(() => new Date().toISOString()),
  })
  .superRefine((workflow, ctx) => {
    const seen = new Set<string>();
    workflow.phases.forEach((phase, index) => {
      if (seen.has(phase.phaseId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phases', index, 'phaseId'],
          message: `Duplicate phase id: ${phase.phaseId}`,
        });
      }
      seen.add(phase.phaseId);
    });
  });

/**
 * Validate the shape of a workflow definition. Graph-level checks
 * (unknown contexts, dangling dependencies, cycles) happen before execution.
 */
export function validateWorkflowDefinition(data: unknown): SchemaValidationResult<WorkflowDefinition> {
  return runSchema(workflowDefinitionSchema, data);
}

export function parseWorkflowDefinition(json: string): SchemaValidationResult<WorkflowDefinition> {
  return parseJson(json, validateWorkflowDefinition);
}

// =============================================================================
// Context catalog (src/config/context-catalog.json)
// =============================================================================

const catalogEntrySchema = z.object({
  phase: z.object({
    name: z.string().min(1),
    description: z.string(),
    inputs: z.array(z.string()),
    outputs: z.array(z.string()),
    qualityGates: z.array(z.string()),
  }),
  baseTimeoutSeconds: z.number().positive(),
  predecessors: z.array(contextNameSchema),
  parallelSafe: z.boolean(),
});

const orderingRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    name: z.string().min(1),
    description: z.string(),
    kind: z.literal('first'),
    context: contextNameSchema,
  }),
  z.object({
    name: z.string().min(1),
    description: z.string(),
    kind: z.literal('before'),
    first: contextNameSchema,
    second: contextNameSchema,
  }),
  z.object({
    name: z.string().min(1),
    description: z.string(),
    kind: z.literal('last'),
    context: contextNameSchema,
  }),
]);

export const contextCatalogSchema = z.object({
  // Exhaustive: every context must have an entry
  contexts: z.object({
    'requirements-analysis': catalogEntrySchema,
    design: catalogEntrySchema,
    implementation: catalogEntrySchema,
    verification: catalogEntrySchema,
    debugging: catalogEntrySchema,
    documentation: catalogEntrySchema,
    'security-review': catalogEntrySchema,
    optimization: catalogEntrySchema,
    release: catalogEntrySchema,
  }),
  timeoutFactors: byComplexity(z.number().positive()),
  durationFactors: byComplexity(z.number().positive()),
  minimumWorkflowMinutes: z.number().positive(),
  orderingRules: z.array(orderingRuleSchema),
  templateCategories: z.record(z.array(z.string())),
});

export type ContextCatalog = z.infer<typeof contextCatalogSchema>;
export type ContextCatalogEntry = z.infer<typeof catalogEntrySchema>;
export type OrderingRule = z.infer<typeof orderingRuleSchema>;

export function validateContextCatalog(data: unknown): SchemaValidationResult<ContextCatalog> {
  return runSchema(contextCatalogSchema, data);
}

// =============================================================================
// Analyzer lexicon (src/analysis/lexicon.json)
// =============================================================================

export const lexiconSchema = z.object({
  entityPatterns: z.record(z.array(regexSchema)),
  stopWords: z.array(z.string()),
  entityContextWords: z.record(z.array(z.string())),
  complexity: z.object({
    perEntity: z.number(),
    highTypes: z.array(z.string()),
    highTypeWeight: z.number(),
    mediumTypes: z.array(z.string()),
    mediumTypeWeight: z.number(),
    otherTypeWeight: z.number(),
    indicators: z.record(z.number()),
    wordCountBonuses: z.array(z.object({ above: z.number().int().min(0), bonus: z.number() })),
    hints: z.record(z.record(z.number())),
  }),
  contextPatterns: z.record(contextNameSchema, z.array(regexSchema)),
  entityContexts: z.record(z.array(contextNameSchema)),
  complexityContexts: byComplexity(z.array(contextNameSchema)),
  dependencyPatterns: z.array(regexSchema),
  prerequisiteTypes: z.array(z.string()),
  successCriteria: z.array(
    z.object({
      types: z.array(z.string()).min(1),
      criteria: z.array(z.string().min(1)).min(1),
    })
  ),
  genericSuccessCriteria: z.array(z.string().min(1)).min(1),
  duration: z.object({
    baseMinutes: byComplexity(z.number().positive()),
    perContext: z.number().min(0),
    perEntity: z.number().min(0),
    heavyTypes: z.array(z.string()),
    perHeavyEntity: z.number().min(0),
    roundTo: z.number().positive(),
    minimum: z.number().positive(),
  }),
  confidence: z.object({
    base: z.number().min(0).max(1),
    minimalDescriptionBase: z.number().min(0).max(1),
    minimalDescriptionLength: z.number().int().min(0),
    entityWeight: z.number().min(0),
    perContext: z.number().min(0),
    contextCap: z.number().min(0),
    nonSimpleBonus: z.number().min(0),
  }),
});

export type Lexicon = z.infer<typeof lexiconSchema>;

export function validateLexicon(data: unknown): SchemaValidationResult<Lexicon> {
  return runSchema(lexiconSchema, data);
}
