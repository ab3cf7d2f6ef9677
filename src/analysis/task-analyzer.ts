/**
 * Task Analyzer
 * Turns a free-text task description into a TaskAnalysis using keyword and
 * pattern heuristics: entities, complexity, required contexts, duration,
 * dependencies, success criteria and an overall confidence.
 */

import { createHash, randomUUID } from 'crypto';
import { ContextName, sortContexts } from '../types/context-name';
import { ComplexityLevel, Entity, TaskAnalysis } from '../types/models';
import { AnalysisSettings } from '../types/engine-config';
import { Logger } from '../types/logger';
import { Clock } from '../types/clock';
import { CompiledLexicon, DEFAULT_LEXICON } from './lexicon';

/**
 * Environment hints (`project_size`, `team_experience`, ...)
 */
export type AnalysisContext = Readonly<Record<string, unknown>>;

/**
 * Dependencies required by the TaskAnalyzer
 */
export interface TaskAnalyzerDependencies {
  logger: Logger;
  clock: Clock;
  /** Defaults to the bundled lexicon */
  lexicon?: CompiledLexicon;
}

const ALNUM = /^[a-z0-9]+$/i;

/**
 * Non-overlapping occurrences of `needle` in `haystack`
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) {
    return 0;
  }
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export class TaskAnalyzer {
  private readonly settings: AnalysisSettings;
  private readonly deps: TaskAnalyzerDependencies;
  private readonly lexicon: CompiledLexicon;

  constructor(settings: AnalysisSettings, deps: TaskAnalyzerDependencies) {
    this.settings = settings;
    this.deps = deps;
    this.lexicon = deps.lexicon ?? DEFAULT_LEXICON;
  }

  /**
   * Analyze a task description. Never throws for empty or meaningless input;
   * such input yields a minimal, low-confidence analysis.
   */
  analyze(description: string, context: AnalysisContext = {}): TaskAnalysis {
    const taskId = this.generateTaskId(description);
    this.deps.logger.event('analysis_started', 'Analyzing task', { taskId });

    const entities = this.extractEntities(description);
    const complexity = this.assessComplexity(entities, description, context);
    const requiredContexts = this.identifyContexts(entities, description, complexity);

    const analysis: TaskAnalysis = {
      taskId,
      description,
      entities,
      complexity,
      requiredContexts,
      estimatedDuration: this.estimateDuration(complexity, requiredContexts, entities),
      dependencies: this.identifyDependencies(entities, description),
      successCriteria: this.generateSuccessCriteria(entities),
      confidence: this.calculateConfidence(description, entities, requiredContexts, complexity),
      createdAt: this.deps.clock.iso(),
    };

    this.deps.logger.event(
      'analysis_completed',
      `Task analysis complete: ${requiredContexts.length} contexts, ${complexity} complexity, ${analysis.estimatedDuration}min estimated`,
      { taskId, complexity, contexts: requiredContexts.join(','), confidence: analysis.confidence }
    );

    return analysis;
  }

  /**
   * Extract typed entities, deduplicated by (name, type) and ranked by confidence
   */
  extractEntities(description: string): Entity[] {
    const text = description.toLowerCase();
    const seen = new Set<string>();
    const entities: Entity[] = [];

    for (const { type, patterns } of this.lexicon.entityPatterns) {
      for (const pattern of patterns) {
        for (const match of text.matchAll(pattern)) {
          const name = this.cleanEntityName(match.groups?.name ?? match[1] ?? match[0]);
          if (name.length === 0) {
            continue;
          }
          const key = `${name}\u0000${type}`;
          if (seen.has(key)) {
            continue;
          }
          seen.add(key);
          entities.push({
            name,
            type,
            confidence: this.entityConfidence(name, type, text),
            attributes: { position: match.index ?? 0, length: name.length },
          });
        }
      }
    }

    return entities
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, this.settings.maxEntities);
  }

  /**
   * Score the task and map the score onto a complexity level
   */
  assessComplexity(entities: readonly Entity[], description: string, context: AnalysisContext = {}): ComplexityLevel {
    const score = this.complexityScore(entities, description, context);
    if (score >= this.settings.complexThreshold) {
      return 'complex';
    }
    if (score >= this.settings.mediumThreshold) {
      return 'medium';
    }
    return 'simple';
  }

  complexityScore(entities: readonly Entity[], description: string, context: AnalysisContext = {}): number {
    const weights = this.lexicon.source.complexity;
    let score = entities.length * weights.perEntity;

    for (const entity of entities) {
      if (weights.highTypes.includes(entity.type)) {
        score += weights.highTypeWeight;
      } else if (weights.mediumTypes.includes(entity.type)) {
        score += weights.mediumTypeWeight;
      } else {
        score += weights.otherTypeWeight;
      }
    }

    const text = description.toLowerCase();
    for (const [indicator, weight] of Object.entries(weights.indicators)) {
      score += weight * countOccurrences(text, indicator);
    }

    const wordCount = description.split(/\s+/).filter((word) => word.length > 0).length;
    const lengthBonus = weights.wordCountBonuses.find((entry) => wordCount > entry.above);
    if (lengthBonus) {
      score += lengthBonus.bonus;
    }

    for (const [hint, adjustments] of Object.entries(weights.hints)) {
      const value = context[hint];
      if (typeof value === 'string') {
        score += adjustments[value] ?? 0;
      }
    }

    return score;
  }

  /**
   * Contexts the task needs, in canonical order. Never empty.
   */
  identifyContexts(entities: readonly Entity[], description: string, complexity: ComplexityLevel): ContextName[] {
    const text = description.toLowerCase();
    const contexts = new Set<ContextName>();

    for (const { context, patterns } of this.lexicon.contextPatterns) {
      if (patterns.some((pattern) => pattern.test(text))) {
        contexts.add(context);
      }
    }

    for (const entity of entities) {
      for (const context of this.lexicon.source.entityContexts[entity.type] ?? []) {
        contexts.add(context);
      }
    }

    for (const context of this.lexicon.source.complexityContexts[complexity]) {
      contexts.add(context);
    }

    if (contexts.size === 0) {
      contexts.add('implementation');
    }

    // Documentation-only work ships without a release phase
    if (!contexts.has('documentation') || contexts.size > 1) {
      contexts.add('release');
    }

    return sortContexts(contexts);
  }

  /**
   * Duration estimate in minutes, rounded to the configured step
   */
  estimateDuration(
    complexity: ComplexityLevel,
    contexts: readonly ContextName[],
    entities: readonly Entity[]
  ): number {
    const duration = this.lexicon.source.duration;
    let total = duration.baseMinutes[complexity];
    total += contexts.length * duration.perContext;
    total += entities.length * duration.perEntity;
    for (const entity of entities) {
      if (duration.heavyTypes.includes(entity.type)) {
        total += duration.perHeavyEntity;
      }
    }
    return Math.max(duration.minimum, Math.round(total / duration.roundTo) * duration.roundTo);
  }

  identifyDependencies(entities: readonly Entity[], description: string): string[] {
    const text = description.toLowerCase();
    const dependencies = new Set<string>();

    for (const pattern of this.lexicon.dependencyPatterns) {
      for (const match of text.matchAll(pattern)) {
        const dependency = (match[1] ?? '').trim();
        if (dependency.length > 0 && dependency.length < 100) {
          dependencies.add(dependency);
        }
      }
    }

    for (const entity of entities) {
      if (this.lexicon.source.prerequisiteTypes.includes(entity.type)) {
        dependencies.add(entity.name);
      }
    }

    return [...dependencies];
  }

  generateSuccessCriteria(entities: readonly Entity[]): string[] {
    const types = new Set(entities.map((entity) => entity.type));
    const criteria: string[] = [];

    for (const group of this.lexicon.source.successCriteria) {
      if (group.types.some((type) => types.has(type))) {
        criteria.push(...group.criteria);
      }
    }

    return criteria.length > 0 ? criteria : [...this.lexicon.source.genericSuccessCriteria];
  }

  calculateConfidence(
    description: string,
    entities: readonly Entity[],
    contexts: readonly ContextName[],
    complexity: ComplexityLevel
  ): number {
    const weights = this.lexicon.source.confidence;
    let confidence =
      description.trim().length < weights.minimalDescriptionLength ? weights.minimalDescriptionBase : weights.base;

    if (entities.length > 0) {
      const mean = entities.reduce((sum, entity) => sum + entity.confidence, 0) / entities.length;
      confidence += mean * weights.entityWeight;
    }

    if (contexts.length > 0) {
      confidence += Math.min(weights.contextCap, contexts.length * weights.perContext);
    }

    if (complexity !== 'simple') {
      confidence += weights.nonSimpleBonus;
    }

    return Math.min(1, Math.max(0, confidence));
  }

  private entityConfidence(name: string, type: string, text: string): number {
    let confidence = 0.5;

    if (name.length > 2 && ALNUM.test(name)) {
      confidence += 0.2;
    }

    confidence += Math.min(0.2, countOccurrences(text, name) * 0.05);

    const contextWords = this.lexicon.source.entityContextWords[type] ?? [];
    if (contextWords.some((word) => text.includes(word))) {
      confidence += 0.1;
    }

    return Math.min(1, confidence);
  }

  /**
   * Collapse whitespace and trim stop words from both ends
   */
  private cleanEntityName(raw: string): string {
    const words = raw.trim().split(/\s+/).filter((word) => word.length > 0);
    while (words.length > 0 && this.lexicon.stopWords.has(words[0])) {
      words.shift();
    }
    while (words.length > 0 && this.lexicon.stopWords.has(words[words.length - 1])) {
      words.pop();
    }
    return words.join(' ');
  }

  private generateTaskId(description: string): string {
    const stamp = this.deps.clock
      .iso()
      .replace(/[-:]/g, '')
      .replace('T', '_')
      .slice(0, 15);
    const hash = createHash('md5').update(description).digest('hex').slice(0, 8);
    return `task_${stamp}_${hash}_${randomUUID().slice(0, 8)}`;
  }
}
