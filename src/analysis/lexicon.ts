/**
 * Analyzer lexicon
 * Patterns, weights and mapping tables used by the TaskAnalyzer, loaded once
 * from lexicon.json, validated and compiled into regular expressions.
 */

import lexiconData from './lexicon.json';
import { CONTEXT_NAMES, ContextName } from '../types/context-name';
import { Lexicon, validateLexicon } from '../schemas/validators';
import { deepFreeze } from '../utils/deep-freeze';

export interface EntityPatternSet {
  type: string;
  /** Global, case-insensitive; use with matchAll */
  patterns: RegExp[];
}

export interface ContextPatternSet {
  context: ContextName;
  patterns: RegExp[];
}

export interface CompiledLexicon {
  readonly source: Readonly<Lexicon>;
  readonly entityPatterns: readonly EntityPatternSet[];
  /** In canonical context order */
  readonly contextPatterns: readonly ContextPatternSet[];
  readonly dependencyPatterns: readonly RegExp[];
  readonly stopWords: ReadonlySet<string>;
}

/**
 * Compile a validated lexicon
 */
export function compileLexicon(lexicon: Lexicon): CompiledLexicon {
  const source = deepFreeze(lexicon);
  return {
    source,
    entityPatterns: Object.entries(source.entityPatterns).map(([type, patterns]) => ({
      type,
      patterns: patterns.map((pattern) => new RegExp(pattern, 'gi')),
    })),
    contextPatterns: CONTEXT_NAMES.map((context) => ({
      context,
      patterns: (source.contextPatterns[context] ?? []).map((pattern) => new RegExp(pattern, 'i')),
    })),
    dependencyPatterns: source.dependencyPatterns.map((pattern) => new RegExp(pattern, 'gi')),
    stopWords: new Set(source.stopWords),
  };
}

/**
 * Validate raw lexicon data and compile it
 */
export function loadLexicon(data: unknown): CompiledLexicon {
  const result = validateLexicon(data);
  if (!result.success || !result.data) {
    throw new Error(`Invalid analyzer lexicon: ${(result.errors ?? []).join('; ')}`);
  }
  return compileLexicon(result.data);
}

export const DEFAULT_LEXICON: CompiledLexicon = loadLexicon(lexiconData);
