/**
 * Analysis module - turns task descriptions into TaskAnalysis values
 */

export type { AnalysisContext, TaskAnalyzerDependencies } from './task-analyzer';
export { TaskAnalyzer, countOccurrences } from './task-analyzer';
export type { CompiledLexicon, EntityPatternSet, ContextPatternSet } from './lexicon';
export { compileLexicon, loadLexicon, DEFAULT_LEXICON } from './lexicon';
