/**
 * Config module - configuration resolution and the context catalog
 */

export type { ResolveConfigOptions } from './resolve-config';
export {
  resolveConfig,
  defaultEngineSettings,
  REPO_CONFIG_PATH,
  USER_CONFIG_PATH,
} from './resolve-config';

export {
  CONTEXT_CATALOG,
  getContextEntry,
  isParallelSafe,
  predecessorsOf,
  phaseTimeoutSeconds,
  categoryEntityTypes,
} from './context-catalog';
