/**
 * Configuration module for linguamerge
 *
 * Handles loading, parsing, and normalizing configuration files.
 */

export type { ExtractionConfig, CatalogConfig, LinguamergeConfig, LoadConfigResult } from './types.js';

export {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_REPO_PATH,
  DEFAULT_COMMIT_RANGE,
  DEFAULT_INCLUDE,
  MAX_COMMITS,
  DEFAULT_SCOPE_STOPLIST,
  DEFAULT_CATALOG_BASE,
  DEFAULT_CATALOG_EXTENSION,
  DEFAULT_LOCALES,
  DEFAULT_LOCALE,
} from './defaults.js';

export {
  ensureStringArray,
  ensureArray,
  normalizeString,
  normalizeCommitRange,
  normalizePositiveInteger,
  normalizeExtension,
  normalizeConfig,
} from './normalizer.js';

export { validateConfig, assertConfigValid, hasUnsafeConfigValue, isSafeLocaleCode } from './validator.js';
export type { ConfigValidationIssue } from './validator.js';

export { loadConfig, loadConfigWithMeta, catalogPathFor } from './loader.js';
