/**
 * Configuration type definitions for linguamerge
 */

// ─────────────────────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────────────────────

export interface ExtractionConfig {
  /** Repository to read history from, relative to the config file. */
  repoPath: string;
  /** Revision range, e.g. `HEAD~10..HEAD` or `main..feature`. */
  commitRange: string;
  /** Glob patterns; a changed file is scanned when any of them matches. */
  include: string[];
  /** Upper bound on commits walked per run (at most 200). */
  maxCommits: number;
  /** Namespace names never used as context prefixes. */
  scopeStoplist: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalogs
// ─────────────────────────────────────────────────────────────────────────────

export interface CatalogConfig {
  /**
   * Catalog path without locale suffix; `translations/app` resolves to
   * `translations/app_zh_CN.ts` and friends.
   */
  catalogBase: string;
  catalogExtension: string;
  locales: string[];
  /** Locale that single-column tables are imported into. */
  defaultLocale: string;
}

export interface LinguamergeConfig extends ExtractionConfig, CatalogConfig {
  version?: number;
}

export interface LoadConfigResult {
  config: LinguamergeConfig;
  /** Undefined when no config file exists and defaults were used. */
  configPath?: string;
  projectRoot: string;
}
