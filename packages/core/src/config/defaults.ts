/**
 * Default configuration values for linguamerge
 */

export const DEFAULT_CONFIG_FILENAME = 'linguamerge.config.json';

// ─────────────────────────────────────────────────────────────────────────────
// Extraction Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_REPO_PATH = '.';
export const DEFAULT_COMMIT_RANGE = 'HEAD~10..HEAD';
export const DEFAULT_INCLUDE = ['*.cpp', '*.h', '*.ui', '*.qml'];
export const MAX_COMMITS = 200;

export const DEFAULT_SCOPE_STOPLIST = ['std', 'Qt', 'QtPrivate', 'Ui', 'detail', 'internal', 'boost'];

// ─────────────────────────────────────────────────────────────────────────────
// Catalog Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_CATALOG_BASE = 'translations/app';
export const DEFAULT_CATALOG_EXTENSION = '.ts';
export const DEFAULT_LOCALES = ['zh_CN', 'zh_HK', 'zh_TW'];
export const DEFAULT_LOCALE = 'zh_CN';
