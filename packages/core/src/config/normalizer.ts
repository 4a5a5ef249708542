/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import type { LinguamergeConfig } from './types.js';
import {
  DEFAULT_CATALOG_BASE,
  DEFAULT_CATALOG_EXTENSION,
  DEFAULT_COMMIT_RANGE,
  DEFAULT_INCLUDE,
  DEFAULT_LOCALE,
  DEFAULT_LOCALES,
  DEFAULT_REPO_PATH,
  DEFAULT_SCOPE_STOPLIST,
  MAX_COMMITS,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Array Utilities
// ─────────────────────────────────────────────────────────────────────────────

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
      .map((item) => item.trim());
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function ensureArray(value: unknown, fallback: string[]): string[] {
  const normalized = ensureStringArray(value);
  return normalized.length ? Array.from(new Set(normalized)) : [...fallback];
}

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeString(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  return fallback;
}

/** Commit ranges may legitimately be empty (meaning HEAD). */
export function normalizeCommitRange(value: unknown): string {
  return typeof value === 'string' ? value.trim() : DEFAULT_COMMIT_RANGE;
}

export function normalizePositiveInteger(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.floor(value);
}

export function normalizeExtension(value: unknown): string {
  const raw = normalizeString(value, DEFAULT_CATALOG_EXTENSION);
  return raw.startsWith('.') ? raw : `.${raw}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Normalizer
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeConfig(parsed: Record<string, unknown>): LinguamergeConfig {
  const locales = ensureArray(parsed.locales, DEFAULT_LOCALES);
  const defaultLocale = normalizeString(parsed.defaultLocale, locales.includes(DEFAULT_LOCALE) ? DEFAULT_LOCALE : locales[0]);

  return {
    version: typeof parsed.version === 'number' ? parsed.version : 1,
    repoPath: normalizeString(parsed.repoPath, DEFAULT_REPO_PATH),
    commitRange: normalizeCommitRange(parsed.commitRange),
    include: ensureArray(parsed.include, DEFAULT_INCLUDE),
    maxCommits: normalizePositiveInteger(parsed.maxCommits) ?? MAX_COMMITS,
    scopeStoplist: ensureArray(parsed.scopeStoplist, DEFAULT_SCOPE_STOPLIST),
    catalogBase: normalizeString(parsed.catalogBase, DEFAULT_CATALOG_BASE),
    catalogExtension: normalizeExtension(parsed.catalogExtension),
    locales,
    defaultLocale,
  };
}
