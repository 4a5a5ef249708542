import type { LinguamergeConfig } from './types.js';
import { MAX_COMMITS } from './defaults.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

const SHELL_META_PATTERN = /[;"'`|&<>$]/;
const LOCALE_CODE_PATTERN = /^[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*$/;
const MAX_PATH_LIKE_LENGTH = 320;
const MAX_GLOB_LENGTH = 512;

export function hasUnsafeConfigValue(value: string): boolean {
  return containsControlCharacters(value) || SHELL_META_PATTERN.test(value);
}

export function isSafeLocaleCode(value: string): boolean {
  return LOCALE_CODE_PATTERN.test(value);
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (hasUnsafeConfigValue(value)) {
    issues.push({ field, message: 'contains control characters or shell metacharacters' });
  }
}

function validateLocale(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!isSafeLocaleCode(value)) {
    issues.push({ field, message: 'must be a locale code of letters, numbers, "-" or "_"' });
  }
}

function validateStringList(field: string, values: string[], issues: ConfigValidationIssue[]) {
  values.forEach((entry, index) => {
    const targetField = `${field}[${index}]`;
    if (entry.length > MAX_GLOB_LENGTH) {
      issues.push({ field: targetField, message: `must be shorter than ${MAX_GLOB_LENGTH} characters` });
      return;
    }
    if (hasUnsafeConfigValue(entry)) {
      issues.push({ field: targetField, message: 'contains control characters or shell metacharacters' });
    }
  });
}

export function validateConfig(config: LinguamergeConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  validatePathLike('repoPath', config.repoPath, issues);
  validatePathLike('catalogBase', config.catalogBase, issues);
  if (hasUnsafeConfigValue(config.commitRange)) {
    issues.push({ field: 'commitRange', message: 'contains control characters or shell metacharacters' });
  }
  if (config.commitRange.startsWith('-')) {
    issues.push({ field: 'commitRange', message: 'must not start with "-"' });
  }

  if (config.maxCommits < 1 || config.maxCommits > MAX_COMMITS) {
    issues.push({ field: 'maxCommits', message: `must be between 1 and ${MAX_COMMITS}` });
  }

  config.locales.forEach((locale, index) => validateLocale(`locales[${index}]`, locale, issues));
  validateLocale('defaultLocale', config.defaultLocale, issues);
  if (!config.locales.includes(config.defaultLocale)) {
    issues.push({ field: 'defaultLocale', message: 'must be one of "locales"' });
  }

  validateStringList('include', config.include, issues);
  validateStringList('scopeStoplist', config.scopeStoplist, issues);

  return issues;
}

export function assertConfigValid(config: LinguamergeConfig): void {
  const issues = validateConfig(config);
  if (!issues.length) {
    return;
  }

  const details = issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n');
  throw new Error(`Invalid linguamerge configuration:\n${details}`);
}
