import path from 'path';
import fg from 'fast-glob';
import {
  SUPPORTED_LOCALES,
  catalogPathFor,
  type LinguamergeConfig,
  type LocaleDefinition,
} from '@linguamerge/core';

/**
 * Expand catalog arguments. Glob patterns are matched against existing files;
 * plain paths are kept as given so that a new catalog can be created.
 */
export async function expandCatalogArgs(values: string[], cwd = process.cwd()): Promise<string[]> {
  const result = new Set<string>();

  for (const value of values) {
    if (fg.isDynamicPattern(value)) {
      const matches = await fg(value, { cwd, absolute: true, onlyFiles: true, unique: true });
      matches.sort().forEach((match) => result.add(path.normalize(match)));
    } else {
      result.add(path.resolve(cwd, value));
    }
  }

  return Array.from(result);
}

/** Table column definitions for the configured locales. */
export function localesFor(config: LinguamergeConfig): LocaleDefinition[] {
  return config.locales.map(
    (code) => SUPPORTED_LOCALES.find((locale) => locale.code === code) ?? { code, label: code }
  );
}

export function defaultCatalogPath(config: LinguamergeConfig, projectRoot: string): string {
  return catalogPathFor(config, config.defaultLocale, projectRoot);
}
