import chalk from 'chalk';
import type { Command } from 'commander';
import { findUntranslated, readCatalog, type TranslationEntry } from '@linguamerge/core';
import { withErrorHandling } from '../utils/errors.js';
import { parseCount } from './collect.js';

interface UntranslatedOptions {
  limit?: number;
  json?: boolean;
}

const DEFAULT_LIMIT = 20;

export async function runUntranslated(
  catalogPath: string,
  options: UntranslatedOptions = {}
): Promise<TranslationEntry[]> {
  const limit = options.limit ?? DEFAULT_LIMIT;
  const untranslated = findUntranslated(await readCatalog(catalogPath));
  const shown = untranslated.slice(0, limit);

  if (options.json) {
    console.log(JSON.stringify({ total: untranslated.length, entries: shown }, null, 2));
    return shown;
  }

  if (!untranslated.length) {
    console.log(chalk.green('Every entry is translated.'));
    return shown;
  }

  console.log(chalk.yellow(`${untranslated.length} untranslated entr${untranslated.length === 1 ? 'y' : 'ies'}:`));
  shown.forEach((entry) => console.log(`[${entry.context}] ${entry.source}`));
  if (untranslated.length > shown.length) {
    console.log(chalk.gray(`...and ${untranslated.length - shown.length} more. Use --limit to see more.`));
  }
  return shown;
}

export function registerUntranslated(program: Command) {
  program
    .command('untranslated <catalog>')
    .description('List entries that still need a translation')
    .option('-l, --limit <n>', `Maximum entries to print (default ${DEFAULT_LIMIT})`, parseCount)
    .option('--json', 'Print raw JSON results', false)
    .action(
      withErrorHandling(async (catalog: string, options: UntranslatedOptions) => {
        await runUntranslated(catalog, options);
      })
    );
}
