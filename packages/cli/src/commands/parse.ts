import chalk from 'chalk';
import type { Command } from 'commander';
import { loadCatalog, summarizeEntries, type CatalogSummary } from '@linguamerge/core';
import { withErrorHandling } from '../utils/errors.js';

interface ParseOptions {
  json?: boolean;
}

export interface ParseResult extends CatalogSummary {
  language?: string;
  contexts: string[];
}

export async function runParse(catalogPath: string, options: ParseOptions = {}): Promise<ParseResult> {
  const catalog = await loadCatalog(catalogPath);
  const entries = catalog.contexts.flatMap((context) => context.entries);
  const result: ParseResult = {
    ...summarizeEntries(entries),
    language: catalog.language,
    contexts: catalog.contexts.map((context) => context.name).filter(Boolean),
  };

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  console.log(chalk.blue(`Catalog ${catalogPath}${result.language ? ` (${result.language})` : ''}`));
  console.log(`Entries: ${result.total}`);
  console.log(chalk.green(`Translated: ${result.translated}`));
  console.log((result.untranslated ? chalk.yellow : chalk.green)(`Untranslated: ${result.untranslated}`));
  console.log(chalk.gray(`Contexts (${result.contexts.length}): ${result.contexts.join(', ')}`));
  return result;
}

export function registerParse(program: Command) {
  program
    .command('parse <catalog>')
    .description('Show entry totals and contexts of a catalog')
    .option('--json', 'Print raw JSON results', false)
    .action(
      withErrorHandling(async (catalog: string, options: ParseOptions) => {
        await runParse(catalog, options);
      })
    );
}
