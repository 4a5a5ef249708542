import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import {
  CatalogUpdater,
  catalogPathFor,
  loadConfigWithMeta,
  parseMultiLocaleTable,
  parseTable,
  type CatalogUpdateSummary,
  type UpdateRequest,
} from '@linguamerge/core';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { printUpdateSummary } from '../utils/diff-utils.js';
import { UPDATE_EXIT_CODES } from '../utils/exit-codes.js';
import { localesFor } from '../utils/catalog-paths.js';
import { writeReport } from '../utils/report.js';

export interface ImportOptions {
  config?: string;
  single?: boolean;
  dryRun?: boolean;
  json?: boolean;
  report?: string;
}

export interface ImportResult {
  locales: Record<string, CatalogUpdateSummary>;
}

export async function runImport(tablePath: string, options: ImportOptions = {}): Promise<ImportResult> {
  const resolved = path.resolve(process.cwd(), tablePath);
  let table: string;
  try {
    table = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`Unable to read table ${resolved}: ${message}`);
  }

  const { config, projectRoot } = await loadConfigWithMeta(options.config);
  const byLocale: Record<string, UpdateRequest[]> = options.single
    ? { [config.defaultLocale]: parseTable(table) }
    : parseMultiLocaleTable(table, localesFor(config));

  const pending = Object.entries(byLocale).filter(([, updates]) => updates.length > 0);
  if (!pending.length) {
    throw new CliError(`No filled translation cells found in ${resolved}.`);
  }

  const updater = new CatalogUpdater();
  const result: ImportResult = { locales: {} };
  let failed = 0;

  for (const [locale, updates] of pending) {
    const catalogPath = catalogPathFor(config, locale, projectRoot);
    if (!options.json) {
      console.log(chalk.blue(`\n${locale}: ${updates.length} translation${updates.length === 1 ? '' : 's'}`));
    }
    const summary = await updater.apply([catalogPath], updates, { dryRun: options.dryRun });
    result.locales[locale] = summary;
    failed += summary.failedMatches.length;
    if (!options.json) {
      printUpdateSummary(summary);
    }
  }

  if (options.report) {
    await writeReport(options.report, result, 'Import report', { quiet: options.json });
  }
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  }

  if (failed) {
    process.exitCode = UPDATE_EXIT_CODES.FAILED_MATCHES;
  }
  return result;
}

export function registerImport(program: Command) {
  program
    .command('import <table>')
    .description('Import a filled Markdown table into the locale catalogs')
    .option('-c, --config <path>', 'Path to linguamerge config file')
    .option('--single', 'Table has one translation column, imported into defaultLocale', false)
    .option('--dry-run', 'Show the diffs without writing', false)
    .option('--json', 'Print raw JSON results', false)
    .option('--report <path>', 'Write JSON summary to a file')
    .action(
      withErrorHandling(async (table: string, options: ImportOptions) => {
        await runImport(table, options);
      })
    );
}
