import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { Option, type Command } from 'commander';
import {
  findUntranslated,
  loadConfigWithMeta,
  readCatalog,
  renderJson,
  renderMultiLocaleTable,
  renderTable,
  type RevisionSource,
  type TableEntry,
} from '@linguamerge/core';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { defaultCatalogPath, localesFor } from '../utils/catalog-paths.js';
import { collectPatterns, extractCandidates } from './collect.js';

export interface ExportOptions {
  config?: string;
  from?: 'git' | 'catalog';
  catalog?: string;
  range?: string;
  include?: string[];
  repo?: string;
  single?: boolean;
  language?: string;
  format?: 'markdown' | 'json';
  prefill?: boolean;
  out?: string;
}

async function entriesFromCatalog(options: ExportOptions): Promise<TableEntry[]> {
  let catalogPath: string;
  if (options.catalog) {
    catalogPath = path.resolve(process.cwd(), options.catalog);
  } else {
    const { config, projectRoot } = await loadConfigWithMeta(options.config);
    catalogPath = defaultCatalogPath(config, projectRoot);
  }

  return findUntranslated(await readCatalog(catalogPath)).map(({ context, source, comment, translation }) => ({
    context,
    source,
    comment,
    translation,
  }));
}

export async function runExport(options: ExportOptions, revisions?: RevisionSource): Promise<string> {
  const from = options.from ?? 'git';
  let entries: TableEntry[];

  if (from === 'git') {
    const { summary } = await extractCandidates(options, revisions);
    summary.warnings.forEach((warning) => console.error(chalk.yellow(warning)));
    entries = summary.candidates.map(({ context, source, comment }) => ({ context, source, comment }));
  } else {
    entries = await entriesFromCatalog(options);
  }

  if (!entries.length) {
    throw new CliError(from === 'git' ? 'No translatable strings found to export.' : 'No untranslated entries to export.');
  }

  let output: string;
  if (options.format === 'json') {
    output = renderJson(entries);
  } else if (options.single) {
    output = renderTable(entries, { targetLanguage: options.language, prefill: options.prefill });
  } else {
    const { config } = await loadConfigWithMeta(options.config);
    output = renderMultiLocaleTable(entries, localesFor(config), { prefill: options.prefill });
  }

  if (options.out) {
    const outputPath = path.resolve(process.cwd(), options.out);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, output.endsWith('\n') ? output : `${output}\n`, 'utf8');
    console.log(chalk.green(`Exported ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'} to ${outputPath}`));
  } else {
    console.log(output.trimEnd());
  }

  return output;
}

export function registerExport(program: Command) {
  program
    .command('export')
    .description('Export strings as a Markdown table (or JSON) for translation')
    .option('-c, --config <path>', 'Path to linguamerge config file')
    .addOption(new Option('--from <source>', 'Where to read strings from').choices(['git', 'catalog']).default('git'))
    .option('--catalog <path>', 'Catalog to read untranslated entries from (with --from catalog)')
    .option('-r, --range <range>', 'Revision range (with --from git)')
    .option('--repo <path>', 'Repository path (with --from git)')
    .option('--include <patterns...>', 'Override include globs from config', collectPatterns, [])
    .option('--single', 'One translation column instead of one per locale', false)
    .option('--language <name>', 'Language named in the single-column header', 'Chinese')
    .addOption(new Option('--format <format>', 'Output format').choices(['markdown', 'json']).default('markdown'))
    .option('--prefill', 'Write existing translations into the table', false)
    .option('-o, --out <file>', 'Write to a file instead of stdout')
    .action(
      withErrorHandling(async (options: ExportOptions) => {
        await runExport(options);
      })
    );
}
