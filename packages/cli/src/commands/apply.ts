import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { CatalogUpdater, loadConfigWithMeta, type CatalogUpdateSummary, type UpdateRequest } from '@linguamerge/core';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { printUpdateSummary } from '../utils/diff-utils.js';
import { writeReport } from '../utils/report.js';
import { UPDATE_EXIT_CODES } from '../utils/exit-codes.js';
import { defaultCatalogPath, expandCatalogArgs } from '../utils/catalog-paths.js';

export interface ApplyOptions {
  config?: string;
  input?: string;
  catalog?: string[];
  dryRun?: boolean;
  json?: boolean;
  report?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts `[{ context, source, translation, comment? }]` or `{ "updates": [...] }`.
 */
export function parseUpdateRequests(raw: unknown, label: string): UpdateRequest[] {
  const list = isRecord(raw) ? raw.updates : raw;
  if (!Array.isArray(list)) {
    throw new CliError(`${label} must contain an array of updates or an object with an "updates" array.`);
  }

  return list.map((item, index) => {
    if (!isRecord(item)) {
      throw new CliError(`${label}: update #${index + 1} is not an object.`);
    }
    const { context, source, translation, comment } = item;
    if (typeof context !== 'string' || typeof source !== 'string') {
      throw new CliError(`${label}: update #${index + 1} needs string "context" and "source" fields.`);
    }
    if (translation !== undefined && translation !== null && typeof translation !== 'string') {
      throw new CliError(`${label}: update #${index + 1} has a non-string "translation".`);
    }
    if (comment !== undefined && comment !== null && typeof comment !== 'string') {
      throw new CliError(`${label}: update #${index + 1} has a non-string "comment".`);
    }
    const request: UpdateRequest = { context, source, translation: translation ?? '' };
    if (comment) {
      request.comment = comment;
    }
    return request;
  });
}

async function readUpdates(inputPath: string): Promise<UpdateRequest[]> {
  const resolved = path.resolve(process.cwd(), inputPath);
  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`Unable to read updates from ${resolved}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`Updates file ${resolved} contains invalid JSON: ${message}`);
  }
  return parseUpdateRequests(parsed, resolved);
}

export async function runApply(options: ApplyOptions): Promise<CatalogUpdateSummary> {
  if (!options.input) {
    throw new CliError('Missing --input <file> with the updates to apply.');
  }
  const updates = await readUpdates(options.input);
  if (!updates.length) {
    throw new CliError('The updates file contains no updates.');
  }

  let catalogs: string[];
  if (options.catalog?.length) {
    catalogs = await expandCatalogArgs(options.catalog);
  } else {
    const { config, projectRoot } = await loadConfigWithMeta(options.config);
    catalogs = [defaultCatalogPath(config, projectRoot)];
  }
  if (!catalogs.length) {
    throw new CliError('No catalog files matched the given --catalog patterns.');
  }

  if (!options.json) {
    console.log(
      chalk.blue(
        `${options.dryRun ? 'Previewing' : 'Applying'} ${updates.length} update${updates.length === 1 ? '' : 's'} ` +
          `to ${catalogs.length} catalog${catalogs.length === 1 ? '' : 's'}...`
      )
    );
  }

  const summary = await new CatalogUpdater().apply(catalogs, updates, { dryRun: options.dryRun });

  if (options.report) {
    await writeReport(options.report, summary, 'Apply report', { quiet: options.json });
  }

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    printUpdateSummary(summary);
  }

  if (summary.failedMatches.length) {
    process.exitCode = UPDATE_EXIT_CODES.FAILED_MATCHES;
  }
  return summary;
}

export function registerApply(program: Command) {
  program
    .command('apply')
    .description('Apply translation updates from a JSON file to catalogs')
    .option('-c, --config <path>', 'Path to linguamerge config file')
    .option('-i, --input <file>', 'JSON file with [{ context, source, translation, comment? }]')
    .option('--catalog <paths...>', 'Catalog files or globs (defaults to the defaultLocale catalog)')
    .option('--dry-run', 'Show the diffs without writing', false)
    .option('--json', 'Print raw JSON results', false)
    .option('--report <path>', 'Write JSON summary to a file')
    .action(
      withErrorHandling(async (options: ApplyOptions) => {
        await runApply(options);
      })
    );
}
