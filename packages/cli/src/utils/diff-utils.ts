/**
 * CLI presentation of catalog updates: per-file counts, dry-run diffs and
 * failed matches.
 */

import path from 'path';
import chalk from 'chalk';
import type { CatalogUpdateSummary } from '@linguamerge/core';

function displayPath(filePath: string): string {
  const relative = path.relative(process.cwd(), filePath);
  return relative && !relative.startsWith('..') ? relative : filePath;
}

export function printCatalogDiffs(summary: CatalogUpdateSummary) {
  const diffs = summary.files.filter((file) => file.diff);
  if (!diffs.length) {
    console.log(chalk.gray('No catalog diffs to display.'));
    return;
  }

  console.log(chalk.blue('\nUnified catalog diffs:'));
  diffs.forEach((file) => {
    console.log(chalk.yellow(`\n--- ${displayPath(file.path)}`));
    console.log((file.diff ?? '').trimEnd());
  });
}

export function printUpdateSummary(summary: CatalogUpdateSummary) {
  for (const file of summary.files) {
    const { replaced, inserted, unchanged, skipped, failed } = file.outcomes;
    const verb = summary.dryRun ? 'would change' : file.written ? 'changed' : 'unchanged';
    const label = `${displayPath(file.path)}${file.created ? ' (new)' : ''}`;
    const counts = `replaced ${replaced}, inserted ${inserted}, unchanged ${unchanged}, skipped ${skipped}, failed ${failed}`;
    const line = `${label}: ${file.modified} ${verb} (${counts})`;
    console.log(file.modified > 0 ? chalk.green(line) : chalk.gray(line));
  }

  if (summary.dryRun) {
    printCatalogDiffs(summary);
  }

  if (summary.failedMatches.length) {
    console.log(chalk.yellow(`\n${summary.failedMatches.length} update(s) did not match any context:`));
    summary.failedMatches.forEach((failure) => {
      console.log(chalk.yellow(`  • [${failure.context}] ${failure.source}`));
      console.log(chalk.gray(`    ${displayPath(failure.file)}: ${failure.reason}`));
    });
  }
}
