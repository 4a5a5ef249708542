import path from 'path';
import chalk from 'chalk';
import { InvalidArgumentError, type Command } from 'commander';
import {
  CandidateExtractor,
  GitRevisionSource,
  loadConfigWithMeta,
  type Candidate,
  type ExtractionSummary,
  type LinguamergeConfig,
  type RevisionSource,
} from '@linguamerge/core';
import { withErrorHandling } from '../utils/errors.js';
import { writeReport } from '../utils/report.js';

export interface CollectOptions {
  config?: string;
  range?: string;
  include?: string[];
  repo?: string;
  maxCommits?: number;
  json?: boolean;
  report?: string;
}

export const collectPatterns = (value: string | string[], previous: string[]) => {
  const list = Array.isArray(value) ? value : [value];
  const tokens = list
    .flatMap((entry) => entry.split(','))
    .map((token) => token.trim())
    .filter(Boolean);
  return [...previous, ...tokens];
};

export const parseCount = (value: string) => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
};

/**
 * Run the extractor with CLI overrides layered on the config. Shared with
 * `export --from git`.
 */
export async function extractCandidates(
  options: CollectOptions,
  revisions?: RevisionSource
): Promise<{ summary: ExtractionSummary; config: LinguamergeConfig; range: string }> {
  const { config, projectRoot } = await loadConfigWithMeta(options.config);
  const range = options.range ?? config.commitRange;
  const repoPath = path.resolve(projectRoot, options.repo ?? config.repoPath);
  const source = revisions ?? new GitRevisionSource(repoPath);

  const summary = await new CandidateExtractor(source).collect({
    range,
    include: options.include?.length ? options.include : config.include,
    maxCommits: options.maxCommits ?? config.maxCommits,
    scopeStoplist: config.scopeStoplist,
  });

  return { summary, config, range };
}

function printCandidates(candidates: Candidate[]) {
  for (const candidate of candidates) {
    const comment = candidate.comment ? chalk.gray(` (${candidate.comment})`) : '';
    console.log(`${candidate.context}: ${candidate.source}${comment}`);
  }
}

export async function runCollect(options: CollectOptions, revisions?: RevisionSource): Promise<ExtractionSummary> {
  if (!options.json) {
    console.log(chalk.blue('Collecting translatable strings from history...'));
  }

  const { summary, range } = await extractCandidates(options, revisions);

  if (options.report) {
    await writeReport(options.report, summary, 'Collect report', { quiet: options.json });
  }

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return summary;
  }

  summary.warnings.forEach((warning) => console.log(chalk.yellow(warning)));

  console.log(
    chalk.green(
      `Scanned ${summary.commitsScanned} commit${summary.commitsScanned === 1 ? '' : 's'} in ${range || 'HEAD'} ` +
        `(${summary.filesMatched} matching file${summary.filesMatched === 1 ? '' : 's'}) and found ` +
        `${summary.candidates.length} candidate${summary.candidates.length === 1 ? '' : 's'}.`
    )
  );

  if (summary.truncated) {
    console.log(chalk.yellow(`Stopped after ${summary.commitsScanned} commits; narrow the range to reach older changes.`));
  }

  if (!summary.candidates.length) {
    console.log(chalk.yellow('No translatable strings found.'));
    return summary;
  }

  printCandidates(summary.candidates);
  return summary;
}

export function registerCollect(program: Command) {
  program
    .command('collect')
    .description('List translatable strings added in a range of commits')
    .option('-c, --config <path>', 'Path to linguamerge config file')
    .option('-r, --range <range>', 'Revision range, e.g. HEAD~10..HEAD (defaults to config commitRange)')
    .option('--repo <path>', 'Repository path (defaults to config repoPath)')
    .option('--include <patterns...>', 'Override include globs from config (comma or space separated)', collectPatterns, [])
    .option('--max-commits <n>', 'Stop after this many commits (at most 200)', parseCount)
    .option('--json', 'Print raw JSON results', false)
    .option('--report <path>', 'Write JSON summary to a file')
    .action(
      withErrorHandling(async (options: CollectOptions) => {
        await runCollect(options);
      })
    );
}
