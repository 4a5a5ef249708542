import { Command } from 'commander';
import inquirer from 'inquirer';
import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import {
  DEFAULT_CATALOG_BASE,
  DEFAULT_CATALOG_EXTENSION,
  DEFAULT_COMMIT_RANGE,
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_INCLUDE,
  DEFAULT_LOCALE,
  DEFAULT_LOCALES,
  DEFAULT_REPO_PATH,
  DEFAULT_SCOPE_STOPLIST,
  MAX_COMMITS,
  assertConfigValid,
  normalizeConfig,
  type LinguamergeConfig,
} from '@linguamerge/core';
import { CliError, withErrorHandling } from '../utils/errors.js';

/**
 * Parse a comma-separated list of glob patterns, respecting brace expansions.
 * Brace-expanded globs like `src/**\/*.{cpp,h}` are kept as a single token.
 */
export function parseGlobList(value: string): string[] {
  const result: string[] = [];
  let current = '';
  let braceDepth = 0;

  for (const char of value) {
    if (char === '{') {
      braceDepth++;
      current += char;
    } else if (char === '}') {
      braceDepth = Math.max(0, braceDepth - 1);
      current += char;
    } else if (char === ',' && braceDepth === 0) {
      const trimmed = current.trim();
      if (trimmed) result.push(trimmed);
      current = '';
    } else {
      current += char;
    }
  }

  const trimmed = current.trim();
  if (trimmed) result.push(trimmed);
  return result;
}

export interface InitCommandOptions {
  yes?: boolean;
  force?: boolean;
}

export interface InitAnswers {
  repoPath: string;
  commitRange: string;
  include: string;
  catalogBase: string;
  locales: string;
  defaultLocale: string;
}

const DEFAULT_ANSWERS: InitAnswers = {
  repoPath: DEFAULT_REPO_PATH,
  commitRange: DEFAULT_COMMIT_RANGE,
  include: DEFAULT_INCLUDE.join(', '),
  catalogBase: DEFAULT_CATALOG_BASE,
  locales: DEFAULT_LOCALES.join(', '),
  defaultLocale: DEFAULT_LOCALE,
};

async function promptAnswers(): Promise<InitAnswers> {
  return inquirer.prompt<InitAnswers>([
    {
      type: 'input',
      name: 'repoPath',
      message: 'Where is the git repository (relative to this directory)?',
      default: DEFAULT_ANSWERS.repoPath,
    },
    {
      type: 'input',
      name: 'commitRange',
      message: 'Which revision range should be scanned by default?',
      default: DEFAULT_ANSWERS.commitRange,
    },
    {
      type: 'input',
      name: 'include',
      message: 'Which files should be scanned? (comma separated glob patterns)',
      default: DEFAULT_ANSWERS.include,
    },
    {
      type: 'input',
      name: 'catalogBase',
      message: 'Catalog path without the locale suffix (e.g. translations/app)',
      default: DEFAULT_ANSWERS.catalogBase,
    },
    {
      type: 'input',
      name: 'locales',
      message: 'Which locales do you translate into? (comma separated)',
      default: DEFAULT_ANSWERS.locales,
    },
    {
      type: 'input',
      name: 'defaultLocale',
      message: 'Which locale receives single-column imports?',
      default: (answers: InitAnswers) => parseGlobList(answers.locales)[0] ?? DEFAULT_LOCALE,
    },
  ]);
}

export function buildConfig(answers: InitAnswers): LinguamergeConfig {
  const config: LinguamergeConfig = {
    version: 1,
    repoPath: answers.repoPath.trim() || DEFAULT_REPO_PATH,
    commitRange: answers.commitRange.trim(),
    include: parseGlobList(answers.include),
    maxCommits: MAX_COMMITS,
    scopeStoplist: [...DEFAULT_SCOPE_STOPLIST],
    catalogBase: answers.catalogBase.trim() || DEFAULT_CATALOG_BASE,
    catalogExtension: DEFAULT_CATALOG_EXTENSION,
    locales: parseGlobList(answers.locales),
    defaultLocale: answers.defaultLocale.trim(),
  };

  try {
    assertConfigValid(normalizeConfig({ ...config }));
  } catch (error) {
    throw new CliError(error instanceof Error ? error.message : String(error));
  }
  return config;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function runInit(options: InitCommandOptions = {}, cwd = process.cwd()): Promise<string | undefined> {
  const configPath = path.join(cwd, DEFAULT_CONFIG_FILENAME);

  if ((await fileExists(configPath)) && !options.force) {
    console.log(chalk.yellow('Config file already exists. Use --force to overwrite it.'));
    console.log(chalk.dim(`  ${configPath}`));
    return undefined;
  }

  const answers = options.yes ? DEFAULT_ANSWERS : await promptAnswers();
  const config = buildConfig(answers);

  await fs.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`);
  console.log(chalk.green(`\nConfiguration created at ${configPath}`));
  return configPath;
}

export function registerInit(program: Command) {
  program
    .command('init')
    .description('Initialize linguamerge configuration')
    .option('-y, --yes', 'Skip prompts and use defaults (non-interactive mode)', false)
    .option('--force', 'Overwrite an existing config file', false)
    .action(
      withErrorHandling(async (commandOptions: InitCommandOptions) => {
        console.log(chalk.blue('Initializing linguamerge configuration...'));
        await runInit(commandOptions);
      })
    );
}
