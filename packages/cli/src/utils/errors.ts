import chalk from 'chalk';
import { LinguamergeError } from '@linguamerge/core';
import { GENERAL_EXIT_CODES } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode: number = GENERAL_EXIT_CODES.ERROR) {
    super(message);
    this.name = 'CliError';
  }
}

type MaybePromise<T> = T | Promise<T>;

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<R | undefined> {
  return async (...args: A): Promise<R | undefined> => {
    try {
      return await action(...args);
    } catch (error) {
      if (error instanceof CliError) {
        console.error(chalk.red(error.message));
        process.exitCode = error.exitCode;
        return undefined;
      }

      // Known failures (missing catalog, bad range, write errors) need no stack.
      if (error instanceof LinguamergeError) {
        console.error(chalk.red(error.message));
        process.exitCode = GENERAL_EXIT_CODES.ERROR;
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      process.exitCode = GENERAL_EXIT_CODES.ERROR;
      return undefined;
    }
  };
}
