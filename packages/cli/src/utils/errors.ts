import chalk from 'chalk';
import { ConfigurationError } from '@transjson/core';
import { TranslatorLoadError } from '@transjson/translation';
import { EXIT_CODES, setExitCode } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode: number = EXIT_CODES.ERROR) {
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
        setExitCode(error.exitCode);
        return undefined;
      }

      if (error instanceof ConfigurationError || error instanceof TranslatorLoadError) {
        console.error(chalk.red(error.message));
        setExitCode(EXIT_CODES.ERROR);
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      setExitCode(EXIT_CODES.ERROR);
      return undefined;
    }
  };
}
