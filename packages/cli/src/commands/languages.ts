import type { Command } from 'commander';
import chalk from 'chalk';
import { listLanguagesByName } from '@transjson/core';
import { withErrorHandling } from '../utils/errors.js';

export function formatLanguageTable(): string[] {
  const languages = listLanguagesByName();
  const width = Math.max(...languages.map((language) => language.code.length));
  return languages.map((language) => `  ${language.code.padEnd(width)}  ${language.name}`);
}

/**
 * Registers the languages command
 */
export function registerLanguages(program: Command): void {
  program
    .command('languages')
    .description('List the supported language codes')
    .option('--json', 'Print the list as JSON', false)
    .action(
      withErrorHandling((options: { json?: boolean }) => {
        if (options.json) {
          console.log(JSON.stringify(listLanguagesByName(), null, 2));
          return;
        }
        console.log(chalk.blue('Supported languages:\n'));
        for (const line of formatLanguageTable()) {
          console.log(line);
        }
      })
    );
}
