import { Command } from 'commander';
import { registerTranslate, defaultCliContext, type CliContext } from './commands/translate/index.js';
import { registerLanguages } from './commands/languages.js';
import { registerCache } from './commands/cache.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(overrides: Partial<CliContext> = {}): Command {
  const context: CliContext = { ...defaultCliContext, ...overrides };
  const program = new Command();

  program
    .name('transjson')
    .description('Translate the strings of JSON documents through pluggable providers')
    .version(CLI_VERSION);

  registerTranslate(program, context);
  registerLanguages(program);
  registerCache(program, context);

  return program;
}
