/**
 * Translate command - translate a JSON document into one or more languages
 */

import type { Command } from 'commander';
import { loadTranslatorFactory } from '@transjson/translation';
import { withErrorHandling } from '../../utils/errors.js';
import { EXIT_CODES, setExitCode } from '../../utils/exit-codes.js';
import type { CliContext, TranslateCommandOptions } from './types.js';
import { executeTranslate } from './executor.js';
import { emitTranslateOutput } from './reporter.js';

export * from './types.js';

export const defaultCliContext: CliContext = {
  cwd: () => process.cwd(),
  loadTranslatorFactory,
};

/**
 * Parse comma-separated language values
 */
export function collectLanguages(value: string | string[], previous: string[] = []): string[] {
  const tokens = (Array.isArray(value) ? value : value.split(','))
    .map((entry) => entry.trim())
    .filter(Boolean);
  return [...previous, ...tokens];
}

export async function runTranslate(
  input: string,
  options: TranslateCommandOptions,
  context: CliContext = defaultCliContext
): Promise<void> {
  const report = await executeTranslate({ input, options, context });
  await emitTranslateOutput(report, options, context.cwd());
  if (options.strict && report.totalFailures > 0) {
    setExitCode(EXIT_CODES.PARTIAL_FAILURE);
  }
}

/**
 * Register the translate command
 */
export function registerTranslate(program: Command, context: CliContext = defaultCliContext): void {
  program
    .command('translate')
    .description('Translate the string leaves of a JSON document into one or more languages')
    .argument('<input>', 'Source JSON document')
    .option('-s, --source <code>', 'Source language code (detected when omitted)')
    .option('-t, --target <codes...>', 'Target language codes (comma or space separated)', collectLanguages)
    .option('-o, --output <dir>', 'Directory for translated documents')
    .option('-c, --config <path>', 'Path to transjson config file')
    .option('--provider <name>', 'Translation provider name or module path')
    .option('--batch-size <n>', 'Strings per batch')
    .option('--super-batch-size <n>', 'Strings per super-batch')
    .option('--concurrency <n>', 'Super-batches in flight at once')
    .option('--inner-concurrency <n>', 'Batches in flight within a super-batch')
    .option('--no-cache', 'Ignore cached translations (new results are still cached)')
    .option('--cache-dir <dir>', 'Translation cache directory')
    .option('--diff', 'Only translate strings that changed since the previous run', false)
    .option('--glossary <path>', 'JSON file with glossary rules')
    .option('--json', 'Print the report as JSON', false)
    .option('--report <path>', 'Write the JSON report to a file')
    .option('--strict', 'Exit with code 2 when any string kept its source text', false)
    .option('-v, --verbose', 'Print progress, warnings and failures', false)
    .action(
      withErrorHandling(async (input: string, options: TranslateCommandOptions) => {
        await runTranslate(input, options, context);
      })
    );
}
