/**
 * Output formatting and reporting utilities for the translate command
 */

import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { formatLeafPath } from '@transjson/core';
import type { TranslateCommandOptions, TranslateReport, TranslateTargetReport } from './types.js';

/**
 * Emit the translation output (report file, JSON, or console)
 */
export async function emitTranslateOutput(
  report: TranslateReport,
  options: TranslateCommandOptions,
  cwd: string
): Promise<void> {
  if (options.report) {
    const outputPath = path.resolve(cwd, options.report);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(report, null, 2));
    if (!options.json) {
      console.log(chalk.green(`Translate report written to ${outputPath}`));
    }
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  printSourceLanguage(report);
  printTargetSummary(report.targets);
  if (options.verbose) {
    printTargetDetails(report.targets);
  }

  if (report.totalFailures > 0) {
    console.log(
      chalk.yellow(
        `${report.totalFailures} string${report.totalFailures === 1 ? '' : 's'} kept the source text. Run again to retry${
          report.diff ? '' : ' (use --diff to retry only those)'
        }.`
      )
    );
  }
}

export function printSourceLanguage(report: TranslateReport): void {
  if (report.detectedSourceLanguage) {
    console.log(chalk.gray(`Detected source language: ${report.detectedSourceLanguage}`));
  }
}

export function describeTarget(target: TranslateTargetReport): string {
  const { summary } = target;
  if (target.identity) {
    return `${summary.totalLeaves} copied (same as source)`;
  }
  const parts = [
    `${summary.scheduled} translated`,
    `${summary.cacheHits} from cache`,
    `${summary.providerCalls} provider call${summary.providerCalls === 1 ? '' : 's'}`,
  ];
  if (summary.reused > 0) {
    parts.push(`${summary.reused} reused`);
  }
  if (summary.failures.length > 0) {
    parts.push(`${summary.failures.length} failed`);
  }
  return parts.join(', ');
}

/**
 * Print one line per target language
 */
export function printTargetSummary(targets: readonly TranslateTargetReport[]): void {
  console.log(chalk.blue('\nTranslation results:'));
  for (const target of targets) {
    const line = `  • ${target.name} (${target.language}): ${describeTarget(target)} → ${target.outputPath}`;
    console.log(target.summary.failures.length > 0 ? chalk.yellow(line) : line);
  }
}

/**
 * Print failures, warnings and diverged paths per target
 */
export function printTargetDetails(targets: readonly TranslateTargetReport[]): void {
  for (const target of targets) {
    const { failures, warnings, divergedPaths, runErrors } = target.summary;
    if (!failures.length && !warnings.length && !divergedPaths.length && !runErrors.length) {
      continue;
    }
    console.log(chalk.bold(`\n${target.name} (${target.language})`));
    for (const failure of failures) {
      console.log(chalk.red(`  ✗ ${formatLeafPath(failure.path)}: ${failure.message}`));
    }
    for (const warning of warnings) {
      console.log(chalk.yellow(`  ⚠ ${formatLeafPath(warning.path)}: ${warning.message}`));
    }
    for (const divergedPath of divergedPaths) {
      console.log(chalk.gray(`  ↺ ${divergedPath}: structure changed, retranslated`));
    }
    for (const runError of runErrors) {
      console.log(chalk.yellow(`  ⚠ ${runError}`));
    }
  }
}
