import path from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import {
  clearTranslationCache,
  formatBytes,
  loadConfigWithMeta,
  readTranslationCacheStats,
  type TranslationCacheStats,
} from '@transjson/core';
import { withErrorHandling } from '../utils/errors.js';
import type { CliContext } from './translate/types.js';

export interface CacheCommandOptions {
  config?: string;
  cacheDir?: string;
  json?: boolean;
}

/**
 * `--cache-dir` wins; otherwise the configured directory, relative to the
 * config file's directory.
 */
export async function resolveCacheDir(options: CacheCommandOptions, cwd: string): Promise<string> {
  if (options.cacheDir) {
    return path.resolve(cwd, options.cacheDir);
  }
  const { config, projectRoot } = await loadConfigWithMeta(options.config, { cwd, requireTargets: false });
  return path.resolve(projectRoot, config.cache.dir);
}

export function formatCacheStats(stats: TranslationCacheStats): string[] {
  if (!stats.exists) {
    return [`No translation cache at ${stats.cacheDir}`];
  }
  const lines = [
    `Cache directory: ${stats.cacheDir}`,
    `Entries: ${stats.entries} (${stats.snapshotEntries} in snapshot, ${stats.journalEntries} in journal)`,
    `Size on disk: ${formatBytes(stats.sizeBytes)}`,
  ];
  if (stats.discardedLines > 0) {
    lines.push(`Unreadable journal lines: ${stats.discardedLines}`);
  }
  for (const pair of stats.languagePairs) {
    lines.push(`  ${pair.sourceLanguage} → ${pair.targetLanguage}: ${pair.entries}`);
  }
  return lines;
}

/**
 * Registers cache maintenance commands (cache stats, cache clear)
 */
export function registerCache(program: Command, context: Pick<CliContext, 'cwd'>): void {
  const cache = program.command('cache').description('Inspect or clear the translation cache');

  cache
    .command('stats')
    .description('Show translation cache statistics')
    .option('-c, --config <path>', 'Path to transjson config file')
    .option('--cache-dir <dir>', 'Translation cache directory')
    .option('--json', 'Print statistics as JSON', false)
    .action(
      withErrorHandling(async (options: CacheCommandOptions) => {
        const cacheDir = await resolveCacheDir(options, context.cwd());
        const stats = await readTranslationCacheStats(cacheDir);
        if (options.json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }
        const [heading, ...rest] = formatCacheStats(stats);
        console.log(chalk.blue(heading));
        for (const line of rest) {
          console.log(line);
        }
      })
    );

  cache
    .command('clear')
    .description('Delete every cached translation')
    .option('-c, --config <path>', 'Path to transjson config file')
    .option('--cache-dir <dir>', 'Translation cache directory')
    .action(
      withErrorHandling(async (options: CacheCommandOptions) => {
        const cacheDir = await resolveCacheDir(options, context.cwd());
        const removed = await clearTranslationCache(cacheDir);
        console.log(chalk.green(`Removed ${removed} cached translation${removed === 1 ? '' : 's'} from ${cacheDir}`));
      })
    );
}
