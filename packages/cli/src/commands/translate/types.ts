/**
 * Type definitions for the translate command
 */

import type { TranslationSummary } from '@transjson/core';
import type { TranslatorFactory, TranslatorLoadOptions } from '@transjson/translation';

export interface TranslateCommandOptions {
  source?: string;
  target?: string[];
  output?: string;
  config?: string;
  provider?: string;
  batchSize?: string;
  superBatchSize?: string;
  concurrency?: string;
  innerConcurrency?: string;
  /** `--no-cache` sets this to false. */
  cache?: boolean;
  cacheDir?: string;
  diff?: boolean;
  glossary?: string;
  json?: boolean;
  report?: string;
  strict?: boolean;
  verbose?: boolean;
}

export interface CliContext {
  cwd: () => string;
  loadTranslatorFactory: (options: TranslatorLoadOptions) => Promise<TranslatorFactory>;
}

export interface TranslateTargetReport {
  language: string;
  name: string;
  outputPath: string;
  identity: boolean;
  summary: TranslationSummary;
}

export interface TranslateReport {
  input: string;
  outputDir: string;
  provider: string;
  sourceLanguage: string;
  detectedSourceLanguage?: string;
  cacheDir: string;
  cacheEnabled: boolean;
  diff: boolean;
  targets: TranslateTargetReport[];
  totalFailures: number;
}
