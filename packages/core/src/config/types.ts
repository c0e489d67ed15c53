/**
 * Configuration type definitions for transjson
 */

import type { GlossaryRule } from '../glossary.js';
import type { PlaceholderGrammar } from '../placeholders.js';

// ─────────────────────────────────────────────────────────────────────────────
// Provider Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface TranslationConfig {
  /** Built-in provider name (`google`, `mock`) or a module path. */
  provider: string;
  /** Explicit module specifier; wins over `provider` when set. */
  module?: string;
  apiKey?: string;
  /** Environment variable holding the provider secret. */
  secretEnvVar?: string;
  timeoutMs?: number;
  retries: number;
  retryDelayMs: number;
  /** Passed to the provider factory untouched. */
  options?: Record<string, unknown>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Scheduling Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface BatchingConfig {
  /** Leaves per batch handled by one worker. */
  batchSize: number;
  /** Leaves per super-batch. */
  superBatchSize: number;
  /** Super-batches in flight at once. */
  concurrency: number;
  /** Workers per super-batch. */
  innerConcurrency: number;
}

export interface CacheConfig {
  enabled: boolean;
  dir: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface TransjsonConfig {
  /** Omitted means detect from the document. */
  sourceLanguage?: string;
  targetLanguages: string[];
  outputDir: string;
  batching: BatchingConfig;
  cache: CacheConfig;
  translation: TranslationConfig;
  /** Inline glossary rules, applied before rules from `glossaryFile`. */
  glossary: GlossaryRule[];
  glossaryFile?: string;
  placeholderGrammars: PlaceholderGrammar[];
  /** Only translate leaves that changed since the previous run. */
  diff: boolean;
}

export interface LoadConfigResult {
  config: TransjsonConfig;
  /** Absent when no config file was found and defaults were used. */
  configPath?: string;
  /** Directory that relative paths in the config resolve against. */
  projectRoot: string;
}
