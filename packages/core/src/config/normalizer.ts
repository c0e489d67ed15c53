/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary. Out-of-range numbers are kept as given
 * so the validator can report them.
 */

import { normalizeGlossaryRules } from '../glossary.js';
import { ALL_PLACEHOLDER_GRAMMARS, isPlaceholderGrammar, type PlaceholderGrammar } from '../placeholders.js';
import { resolveLanguageCode } from '../languages.js';
import type { BatchingConfig, CacheConfig, TransjsonConfig, TranslationConfig } from './types.js';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CACHE_DIR,
  DEFAULT_CONCURRENCY,
  DEFAULT_INNER_CONCURRENCY,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PROVIDER,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_SUPER_BATCH_SIZE,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
      .map((item) => item.trim());
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function normalizeOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

/**
 * Numbers pass through untouched; numeric strings (CLI flags) are parsed.
 * Anything else falls back to the default.
 */
export function normalizeNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length) {
    return Number(value.trim());
  }
  return fallback;
}

export function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Canonical spelling for supported codes; unknown codes are kept for the
 * validator to report.
 */
export function normalizeLanguage(value: unknown): string | undefined {
  const raw = normalizeOptionalString(value);
  if (!raw || raw.toLowerCase() === 'auto') {
    return undefined;
  }
  return resolveLanguageCode(raw) ?? raw;
}

export function normalizeLanguageList(value: unknown): string[] {
  const languages = ensureStringArray(value).map((code) => resolveLanguageCode(code) ?? code);
  return Array.from(new Set(languages));
}

export function normalizePlaceholderGrammars(value: unknown): PlaceholderGrammar[] {
  if (value === undefined) {
    return [...ALL_PLACEHOLDER_GRAMMARS];
  }
  return ensureStringArray(value).filter(isPlaceholderGrammar);
}

// ─────────────────────────────────────────────────────────────────────────────
// Section Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeBatchingConfig(input: unknown): BatchingConfig {
  const raw = isRecord(input) ? input : {};
  return {
    batchSize: normalizeNumber(raw.batchSize, DEFAULT_BATCH_SIZE),
    superBatchSize: normalizeNumber(raw.superBatchSize, DEFAULT_SUPER_BATCH_SIZE),
    concurrency: normalizeNumber(raw.concurrency, DEFAULT_CONCURRENCY),
    innerConcurrency: normalizeNumber(raw.innerConcurrency, DEFAULT_INNER_CONCURRENCY),
  };
}

export function normalizeCacheConfig(input: unknown): CacheConfig {
  const raw = isRecord(input) ? input : {};
  return {
    enabled: normalizeBoolean(raw.enabled, true),
    dir: normalizeOptionalString(raw.dir) ?? DEFAULT_CACHE_DIR,
  };
}

export function normalizeTranslationConfig(input: unknown): TranslationConfig {
  const raw = isRecord(input) ? input : {};
  const translationConfig: TranslationConfig = {
    provider: normalizeOptionalString(raw.provider) ?? DEFAULT_PROVIDER,
    retries: normalizeNumber(raw.retries, DEFAULT_RETRIES),
    retryDelayMs: normalizeNumber(raw.retryDelayMs, DEFAULT_RETRY_DELAY_MS),
  };

  const moduleSpecifier = normalizeOptionalString(raw.module);
  if (moduleSpecifier) {
    translationConfig.module = moduleSpecifier;
  }

  const apiKey = normalizeOptionalString(raw.apiKey);
  if (apiKey) {
    translationConfig.apiKey = apiKey;
  }

  const secretEnvVar = normalizeOptionalString(raw.secretEnvVar);
  if (secretEnvVar) {
    translationConfig.secretEnvVar = secretEnvVar;
  }

  if (raw.timeoutMs !== undefined) {
    translationConfig.timeoutMs = normalizeNumber(raw.timeoutMs, 0);
  }

  if (isRecord(raw.options)) {
    translationConfig.options = raw.options;
  }

  return translationConfig;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Config Normalizer
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeConfig(input: unknown): TransjsonConfig {
  const raw = isRecord(input) ? input : {};

  const config: TransjsonConfig = {
    targetLanguages: normalizeLanguageList(raw.targetLanguages),
    outputDir: normalizeOptionalString(raw.outputDir) ?? DEFAULT_OUTPUT_DIR,
    batching: normalizeBatchingConfig(raw.batching),
    cache: normalizeCacheConfig(raw.cache),
    translation: normalizeTranslationConfig(raw.translation),
    glossary: normalizeGlossaryRules(raw.glossary),
    placeholderGrammars: normalizePlaceholderGrammars(raw.placeholderGrammars),
    diff: normalizeBoolean(raw.diff, false),
  };

  const sourceLanguage = normalizeLanguage(raw.sourceLanguage);
  if (sourceLanguage) {
    config.sourceLanguage = sourceLanguage;
  }

  const glossaryFile = normalizeOptionalString(raw.glossaryFile);
  if (glossaryFile) {
    config.glossaryFile = glossaryFile;
  }

  return config;
}
