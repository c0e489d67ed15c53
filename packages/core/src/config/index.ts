/**
 * Configuration module for transjson
 *
 * This module handles loading, parsing, and normalizing configuration files.
 */

export type {
  TranslationConfig,
  BatchingConfig,
  CacheConfig,
  TransjsonConfig,
  LoadConfigResult,
} from './types.js';

export {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_CACHE_DIR,
  DEFAULT_PROVIDER,
  DEFAULT_BATCH_SIZE,
  DEFAULT_SUPER_BATCH_SIZE,
  DEFAULT_CONCURRENCY,
  DEFAULT_INNER_CONCURRENCY,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
} from './defaults.js';

export {
  isRecord,
  ensureStringArray,
  normalizeOptionalString,
  normalizeNumber,
  normalizeBoolean,
  normalizeLanguage,
  normalizeLanguageList,
  normalizePlaceholderGrammars,
  normalizeBatchingConfig,
  normalizeCacheConfig,
  normalizeTranslationConfig,
  normalizeConfig,
} from './normalizer.js';

export {
  validateConfig,
  assertConfigValid,
  validatePositiveInteger,
  validateNonNegativeInteger,
  validateLanguage,
  validateTargetLanguages,
  type ValidateConfigOptions,
} from './validator.js';

export { loadConfigWithMeta, mergeConfigInput, findUp, type LoadConfigOptions } from './loader.js';
