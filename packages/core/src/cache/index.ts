/**
 * Translation cache module
 *
 * Durable and in-memory stores for translated strings, plus statistics and
 * maintenance helpers for the CLI.
 */

export {
  FileTranslationCache,
  MemoryTranslationCache,
  TRANSLATION_CACHE_VERSION,
  toCacheKey,
  writeFileAtomic,
  type TranslationCache,
  type CacheRecord,
  type FileTranslationCacheLoadReport,
} from './translation-cache.js';

export {
  readTranslationCacheStats,
  clearTranslationCache,
  formatBytes,
  type TranslationCacheStats,
  type LanguagePairStats,
} from './cache-stats.js';
