/**
 * Default configuration values for transjson
 */

export const DEFAULT_CONFIG_FILENAME = 'transjson.config.json';
export const DEFAULT_OUTPUT_DIR = './translations';
export const DEFAULT_CACHE_DIR = '.transjson/cache';
export const DEFAULT_PROVIDER = 'google';

// ─────────────────────────────────────────────────────────────────────────────
// Scheduling Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_BATCH_SIZE = 25;
export const DEFAULT_SUPER_BATCH_SIZE = 100;
export const DEFAULT_CONCURRENCY = 2;
export const DEFAULT_INNER_CONCURRENCY = 4;

// ─────────────────────────────────────────────────────────────────────────────
// Provider Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 250;
