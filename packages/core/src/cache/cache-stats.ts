/**
 * Cache statistics and maintenance
 *
 * Reads a translation cache directory without opening it for writing, and
 * removes it on request.
 */

import fs from 'fs/promises';
import path from 'path';
import {
  JOURNAL_FILENAME,
  SNAPSHOT_FILENAME,
  readJournal,
  readSnapshot,
  toCacheKey,
} from './translation-cache.js';

export interface LanguagePairStats {
  sourceLanguage: string;
  targetLanguage: string;
  entries: number;
}

export interface TranslationCacheStats {
  cacheDir: string;
  exists: boolean;
  /** Distinct entries after replaying snapshot and journal. */
  entries: number;
  snapshotEntries: number;
  journalEntries: number;
  discardedLines: number;
  sizeBytes: number;
  languagePairs: LanguagePairStats[];
}

async function fileSize(filePath: string): Promise<number> {
  try {
    const stat = await fs.stat(filePath);
    return stat.size;
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return 0;
    }
    throw error;
  }
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dir);
    return stat.isDirectory();
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export async function readTranslationCacheStats(cacheDir: string): Promise<TranslationCacheStats> {
  const exists = await directoryExists(cacheDir);
  if (!exists) {
    return {
      cacheDir,
      exists,
      entries: 0,
      snapshotEntries: 0,
      journalEntries: 0,
      discardedLines: 0,
      sizeBytes: 0,
      languagePairs: [],
    };
  }

  const snapshotPath = path.join(cacheDir, SNAPSHOT_FILENAME);
  const journalPath = path.join(cacheDir, JOURNAL_FILENAME);
  const snapshot = await readSnapshot(snapshotPath);
  const journal = await readJournal(journalPath);

  const seen = new Set<string>();
  const pairs = new Map<string, LanguagePairStats>();
  for (const [sourceLanguage, targetLanguage, text] of [...snapshot, ...journal.records]) {
    const key = toCacheKey(sourceLanguage, targetLanguage, text);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    const pairKey = `${sourceLanguage}\u0000${targetLanguage}`;
    const pair = pairs.get(pairKey) ?? { sourceLanguage, targetLanguage, entries: 0 };
    pair.entries += 1;
    pairs.set(pairKey, pair);
  }

  return {
    cacheDir,
    exists,
    entries: seen.size,
    snapshotEntries: snapshot.length,
    journalEntries: journal.records.length,
    discardedLines: journal.discarded,
    sizeBytes: (await fileSize(snapshotPath)) + (await fileSize(journalPath)),
    languagePairs: Array.from(pairs.values()).sort(
      (a, b) => a.sourceLanguage.localeCompare(b.sourceLanguage) || a.targetLanguage.localeCompare(b.targetLanguage)
    ),
  };
}

/**
 * Remove the cache files. Returns the number of entries that were stored.
 */
export async function clearTranslationCache(cacheDir: string): Promise<number> {
  const stats = await readTranslationCacheStats(cacheDir);
  if (!stats.exists) {
    return 0;
  }
  await fs.rm(path.join(cacheDir, SNAPSHOT_FILENAME), { force: true });
  await fs.rm(path.join(cacheDir, JOURNAL_FILENAME), { force: true });
  return stats.entries;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
