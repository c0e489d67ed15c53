/**
 * Persistent (sourceLanguage, targetLanguage, text) → translation store.
 *
 * Reads are served from an in-memory index. Writes are appended to a
 * write-ahead journal through one serialized chain, and `compact()` folds the
 * journal into a snapshot written via temp file + rename.
 */

import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';

export interface TranslationCache {
  get(sourceLanguage: string, targetLanguage: string, text: string): Promise<string | undefined>;
  put(sourceLanguage: string, targetLanguage: string, text: string, translated: string): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export const TRANSLATION_CACHE_VERSION = 1;
export const SNAPSHOT_FILENAME = 'snapshot.json';
export const JOURNAL_FILENAME = 'journal.jsonl';

/** `[sourceLanguage, targetLanguage, text, translated]` */
export type CacheRecord = [string, string, string, string];

export interface CacheSnapshotFile {
  version: number;
  entries: CacheRecord[];
}

export function toCacheKey(sourceLanguage: string, targetLanguage: string, text: string): string {
  return JSON.stringify([sourceLanguage, targetLanguage, text]);
}

export function isCacheRecord(value: unknown): value is CacheRecord {
  return Array.isArray(value) && value.length === 4 && value.every((part) => typeof part === 'string');
}

export class MemoryTranslationCache implements TranslationCache {
  private readonly entries = new Map<string, string>();

  constructor(seed: readonly CacheRecord[] = []) {
    for (const [sourceLanguage, targetLanguage, text, translated] of seed) {
      this.entries.set(toCacheKey(sourceLanguage, targetLanguage, text), translated);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  async get(sourceLanguage: string, targetLanguage: string, text: string): Promise<string | undefined> {
    return this.entries.get(toCacheKey(sourceLanguage, targetLanguage, text));
  }

  async put(sourceLanguage: string, targetLanguage: string, text: string, translated: string): Promise<void> {
    const key = toCacheKey(sourceLanguage, targetLanguage, text);
    if (!this.entries.has(key)) {
      this.entries.set(key, translated);
    }
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {}
}

export interface FileTranslationCacheLoadReport {
  snapshotEntries: number;
  journalEntries: number;
  /** Journal lines that could not be parsed (a torn final write, usually). */
  discardedLines: number;
}

export class FileTranslationCache implements TranslationCache {
  private readonly entries = new Map<string, string>();
  private writeChain: Promise<void> = Promise.resolve();
  private pendingJournalEntries = 0;
  private closed = false;
  private loadReport: FileTranslationCacheLoadReport = { snapshotEntries: 0, journalEntries: 0, discardedLines: 0 };

  private constructor(private readonly cacheDir: string) {}

  static async open(cacheDir: string): Promise<FileTranslationCache> {
    const cache = new FileTranslationCache(cacheDir);
    await fs.mkdir(cacheDir, { recursive: true });
    await cache.load();
    return cache;
  }

  get directory(): string {
    return this.cacheDir;
  }

  get size(): number {
    return this.entries.size;
  }

  get report(): FileTranslationCacheLoadReport {
    return { ...this.loadReport };
  }

  async get(sourceLanguage: string, targetLanguage: string, text: string): Promise<string | undefined> {
    return this.entries.get(toCacheKey(sourceLanguage, targetLanguage, text));
  }

  async put(sourceLanguage: string, targetLanguage: string, text: string, translated: string): Promise<void> {
    if (this.closed) {
      throw new Error(`Translation cache at ${this.cacheDir} is closed.`);
    }

    const key = toCacheKey(sourceLanguage, targetLanguage, text);
    if (this.entries.has(key)) {
      return;
    }
    this.entries.set(key, translated);

    const record: CacheRecord = [sourceLanguage, targetLanguage, text, translated];
    const line = `${JSON.stringify(record)}\n`;
    await this.enqueue(async () => {
      await fs.appendFile(this.journalPath, line, 'utf8');
      this.pendingJournalEntries += 1;
    });
  }

  /**
   * Resolves once every write queued so far has reached the journal.
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  async compact(): Promise<void> {
    await this.enqueue(async () => {
      const payload: CacheSnapshotFile = {
        version: TRANSLATION_CACHE_VERSION,
        entries: Array.from(this.entries, ([key, translated]) => [...parseCacheKey(key), translated]),
      };
      await writeFileAtomic(this.snapshotPath, JSON.stringify(payload));
      await fs.writeFile(this.journalPath, '', 'utf8');
      this.pendingJournalEntries = 0;
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    await this.flush();
    if (this.pendingJournalEntries > 0 || this.loadReport.discardedLines > 0) {
      await this.compact();
    }
    this.closed = true;
  }

  private get snapshotPath(): string {
    return path.join(this.cacheDir, SNAPSHOT_FILENAME);
  }

  private get journalPath(): string {
    return path.join(this.cacheDir, JOURNAL_FILENAME);
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(task);
    // Keep the chain alive for later writers; the caller still receives `next`.
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async load(): Promise<void> {
    const snapshot = await readSnapshot(this.snapshotPath);
    for (const [sourceLanguage, targetLanguage, text, translated] of snapshot) {
      this.entries.set(toCacheKey(sourceLanguage, targetLanguage, text), translated);
    }

    const journal = await readJournal(this.journalPath);
    for (const [sourceLanguage, targetLanguage, text, translated] of journal.records) {
      const key = toCacheKey(sourceLanguage, targetLanguage, text);
      if (!this.entries.has(key)) {
        this.entries.set(key, translated);
      }
    }

    this.pendingJournalEntries = journal.records.length;
    this.loadReport = {
      snapshotEntries: snapshot.length,
      journalEntries: journal.records.length,
      discardedLines: journal.discarded,
    };
  }
}

function parseCacheKey(key: string): [string, string, string] {
  const parsed: unknown = JSON.parse(key);
  if (Array.isArray(parsed) && parsed.length === 3 && parsed.every((part) => typeof part === 'string')) {
    return [parsed[0], parsed[1], parsed[2]];
  }
  throw new Error(`Malformed translation cache key: ${key}`);
}

export async function readSnapshot(snapshotPath: string): Promise<CacheRecord[]> {
  let raw: string;
  try {
    raw = await fs.readFile(snapshotPath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object' || !('version' in parsed) || !('entries' in parsed)) {
      return [];
    }
    if (parsed.version !== TRANSLATION_CACHE_VERSION || !Array.isArray(parsed.entries)) {
      return [];
    }
    return parsed.entries.filter(isCacheRecord);
  } catch {
    return [];
  }
}

export async function readJournal(journalPath: string): Promise<{ records: CacheRecord[]; discarded: number }> {
  let raw: string;
  try {
    raw = await fs.readFile(journalPath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return { records: [], discarded: 0 };
    }
    throw error;
  }

  const records: CacheRecord[] = [];
  let discarded = 0;
  for (const line of raw.split('\n')) {
    if (!line.trim()) {
      continue;
    }
    try {
      const parsed: unknown = JSON.parse(line);
      if (isCacheRecord(parsed)) {
        records.push(parsed);
      } else {
        discarded += 1;
      }
    } catch {
      discarded += 1;
    }
  }
  return { records, discarded };
}

export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${crypto.randomBytes(6).toString('hex')}.tmp`;
  await fs.writeFile(tempPath, contents, 'utf8');

  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'EEXIST' || err.code === 'EPERM') {
      await fs.rm(filePath, { force: true });
      await fs.rename(tempPath, filePath);
    } else {
      throw error;
    }
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}
