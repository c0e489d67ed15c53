import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../errors.js';
import { loadConfigWithMeta, mergeConfigInput } from './loader.js';
import { normalizeConfig } from './normalizer.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'transjson-config-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('loadConfigWithMeta', () => {
  it('falls back to defaults when no config file exists', async () => {
    const result = await loadConfigWithMeta(undefined, { cwd: tmpDir });

    expect(result.configPath).toBeUndefined();
    expect(result.projectRoot).toBe(path.resolve(tmpDir));
    expect(result.config.outputDir).toBe('./translations');
    expect(result.config.batching).toEqual({ batchSize: 25, superBatchSize: 100, concurrency: 2, innerConcurrency: 4 });
    expect(result.config.cache).toEqual({ enabled: true, dir: '.transjson/cache' });
    expect(result.config.translation).toEqual({ provider: 'google', retries: 2, retryDelayMs: 250 });
    expect(result.config.sourceLanguage).toBeUndefined();
  });

  it('finds the config file in a parent directory', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'transjson.config.json'),
      JSON.stringify({ sourceLanguage: 'EN', targetLanguages: ['zh-cn', 'es'], batching: { batchSize: 10 } })
    );
    const nested = path.join(tmpDir, 'packages', 'web');
    await fs.mkdir(nested, { recursive: true });

    const result = await loadConfigWithMeta(undefined, { cwd: nested });

    expect(result.configPath).toBe(path.join(tmpDir, 'transjson.config.json'));
    expect(result.projectRoot).toBe(tmpDir);
    expect(result.config.sourceLanguage).toBe('en');
    expect(result.config.targetLanguages).toEqual(['zh-CN', 'es']);
    expect(result.config.batching.batchSize).toBe(10);
  });

  it('layers overrides over file values', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'transjson.config.json'),
      JSON.stringify({ targetLanguages: ['es'], batching: { batchSize: 10, concurrency: 3 } })
    );

    const result = await loadConfigWithMeta(undefined, {
      cwd: tmpDir,
      overrides: { targetLanguages: ['fr'], batching: { batchSize: 5, concurrency: undefined } },
    });

    expect(result.config.targetLanguages).toEqual(['fr']);
    expect(result.config.batching.batchSize).toBe(5);
    expect(result.config.batching.concurrency).toBe(3);
  });

  it('rejects a missing explicit config path', async () => {
    await expect(loadConfigWithMeta('missing.json', { cwd: tmpDir })).rejects.toThrow(/Config file not found/);
  });

  it('rejects invalid JSON', async () => {
    await fs.writeFile(path.join(tmpDir, 'transjson.config.json'), '{ "targetLanguages": [');
    await expect(loadConfigWithMeta(undefined, { cwd: tmpDir })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects invalid values', async () => {
    await fs.writeFile(path.join(tmpDir, 'transjson.config.json'), JSON.stringify({ batching: { batchSize: 0 } }));
    await expect(loadConfigWithMeta(undefined, { cwd: tmpDir })).rejects.toThrow(/batching\.batchSize/);
  });
});

describe('mergeConfigInput', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(mergeConfigInput({ a: { b: 1, c: 2 }, list: [1, 2] }, { a: { c: 3 }, list: [9] })).toEqual({
      a: { b: 1, c: 3 },
      list: [9],
    });
  });
});

describe('normalizeConfig', () => {
  it('treats "auto" as an absent source language', () => {
    expect(normalizeConfig({ sourceLanguage: 'auto' }).sourceLanguage).toBeUndefined();
  });

  it('reads glossary rules and placeholder grammars', () => {
    const config = normalizeConfig({
      glossary: { car: 'auto' },
      placeholderGrammars: ['doubleBrace', 'bogus', 'percent'],
    });
    expect(config.glossary).toEqual([{ source: 'car', target: 'auto' }]);
    expect(config.placeholderGrammars).toEqual(['doubleBrace', 'percent']);
  });

  it('parses numeric strings from the command line', () => {
    expect(normalizeConfig({ batching: { batchSize: '8' } }).batching.batchSize).toBe(8);
  });
});
