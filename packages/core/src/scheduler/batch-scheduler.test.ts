import { describe, expect, it, vi } from 'vitest';
import { ProviderError, type Translator } from '@transjson/translation';
import { MemoryTranslationCache, type TranslationCache } from '../cache/translation-cache.js';
import { chunk, effectiveConcurrency, runScheduler, type SchedulerOptions } from './batch-scheduler.js';

function createFakeTranslator(overrides: Partial<Translator> = {}): Translator {
  return {
    name: 'fake',
    translate: vi.fn(async (text: string, _source: string, target: string) => `${target}:${text}`),
    detectLanguage: vi.fn(async () => 'en'),
    ...overrides,
  };
}

function baseOptions(overrides: Partial<SchedulerOptions> = {}): SchedulerOptions {
  return {
    sourceLanguage: 'en',
    targetLanguage: 'es',
    translatorFactory: () => createFakeTranslator(),
    cache: new MemoryTranslationCache(),
    batchSize: 2,
    superBatchSize: 4,
    outerConcurrency: 2,
    innerConcurrency: 2,
    retries: 0,
    retryDelayMs: 0,
    ...overrides,
  };
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('chunk', () => {
  it('splits into consecutive slices with a shorter tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });
});

describe('effectiveConcurrency', () => {
  it('is bounded by the number of super-batches', () => {
    expect(effectiveConcurrency(250, 100, 2, 4)).toBe(8);
    expect(effectiveConcurrency(50, 100, 2, 4)).toBe(4);
    expect(effectiveConcurrency(0, 100, 2, 4)).toBe(0);
  });
});

describe('runScheduler', () => {
  const configurations: Array<[number, number, number, number]> = [
    [1, 1, 1, 1],
    [4, 2, 2, 2],
    [10, 3, 3, 4],
    [100, 25, 2, 4],
    [3, 5, 1, 8],
  ];

  it.each(configurations)(
    'preserves input order with S=%i B=%i outer=%i inner=%i',
    async (superBatchSize, batchSize, outerConcurrency, innerConcurrency) => {
      const texts = Array.from({ length: 23 }, (_, index) => `item ${index}`);
      const factory = () =>
        createFakeTranslator({
          translate: async (text: string) => {
            const n = Number(text.split(' ')[1]);
            await sleep((n * 7) % 5);
            return `T(${text})`;
          },
        });

      const result = await runScheduler(
        texts,
        baseOptions({ translatorFactory: factory, superBatchSize, batchSize, outerConcurrency, innerConcurrency })
      );

      expect(result.outcomes.map((outcome) => outcome.text)).toEqual(texts.map((text) => `T(${text})`));
      expect(result.providerCalls).toBe(23);
      expect(result.failures).toEqual([]);
    }
  );

  it('serves repeated texts from the cache with a single provider call', async () => {
    const cache = new MemoryTranslationCache([['en', 'es', 'Hello', 'Hola']]);
    const translate = vi.fn(async () => 'Mundo');

    const result = await runScheduler(
      ['Hello', 'Hello', 'World'],
      baseOptions({ cache, translatorFactory: () => createFakeTranslator({ translate }) })
    );

    expect(translate).toHaveBeenCalledTimes(1);
    expect(translate).toHaveBeenCalledWith('World', 'en', 'es');
    expect(result.cacheHits).toBe(2);
    expect(result.providerCalls).toBe(1);
    expect(result.outcomes).toEqual([
      { status: 'cached', text: 'Hola' },
      { status: 'cached', text: 'Hola' },
      { status: 'translated', text: 'Mundo' },
    ]);
    expect(await cache.get('en', 'es', 'World')).toBe('Mundo');
  });

  it('joins an in-flight call for an identical text', async () => {
    const translate = vi.fn(async (text: string) => {
      await sleep(5);
      return `es:${text}`;
    });

    const result = await runScheduler(
      ['Save', 'Save'],
      baseOptions({
        batchSize: 1,
        superBatchSize: 2,
        innerConcurrency: 2,
        translatorFactory: () => createFakeTranslator({ translate }),
      })
    );

    expect(translate).toHaveBeenCalledTimes(1);
    expect(result.deduplicated).toBe(1);
    expect(result.cacheHits).toBe(0);
    expect(result.outcomes).toEqual([
      { status: 'translated', text: 'es:Save' },
      { status: 'deduplicated', text: 'es:Save' },
    ]);
  });

  it('skips cache reads but still writes when reads are disabled', async () => {
    const cache = new MemoryTranslationCache([['en', 'es', 'Hello', 'Hola vieja']]);
    const put = vi.spyOn(cache, 'put');

    const result = await runScheduler(['Hello', 'Bye'], baseOptions({ cache, cacheReads: false }));

    expect(result.cacheHits).toBe(0);
    expect(result.providerCalls).toBe(2);
    expect(result.outcomes.map((outcome) => outcome.text)).toEqual(['es:Hello', 'es:Bye']);
    expect(put).toHaveBeenCalledWith('en', 'es', 'Bye', 'es:Bye');
  });

  it('falls back to the original text after retries are exhausted', async () => {
    const translate = vi.fn(async (text: string) => {
      if (text === 'Broken') {
        throw new ProviderError('Service unavailable', { provider: 'fake', status: 503 });
      }
      return `es:${text}`;
    });
    const onRetry = vi.fn();

    const result = await runScheduler(
      ['Fine', 'Broken', 'Also fine'],
      baseOptions({ retries: 2, translatorFactory: () => createFakeTranslator({ translate }), onRetry })
    );

    expect(result.outcomes).toEqual([
      { status: 'translated', text: 'es:Fine' },
      { status: 'failed', text: 'Broken', error: 'Service unavailable' },
      { status: 'translated', text: 'es:Also fine' },
    ]);
    expect(result.failures).toEqual([{ index: 1, message: 'Service unavailable' }]);
    expect(translate.mock.calls.filter(([text]) => text === 'Broken')).toHaveLength(3);
    expect(onRetry).toHaveBeenCalledTimes(3);
  });

  it('does not retry non-retryable provider errors', async () => {
    const translate = vi.fn(async () => {
      throw new ProviderError('Invalid API key', { provider: 'fake', status: 403, retryable: false });
    });

    const result = await runScheduler(
      ['Hello'],
      baseOptions({ retries: 3, translatorFactory: () => createFakeTranslator({ translate }) })
    );

    expect(translate).toHaveBeenCalledTimes(1);
    expect(result.failures).toEqual([{ index: 0, message: 'Invalid API key' }]);
  });

  it('treats an empty translation as a failure', async () => {
    const result = await runScheduler(
      ['Hello'],
      baseOptions({ translatorFactory: () => createFakeTranslator({ translate: async () => '  ' }) })
    );

    expect(result.outcomes[0]).toEqual({
      status: 'failed',
      text: 'Hello',
      error: 'fake returned an empty translation.',
    });
  });

  it('builds one translator per worker and disposes each', async () => {
    const dispose = vi.fn();
    const factory = vi.fn(() => createFakeTranslator({ dispose }));

    await runScheduler(
      Array.from({ length: 40 }, (_, index) => `t${index}`),
      baseOptions({ superBatchSize: 10, batchSize: 2, outerConcurrency: 2, innerConcurrency: 3, translatorFactory: factory })
    );

    // 4 super-batches, each with min(3, 5) workers
    expect(factory).toHaveBeenCalledTimes(12);
    expect(dispose).toHaveBeenCalledTimes(12);
  });

  it('finishes the run when a translator fails to dispose', async () => {
    const dispose = vi.fn(async () => {
      throw new Error('socket already closed');
    });

    const result = await runScheduler(
      ['a', 'b', 'c'],
      baseOptions({
        batchSize: 1,
        innerConcurrency: 3,
        translatorFactory: () => createFakeTranslator({ dispose }),
      })
    );

    expect(result.outcomes.map((outcome) => outcome.text)).toEqual(['es:a', 'es:b', 'es:c']);
    expect(result.failures).toEqual([]);
    expect(dispose).toHaveBeenCalledTimes(3);
    expect(result.runErrors).toEqual([
      'fake could not be disposed: socket already closed',
      'fake could not be disposed: socket already closed',
      'fake could not be disposed: socket already closed',
    ]);
  });

  it('never exceeds the effective concurrency bound', async () => {
    let active = 0;
    let peak = 0;
    const factory = () =>
      createFakeTranslator({
        translate: async (text: string) => {
          active += 1;
          peak = Math.max(peak, active);
          await sleep(2);
          active -= 1;
          return text.toUpperCase();
        },
      });

    await runScheduler(
      Array.from({ length: 40 }, (_, index) => `t${index}`),
      baseOptions({ superBatchSize: 10, batchSize: 2, outerConcurrency: 2, innerConcurrency: 3, translatorFactory: factory })
    );

    expect(peak).toBeGreaterThan(1);
    expect(peak).toBeLessThanOrEqual(effectiveConcurrency(40, 10, 2, 3));
  });

  it('fails the leaves of a worker whose translator cannot be built', async () => {
    const factory = vi.fn(() => {
      throw new Error('no credentials');
    });

    const result = await runScheduler(['Hello', 'World'], baseOptions({ translatorFactory: factory }));

    expect(result.failures).toEqual([
      { index: 0, message: 'Translator could not be created: no credentials' },
      { index: 1, message: 'Translator could not be created: no credentials' },
    ]);
    expect(result.outcomes.map((outcome) => outcome.text)).toEqual(['Hello', 'World']);
  });

  it('keeps a translation whose cache write failed', async () => {
    const cache: TranslationCache = {
      get: async () => undefined,
      put: async () => {
        throw new Error('disk full');
      },
      flush: async () => undefined,
      close: async () => undefined,
    };

    const result = await runScheduler(['Hello'], baseOptions({ cache }));

    expect(result.outcomes).toEqual([{ status: 'translated', text: 'es:Hello' }]);
    expect(result.cacheWriteErrors).toEqual([{ index: 0, message: 'disk full' }]);
  });

  it('reports monotonic progress', async () => {
    const seen: number[] = [];
    await runScheduler(
      ['a', 'b', 'c', 'd', 'e'],
      baseOptions({ onProgress: ({ completed, total }) => seen.push(completed * 10 + total) })
    );

    expect(seen).toEqual([15, 25, 35, 45, 55]);
  });

  it('keeps translating when the progress listener throws', async () => {
    const listener = vi.fn(() => {
      throw new Error('terminal gone');
    });

    const result = await runScheduler(['a', 'b', 'c'], baseOptions({ onProgress: listener }));

    expect(result.outcomes.map((outcome) => outcome.text)).toEqual(['es:a', 'es:b', 'es:c']);
    expect(listener).toHaveBeenCalledTimes(3);
    expect(result.runErrors).toEqual(['Progress listener failed: terminal gone']);
  });
});
