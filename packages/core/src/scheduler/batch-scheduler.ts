/**
 * Two-level fan-out of leaf translations over a provider.
 *
 * Leaves are split into super-batches that run on an outer pool. Inside a
 * super-batch a small set of workers, each holding its own translator, pull
 * batches from a shared queue. Results land in slots addressed by leaf index,
 * so output order never depends on completion order.
 */

import pLimit from 'p-limit';
import pRetry, { AbortError } from 'p-retry';
import { ProviderError, type Translator, type TranslatorFactory } from '@transjson/translation';
import type { TranslationCache } from '../cache/translation-cache.js';
import { DEFAULT_RETRIES, DEFAULT_RETRY_DELAY_MS } from '../config/defaults.js';
import { describeError } from '../errors.js';
import { ProgressCounter, type ProgressListener } from './progress.js';

export interface SchedulerRetryEvent {
  text: string;
  targetLanguage: string;
  attemptNumber: number;
  retriesLeft: number;
  message: string;
}

export interface SchedulerOptions {
  sourceLanguage: string;
  targetLanguage: string;
  translatorFactory: TranslatorFactory;
  cache: TranslationCache;
  batchSize: number;
  superBatchSize: number;
  outerConcurrency: number;
  innerConcurrency: number;
  /** When false the cache is written but never read. */
  cacheReads?: boolean;
  retries?: number;
  retryDelayMs?: number;
  onProgress?: ProgressListener;
  onRetry?: (event: SchedulerRetryEvent) => void;
}

export type LeafOutcome =
  | { status: 'cached'; text: string }
  | { status: 'translated'; text: string }
  | { status: 'deduplicated'; text: string }
  | { status: 'failed'; text: string; error: string };

export interface SchedulerIssue {
  index: number;
  message: string;
}

export interface SchedulerResult {
  /** One outcome per input text, in input order. */
  outcomes: LeafOutcome[];
  cacheHits: number;
  providerCalls: number;
  deduplicated: number;
  failures: SchedulerIssue[];
  cacheWriteErrors: SchedulerIssue[];
  /** Problems that belong to no single leaf: translator disposal, progress listeners. */
  runErrors: string[];
}

/**
 * Split `items` into consecutive slices of at most `size` elements.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) {
    return [items.slice()];
  }
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

/**
 * Upper bound on simultaneous provider calls for `leafCount` leaves.
 */
export function effectiveConcurrency(
  leafCount: number,
  superBatchSize: number,
  outerConcurrency: number,
  innerConcurrency: number
): number {
  if (leafCount <= 0) {
    return 0;
  }
  return Math.min(outerConcurrency, Math.ceil(leafCount / superBatchSize)) * innerConcurrency;
}

interface RunState {
  texts: readonly string[];
  options: SchedulerOptions;
  outcomes: Array<LeafOutcome | undefined>;
  inFlight: Map<string, Promise<string>>;
  progress: ProgressCounter;
  counters: {
    cacheHits: number;
    providerCalls: number;
    deduplicated: number;
  };
  failures: SchedulerIssue[];
  cacheWriteErrors: SchedulerIssue[];
  runErrors: string[];
}

/**
 * Translate `texts` (already placeholder-protected) into `targetLanguage`.
 * Failures are contained per leaf: a failed leaf keeps its original text and
 * is listed in `failures`.
 */
export async function runScheduler(texts: readonly string[], options: SchedulerOptions): Promise<SchedulerResult> {
  const runErrors: string[] = [];
  const state: RunState = {
    texts,
    options,
    outcomes: new Array<LeafOutcome | undefined>(texts.length).fill(undefined),
    inFlight: new Map(),
    progress: new ProgressCounter(texts.length, options.onProgress, (error) => {
      const message = `Progress listener failed: ${describeError(error)}`;
      if (!runErrors.includes(message)) {
        runErrors.push(message);
      }
    }),
    counters: { cacheHits: 0, providerCalls: 0, deduplicated: 0 },
    failures: [],
    cacheWriteErrors: [],
    runErrors,
  };

  const indices = texts.map((_, index) => index);
  const superBatches = chunk(indices, options.superBatchSize);
  const limit = pLimit(options.outerConcurrency);

  await Promise.all(superBatches.map((superBatch) => limit(() => runSuperBatch(superBatch, state))));

  const outcomes = state.outcomes.map((outcome, index): LeafOutcome => {
    if (outcome) {
      return outcome;
    }
    const message = 'Leaf was never scheduled.';
    state.failures.push({ index, message });
    return { status: 'failed', text: texts[index], error: message };
  });

  return {
    outcomes,
    ...state.counters,
    failures: state.failures.sort((a, b) => a.index - b.index),
    cacheWriteErrors: state.cacheWriteErrors.sort((a, b) => a.index - b.index),
    runErrors: state.runErrors,
  };
}

async function runSuperBatch(superBatch: number[], state: RunState): Promise<void> {
  const batches = chunk(superBatch, state.options.batchSize);
  const workerCount = Math.min(state.options.innerConcurrency, batches.length);
  let cursor = 0;
  const nextBatch = (): number[] | undefined => {
    if (cursor >= batches.length) {
      return undefined;
    }
    const batch = batches[cursor];
    cursor += 1;
    return batch;
  };

  await Promise.all(Array.from({ length: workerCount }, () => runWorker(nextBatch, state)));
}

async function runWorker(nextBatch: () => number[] | undefined, state: RunState): Promise<void> {
  let translator: Translator | undefined;
  let constructionError: string | undefined;
  try {
    translator = await state.options.translatorFactory();
  } catch (error) {
    constructionError = `Translator could not be created: ${describeError(error)}`;
  }

  try {
    for (let batch = nextBatch(); batch; batch = nextBatch()) {
      for (const index of batch) {
        await translateLeaf(index, translator, constructionError, state);
        state.progress.increment();
      }
    }
  } finally {
    if (translator) {
      await disposeTranslator(translator, state);
    }
  }
}

async function disposeTranslator(translator: Translator, state: RunState): Promise<void> {
  try {
    await translator.dispose?.();
  } catch (error) {
    state.runErrors.push(`${translator.name} could not be disposed: ${describeError(error)}`);
  }
}

async function translateLeaf(
  index: number,
  translator: Translator | undefined,
  constructionError: string | undefined,
  state: RunState
): Promise<void> {
  const { options } = state;
  const text = state.texts[index];

  if (options.cacheReads !== false) {
    const cached = await options.cache.get(options.sourceLanguage, options.targetLanguage, text);
    if (cached !== undefined) {
      state.counters.cacheHits += 1;
      state.outcomes[index] = { status: 'cached', text: cached };
      return;
    }
  }

  const pending = state.inFlight.get(text);
  if (pending) {
    try {
      const translated = await pending;
      state.counters.deduplicated += 1;
      state.outcomes[index] = { status: 'deduplicated', text: translated };
    } catch (error) {
      recordFailure(index, describeError(error), state);
    }
    return;
  }

  if (!translator) {
    recordFailure(index, constructionError ?? 'Translator unavailable.', state);
    return;
  }

  const call = callProvider(translator, text, state);
  state.inFlight.set(text, call);

  let translated: string;
  try {
    translated = await call;
  } catch (error) {
    recordFailure(index, describeError(error), state);
    return;
  }
  state.outcomes[index] = { status: 'translated', text: translated };

  try {
    await options.cache.put(options.sourceLanguage, options.targetLanguage, text, translated);
  } catch (error) {
    state.cacheWriteErrors.push({ index, message: describeError(error) });
  }
}

function callProvider(translator: Translator, text: string, state: RunState): Promise<string> {
  const { options } = state;
  return pRetry(
    async () => {
      state.counters.providerCalls += 1;
      let translated: string;
      try {
        translated = await translator.translate(text, options.sourceLanguage, options.targetLanguage);
      } catch (error) {
        if (error instanceof ProviderError && !error.retryable) {
          throw new AbortError(error);
        }
        throw error;
      }

      if (typeof translated !== 'string' || !translated.trim().length) {
        throw new ProviderError(`${translator.name} returned an empty translation.`, { provider: translator.name });
      }
      return translated;
    },
    {
      retries: options.retries ?? DEFAULT_RETRIES,
      minTimeout: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
      onFailedAttempt: (error) => {
        options.onRetry?.({
          text,
          targetLanguage: options.targetLanguage,
          attemptNumber: error.attemptNumber,
          retriesLeft: error.retriesLeft,
          message: error.message,
        });
      },
    }
  );
}

function recordFailure(index: number, message: string, state: RunState): void {
  state.failures.push({ index, message });
  state.outcomes[index] = { status: 'failed', text: state.texts[index], error: message };
}
