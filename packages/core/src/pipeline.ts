/**
 * Document translation pipeline.
 *
 * Extraction and placeholder protection run once per document and are shared
 * by every target language. Each target then goes through diff selection,
 * scheduling, placeholder restoration and glossary enforcement before the
 * document is reassembled.
 */

import type { TranslatorFactory } from '@transjson/translation';
import { MemoryTranslationCache, type TranslationCache } from './cache/translation-cache.js';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONCURRENCY,
  DEFAULT_INNER_CONCURRENCY,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_SUPER_BATCH_SIZE,
} from './config/defaults.js';
import {
  validateLanguage,
  validateNonNegativeInteger,
  validatePositiveInteger,
  validateTargetLanguages,
} from './config/validator.js';
import { selectChangedLeaves, type DiffSelection } from './diff-engine.js';
import { ConfigurationError, DetectionError, describeError, type ConfigValidationIssue } from './errors.js';
import { applyGlossary, type GlossaryRule } from './glossary.js';
import { getLanguageName, resolveLanguageCode } from './languages.js';
import {
  ALL_PLACEHOLDER_GRAMMARS,
  protectPlaceholders,
  restorePlaceholders,
  type PlaceholderGrammar,
  type ProtectedText,
} from './placeholders.js';
import { runScheduler, type SchedulerRetryEvent } from './scheduler/batch-scheduler.js';
import {
  collectSamples,
  extractLeaves,
  formatLeafPath,
  reassembleDocument,
  type JsonValue,
  type LeafPath,
  type LeafRef,
} from './tree-walker.js';

export const DETECTION_SAMPLE_LIMIT = 20;
export const DETECTION_SAMPLES_SENT = 10;

export interface TranslationProgressEvent {
  targetLanguage: string;
  completed: number;
  total: number;
}

export interface TranslateDocumentOptions {
  /** Detected from the document when omitted. */
  sourceLanguage?: string;
  targetLanguages: readonly string[];
  translatorFactory: TranslatorFactory;
  /** Defaults to an in-memory cache that lives for this call. */
  cache?: TranslationCache;
  /** When false the cache is written but never read. */
  cacheEnabled?: boolean;
  batchSize?: number;
  superBatchSize?: number;
  outerConcurrency?: number;
  innerConcurrency?: number;
  retries?: number;
  retryDelayMs?: number;
  glossary?: readonly GlossaryRule[];
  placeholderGrammars?: readonly PlaceholderGrammar[];
  /** Only translate leaves that changed since the previous outputs. */
  diff?: boolean;
  /** Previous output document per target language. */
  previousOutputs?: Readonly<Record<string, JsonValue | undefined>>;
  /** Source document that produced each previous output. */
  previousSources?: Readonly<Record<string, JsonValue | undefined>>;
  onProgress?: (event: TranslationProgressEvent) => void;
  onRetry?: (event: SchedulerRetryEvent) => void;
}

export interface LeafFailure {
  path: LeafPath;
  message: string;
}

export type LeafWarningKind = 'placeholder-mismatch' | 'cache-write';

export interface LeafWarning {
  kind: LeafWarningKind;
  path: LeafPath;
  message: string;
}

export interface TranslationSummary {
  totalLeaves: number;
  scheduled: number;
  reused: number;
  cacheHits: number;
  providerCalls: number;
  deduplicated: number;
  failures: LeafFailure[];
  warnings: LeafWarning[];
  divergedPaths: string[];
  /** Problems outside any single leaf, such as a translator that failed to dispose. */
  runErrors: string[];
}

export interface TargetTranslationResult {
  targetLanguage: string;
  document: JsonValue;
  /**
   * The input with failed leaves set to `null`. Passing it back as a previous
   * source makes the next diff run retry those leaves.
   */
  sourceSnapshot: JsonValue;
  /** True when the target equals the source language and nothing was translated. */
  identity: boolean;
  summary: TranslationSummary;
}

export interface TranslateDocumentResult {
  sourceLanguage: string;
  /** Set when the source language was detected rather than given. */
  detectedSourceLanguage?: string;
  targets: TargetTranslationResult[];
}

interface ResolvedSettings {
  sourceLanguage?: string;
  targetLanguages: string[];
  cache: TranslationCache;
  cacheReads: boolean;
  batchSize: number;
  superBatchSize: number;
  outerConcurrency: number;
  innerConcurrency: number;
  retries: number;
  retryDelayMs: number;
  glossary: readonly GlossaryRule[];
  grammars: readonly PlaceholderGrammar[];
}

export function validateTranslateOptions(options: TranslateDocumentOptions): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  if (options.sourceLanguage !== undefined) {
    validateLanguage('sourceLanguage', options.sourceLanguage, issues);
  }
  validateTargetLanguages('targetLanguages', options.targetLanguages, issues, { required: true });

  validatePositiveInteger('batchSize', options.batchSize ?? DEFAULT_BATCH_SIZE, issues);
  validatePositiveInteger('superBatchSize', options.superBatchSize ?? DEFAULT_SUPER_BATCH_SIZE, issues);
  validatePositiveInteger('outerConcurrency', options.outerConcurrency ?? DEFAULT_CONCURRENCY, issues);
  validatePositiveInteger('innerConcurrency', options.innerConcurrency ?? DEFAULT_INNER_CONCURRENCY, issues);
  validateNonNegativeInteger('retries', options.retries ?? DEFAULT_RETRIES, issues);
  validateNonNegativeInteger('retryDelayMs', options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS, issues);

  if (options.diff && !options.previousOutputs) {
    issues.push({ field: 'previousOutputs', message: 'diff mode needs the previous output documents' });
  }

  return issues;
}

function resolveSettings(options: TranslateDocumentOptions): ResolvedSettings {
  const issues = validateTranslateOptions(options);
  if (issues.length) {
    throw ConfigurationError.fromIssues(issues);
  }

  const targetLanguages = Array.from(
    new Set(options.targetLanguages.map((code) => resolveLanguageCode(code) ?? code))
  );

  return {
    sourceLanguage: resolveLanguageCode(options.sourceLanguage),
    targetLanguages,
    cache: options.cache ?? new MemoryTranslationCache(),
    cacheReads: options.cacheEnabled !== false,
    batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    superBatchSize: options.superBatchSize ?? DEFAULT_SUPER_BATCH_SIZE,
    outerConcurrency: options.outerConcurrency ?? DEFAULT_CONCURRENCY,
    innerConcurrency: options.innerConcurrency ?? DEFAULT_INNER_CONCURRENCY,
    retries: options.retries ?? DEFAULT_RETRIES,
    retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    glossary: options.glossary ?? [],
    grammars: options.placeholderGrammars ?? ALL_PLACEHOLDER_GRAMMARS,
  };
}

/**
 * Ask the provider which language `document` is written in. Resolves the
 * canonical code or throws {@link DetectionError}.
 */
export async function detectSourceLanguage(document: JsonValue, translatorFactory: TranslatorFactory): Promise<string> {
  const samples = collectSamples(document, DETECTION_SAMPLE_LIMIT).slice(0, DETECTION_SAMPLES_SENT);
  if (!samples.length) {
    throw new DetectionError('The document contains no text to detect a language from.');
  }

  let detected: string | undefined;
  try {
    const translator = await translatorFactory();
    try {
      detected = await translator.detectLanguage(samples);
    } finally {
      await translator.dispose?.();
    }
  } catch (error) {
    throw new DetectionError(`Language detection failed: ${describeError(error)}`, error);
  }

  if (!detected) {
    throw new DetectionError('Language detection returned no result.');
  }

  const resolved = resolveLanguageCode(detected);
  if (!resolved) {
    throw new DetectionError(`Detected language "${detected}" is not supported.`);
  }
  return resolved;
}

export async function translateDocument(
  document: JsonValue,
  options: TranslateDocumentOptions
): Promise<TranslateDocumentResult> {
  const settings = resolveSettings(options);

  const leaves = extractLeaves(document);
  const protectedTexts = leaves.map((leaf) => protectPlaceholders(leaf.text, settings.grammars));

  let sourceLanguage = settings.sourceLanguage;
  let detectedSourceLanguage: string | undefined;
  if (!sourceLanguage) {
    try {
      detectedSourceLanguage = await detectSourceLanguage(document, options.translatorFactory);
    } catch (error) {
      throw new ConfigurationError(
        `Could not detect the source language (${describeError(error)}). Pass it explicitly.`,
        [{ field: 'sourceLanguage', message: 'detection failed; set the source language explicitly' }],
        error
      );
    }
    sourceLanguage = detectedSourceLanguage;
  }

  const targets: TargetTranslationResult[] = [];
  for (const targetLanguage of settings.targetLanguages) {
    targets.push(
      await translateTarget({
        document,
        leaves,
        protectedTexts,
        sourceLanguage,
        targetLanguage,
        settings,
        options,
      })
    );
  }

  return { sourceLanguage, detectedSourceLanguage, targets };
}

interface TargetContext {
  document: JsonValue;
  leaves: LeafRef[];
  protectedTexts: ProtectedText[];
  sourceLanguage: string;
  targetLanguage: string;
  settings: ResolvedSettings;
  options: TranslateDocumentOptions;
}

function emptySummary(totalLeaves: number): TranslationSummary {
  return {
    totalLeaves,
    scheduled: 0,
    reused: 0,
    cacheHits: 0,
    providerCalls: 0,
    deduplicated: 0,
    failures: [],
    warnings: [],
    divergedPaths: [],
    runErrors: [],
  };
}

async function translateTarget(context: TargetContext): Promise<TargetTranslationResult> {
  const { document, leaves, protectedTexts, sourceLanguage, targetLanguage, settings, options } = context;
  const summary = emptySummary(leaves.length);

  if (targetLanguage === sourceLanguage) {
    const copy = reassembleDocument(document, new Map());
    return { targetLanguage, document: copy, sourceSnapshot: copy, identity: true, summary };
  }

  const selection = options.diff ? await selectForDiff(context) : undefined;
  const pending = selection ? leaves.filter((leaf) => selection.changed.has(leaf.key)) : leaves;

  const scheduled = await runScheduler(
    pending.map((leaf) => protectedTexts[leaf.index].text),
    {
      sourceLanguage,
      targetLanguage,
      translatorFactory: options.translatorFactory,
      cache: settings.cache,
      cacheReads: settings.cacheReads,
      batchSize: settings.batchSize,
      superBatchSize: settings.superBatchSize,
      outerConcurrency: settings.outerConcurrency,
      innerConcurrency: settings.innerConcurrency,
      retries: settings.retries,
      retryDelayMs: settings.retryDelayMs,
      onProgress: options.onProgress
        ? ({ completed, total }) => options.onProgress?.({ targetLanguage, completed, total })
        : undefined,
      onRetry: options.onRetry,
    }
  );

  const translations = new Map<string, string>(selection?.reused ?? []);
  const failedKeys = new Map<string, JsonValue>();

  scheduled.outcomes.forEach((outcome, position) => {
    const leaf = pending[position];
    if (outcome.status === 'failed') {
      summary.failures.push({ path: leaf.path, message: outcome.error });
      failedKeys.set(leaf.key, null);
      translations.set(leaf.key, leaf.text);
      return;
    }

    const restored = restorePlaceholders(outcome.text, protectedTexts[leaf.index].tokens);
    if (restored.mismatch) {
      summary.warnings.push({
        kind: 'placeholder-mismatch',
        path: leaf.path,
        message: `expected ${restored.mismatch.expected} placeholder(s) in the ${getLanguageName(targetLanguage)} translation, found ${restored.mismatch.found}`,
      });
    }
    translations.set(leaf.key, applyGlossary(restored.text, settings.glossary, settings.grammars));
  });

  for (const issue of scheduled.cacheWriteErrors) {
    summary.warnings.push({
      kind: 'cache-write',
      path: pending[issue.index].path,
      message: `translation was not cached: ${issue.message}`,
    });
  }

  summary.scheduled = pending.length;
  summary.reused = selection?.reused.size ?? 0;
  summary.cacheHits = scheduled.cacheHits;
  summary.providerCalls = scheduled.providerCalls;
  summary.deduplicated = scheduled.deduplicated;
  summary.divergedPaths = selection?.diverged.map((path) => formatLeafPath(path)) ?? [];
  summary.runErrors = scheduled.runErrors;

  return {
    targetLanguage,
    document: reassembleDocument(document, translations),
    sourceSnapshot: reassembleDocument(document, failedKeys),
    identity: false,
    summary,
  };
}

async function selectForDiff(context: TargetContext): Promise<DiffSelection | undefined> {
  const { document, sourceLanguage, targetLanguage, settings, options } = context;
  const previousOutput = options.previousOutputs?.[targetLanguage];
  if (previousOutput === undefined) {
    return undefined;
  }

  const previousSource = options.previousSources?.[targetLanguage];
  const producedBy = settings.cacheReads
    ? async (text: string, previousValue: string): Promise<boolean> => {
        const protectedText = protectPlaceholders(text, settings.grammars);
        const cached = await settings.cache.get(sourceLanguage, targetLanguage, protectedText.text);
        if (cached === undefined) {
          return false;
        }
        const restored = restorePlaceholders(cached, protectedText.tokens);
        return applyGlossary(restored.text, settings.glossary, settings.grammars) === previousValue;
      }
    : undefined;

  return selectChangedLeaves(previousOutput, document, { previousSource, producedBy });
}
