/**
 * Translation execution: configuration, provider, cache, pipeline and output files
 */

import path from 'path';
import { pathToFileURL } from 'url';
import chalk from 'chalk';
import {
  FileTranslationCache,
  getLanguageName,
  loadConfigWithMeta,
  translateDocument,
  type JsonValue,
  type LoadConfigResult,
  type TransjsonConfig,
} from '@transjson/core';
import type { TranslatorLoadOptions } from '@transjson/translation';
import type { CliContext, TranslateCommandOptions, TranslateReport } from './types.js';
import {
  inputStem,
  outputFilePath,
  readGlossaryFile,
  readInputDocument,
  readOptionalDocument,
  sourceSnapshotPath,
  writeDocument,
} from './io.js';

function resolveFrom(base: string, value: string | undefined): string | undefined {
  return value ? path.resolve(base, value) : undefined;
}

/**
 * Command-line flags as config overrides. Paths given on the command line are
 * resolved against the working directory; paths in the config file against
 * the file's directory.
 */
export function buildConfigOverrides(options: TranslateCommandOptions, cwd: string): Record<string, unknown> {
  return {
    sourceLanguage: options.source,
    targetLanguages: options.target?.length ? options.target : undefined,
    outputDir: resolveFrom(cwd, options.output),
    glossaryFile: resolveFrom(cwd, options.glossary),
    diff: options.diff ? true : undefined,
    batching: {
      batchSize: options.batchSize,
      superBatchSize: options.superBatchSize,
      concurrency: options.concurrency,
      innerConcurrency: options.innerConcurrency,
    },
    cache: {
      enabled: options.cache === false ? false : undefined,
      dir: resolveFrom(cwd, options.cacheDir),
    },
    translation: {
      provider: options.provider,
    },
  };
}

function isModulePath(specifier: string): boolean {
  return specifier.startsWith('.') || path.isAbsolute(specifier);
}

/**
 * Loader options for the configured provider. Module paths become file URLs
 * so dynamic import resolves them from the right directory.
 */
export function resolveProviderLoadOptions(
  config: TransjsonConfig,
  projectRoot: string,
  cwd: string,
  providerFromFlag: boolean
): TranslatorLoadOptions {
  const translation = config.translation;
  let provider = translation.provider;
  let moduleSpecifier = translation.module;

  if (isModulePath(provider)) {
    moduleSpecifier = pathToFileURL(path.resolve(providerFromFlag ? cwd : projectRoot, provider)).href;
    provider = path.parse(provider).name;
  } else if (moduleSpecifier && isModulePath(moduleSpecifier)) {
    moduleSpecifier = pathToFileURL(path.resolve(projectRoot, moduleSpecifier)).href;
  }

  if (providerFromFlag && !isModulePath(translation.provider)) {
    moduleSpecifier = undefined;
  }

  const secret = translation.secretEnvVar ? process.env[translation.secretEnvVar] : undefined;

  return {
    provider,
    module: moduleSpecifier,
    apiKey: translation.apiKey,
    secret,
    timeoutMs: translation.timeoutMs,
    config: translation.options,
  };
}

async function loadGlossary(config: TransjsonConfig, projectRoot: string) {
  const rules = [...config.glossary];
  if (config.glossaryFile) {
    rules.push(...(await readGlossaryFile(path.resolve(projectRoot, config.glossaryFile))));
  }
  return rules;
}

async function readPreviousRun(
  outputDir: string,
  stem: string,
  languages: readonly string[]
): Promise<{ outputs: Record<string, JsonValue | undefined>; sources: Record<string, JsonValue | undefined> }> {
  const outputs: Record<string, JsonValue | undefined> = {};
  const sources: Record<string, JsonValue | undefined> = {};
  for (const language of languages) {
    outputs[language] = await readOptionalDocument(outputFilePath(outputDir, stem, language));
    sources[language] = await readOptionalDocument(sourceSnapshotPath(outputDir, stem, language));
  }
  return { outputs, sources };
}

export interface ExecuteTranslateInput {
  input: string;
  options: TranslateCommandOptions;
  context: CliContext;
}

export async function executeTranslate({ input, options, context }: ExecuteTranslateInput): Promise<TranslateReport> {
  const cwd = context.cwd();
  const quiet = Boolean(options.json);
  const log = (message: string) => {
    if (!quiet) {
      console.log(message);
    }
  };

  const inputPath = path.resolve(cwd, input);
  if (path.extname(inputPath).toLowerCase() !== '.json') {
    log(chalk.yellow(`Warning: ${input} does not have a .json extension; reading it as JSON anyway.`));
  }
  const document = await readInputDocument(inputPath);

  const loaded: LoadConfigResult = await loadConfigWithMeta(options.config, {
    cwd,
    overrides: buildConfigOverrides(options, cwd),
    requireTargets: true,
  });
  const { config, projectRoot } = loaded;
  if (loaded.configPath && options.verbose) {
    log(chalk.gray(`Using config ${loaded.configPath}`));
  }

  const outputDir = path.resolve(projectRoot, config.outputDir);
  const cacheDir = path.resolve(projectRoot, config.cache.dir);
  const stem = inputStem(inputPath);
  const glossary = await loadGlossary(config, projectRoot);

  const loadOptions = resolveProviderLoadOptions(config, projectRoot, cwd, Boolean(options.provider));
  const translatorFactory = await context.loadTranslatorFactory(loadOptions);

  const previous = config.diff ? await readPreviousRun(outputDir, stem, config.targetLanguages) : undefined;

  const sourceLabel = config.sourceLanguage
    ? `${getLanguageName(config.sourceLanguage)} (${config.sourceLanguage})`
    : 'auto-detected language';
  log(
    chalk.blue(
      `Translating ${path.basename(inputPath)} from ${sourceLabel} into ${config.targetLanguages.length} language${
        config.targetLanguages.length === 1 ? '' : 's'
      } via ${loadOptions.provider}...`
    )
  );

  const cache = await FileTranslationCache.open(cacheDir);
  let result: Awaited<ReturnType<typeof translateDocument>>;
  try {
    result = await translateDocument(document, {
      sourceLanguage: config.sourceLanguage,
      targetLanguages: config.targetLanguages,
      translatorFactory,
      cache,
      cacheEnabled: config.cache.enabled,
      batchSize: config.batching.batchSize,
      superBatchSize: config.batching.superBatchSize,
      outerConcurrency: config.batching.concurrency,
      innerConcurrency: config.batching.innerConcurrency,
      retries: config.translation.retries,
      retryDelayMs: config.translation.retryDelayMs,
      glossary,
      placeholderGrammars: config.placeholderGrammars,
      diff: config.diff,
      previousOutputs: previous?.outputs,
      previousSources: previous?.sources,
      onProgress: ({ targetLanguage, completed, total }) => {
        if (options.verbose && (completed === total || completed % 25 === 0)) {
          log(chalk.gray(`  ${targetLanguage}: ${completed}/${total}`));
        }
      },
      onRetry: (event) => {
        log(
          chalk.yellow(
            `Attempt ${event.attemptNumber} failed translating into ${event.targetLanguage}. There are ${event.retriesLeft} retries left.`
          )
        );
      },
    });
  } finally {
    await cache.close();
  }

  const targets: TranslateReport['targets'] = [];
  for (const target of result.targets) {
    const outputPath = outputFilePath(outputDir, stem, target.targetLanguage);
    await writeDocument(outputPath, target.document);
    await writeDocument(sourceSnapshotPath(outputDir, stem, target.targetLanguage), target.sourceSnapshot);
    targets.push({
      language: target.targetLanguage,
      name: getLanguageName(target.targetLanguage),
      outputPath,
      identity: target.identity,
      summary: target.summary,
    });
  }

  return {
    input: inputPath,
    outputDir,
    provider: loadOptions.provider,
    sourceLanguage: result.sourceLanguage,
    detectedSourceLanguage: result.detectedSourceLanguage,
    cacheDir,
    cacheEnabled: config.cache.enabled,
    diff: config.diff,
    targets,
    totalFailures: targets.reduce((total, target) => total + target.summary.failures.length, 0),
  };
}
