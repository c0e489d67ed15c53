import { ConfigurationError, type ConfigValidationIssue } from '../errors.js';
import { isSupportedLanguage } from '../languages.js';
import type { TransjsonConfig } from './types.js';

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

const MAX_PATH_LIKE_LENGTH = 320;

export function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]): void {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (containsControlCharacters(value)) {
    issues.push({ field, message: 'contains control characters' });
  }
}

export function validatePositiveInteger(field: string, value: number, issues: ConfigValidationIssue[]): void {
  if (!Number.isInteger(value) || value <= 0) {
    issues.push({ field, message: `must be a positive integer (received ${String(value)})` });
  }
}

export function validateNonNegativeInteger(field: string, value: number, issues: ConfigValidationIssue[]): void {
  if (!Number.isInteger(value) || value < 0) {
    issues.push({ field, message: `must be zero or a positive integer (received ${String(value)})` });
  }
}

export function validateLanguage(field: string, value: string, issues: ConfigValidationIssue[]): void {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (!isSupportedLanguage(value)) {
    issues.push({ field, message: `"${value}" is not a supported language (run "transjson languages")` });
  }
}

export function validateTargetLanguages(
  field: string,
  values: readonly string[],
  issues: ConfigValidationIssue[],
  options: { required: boolean }
): void {
  if (!values.length) {
    if (options.required) {
      issues.push({ field, message: 'at least one target language is required' });
    }
    return;
  }
  values.forEach((language, index) => validateLanguage(`${field}[${index}]`, language, issues));
}

export interface ValidateConfigOptions {
  /** Targets may come from the command line instead of the file. */
  requireTargets?: boolean;
}

export function validateConfig(config: TransjsonConfig, options: ValidateConfigOptions = {}): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  if (config.sourceLanguage !== undefined) {
    validateLanguage('sourceLanguage', config.sourceLanguage, issues);
  }
  validateTargetLanguages('targetLanguages', config.targetLanguages, issues, {
    required: options.requireTargets ?? false,
  });

  validatePathLike('outputDir', config.outputDir, issues);
  validatePathLike('cache.dir', config.cache.dir, issues);
  if (config.glossaryFile !== undefined) {
    validatePathLike('glossaryFile', config.glossaryFile, issues);
  }

  validatePositiveInteger('batching.batchSize', config.batching.batchSize, issues);
  validatePositiveInteger('batching.superBatchSize', config.batching.superBatchSize, issues);
  validatePositiveInteger('batching.concurrency', config.batching.concurrency, issues);
  validatePositiveInteger('batching.innerConcurrency', config.batching.innerConcurrency, issues);

  if (!config.translation.provider.trim()) {
    issues.push({ field: 'translation.provider', message: 'must not be empty' });
  }
  validateNonNegativeInteger('translation.retries', config.translation.retries, issues);
  validateNonNegativeInteger('translation.retryDelayMs', config.translation.retryDelayMs, issues);
  if (config.translation.timeoutMs !== undefined) {
    validatePositiveInteger('translation.timeoutMs', config.translation.timeoutMs, issues);
  }

  return issues;
}

export function assertConfigValid(config: TransjsonConfig, options: ValidateConfigOptions = {}): void {
  const issues = validateConfig(config, options);
  if (!issues.length) {
    return;
  }
  throw ConfigurationError.fromIssues(issues);
}
