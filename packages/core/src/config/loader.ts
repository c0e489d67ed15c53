/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import { ConfigurationError } from '../errors.js';
import type { LoadConfigResult } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Search upward through directories for a file.
 */
export async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = path.resolve(cwd);
  const maxDepth = 10;

  for (let depth = 0; depth <= maxDepth; depth += 1) {
    const filePath = path.join(currentDir, filename);
    try {
      await fs.access(filePath);
      return filePath;
    } catch {
      // continue
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Load and parse a config file from a specific path.
 */
async function readConfigFile(resolvedPath: string): Promise<unknown> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigurationError(`Config file not found at ${resolvedPath}.`, [], error);
    }
    throw new ConfigurationError(`Unable to read config file at ${resolvedPath}: ${err.message}`, [], error);
  }

  try {
    const parsed: unknown = JSON.parse(fileContents);
    return parsed;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file at ${resolvedPath} contains invalid JSON: ${message}`, [], error);
  }
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Extra values layered over the file (command-line flags). */
  overrides?: Record<string, unknown>;
  requireTargets?: boolean;
}

/**
 * Load the config file, searching parent directories when no explicit path
 * is given. A missing default file yields the defaults; a missing explicit
 * path is an error.
 */
export async function loadConfigWithMeta(
  configPath?: string,
  options: LoadConfigOptions = {}
): Promise<LoadConfigResult> {
  const cwd = options.cwd ?? process.cwd();
  let resolvedPath: string | undefined;

  if (configPath) {
    resolvedPath = path.resolve(cwd, configPath);
  } else {
    resolvedPath = (await findUp(DEFAULT_CONFIG_FILENAME, cwd)) ?? undefined;
  }

  const rawConfig = resolvedPath ? await readConfigFile(resolvedPath) : {};
  if (rawConfig === null || typeof rawConfig !== 'object' || Array.isArray(rawConfig)) {
    throw new ConfigurationError(`Config file at ${resolvedPath ?? cwd} must contain a JSON object.`);
  }

  const merged = mergeConfigInput(rawConfig, options.overrides ?? {});
  const config = normalizeConfig(merged);
  assertConfigValid(config, { requireTargets: options.requireTargets });

  return {
    config,
    configPath: resolvedPath,
    projectRoot: resolvedPath ? path.dirname(resolvedPath) : path.resolve(cwd),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge for plain objects; `undefined` overrides are skipped so unset
 * flags never mask file values.
 */
export function mergeConfigInput(base: object, overrides: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? mergeConfigInput(existing, value) : value;
  }
  return result;
}
