/**
 * File input and output for the translate command
 */

import fs from 'fs/promises';
import path from 'path';
import { isJsonValue, normalizeGlossaryRules, writeFileAtomic, type GlossaryRule, type JsonValue } from '@transjson/core';
import { CliError } from '../../utils/errors.js';

export const STATE_DIRNAME = '.transjson';

export function inputStem(inputPath: string): string {
  return path.parse(inputPath).name;
}

export function outputFilePath(outputDir: string, stem: string, language: string): string {
  return path.join(outputDir, `${stem}.${language}.json`);
}

export function sourceSnapshotPath(outputDir: string, stem: string, language: string): string {
  return path.join(outputDir, STATE_DIRNAME, `${stem}.${language}.source.json`);
}

export function serializeDocument(document: JsonValue): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

async function readJsonFile(filePath: string, label: string): Promise<JsonValue> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new CliError(`${label} not found: ${filePath}`);
    }
    throw new CliError(`Unable to read ${label.toLowerCase()} ${filePath}: ${err.message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`${label} ${filePath} is not valid JSON: ${message}`);
  }

  if (!isJsonValue(parsed)) {
    throw new CliError(`${label} ${filePath} is not a JSON document.`);
  }
  return parsed;
}

export function readInputDocument(inputPath: string): Promise<JsonValue> {
  return readJsonFile(inputPath, 'Input file');
}

/**
 * Read a previous run's file, or `undefined` when there is none. A corrupt
 * previous file is treated as absent so the target is translated in full.
 */
export async function readOptionalDocument(filePath: string): Promise<JsonValue | undefined> {
  try {
    return await readJsonFile(filePath, 'Previous output');
  } catch (error) {
    if (error instanceof CliError) {
      return undefined;
    }
    throw error;
  }
}

export async function readGlossaryFile(glossaryPath: string): Promise<GlossaryRule[]> {
  const parsed = await readJsonFile(glossaryPath, 'Glossary file');
  return normalizeGlossaryRules(parsed);
}

export async function writeDocument(filePath: string, document: JsonValue): Promise<void> {
  await writeFileAtomic(filePath, serializeDocument(document));
}
