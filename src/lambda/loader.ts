/**
 * Vocabulary loading from disk
 */

import { readFileSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from './errors.js';
import { buildVocabulary, type VocabularyTable } from './vocabulary.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/lambda or dist/lambda -> <package>/data
export const DEFAULT_VOCABULARY_PATH = join(__dirname, '..', '..', 'data', 'atoms.json');

const cache = new Map<string, VocabularyTable>();

/**
 * Read and validate a vocabulary file. Throws ConfigurationError on any problem.
 */
export function loadVocabulary(path: string = DEFAULT_VOCABULARY_PATH): VocabularyTable {
  if (!existsSync(path)) {
    throw new ConfigurationError('vocabulary file not found', path);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`vocabulary file is not valid JSON: ${reason}`, path);
  }

  return buildVocabulary(parsed, path);
}

/**
 * Load a vocabulary once per path and reuse it
 */
export function getVocabulary(path: string = DEFAULT_VOCABULARY_PATH): VocabularyTable {
  const cached = cache.get(path);
  if (cached) return cached;

  const vocabulary = loadVocabulary(path);
  cache.set(path, vocabulary);
  return vocabulary;
}
