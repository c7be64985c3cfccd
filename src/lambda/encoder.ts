/**
 * Λ Encoder - English to notation
 *
 * Keyword substitution only. Words without an atom are dropped, so the
 * result does not translate back to the same sentence.
 */

import type { AtomCategory, VocabularyTable } from './vocabulary.js';

// Later categories overwrite earlier ones on a shared English word
const ENCODABLE_CATEGORIES: AtomCategory[] = ['entities', 'verbs', 'modifiers', 'time', 'quantifiers', 'extended'];

const COMMAND_WORDS = new Set(['please', 'do', 'find', 'make', 'create']);
const ARTICLES = new Set(['the', 'a', 'an']);

/**
 * Map each atom's first English rendering (before any `/`) to its key
 */
export function buildReverseLookup(vocabulary: VocabularyTable): Map<string, string> {
  const reverse = new Map<string, string>();
  for (const category of ENCODABLE_CATEGORIES) {
    for (const [key, atom] of vocabulary.categories[category]) {
      reverse.set(atom.renderings.en.split('/')[0].toLowerCase(), key);
    }
  }
  return reverse;
}

/**
 * Encode a simple English sentence into notation
 */
export function encodeEnglish(text: string, vocabulary: VocabularyTable): string {
  const normalized = text.toLowerCase().trim();
  const isQuestion = normalized.endsWith('?');
  const words = normalized
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .split(/\s+/)
    .filter(Boolean);

  const reverse = buildReverseLookup(vocabulary);
  const result: string[] = [];

  if (isQuestion) {
    result.push('?');
  } else if (words.slice(0, 2).some(w => COMMAND_WORDS.has(w))) {
    result.push('.');
  } else {
    result.push('!');
  }

  for (const word of words) {
    if (ARTICLES.has(word)) continue;
    const key = reverse.get(word);
    if (key !== undefined) result.push(key);
  }

  return result.join('');
}
