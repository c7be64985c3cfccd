/**
 * Λ Scanner - splits a notation string into tokens
 *
 * Atoms are not delimited, so each position is matched against an ordered
 * list of rules and the first match wins. Control blocks mutate the context
 * as they are reached; tokens are yielded lazily so a consumer resolving each
 * token on arrival sees exactly the context in force at that point.
 */

import type { Context } from './context.js';
import { applyControlBlock, parseControlBlock, type ControlBlock } from './control.js';
import { isResolvable } from './resolver.js';
import { QUOTED_MARKERS, isMessageType, type VocabularyTable } from './vocabulary.js';

export type TokenKind = 'block' | 'bracket' | 'domain' | 'disambiguated' | 'atom' | 'literal';

interface TokenSpan {
  text: string;
  /** Code point offsets into the scanned string, end exclusive */
  start: number;
  end: number;
}

export type Token =
  | (TokenSpan & { kind: 'block'; block: ControlBlock })
  | (TokenSpan & { kind: Exclude<TokenKind, 'block'> });

interface RuleMatch {
  kind: 'bracket' | 'domain' | 'disambiguated' | 'atom';
  length: number;
}

const BRACKETS = new Set(['(', ')', '[', ']']);
const BLOCK_OPEN = '{';
const BLOCK_CLOSE = '}';
const WHITESPACE = /\s/u;
const LOWER_PAIR = /^[a-z]{2}$/;
const DOMAIN_PREFIXED_AT = /^[a-z]{2,3}:[a-z]{2}/;
const DISAMBIGUATED_AT = new RegExp(`^[a-z]{2}(?:'[${QUOTED_MARKERS.join('')}]|-)`);
// Longest rule span is `abc:de`
const LOOKAHEAD = 6;

/**
 * Rules 3-8: bracket, domain prefix, disambiguation marker, discourse/emotion
 * pair, extended pair, single character.
 */
function matchAt(
  chars: string[],
  i: number,
  context: Context,
  vocabulary: VocabularyTable
): RuleMatch | undefined {
  const ch = chars[i];

  if (BRACKETS.has(ch)) {
    return { kind: 'bracket', length: 1 };
  }

  const ahead = chars.slice(i, i + LOOKAHEAD).join('');

  const prefixed = DOMAIN_PREFIXED_AT.exec(ahead);
  if (prefixed) {
    return { kind: 'domain', length: prefixed[0].length };
  }

  const marked = DISAMBIGUATED_AT.exec(ahead);
  if (marked) {
    return { kind: 'disambiguated', length: marked[0].length };
  }

  if (i + 1 < chars.length) {
    const pair = ch + chars[i + 1];
    if (vocabulary.categories.discourse.has(pair) || vocabulary.categories.emotion.has(pair)) {
      return { kind: 'atom', length: 2 };
    }
    // Context-sensitive: a pair only known to an active domain or a local
    // definition tokenizes as one atom
    if (LOWER_PAIR.test(pair) && isResolvable(pair, context, vocabulary)) {
      return { kind: 'atom', length: 2 };
    }
  }

  if (isMessageType(vocabulary, ch) || isResolvable(ch, context, vocabulary)) {
    return { kind: 'atom', length: 1 };
  }

  return undefined;
}

function isRunBoundary(chars: string[], i: number, context: Context, vocabulary: VocabularyTable): boolean {
  const ch = chars[i];
  return WHITESPACE.test(ch) || ch === BLOCK_OPEN || ch === BLOCK_CLOSE || matchAt(chars, i, context, vocabulary) !== undefined;
}

/**
 * Lazily scan a notation string. Mutates `context` when a control block is
 * reached. Never throws: an unterminated `{` becomes a literal running to the
 * end of the input.
 */
export function* scanTokens(raw: string, context: Context, vocabulary: VocabularyTable): Generator<Token, void, undefined> {
  const chars = Array.from(raw);
  const slice = (start: number, end: number) => chars.slice(start, end).join('');
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i];

    if (WHITESPACE.test(ch)) {
      i++;
      continue;
    }

    if (ch === BLOCK_OPEN) {
      const close = chars.indexOf(BLOCK_CLOSE, i + 1);
      if (close === -1) {
        yield { kind: 'literal', text: slice(i, chars.length), start: i, end: chars.length };
        return;
      }
      const block = parseControlBlock(slice(i + 1, close));
      applyControlBlock(context, block);
      yield { kind: 'block', text: slice(i, close + 1), start: i, end: close + 1, block };
      i = close + 1;
      continue;
    }

    const match = matchAt(chars, i, context, vocabulary);
    if (match) {
      const end = i + match.length;
      yield { kind: match.kind, text: slice(i, end), start: i, end };
      i = end;
      continue;
    }

    // Unknown run, always at least one character
    let j = i + 1;
    while (j < chars.length && !isRunBoundary(chars, j, context, vocabulary)) {
      j++;
    }
    yield { kind: 'literal', text: slice(i, j), start: i, end: j };
    i = j;
  }
}

/**
 * Scan a notation string into a token list
 */
export function scan(raw: string, context: Context, vocabulary: VocabularyTable): Token[] {
  return Array.from(scanTokens(raw, context, vocabulary));
}
