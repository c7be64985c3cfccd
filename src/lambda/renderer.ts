/**
 * Λ Renderer - notation to English / Chinese
 */

import { createContext, type Context } from './context.js';
import { resolve, type Resolution } from './resolver.js';
import { scanTokens, type Token } from './scanner.js';
import { isMessageType, type LanguageTag, type VocabularyTable } from './vocabulary.js';

export interface InterpretedToken {
  token: Token;
  /** Null for blocks and brackets, which carry no meaning of their own */
  resolutions: Record<LanguageTag, Resolution> | null;
}

const SEPARATORS: Record<LanguageTag, string> = {
  en: ' ',
  zh: '',
};

/**
 * Scan and resolve in one pass. Each token is resolved as soon as it is
 * scanned, so a control block only affects the tokens after it.
 */
export function interpret(raw: string, context: Context, vocabulary: VocabularyTable): InterpretedToken[] {
  const result: InterpretedToken[] = [];

  for (const token of scanTokens(raw, context, vocabulary)) {
    if (token.kind === 'block' || token.kind === 'bracket') {
      result.push({ token, resolutions: null });
      continue;
    }
    result.push({
      token,
      resolutions: {
        en: resolve(token.text, 'en', context, vocabulary),
        zh: resolve(token.text, 'zh', context, vocabulary),
      },
    });
  }

  return result;
}

/**
 * Render interpreted tokens. The first message-type atom becomes a
 * parenthesised prefix; unresolved tokens are shown in square brackets.
 */
export function renderInterpretation(
  items: InterpretedToken[],
  lang: LanguageTag,
  vocabulary: VocabularyTable
): string {
  let messageType: string | undefined;
  const parts: string[] = [];

  for (const { token, resolutions } of items) {
    if (token.kind === 'block') continue;
    if (resolutions === null) {
      parts.push(token.text);
      continue;
    }

    const resolution = resolutions[lang];
    const text = resolution.resolved ? resolution.text : `[${token.text}]`;

    if (messageType === undefined && token.kind === 'atom' && isMessageType(vocabulary, token.text)) {
      messageType = text;
      continue;
    }
    if (text) parts.push(text);
  }

  const body = parts.join(SEPARATORS[lang]);
  if (messageType === undefined) return body;
  return body ? `(${messageType}) ${body}` : `(${messageType})`;
}

export function render(
  raw: string,
  lang: LanguageTag,
  vocabulary: VocabularyTable,
  context: Context = createContext()
): string {
  return renderInterpretation(interpret(raw, context, vocabulary), lang, vocabulary);
}

/**
 * Render every supported language from a single scan
 */
export function translate(
  raw: string,
  vocabulary: VocabularyTable,
  context: Context = createContext()
): Record<LanguageTag, string> {
  const items = interpret(raw, context, vocabulary);
  return {
    en: renderInterpretation(items, 'en', vocabulary),
    zh: renderInterpretation(items, 'zh', vocabulary),
  };
}

/**
 * Raw text of every token that found no meaning
 */
export function unresolvedTokens(items: InterpretedToken[]): string[] {
  return items
    .filter(item => item.resolutions !== null && !item.resolutions.en.resolved)
    .map(item => item.token.text);
}
