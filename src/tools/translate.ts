/**
 * lambda_translate - Render a Λ message in English and/or Chinese
 */

import type Database from 'better-sqlite3';
import { withSession } from '../db/sessions.js';
import { interpret, renderInterpretation, unresolvedTokens } from '../lambda/renderer.js';
import type { LanguageTag, VocabularyTable } from '../lambda/vocabulary.js';
import type { TranslateInput } from '../types.js';
import { getConfig } from '../config/index.js';
import { optionalOutputLanguage, optionalString, requireString, type ToolArgs } from './input.js';

export interface TranslateResult {
  success: boolean;
  en?: string;
  zh?: string;
  activatedDomains: string[];
  unresolved: string[];
}

export function toTranslateInput(args: ToolArgs): TranslateInput {
  return {
    message: requireString(args, 'message'),
    lang: optionalOutputLanguage(args, 'lang'),
    session_id: optionalString(args, 'session_id'),
  };
}

/**
 * Translate a message, keeping session context when a session id is given
 */
export function translateMessage(
  db: Database.Database,
  vocabulary: VocabularyTable,
  input: TranslateInput
): TranslateResult {
  const lang = input.lang ?? getConfig().default_language;
  const languages: LanguageTag[] = lang === 'both' ? ['en', 'zh'] : [lang];

  return withSession(db, input.session_id, context => {
    const items = interpret(input.message, context, vocabulary);
    const result: TranslateResult = {
      success: true,
      activatedDomains: [...context.activatedDomains],
      unresolved: unresolvedTokens(items),
    };
    for (const language of languages) {
      result[language] = renderInterpretation(items, language, vocabulary);
    }
    return result;
  });
}

/**
 * Tool definition for MCP
 */
export const translateToolDef = {
  name: 'lambda_translate',
  description: 'Translate a Λ notation message into English and/or Chinese. Control blocks such as {ns:cd} and {def:k=v} are honored, and persist across calls when a session_id is given.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      message: {
        type: 'string',
        description: 'The Λ message, e.g. "?Uk/co" or "{ns:cd}!If/bg"',
      },
      lang: {
        type: 'string',
        enum: ['en', 'zh', 'both'],
        description: 'Output language. Default: the configured default language',
      },
      session_id: {
        type: 'string',
        description: 'Session whose activated domains and definitions apply; updated by control blocks in the message',
      },
    },
    required: ['message'],
  },
};
