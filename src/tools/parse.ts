/**
 * lambda_parse - Show how a Λ message tokenizes and what each token means
 */

import type Database from 'better-sqlite3';
import { withSession } from '../db/sessions.js';
import { interpret } from '../lambda/renderer.js';
import type { TokenKind } from '../lambda/scanner.js';
import type { VocabularyTable } from '../lambda/vocabulary.js';
import type { ParseInput } from '../types.js';
import { optionalString, requireString, type ToolArgs } from './input.js';

export interface ParsedToken {
  text: string;
  kind: TokenKind;
  start: number;
  end: number;
  en?: string;
  zh?: string;
  source?: string;
}

export interface ParseResult {
  success: boolean;
  tokens: ParsedToken[];
  activatedDomains: string[];
  definitions: Record<string, string>;
}

export function toParseInput(args: ToolArgs): ParseInput {
  return {
    message: requireString(args, 'message'),
    session_id: optionalString(args, 'session_id'),
  };
}

export function parseMessage(
  db: Database.Database,
  vocabulary: VocabularyTable,
  input: ParseInput
): ParseResult {
  return withSession(db, input.session_id, context => {
    const tokens = interpret(input.message, context, vocabulary).map(({ token, resolutions }): ParsedToken => {
      const parsed: ParsedToken = { text: token.text, kind: token.kind, start: token.start, end: token.end };
      if (resolutions !== null) {
        const { en, zh } = resolutions;
        if (en.resolved && zh.resolved) {
          parsed.en = en.text;
          parsed.zh = zh.text;
          parsed.source = en.source;
        }
      }
      return parsed;
    });

    return {
      success: true,
      tokens,
      activatedDomains: [...context.activatedDomains],
      definitions: Object.fromEntries(context.definitions),
    };
  });
}

/**
 * Tool definition for MCP
 */
export const parseToolDef = {
  name: 'lambda_parse',
  description: 'Tokenize a Λ message and report each token with its kind, position and resolved meaning.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      message: {
        type: 'string',
        description: 'The Λ message to tokenize',
      },
      session_id: {
        type: 'string',
        description: 'Session whose context applies during tokenization',
      },
    },
    required: ['message'],
  },
};
