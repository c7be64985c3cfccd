/**
 * lambda_session - Inspect or change a stored translation session
 */

import type Database from 'better-sqlite3';
import { deleteSession, getSession, loadSession, saveSession } from '../db/sessions.js';
import { activateDomain, defineLocal } from '../lambda/context.js';
import type { VocabularyTable } from '../lambda/vocabulary.js';
import type { SessionInput } from '../types.js';
import {
  optionalBoolean,
  optionalStringArray,
  optionalStringRecord,
  requireString,
  type ToolArgs,
} from './input.js';

export interface SessionResult {
  success: boolean;
  sessionId: string;
  activatedDomains: string[];
  definitions: Record<string, string>;
  warnings?: string[];
}

export function toSessionInput(args: ToolArgs): SessionInput {
  return {
    session_id: requireString(args, 'session_id'),
    activate: optionalStringArray(args, 'activate'),
    define: optionalStringRecord(args, 'define'),
    reset: optionalBoolean(args, 'reset'),
  };
}

/**
 * Apply reset, activations and definitions (in that order) and report the state
 */
export function updateSession(
  db: Database.Database,
  vocabulary: VocabularyTable,
  input: SessionInput
): SessionResult {
  const warnings: string[] = [];
  const changing = input.reset || input.activate !== undefined || input.define !== undefined;

  if (input.reset) {
    deleteSession(db, input.session_id);
  }

  const context = loadSession(db, input.session_id);

  for (const code of input.activate ?? []) {
    // Unknown domains are accepted, they just never resolve anything
    if (!vocabulary.domains.has(code)) {
      warnings.push(`Unknown domain: ${code}`);
    }
    activateDomain(context, code);
  }
  for (const [key, value] of Object.entries(input.define ?? {})) {
    defineLocal(context, key, value);
  }

  const stored = changing ? saveSession(db, input.session_id, context) : getSession(db, input.session_id);

  return {
    success: true,
    sessionId: input.session_id,
    activatedDomains: stored?.activatedDomains ?? [],
    definitions: stored?.definitions ?? {},
    warnings: warnings.length > 0 ? warnings : undefined,
  };
}

/**
 * Tool definition for MCP
 */
export const sessionToolDef = {
  name: 'lambda_session',
  description: 'Show, reset or extend a Λ translation session: activate domains and install local definitions that later lambda_translate calls with the same session_id will use.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      session_id: {
        type: 'string',
        description: 'Session identifier',
      },
      activate: {
        type: 'array',
        items: { type: 'string' },
        description: 'Domain codes to activate, e.g. ["cd"]',
      },
      define: {
        type: 'object',
        additionalProperties: { type: 'string' },
        description: 'Local definitions, atom key to literal rendering',
      },
      reset: {
        type: 'boolean',
        description: 'Clear the session before applying other changes',
      },
    },
    required: ['session_id'],
  },
};
