/**
 * lambda_encode - Convert a simple English sentence into Λ
 */

import { encodeEnglish } from '../lambda/encoder.js';
import { render } from '../lambda/renderer.js';
import type { VocabularyTable } from '../lambda/vocabulary.js';
import type { EncodeInput } from '../types.js';
import { requireString, type ToolArgs } from './input.js';

export interface EncodeResult {
  success: boolean;
  encoded: string;
  reading: string;
  compressionRatio: number;
}

export function toEncodeInput(args: ToolArgs): EncodeInput {
  return { text: requireString(args, 'text') };
}

export function encodeText(vocabulary: VocabularyTable, input: EncodeInput): EncodeResult {
  const encoded = encodeEnglish(input.text, vocabulary);
  return {
    success: true,
    encoded,
    // How the encoding reads back, which shows what the heuristic dropped
    reading: render(encoded, 'en', vocabulary),
    compressionRatio: input.text.length / encoded.length,
  };
}

/**
 * Tool definition for MCP
 */
export const encodeToolDef = {
  name: 'lambda_encode',
  description: 'Encode a simple English sentence as Λ by keyword substitution. Lossy: words without an atom are dropped.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      text: {
        type: 'string',
        description: 'English text, e.g. "do you know about consciousness?"',
      },
    },
    required: ['text'],
  },
};
