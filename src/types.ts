import type { LanguageTag } from './lambda/vocabulary.js';

// Configuration
export interface LambdaConfig {
  vocabulary_path?: string;        // Defaults to the bundled data/atoms.json
  default_language: LanguageTag;
  persist_sessions: boolean;       // false keeps sessions in memory only
}

export const DEFAULT_CONFIG: LambdaConfig = {
  default_language: 'en',
  persist_sessions: true,
};

// Stored session
export interface SessionRecord {
  id: string;
  activatedDomains: string[];
  definitions: Record<string, string>;
  createdAt: number;
  updatedAt: number;
}

// MCP Tool inputs
export type OutputLanguage = LanguageTag | 'both';

export interface TranslateInput {
  message: string;
  lang?: OutputLanguage;
  session_id?: string;
}

export interface ParseInput {
  message: string;
  session_id?: string;
}

export interface EncodeInput {
  text: string;
}

export interface SessionInput {
  session_id: string;
  activate?: string[];
  define?: Record<string, string>;
  reset?: boolean;
}
