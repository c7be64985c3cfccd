/**
 * Configuration Management
 *
 * Settings live in <LAMBDA_HOME>/config.json (default ~/.lambda-lang) and
 * can be overridden by environment variables.
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { getLambdaDir, ensureDirectories } from '../db/schema.js';
import { ConfigurationError } from '../lambda/errors.js';
import { DEFAULT_VOCABULARY_PATH, loadVocabulary } from '../lambda/loader.js';
import { isLanguageTag } from '../lambda/vocabulary.js';
import type { LambdaConfig } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';

export function getConfigPath(): string {
  return join(getLambdaDir(), 'config.json');
}

// In-memory config cache
let currentConfig: LambdaConfig | null = null;

/**
 * Keep only the recognised, well-typed fields of a parsed config file
 */
function readConfigFile(value: unknown): Partial<LambdaConfig> {
  const config: Partial<LambdaConfig> = {};
  if (typeof value !== 'object' || value === null) return config;

  const fields: Record<string, unknown> = { ...value };
  if (typeof fields.vocabulary_path === 'string') {
    config.vocabulary_path = fields.vocabulary_path;
  }
  if (isLanguageTag(fields.default_language)) {
    config.default_language = fields.default_language;
  } else if (fields.default_language !== undefined) {
    console.error(`Ignoring unknown default_language in config: ${String(fields.default_language)}`);
  }
  if (typeof fields.persist_sessions === 'boolean') {
    config.persist_sessions = fields.persist_sessions;
  }
  return config;
}

/**
 * Read the config file, or nothing if it is absent or unreadable
 */
function loadConfigFile(): Partial<LambdaConfig> {
  const configPath = getConfigPath();
  if (!existsSync(configPath)) return {};

  try {
    return readConfigFile(JSON.parse(readFileSync(configPath, 'utf-8')));
  } catch (error) {
    console.error('Failed to load config file:', error);
    return {};
  }
}

/**
 * Settings supplied through environment variables
 */
function readEnvOverrides(): Partial<LambdaConfig> {
  const overrides: Partial<LambdaConfig> = {};

  if (process.env.LAMBDA_VOCABULARY_PATH) {
    overrides.vocabulary_path = process.env.LAMBDA_VOCABULARY_PATH;
  }

  const envLang = process.env.LAMBDA_DEFAULT_LANG;
  if (envLang !== undefined) {
    if (isLanguageTag(envLang)) {
      overrides.default_language = envLang;
    } else {
      console.error(`Ignoring LAMBDA_DEFAULT_LANG=${envLang}: expected en or zh`);
    }
  }

  if (process.env.LAMBDA_PERSIST_SESSIONS !== undefined) {
    overrides.persist_sessions = process.env.LAMBDA_PERSIST_SESSIONS === 'true';
  }

  return overrides;
}

/**
 * Load configuration from disk or environment
 */
export function loadConfig(): LambdaConfig {
  if (currentConfig) {
    return currentConfig;
  }

  const config: LambdaConfig = { ...DEFAULT_CONFIG, ...loadConfigFile(), ...readEnvOverrides() };
  currentConfig = config;
  return config;
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: LambdaConfig): void {
  ensureDirectories();

  // A value still matching its environment override stays in the environment;
  // the file keeps whatever it had for that key
  const env = readEnvOverrides();
  const file = loadConfigFile();
  const configToSave: Partial<LambdaConfig> = { ...config };

  if (env.vocabulary_path !== undefined && config.vocabulary_path === env.vocabulary_path) {
    configToSave.vocabulary_path = file.vocabulary_path;
  }
  if (env.default_language !== undefined && config.default_language === env.default_language) {
    configToSave.default_language = file.default_language;
  }
  if (env.persist_sessions !== undefined && config.persist_sessions === env.persist_sessions) {
    configToSave.persist_sessions = file.persist_sessions;
  }

  // JSON.stringify drops the keys left undefined
  writeFileSync(getConfigPath(), JSON.stringify(configToSave, null, 2), 'utf-8');
  currentConfig = config;
}

/**
 * Update specific config values
 */
export function updateConfig(updates: Partial<LambdaConfig>): LambdaConfig {
  const config = loadConfig();
  const newConfig = { ...config, ...updates };
  saveConfig(newConfig);
  return newConfig;
}

/**
 * Get current config (cached)
 */
export function getConfig(): LambdaConfig {
  return loadConfig();
}

/**
 * Drop the cached config so the next read goes back to disk and environment
 */
export function clearConfigCache(): void {
  currentConfig = null;
}

export function resolveVocabularyPath(config: LambdaConfig = loadConfig()): string {
  return config.vocabulary_path ?? DEFAULT_VOCABULARY_PATH;
}

/**
 * Get config for display
 */
export function getConfigForDisplay(): Record<string, unknown> {
  const config = loadConfig();
  return {
    vocabulary_path: resolveVocabularyPath(config),
    default_language: config.default_language,
    persist_sessions: config.persist_sessions,
    config_path: getConfigPath(),
  };
}

/**
 * Reset config to defaults
 */
export function resetConfig(): LambdaConfig {
  currentConfig = null;
  ensureDirectories();
  writeFileSync(getConfigPath(), JSON.stringify(DEFAULT_CONFIG, null, 2), 'utf-8');
  return loadConfig();
}

/**
 * Validate config and return any issues
 */
export function validateConfig(): { valid: boolean; issues: string[] } {
  const config = loadConfig();
  const issues: string[] = [];

  try {
    loadVocabulary(resolveVocabularyPath(config));
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    issues.push(error.message);
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
