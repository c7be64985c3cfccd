/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  clearConfigCache,
  getConfigForDisplay,
  getConfigPath,
  loadConfig,
  resetConfig,
  resolveVocabularyPath,
  updateConfig,
  validateConfig,
} from '../src/config/index.js';
import { DEFAULT_VOCABULARY_PATH } from '../src/lambda/loader.js';

describe('Configuration', () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'lambda-config-'));
    process.env.LAMBDA_HOME = home;
    clearConfigCache();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.LAMBDA_HOME;
    delete process.env.LAMBDA_VOCABULARY_PATH;
    delete process.env.LAMBDA_DEFAULT_LANG;
    delete process.env.LAMBDA_PERSIST_SESSIONS;
    clearConfigCache();
    rmSync(home, { recursive: true, force: true });
  });

  it('should use defaults without a config file', () => {
    expect(loadConfig()).toEqual({ default_language: 'en', persist_sessions: true });
    expect(resolveVocabularyPath()).toBe(DEFAULT_VOCABULARY_PATH);
    expect(getConfigPath()).toBe(join(home, 'config.json'));
  });

  it('should read the config file', () => {
    writeFileSync(
      getConfigPath(),
      JSON.stringify({ vocabulary_path: '/tmp/atoms.json', default_language: 'zh', persist_sessions: false })
    );
    expect(loadConfig()).toEqual({
      vocabulary_path: '/tmp/atoms.json',
      default_language: 'zh',
      persist_sessions: false,
    });
  });

  it('should let the environment override the file', () => {
    writeFileSync(getConfigPath(), JSON.stringify({ default_language: 'zh' }));
    process.env.LAMBDA_DEFAULT_LANG = 'en';
    process.env.LAMBDA_PERSIST_SESSIONS = 'false';
    process.env.LAMBDA_VOCABULARY_PATH = '/env/atoms.json';

    expect(loadConfig()).toEqual({
      vocabulary_path: '/env/atoms.json',
      default_language: 'en',
      persist_sessions: false,
    });
  });

  it('should ignore an invalid language and log it', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(getConfigPath(), JSON.stringify({ default_language: 'fr' }));

    expect(loadConfig().default_language).toBe('en');
    expect(errorSpy).toHaveBeenCalledWith('Ignoring unknown default_language in config: fr');
  });

  it('should ignore an invalid language from the environment', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    process.env.LAMBDA_DEFAULT_LANG = 'fr';

    expect(loadConfig().default_language).toBe('en');
    expect(errorSpy).toHaveBeenCalledWith('Ignoring LAMBDA_DEFAULT_LANG=fr: expected en or zh');
  });

  it('should fall back to defaults on a malformed file', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeFileSync(getConfigPath(), 'not json');

    expect(loadConfig()).toEqual({ default_language: 'en', persist_sessions: true });
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should cache until cleared', () => {
    expect(loadConfig().default_language).toBe('en');
    writeFileSync(getConfigPath(), JSON.stringify({ default_language: 'zh' }));
    expect(loadConfig().default_language).toBe('en');
    clearConfigCache();
    expect(loadConfig().default_language).toBe('zh');
  });

  it('should write updates to disk', () => {
    updateConfig({ default_language: 'zh' });
    expect(JSON.parse(readFileSync(getConfigPath(), 'utf-8'))).toEqual({
      default_language: 'zh',
      persist_sessions: true,
    });

    clearConfigCache();
    expect(loadConfig().default_language).toBe('zh');
  });

  it('should not persist a vocabulary path taken from the environment', () => {
    process.env.LAMBDA_VOCABULARY_PATH = '/env/atoms.json';
    updateConfig({ persist_sessions: false });

    expect(JSON.parse(readFileSync(getConfigPath(), 'utf-8'))).toEqual({
      default_language: 'en',
      persist_sessions: false,
    });
  });

  it('should keep every environment override out of the file', () => {
    writeFileSync(getConfigPath(), JSON.stringify({ default_language: 'en' }));
    process.env.LAMBDA_DEFAULT_LANG = 'zh';
    process.env.LAMBDA_PERSIST_SESSIONS = 'false';

    updateConfig({ vocabulary_path: '/tmp/atoms.json' });

    expect(JSON.parse(readFileSync(getConfigPath(), 'utf-8'))).toEqual({
      default_language: 'en',
      vocabulary_path: '/tmp/atoms.json',
    });
    expect(loadConfig().default_language).toBe('zh');
  });

  it('should write a value that differs from its environment override', () => {
    process.env.LAMBDA_DEFAULT_LANG = 'zh';
    updateConfig({ default_language: 'en' });

    expect(JSON.parse(readFileSync(getConfigPath(), 'utf-8'))).toMatchObject({ default_language: 'en' });
  });

  it('should reset to defaults', () => {
    updateConfig({ default_language: 'zh', vocabulary_path: '/tmp/atoms.json' });
    expect(resetConfig()).toEqual({ default_language: 'en', persist_sessions: true });
    clearConfigCache();
    expect(loadConfig()).toEqual({ default_language: 'en', persist_sessions: true });
  });

  it('should show the resolved settings', () => {
    expect(getConfigForDisplay()).toEqual({
      vocabulary_path: DEFAULT_VOCABULARY_PATH,
      default_language: 'en',
      persist_sessions: true,
      config_path: join(home, 'config.json'),
    });
  });

  describe('validateConfig', () => {
    it('should accept the bundled vocabulary', () => {
      expect(validateConfig()).toEqual({ valid: true, issues: [] });
    });

    it('should report a missing vocabulary file', () => {
      const missing = join(home, 'missing.json');
      process.env.LAMBDA_VOCABULARY_PATH = missing;

      expect(validateConfig()).toEqual({
        valid: false,
        issues: [`Invalid configuration (${missing}): vocabulary file not found`],
      });
    });

    it('should report an invalid vocabulary file', () => {
      const broken = join(home, 'broken.json');
      writeFileSync(broken, JSON.stringify({ version: '1' }));
      updateConfig({ vocabulary_path: broken });

      const result = validateConfig();
      expect(result.valid).toBe(false);
      expect(result.issues[0]).toContain('types: missing or not an object');
    });
  });
});
