/**
 * Vocabulary Table Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildVocabulary, type VocabularyTable } from '../src/lambda/vocabulary.js';
import { loadVocabulary, getVocabulary, DEFAULT_VOCABULARY_PATH } from '../src/lambda/loader.js';
import { ConfigurationError } from '../src/lambda/errors.js';

function minimalSource(): Record<string, unknown> {
  return {
    version: '1',
    types: { '?': { en: 'question', zh: '疑问' } },
    entities: {},
    verbs: {},
    modifiers: {},
    time: {},
    quantifiers: {},
    aspect: {},
    extended: { de: { en: 'decide', zh: '决定' } },
    discourse: {},
    emotion: {},
    domains: {},
  };
}

function issuesOf(source: unknown): string[] {
  try {
    buildVocabulary(source);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  return [];
}

describe('Vocabulary Table', () => {
  describe('bundled vocabulary', () => {
    let vocabulary: VocabularyTable;

    beforeAll(() => {
      vocabulary = loadVocabulary();
    });

    it('should load every category', () => {
      expect(vocabulary.version).toBe('2.0');
      expect(vocabulary.categories.types.get('?')?.renderings).toEqual({ en: 'question', zh: '疑问' });
      expect(vocabulary.categories.extended.get('co')?.renderings.en).toBe('consciousness');
      expect(vocabulary.categories.discourse.get('=>')?.renderings.en).toBe('then');
      expect(vocabulary.categories.emotion.get(':)')?.renderings.zh).toBe('开心');
    });

    it('should merge single-character categories into the core table', () => {
      expect(vocabulary.core.get('k')?.category).toBe('verbs');
      expect(vocabulary.core.get('/')?.renderings.en).toBe('about');
      expect(vocabulary.core.get('?')?.category).toBe('types');
    });

    it('should load domains with display names', () => {
      const code = vocabulary.domains.get('cd');
      expect(code?.name).toEqual({ en: 'code', zh: '代码' });
      expect(code?.atoms.get('bg')?.renderings.en).toBe('bug');
      expect(vocabulary.domains.get('soc')?.atoms.get('th')?.renderings.en).toBe('thanks');
    });

    it('should load disambiguation entries', () => {
      const entry = vocabulary.disambiguation.get('de');
      expect(entry?.primary.en).toBe('decide');
      expect(entry?.alternates.get('E')).toEqual({ en: 'death', zh: '死亡' });
      expect(vocabulary.disambiguation.get('lo')?.alternates.get('-')?.en).toBe('lose');
    });

    it('should load the bracketed emotion pairs', () => {
      expect(vocabulary.categories.emotion.get(':)')?.renderings.en).toBe('happy');
      expect(vocabulary.categories.emotion.get(':(')?.renderings.en).toBe('sad');
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(vocabulary)).toBe(true);
      expect(Object.isFrozen(vocabulary.categories)).toBe(true);
      expect(Object.isFrozen(vocabulary.categories.verbs.get('k'))).toBe(true);
    });

    it('should cache by path', () => {
      expect(getVocabulary(DEFAULT_VOCABULARY_PATH)).toBe(getVocabulary(DEFAULT_VOCABULARY_PATH));
    });
  });

  describe('buildVocabulary', () => {
    it('should accept a minimal source without disambiguation', () => {
      const vocabulary = buildVocabulary(minimalSource());
      expect(vocabulary.version).toBe('1');
      expect(vocabulary.disambiguation.size).toBe(0);
      expect(vocabulary.domains.size).toBe(0);
    });

    it('should let the earlier category win a core collision', () => {
      const source = minimalSource();
      source.entities = { '?': { en: 'who', zh: '谁' } };
      const vocabulary = buildVocabulary(source);
      expect(vocabulary.core.get('?')?.category).toBe('types');
      expect(vocabulary.categories.entities.get('?')?.renderings.en).toBe('who');
    });

    it('should reject a source that is not an object', () => {
      expect(() => buildVocabulary([])).toThrow(ConfigurationError);
      expect(() => buildVocabulary(null)).toThrow('Invalid configuration: vocabulary source must be an object');
    });

    it('should require a version marker', () => {
      const source = minimalSource();
      delete source.version;
      expect(issuesOf(source)).toEqual(['version: missing version marker']);
    });

    it('should require every category', () => {
      const source = minimalSource();
      delete source.aspect;
      expect(issuesOf(source)).toEqual(['aspect: missing or not an object']);
    });

    it('should reject keys of the wrong shape', () => {
      const source = minimalSource();
      source.verbs = { kk: { en: 'know', zh: '知道' } };
      source.extended = { Co: { en: 'consciousness', zh: '意识' } };
      expect(issuesOf(source)).toEqual([
        'verbs: invalid key "kk"',
        'extended: invalid key "Co"',
      ]);
    });

    it('should reject renderings missing a language', () => {
      const source = minimalSource();
      source.extended = { co: { en: 'consciousness' } };
      expect(issuesOf(source)).toEqual(['extended.co: en and zh renderings must be non-empty strings']);
    });

    it('should reject bad domain codes', () => {
      const source = minimalSource();
      source.domains = { code: { name: { en: 'code', zh: '代码' }, atoms: {} } };
      expect(issuesOf(source)).toEqual(['domains.code: domain codes must be 2-3 lowercase letters']);
    });

    it('should reject a disambiguation key without an extended entry', () => {
      const source = minimalSource();
      source.disambiguation = {
        lo: { primary: { en: 'love', zh: '爱' }, alternates: {} },
      };
      expect(issuesOf(source)).toEqual(['disambiguation.lo: no extended atom carries the primary meaning']);
    });

    it('should accept a bracket after the first character of a pair', () => {
      const source = minimalSource();
      source.emotion = { ':)': { en: 'happy', zh: '开心' }, ':(': { en: 'sad', zh: '难过' } };
      expect(buildVocabulary(source).categories.emotion.get(':(')?.renderings.en).toBe('sad');
    });

    it('should reject keys that start with a bracket or contain a brace', () => {
      const source = minimalSource();
      source.emotion = { '(:': { en: 'odd', zh: '怪' }, ':}': { en: 'odd', zh: '怪' } };
      source.modifiers = { '[': { en: 'open', zh: '开' } };
      expect(issuesOf(source)).toEqual([
        'modifiers: invalid key "["',
        'emotion: invalid key "(:"',
        'emotion: invalid key ":}"',
      ]);
    });

    it('should reject markers outside the marker alphabet', () => {
      const source = minimalSource();
      source.disambiguation = {
        de: {
          primary: { en: 'decide', zh: '决定' },
          alternates: { Q: { en: 'death', zh: '死亡' } },
        },
      };
      expect(issuesOf(source)).toEqual(['disambiguation.de.alternates: unknown marker "Q"']);
    });

    it('should report every issue at once', () => {
      const source = minimalSource();
      delete source.version;
      source.domains = 'none';
      expect(issuesOf(source)).toHaveLength(2);
    });
  });

  describe('loadVocabulary', () => {
    it('should fail on a missing file', () => {
      expect(() => loadVocabulary(join(tmpdir(), 'no-such-atoms.json'))).toThrow(ConfigurationError);
    });

    it('should fail on invalid JSON', () => {
      const path = join(mkdtempSync(join(tmpdir(), 'lambda-vocab-')), 'atoms.json');
      writeFileSync(path, '{ not json');
      expect(() => loadVocabulary(path)).toThrow(/vocabulary file is not valid JSON/);
    });

    it('should load a valid file from any path', () => {
      const path = join(mkdtempSync(join(tmpdir(), 'lambda-vocab-')), 'atoms.json');
      writeFileSync(path, JSON.stringify(minimalSource()));
      expect(loadVocabulary(path).categories.extended.get('de')?.renderings.zh).toBe('决定');
    });
  });
});
