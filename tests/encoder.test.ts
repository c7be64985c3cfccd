/**
 * Encoder Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { buildReverseLookup, encodeEnglish } from '../src/lambda/encoder.js';
import { loadVocabulary } from '../src/lambda/loader.js';
import { render } from '../src/lambda/renderer.js';
import type { VocabularyTable } from '../src/lambda/vocabulary.js';

describe('Encoder', () => {
  let vocabulary: VocabularyTable;

  beforeAll(() => {
    vocabulary = loadVocabulary();
  });

  describe('buildReverseLookup', () => {
    it('should map lowercase English words to atom keys', () => {
      const reverse = buildReverseLookup(vocabulary);
      expect(reverse.get('i')).toBe('I');
      expect(reverse.get('know')).toBe('k');
      expect(reverse.get('about')).toBe('/');
      expect(reverse.get('consciousness')).toBe('co');
    });

    it('should leave out types and domain atoms', () => {
      const reverse = buildReverseLookup(vocabulary);
      expect(reverse.get('statement')).toBeUndefined();
      expect(reverse.get('bug')).toBeUndefined();
    });
  });

  describe('encodeEnglish', () => {
    it('should encode a question', () => {
      expect(encodeEnglish('do you know about consciousness?', vocabulary)).toBe('?dUk/co');
    });

    it('should encode a statement', () => {
      expect(encodeEnglish('I want help', vocabulary)).toBe('!Iwhp');
    });

    it('should treat a leading command word as a command', () => {
      expect(encodeEnglish('Please find the bug', vocabulary)).toBe('.f');
      expect(encodeEnglish('Create a new plan.', vocabulary)).toBe('.nepl');
    });

    it('should produce notation that reads back', () => {
      expect(render(encodeEnglish('do you know about consciousness?', vocabulary), 'en', vocabulary)).toBe(
        '(question) do you know about consciousness'
      );
    });

    it('should emit only the type for text without known words', () => {
      expect(encodeEnglish('xyzzy plugh', vocabulary)).toBe('!');
      expect(encodeEnglish('', vocabulary)).toBe('!');
    });
  });
});
