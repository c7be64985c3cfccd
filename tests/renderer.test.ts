/**
 * Renderer Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { createContext } from '../src/lambda/context.js';
import { loadVocabulary } from '../src/lambda/loader.js';
import { interpret, render, translate, unresolvedTokens } from '../src/lambda/renderer.js';
import type { VocabularyTable } from '../src/lambda/vocabulary.js';

describe('Renderer', () => {
  let vocabulary: VocabularyTable;

  beforeAll(() => {
    vocabulary = loadVocabulary();
  });

  describe('render', () => {
    it('should render a question in both languages', () => {
      expect(translate('?Uk/co', vocabulary)).toEqual({
        en: '(question) you know about consciousness',
        zh: '(疑问) 你知道关于意识',
      });
    });

    it('should pick disambiguated meanings', () => {
      expect(render("!Ide'E", 'en', vocabulary)).toBe('(statement) I death');
      expect(render('!Ilo-', 'en', vocabulary)).toBe('(statement) I lose');
    });

    it('should use a domain activated earlier in the message', () => {
      expect(translate('{ns:cd}!If/bg', vocabulary)).toEqual({
        en: '(statement) I find about bug',
        zh: '(陈述) 我寻找关于缺陷',
      });
    });

    it('should split a domain atom into single characters when no domain is active', () => {
      expect(render('!Ibg', 'en', vocabulary)).toBe('(statement) I become give');
    });

    it('should apply a local definition', () => {
      expect(translate('{def:fe=custom}!Ife', vocabulary)).toEqual({
        en: '(statement) I custom',
        zh: '(陈述) 我custom',
      });
    });

    it('should ignore an empty definition', () => {
      expect(render('{def:fe=}!Ife', 'en', vocabulary)).toBe('(statement) I feel');
    });

    it('should not leave gaps for atoms defined as empty text', () => {
      const context = createContext({ definitions: { fe: '' } });
      expect(render('!Ife k', 'en', vocabulary, context)).toBe('(statement) I know');
    });

    it('should apply a block only to the tokens after it', () => {
      expect(render('fe{def:fe=custom}fe', 'en', vocabulary)).toBe('feel custom');
    });

    it('should mark unknown tokens', () => {
      expect(render('!IQ', 'en', vocabulary)).toBe('(statement) I [Q]');
      expect(render('!I{ns:cd', 'en', vocabulary)).toBe('(statement) I [{ns:cd]');
    });

    it('should pass brackets through', () => {
      expect(translate('!I(k co)', vocabulary)).toEqual({
        en: '(statement) I ( know consciousness )',
        zh: '(陈述) 我(知道意识)',
      });
    });

    it('should only use the first type marker as the prefix', () => {
      expect(render('?!', 'en', vocabulary)).toBe('(question) statement');
    });

    it('should render a bare type marker', () => {
      expect(render('~', 'en', vocabulary)).toBe('(uncertain)');
    });

    it('should render without a prefix when there is no type marker', () => {
      expect(render('I:)', 'en', vocabulary)).toBe('I happy');
      expect(render('', 'en', vocabulary)).toBe('');
    });

    it('should carry a supplied context across calls', () => {
      const context = createContext();
      render('{ns:cd}', 'en', vocabulary, context);
      expect(render('!Ibg', 'en', vocabulary, context)).toBe('(statement) I bug');
    });
  });

  describe('interpret', () => {
    it('should leave blocks and brackets without resolutions', () => {
      const items = interpret('{ns:cd}(k)', createContext(), vocabulary);
      expect(items.map(item => [item.token.kind, item.resolutions === null])).toEqual([
        ['block', true],
        ['bracket', true],
        ['atom', false],
        ['bracket', true],
      ]);
    });

    it('should resolve each token in both languages', () => {
      const [item] = interpret('co', createContext(), vocabulary);
      expect(item.resolutions).toEqual({
        en: { resolved: true, text: 'consciousness', source: 'extended' },
        zh: { resolved: true, text: '意识', source: 'extended' },
      });
    });
  });

  describe('unresolvedTokens', () => {
    it('should list tokens that found no meaning', () => {
      expect(unresolvedTokens(interpret('!IQ k Z#', createContext(), vocabulary))).toEqual(['Q', 'Z#']);
    });
  });
});
