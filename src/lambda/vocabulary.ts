/**
 * Λ Vocabulary Table
 *
 * Immutable atom tables built once from a declarative source (data/atoms.json).
 * Every scan and resolve call receives the table by reference; nothing here
 * is module state.
 */

import { ConfigurationError } from './errors.js';

export const LANGUAGES = ['en', 'zh'] as const;
export type LanguageTag = (typeof LANGUAGES)[number];

// Single-character categories, in lookup order for the core table
export const CORE_CATEGORIES = [
  'types',
  'entities',
  'verbs',
  'modifiers',
  'time',
  'quantifiers',
  'aspect',
] as const;
export type CoreCategory = (typeof CORE_CATEGORIES)[number];

export const PAIR_CATEGORIES = ['extended', 'discourse', 'emotion'] as const;
export type PairCategory = (typeof PAIR_CATEGORIES)[number];

export type AtomCategory = CoreCategory | PairCategory;

// `-` is positional (`lo-`); the others follow a quote (`de'E`)
export const POSITIONAL_MARKER = '-';
export const QUOTED_MARKERS = ['E', 'V', 'S', '2', '3'] as const;
export const DISAMBIGUATION_MARKERS: readonly string[] = [...QUOTED_MARKERS, POSITIONAL_MARKER];

export type Renderings = Readonly<Record<LanguageTag, string>>;

export interface Atom {
  readonly key: string;
  readonly category: AtomCategory | 'domain';
  readonly renderings: Renderings;
}

export interface Domain {
  readonly code: string;
  readonly name: Renderings;
  readonly atoms: ReadonlyMap<string, Atom>;
}

export interface DisambiguationEntry {
  readonly key: string;
  readonly primary: Renderings;
  readonly alternates: ReadonlyMap<string, Renderings>;
}

export interface VocabularyTable {
  readonly version: string;
  readonly categories: Readonly<Record<AtomCategory, ReadonlyMap<string, Atom>>>;
  /** All single-character categories merged; the earlier category wins a collision. */
  readonly core: ReadonlyMap<string, Atom>;
  readonly domains: ReadonlyMap<string, Domain>;
  readonly disambiguation: ReadonlyMap<string, DisambiguationEntry>;
}

export const DOMAIN_CODE_PATTERN = /^[a-z]{2,3}$/;
const LOWER_PAIR_PATTERN = /^[a-z]{2}$/;
const RESERVED_CHARS = new Set(['{', '}']);
// The scanner emits a bracket before trying any atom, so no key may start with one
const BRACKETS = new Set(['(', ')', '[', ']']);

export function isLanguageTag(value: unknown): value is LanguageTag {
  return LANGUAGES.some(lang => lang === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSymbolKey(key: string, length: number): boolean {
  const chars = Array.from(key);
  return (
    chars.length === length &&
    !BRACKETS.has(chars[0]) &&
    chars.every(c => !/\s/u.test(c) && !RESERVED_CHARS.has(c))
  );
}

type KeyCheck = (key: string) => boolean;

const KEY_CHECKS: Record<AtomCategory, KeyCheck> = {
  types: key => isSymbolKey(key, 1),
  entities: key => isSymbolKey(key, 1),
  verbs: key => isSymbolKey(key, 1),
  modifiers: key => isSymbolKey(key, 1),
  time: key => isSymbolKey(key, 1),
  quantifiers: key => isSymbolKey(key, 1),
  aspect: key => isSymbolKey(key, 1),
  extended: key => LOWER_PAIR_PATTERN.test(key),
  discourse: key => isSymbolKey(key, 2),
  emotion: key => isSymbolKey(key, 2),
};

function readRenderings(value: unknown, path: string, issues: string[]): Renderings | undefined {
  if (!isRecord(value)) {
    issues.push(`${path}: expected an object with en/zh renderings`);
    return undefined;
  }

  const { en, zh } = value;
  if (typeof en !== 'string' || en.length === 0 || typeof zh !== 'string' || zh.length === 0) {
    issues.push(`${path}: en and zh renderings must be non-empty strings`);
    return undefined;
  }

  return Object.freeze({ en, zh });
}

function readAtoms(
  value: unknown,
  path: string,
  category: Atom['category'],
  keyCheck: KeyCheck,
  issues: string[]
): ReadonlyMap<string, Atom> {
  const atoms = new Map<string, Atom>();

  if (!isRecord(value)) {
    issues.push(`${path}: missing or not an object`);
    return atoms;
  }

  for (const [key, entry] of Object.entries(value)) {
    if (!keyCheck(key)) {
      issues.push(`${path}: invalid key "${key}"`);
      continue;
    }
    const renderings = readRenderings(entry, `${path}.${key}`, issues);
    if (renderings) {
      atoms.set(key, Object.freeze({ key, category, renderings }));
    }
  }

  return atoms;
}

function readCategory(
  source: Record<string, unknown>,
  category: AtomCategory,
  issues: string[]
): ReadonlyMap<string, Atom> {
  return readAtoms(source[category], category, category, KEY_CHECKS[category], issues);
}

function readDomains(value: unknown, issues: string[]): ReadonlyMap<string, Domain> {
  const domains = new Map<string, Domain>();

  if (!isRecord(value)) {
    issues.push('domains: missing or not an object');
    return domains;
  }

  for (const [code, entry] of Object.entries(value)) {
    const path = `domains.${code}`;
    if (!DOMAIN_CODE_PATTERN.test(code)) {
      issues.push(`${path}: domain codes must be 2-3 lowercase letters`);
      continue;
    }
    if (!isRecord(entry)) {
      issues.push(`${path}: expected an object with name and atoms`);
      continue;
    }

    const name = readRenderings(entry.name, `${path}.name`, issues);
    const atoms = readAtoms(entry.atoms, `${path}.atoms`, 'domain', key => LOWER_PAIR_PATTERN.test(key), issues);
    if (name) {
      domains.set(code, Object.freeze({ code, name, atoms }));
    }
  }

  return domains;
}

function readDisambiguation(
  value: unknown,
  extended: ReadonlyMap<string, Atom>,
  issues: string[]
): ReadonlyMap<string, DisambiguationEntry> {
  const entries = new Map<string, DisambiguationEntry>();

  // Optional: older vocabularies have no overloaded atoms
  if (value === undefined) return entries;

  if (!isRecord(value)) {
    issues.push('disambiguation: not an object');
    return entries;
  }

  for (const [key, entry] of Object.entries(value)) {
    const path = `disambiguation.${key}`;
    if (!extended.has(key)) {
      issues.push(`${path}: no extended atom carries the primary meaning`);
      continue;
    }
    if (!isRecord(entry)) {
      issues.push(`${path}: expected an object with primary and alternates`);
      continue;
    }

    const primary = readRenderings(entry.primary, `${path}.primary`, issues);
    const alternates = new Map<string, Renderings>();

    if (entry.alternates !== undefined && !isRecord(entry.alternates)) {
      issues.push(`${path}.alternates: not an object`);
    } else if (entry.alternates !== undefined) {
      for (const [marker, rendering] of Object.entries(entry.alternates)) {
        if (!DISAMBIGUATION_MARKERS.includes(marker)) {
          issues.push(`${path}.alternates: unknown marker "${marker}"`);
          continue;
        }
        const alternate = readRenderings(rendering, `${path}.alternates.${marker}`, issues);
        if (alternate) alternates.set(marker, alternate);
      }
    }

    if (primary) {
      entries.set(key, Object.freeze({ key, primary, alternates }));
    }
  }

  return entries;
}

/**
 * Validate a parsed vocabulary source and build the immutable table.
 * Collects every problem before throwing.
 */
export function buildVocabulary(source: unknown, origin?: string): VocabularyTable {
  if (!isRecord(source)) {
    throw new ConfigurationError('vocabulary source must be an object', origin);
  }

  const issues: string[] = [];

  if (typeof source.version !== 'string' || source.version.length === 0) {
    issues.push('version: missing version marker');
  }

  const categories: Record<AtomCategory, ReadonlyMap<string, Atom>> = {
    types: readCategory(source, 'types', issues),
    entities: readCategory(source, 'entities', issues),
    verbs: readCategory(source, 'verbs', issues),
    modifiers: readCategory(source, 'modifiers', issues),
    time: readCategory(source, 'time', issues),
    quantifiers: readCategory(source, 'quantifiers', issues),
    aspect: readCategory(source, 'aspect', issues),
    extended: readCategory(source, 'extended', issues),
    discourse: readCategory(source, 'discourse', issues),
    emotion: readCategory(source, 'emotion', issues),
  };

  const domains = readDomains(source.domains, issues);
  const disambiguation = readDisambiguation(source.disambiguation, categories.extended, issues);

  if (issues.length > 0) {
    throw new ConfigurationError(issues, origin);
  }

  const core = new Map<string, Atom>();
  for (const category of CORE_CATEGORIES) {
    for (const [key, atom] of categories[category]) {
      if (!core.has(key)) core.set(key, atom);
    }
  }

  return Object.freeze({
    version: String(source.version),
    categories: Object.freeze(categories),
    core,
    domains,
    disambiguation,
  });
}

/**
 * Check whether a key is a message-type marker (`?`, `!`, ...)
 */
export function isMessageType(vocabulary: VocabularyTable, key: string): boolean {
  return vocabulary.categories.types.has(key);
}
