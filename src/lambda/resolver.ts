/**
 * Λ Resolver - maps a token to its rendering
 *
 * Precedence is the order of RESOLUTION_CHAIN: local definitions, then
 * disambiguation, explicit domain prefix, activated domains, and finally the
 * discourse, emotion, extended and core tables. First match wins.
 */

import type { Context } from './context.js';
import type { LanguageTag, VocabularyTable } from './vocabulary.js';

export type ResolutionSource =
  | 'definitions'
  | 'disambiguation'
  | 'domain-prefix'
  | 'active-domains'
  | 'discourse'
  | 'emotion'
  | 'extended'
  | 'core';

export type Resolution =
  | { resolved: true; text: string; source: ResolutionSource }
  | { resolved: false; token: string };

/**
 * A token split into its lookup parts
 */
export interface AtomReference {
  token: string;
  base: string;
  marker?: string;
  domain?: string;
  atom?: string;
}

export interface ResolverStrategy {
  name: ResolutionSource;
  lookup(ref: AtomReference, lang: LanguageTag, context: Context, vocabulary: VocabularyTable): string | undefined;
}

const DOMAIN_PREFIXED = /^([a-z]{2,3}):([a-z]{2})$/;
const QUOTED_MARKER = /^([a-z]{2})'(.)$/u;
const POSITIONAL_MARKER = /^([a-z]{2})-$/;

export function parseAtomReference(token: string): AtomReference {
  const prefixed = DOMAIN_PREFIXED.exec(token);
  if (prefixed) {
    return { token, base: token, domain: prefixed[1], atom: prefixed[2] };
  }

  const quoted = QUOTED_MARKER.exec(token);
  if (quoted) {
    return { token, base: quoted[1], marker: quoted[2] };
  }

  const positional = POSITIONAL_MARKER.exec(token);
  if (positional) {
    return { token, base: positional[1], marker: '-' };
  }

  return { token, base: token };
}

const definitions: ResolverStrategy = {
  name: 'definitions',
  lookup: (ref, _lang, context) => context.definitions.get(ref.base),
};

const disambiguation: ResolverStrategy = {
  name: 'disambiguation',
  lookup: (ref, lang, _context, vocabulary) => {
    const entry = vocabulary.disambiguation.get(ref.base);
    if (!entry) return undefined;
    // An unrecognised marker falls back to the primary meaning
    const alternate = ref.marker !== undefined ? entry.alternates.get(ref.marker) : undefined;
    return (alternate ?? entry.primary)[lang];
  },
};

const domainPrefix: ResolverStrategy = {
  name: 'domain-prefix',
  lookup: (ref, lang, _context, vocabulary) => {
    if (ref.domain === undefined || ref.atom === undefined) return undefined;
    return vocabulary.domains.get(ref.domain)?.atoms.get(ref.atom)?.renderings[lang];
  },
};

const activeDomains: ResolverStrategy = {
  name: 'active-domains',
  lookup: (ref, lang, context, vocabulary) => {
    for (const code of context.activatedDomains) {
      const atom = vocabulary.domains.get(code)?.atoms.get(ref.base);
      if (atom) return atom.renderings[lang];
    }
    return undefined;
  },
};

function tableLookup(name: 'discourse' | 'emotion' | 'extended'): ResolverStrategy {
  return {
    name,
    lookup: (ref, lang, _context, vocabulary) => vocabulary.categories[name].get(ref.base)?.renderings[lang],
  };
}

const core: ResolverStrategy = {
  name: 'core',
  lookup: (ref, lang, _context, vocabulary) => vocabulary.core.get(ref.base)?.renderings[lang],
};

export const RESOLUTION_CHAIN: readonly ResolverStrategy[] = [
  definitions,
  disambiguation,
  domainPrefix,
  activeDomains,
  tableLookup('discourse'),
  tableLookup('emotion'),
  tableLookup('extended'),
  core,
];

/**
 * Resolve a raw token in the given language
 */
export function resolve(
  token: string,
  lang: LanguageTag,
  context: Context,
  vocabulary: VocabularyTable
): Resolution {
  const ref = parseAtomReference(token);

  for (const strategy of RESOLUTION_CHAIN) {
    const text = strategy.lookup(ref, lang, context, vocabulary);
    if (text !== undefined) {
      return { resolved: true, text, source: strategy.name };
    }
  }

  return { resolved: false, token };
}

/**
 * True when the token resolves in any language. Languages share keys, so
 * checking one suffices.
 */
export function isResolvable(token: string, context: Context, vocabulary: VocabularyTable): boolean {
  return resolve(token, 'en', context, vocabulary).resolved;
}
