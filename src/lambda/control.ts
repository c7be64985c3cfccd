/**
 * Control blocks - `{ns:<code>}` and `{def:<key>=<value>,...}`
 */

import { activateDomain, defineLocal, type Context } from './context.js';

export type ControlBlock =
  | { kind: 'namespace'; domain: string }
  | { kind: 'definitions'; entries: Array<[key: string, value: string]> }
  | { kind: 'unknown'; body: string };

const NAMESPACE_PREFIX = 'ns:';
const DEFINITION_PREFIX = 'def:';

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse the text between `{` and `}`.
 * Definition values are split on commas, so a quoted value cannot contain one.
 * Pairs with an empty key or value are skipped.
 */
export function parseControlBlock(body: string): ControlBlock {
  const text = body.trim();

  if (text.startsWith(NAMESPACE_PREFIX)) {
    const domain = text.slice(NAMESPACE_PREFIX.length).trim();
    return domain ? { kind: 'namespace', domain } : { kind: 'unknown', body };
  }

  if (text.startsWith(DEFINITION_PREFIX)) {
    const entries: Array<[string, string]> = [];
    for (const pair of text.slice(DEFINITION_PREFIX.length).split(',')) {
      const eq = pair.indexOf('=');
      if (eq === -1) continue;
      const key = pair.slice(0, eq).trim();
      const value = unquote(pair.slice(eq + 1).trim());
      if (!key || !value) continue;
      entries.push([key, value]);
    }
    return { kind: 'definitions', entries };
  }

  return { kind: 'unknown', body };
}

/**
 * Apply a parsed block to the session context. Unknown blocks are inert.
 */
export function applyControlBlock(context: Context, block: ControlBlock): void {
  switch (block.kind) {
    case 'namespace':
      activateDomain(context, block.domain);
      break;
    case 'definitions':
      for (const [key, value] of block.entries) {
        defineLocal(context, key, value);
      }
      break;
    case 'unknown':
      break;
  }
}
