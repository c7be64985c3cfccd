/**
 * Λ Context - per-session resolution state
 *
 * Holds the activated domains (activation order, no duplicates) and local
 * definitions. Owned by one session at a time; there is no locking, so two
 * scans must never run against the same context concurrently.
 */

export interface Context {
  readonly activatedDomains: string[];
  readonly definitions: Map<string, string>;
}

/**
 * Serializable form of a context, used by the session store
 */
export interface ContextSnapshot {
  activatedDomains: string[];
  definitions: Record<string, string>;
}

export function createContext(init?: Partial<ContextSnapshot>): Context {
  const context: Context = { activatedDomains: [], definitions: new Map() };

  for (const code of init?.activatedDomains ?? []) {
    activateDomain(context, code);
  }
  for (const [key, value] of Object.entries(init?.definitions ?? {})) {
    defineLocal(context, key, value);
  }

  return context;
}

/**
 * Activate a domain. Returns false when it was already active.
 */
export function activateDomain(context: Context, code: string): boolean {
  if (context.activatedDomains.includes(code)) {
    return false;
  }
  context.activatedDomains.push(code);
  return true;
}

/**
 * Install or overwrite a local definition
 */
export function defineLocal(context: Context, key: string, value: string): void {
  context.definitions.set(key, value);
}

export function resetContext(context: Context): void {
  context.activatedDomains.length = 0;
  context.definitions.clear();
}

export function snapshotContext(context: Context): ContextSnapshot {
  return {
    activatedDomains: [...context.activatedDomains],
    definitions: Object.fromEntries(context.definitions),
  };
}
