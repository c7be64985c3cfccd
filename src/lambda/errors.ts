/**
 * Lambda Errors
 */

/**
 * Raised when a vocabulary source or configuration file is malformed.
 * Fatal at startup; never raised while translating.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[] | string, source?: string) {
    const list = Array.isArray(issues) ? issues : [issues];
    const where = source ? ` (${source})` : '';
    super(`Invalid configuration${where}: ${list.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = list;
  }
}
