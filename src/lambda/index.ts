/**
 * Λ (Lambda) Notation Module
 *
 * Compact symbolic notation for agent-to-agent messages, with translation
 * to and from English and Chinese.
 */

export * from './errors.js';
export * from './vocabulary.js';
export * from './loader.js';
export * from './context.js';
export * from './control.js';
export * from './resolver.js';
export * from './scanner.js';
export * from './renderer.js';
export * from './encoder.js';
