/**
 * Tool argument readers
 *
 * MCP hands tool arguments over as untyped JSON; these narrow them to the
 * tool input types and throw with a readable message on a bad argument.
 */

import { isLanguageTag } from '../lambda/vocabulary.js';
import type { OutputLanguage } from '../types.js';

export type ToolArgs = Record<string, unknown> | undefined;

export function requireString(args: ToolArgs, name: string): string {
  const value = args?.[name];
  if (typeof value !== 'string') {
    throw new Error(`Missing required string argument: ${name}`);
  }
  return value;
}

export function optionalString(args: ToolArgs, name: string): string | undefined {
  const value = args?.[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Argument ${name} must be a string`);
  }
  return value;
}

export function optionalBoolean(args: ToolArgs, name: string): boolean | undefined {
  const value = args?.[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`Argument ${name} must be a boolean`);
  }
  return value;
}

export function optionalStringArray(args: ToolArgs, name: string): string[] | undefined {
  const value = args?.[name];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every(v => typeof v === 'string')) {
    throw new Error(`Argument ${name} must be an array of strings`);
  }
  return value.filter((v): v is string => typeof v === 'string');
}

export function optionalStringRecord(args: ToolArgs, name: string): Record<string, string> | undefined {
  const value = args?.[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Argument ${name} must be an object of strings`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new Error(`Argument ${name}.${key} must be a string`);
    }
    result[key] = entry;
  }
  return result;
}

export function optionalOutputLanguage(args: ToolArgs, name: string): OutputLanguage | undefined {
  const value = optionalString(args, name);
  if (value === undefined || value === 'both' || isLanguageTag(value)) return value;
  throw new Error(`Argument ${name} must be one of: en, zh, both`);
}
