#!/usr/bin/env node
/**
 * Λ (Lambda) CLI
 *
 * Translate, tokenize and encode Λ messages from the command line.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { createInterface } from 'readline';

import {
  getConfig,
  getConfigForDisplay,
  resetConfig,
  resolveVocabularyPath,
  updateConfig,
  validateConfig,
} from './config/index.js';
import { openSessionDb, loadSession, saveSession, listSessions, deleteSession } from './db/index.js';
import {
  ConfigurationError,
  createContext,
  encodeEnglish,
  getVocabulary,
  interpret,
  isLanguageTag,
  render,
  renderInterpretation,
  resetContext,
  scan,
  type Context,
  type LanguageTag,
  type VocabularyTable,
} from './lambda/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readPackageVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function success(message: string): void {
  log(`✓ ${message}`, 'green');
}

function info(message: string): void {
  log(`ℹ ${message}`, 'blue');
}

function warn(message: string): void {
  log(`⚠ ${message}`, 'yellow');
}

function error(message: string): void {
  log(`✗ ${message}`, 'red');
}

/**
 * Show help message
 */
function showHelp(): void {
  console.log(`
${colors.bright}Λ lambda-lang${colors.reset} v${readPackageVersion()}
Compact notation for agent-to-agent messages

${colors.cyan}Usage:${colors.reset}
  lambda-lang <command> [args]

${colors.cyan}Commands:${colors.reset}
  parse <msg>       Tokenize a message and show each atom
  en <msg>          Translate a message to English
  zh <msg>          Translate a message to Chinese
  from-en <text>    Encode simple English as Λ
  repl              Interactive translation with a persistent context
  sessions          List stored sessions
  config            Manage configuration
  version           Show version
  help              Show this help

${colors.cyan}Repl Options:${colors.reset}
  --lang <en|zh>    Output language (default from config)
  --session <id>    Load and save the context under this session id

${colors.cyan}Sessions Options:${colors.reset}
  --delete <id>     Delete a stored session

${colors.cyan}Config Options:${colors.reset}
  --show            Show current configuration
  --reset           Restore the default configuration
  --set-lang <l>    Set the default language (en or zh)
  --set-vocab <p>   Use a different vocabulary file

${colors.cyan}Examples:${colors.reset}
  lambda-lang en '?Uk/co'
  lambda-lang zh '{ns:cd}!If/bg'
  lambda-lang parse "!Ide'E"
  lambda-lang from-en 'do you know about consciousness?'
  lambda-lang repl --lang zh --session work
`);
}

/**
 * Load the configured vocabulary, exiting with the validation issues on failure
 */
function loadVocabularyOrExit(): VocabularyTable {
  try {
    return getVocabulary(resolveVocabularyPath());
  } catch (err) {
    if (err instanceof ConfigurationError) {
      error('Vocabulary could not be loaded:');
      for (const issue of err.issues) {
        log(`  ${issue}`, 'red');
      }
      process.exit(1);
    }
    throw err;
  }
}

function requireMessage(args: string[], command: string): string {
  const message = args.join(' ');
  if (!message) {
    error(`Missing message. Usage: lambda-lang ${command} <msg>`);
    process.exit(1);
  }
  return message;
}

/**
 * Print each token with its kind and meaning
 */
function parseCommand(args: string[]): void {
  const message = requireMessage(args, 'parse');
  const vocabulary = loadVocabularyOrExit();

  log(`Tokens: ${JSON.stringify(scan(message, createContext(), vocabulary).map(t => t.text))}`, 'cyan');

  for (const { token, resolutions } of interpret(message, createContext(), vocabulary)) {
    const kind = token.kind.padEnd(13);
    if (resolutions === null) {
      log(`  ${kind} ${token.text}`, 'dim');
      continue;
    }
    const { en, zh } = resolutions;
    if (en.resolved && zh.resolved) {
      log(`  ${kind} ${token.text} → ${en.text} / ${zh.text} (${en.source})`);
    } else {
      log(`  ${kind} ${token.text} → ?`, 'yellow');
    }
  }
}

function translateCommand(args: string[], lang: LanguageTag): void {
  const message = requireMessage(args, lang);
  const vocabulary = loadVocabularyOrExit();
  console.log(render(message, lang, vocabulary));
}

function fromEnglishCommand(args: string[]): void {
  const text = requireMessage(args, 'from-en');
  const vocabulary = loadVocabularyOrExit();
  console.log(encodeEnglish(text, vocabulary));
}

function optionValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index !== -1 ? args[index + 1] : undefined;
}

function describeContext(context: Context): void {
  log(`  domains: ${context.activatedDomains.join(', ') || '(none)'}`, 'dim');
  for (const [key, value] of context.definitions) {
    log(`  ${key} = ${value}`, 'dim');
  }
}

/**
 * Interactive read loop. One context lives for the whole loop, so
 * `{ns:...}` and `{def:...}` carry over from one line to the next.
 */
function replCommand(args: string[]): void {
  const vocabulary = loadVocabularyOrExit();

  const langArg = optionValue(args, '--lang');
  let lang: LanguageTag = getConfig().default_language;
  if (langArg !== undefined) {
    if (!isLanguageTag(langArg)) {
      error(`Unknown language: ${langArg}. Use en or zh.`);
      process.exit(1);
    }
    lang = langArg;
  }

  const sessionId = optionValue(args, '--session');
  const db = sessionId !== undefined ? openSessionDb() : undefined;
  const context = db && sessionId !== undefined ? loadSession(db, sessionId) : createContext();

  const persist = (): void => {
    if (db && sessionId !== undefined) saveSession(db, sessionId, context);
  };

  log('\nΛ repl. :lang <en|zh>, :context, :reset, :quit\n', 'bright');
  if (sessionId !== undefined) {
    info(`Session: ${sessionId}`);
    describeContext(context);
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'Λ> ' });

  rl.on('line', (line: string) => {
    const input = line.trim();

    if (input === ':quit' || input === ':q') {
      rl.close();
      return;
    }

    if (input.startsWith(':lang')) {
      const next = input.slice(':lang'.length).trim();
      if (isLanguageTag(next)) {
        lang = next;
        success(`Language: ${lang}`);
      } else {
        warn('Use :lang en or :lang zh');
      }
    } else if (input === ':context') {
      describeContext(context);
    } else if (input === ':reset') {
      resetContext(context);
      persist();
      success('Context cleared');
    } else if (input) {
      const items = interpret(input, context, vocabulary);
      console.log(renderInterpretation(items, lang, vocabulary));
      persist();
    }

    rl.prompt();
  });

  rl.on('close', () => {
    persist();
    db?.close();
    log('');
  });

  rl.prompt();
}

/**
 * List stored sessions, most recently used first
 */
function sessionsCommand(args: string[]): void {
  const db = openSessionDb();

  try {
    const toDelete = optionValue(args, '--delete');
    if (toDelete !== undefined) {
      if (deleteSession(db, toDelete)) {
        success(`Deleted session ${toDelete}`);
      } else {
        warn(`No session named ${toDelete}`);
      }
      return;
    }

    const sessions = listSessions(db);
    if (sessions.length === 0) {
      info('No stored sessions');
      return;
    }

    log('\nStored sessions\n', 'bright');
    for (const session of sessions) {
      const domains = session.activatedDomains.join(', ') || '(none)';
      const definitions = Object.keys(session.definitions).length;
      log(`  ${session.id.padEnd(20)} domains: ${domains}  definitions: ${definitions}  updated: ${new Date(session.updatedAt).toISOString()}`);
    }
    log('');
  } finally {
    db.close();
  }
}

/**
 * Manage configuration
 */
function config(args: string[]): void {
  if (args.includes('--reset')) {
    resetConfig();
    success('Configuration reset to defaults');
    showConfig();
    return;
  }

  const lang = optionValue(args, '--set-lang');
  if (lang !== undefined) {
    if (!isLanguageTag(lang)) {
      error(`Unknown language: ${lang}. Use en or zh.`);
      process.exit(1);
    }
    updateConfig({ default_language: lang });
    success(`Default language set to ${lang}`);
    return;
  }

  const vocabPath = optionValue(args, '--set-vocab');
  if (vocabPath !== undefined) {
    updateConfig({ vocabulary_path: vocabPath });
    success(`Vocabulary path set to ${vocabPath}`);
  }

  // Default (and --show): show config
  showConfig();
}

/**
 * Show current configuration
 */
function showConfig(): void {
  log('\n📋 Lambda Configuration\n', 'bright');

  for (const [key, value] of Object.entries(getConfigForDisplay())) {
    log(`  ${key}: ${JSON.stringify(value)}`);
  }
  log('');

  const validation = validateConfig();
  if (validation.valid) {
    success('Vocabulary loads cleanly');
  } else {
    for (const issue of validation.issues) {
      warn(issue);
    }
  }
  log('');
}

/**
 * Main CLI entry point
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'parse':
      parseCommand(args.slice(1));
      break;
    case 'en':
    case 'zh':
      translateCommand(args.slice(1), command);
      break;
    case 'from-en':
      fromEnglishCommand(args.slice(1));
      break;
    case 'repl':
      replCommand(args.slice(1));
      break;
    case 'sessions':
      sessionsCommand(args.slice(1));
      break;
    case 'config':
      config(args.slice(1));
      break;
    case 'version':
    case '-v':
    case '--version':
      console.log(`lambda-lang v${readPackageVersion()}`);
      break;
    case 'help':
    case '-h':
    case '--help':
    case undefined:
      showHelp();
      break;
    default:
      error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
}

main();
