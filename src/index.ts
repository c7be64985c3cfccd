#!/usr/bin/env node
/**
 * Λ (Lambda) MCP Server
 *
 * Exposes Λ notation translation to agents over stdio: translate, parse,
 * encode, and session management with persistent context.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { openSessionDb } from './db/index.js';
import { loadConfig, resolveVocabularyPath } from './config/index.js';
import { getVocabulary } from './lambda/index.js';
import {
  translateMessage,
  translateToolDef,
  toTranslateInput,
  parseMessage,
  parseToolDef,
  toParseInput,
  encodeText,
  encodeToolDef,
  toEncodeInput,
  updateSession,
  sessionToolDef,
  toSessionInput,
} from './tools/index.js';

// Initialize config, vocabulary and session store. A broken vocabulary is fatal.
const appConfig = loadConfig();
const vocabulary = getVocabulary(resolveVocabularyPath(appConfig));
const db = openSessionDb(appConfig.persist_sessions ? undefined : ':memory:');

function textResult(result: unknown) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}

// Create MCP server
const server = new Server(
  {
    name: 'lambda-lang',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      translateToolDef,
      parseToolDef,
      encodeToolDef,
      sessionToolDef,
    ],
  };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'lambda_translate':
        return textResult(translateMessage(db, vocabulary, toTranslateInput(args)));

      case 'lambda_parse':
        return textResult(parseMessage(db, vocabulary, toParseInput(args)));

      case 'lambda_encode':
        return textResult(encodeText(vocabulary, toEncodeInput(args)));

      case 'lambda_session':
        return textResult(updateSession(db, vocabulary, toSessionInput(args)));

      default:
        return {
          content: [
            {
              type: 'text' as const,
              text: `Unknown tool: ${name}`,
            },
          ],
          isError: true,
        };
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return {
      content: [
        {
          type: 'text' as const,
          text: `Error: ${errorMessage}`,
        },
      ],
      isError: true,
    };
  }
});

// Handle cleanup
process.on('SIGINT', () => {
  db.close();
  process.exit(0);
});

process.on('SIGTERM', () => {
  db.close();
  process.exit(0);
});

// Start the server
async function main() {
  try {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`Lambda MCP server running (vocabulary v${vocabulary.version})`);
  } catch (error) {
    console.error('Failed to connect transport:', error);
    throw error;
  }
}

process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  db.close();
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
});

main().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
