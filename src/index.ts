#!/usr/bin/env node

// Movielog MCP Server
// A personal movie log: one Markdown document per film, metadata from TMDB

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { realClock } from './types.js';
import { loadConfig } from './config.js';
import { MarkdownRecordStore } from './store.js';
import { MetadataMatcher } from './matcher.js';
import { createTmdbService } from './metadata-service.js';
import { describeError } from './errors.js';
import { handleToolCall, TOOL_DEFINITIONS } from './tools.js';
import type { ToolDeps } from './tools.js';

// --- Process-level crash protection ---
// Fail fast: unknown state is worse than no state.

process.on('uncaughtException', (error) => {
  process.stderr.write(`[movielog] FATAL: Uncaught exception — exiting.\n`);
  process.stderr.write(`[movielog] Error: ${error.message}\n`);
  if (error.stack) process.stderr.write(`[movielog] Stack: ${error.stack}\n`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  process.stderr.write(`[movielog] FATAL: Unhandled rejection — exiting.\n`);
  process.stderr.write(`[movielog] Error: ${error.message}\n`);
  if (error.stack) process.stderr.write(`[movielog] Stack: ${error.stack}\n`);
  process.exit(1);
});

// --- Configuration ---
const { config, origin } = loadConfig();
const clock = realClock;

const store = new MarkdownRecordStore({ moviesPath: config.moviesPath, clock });

// Lookup tools need a key; everything else works offline
const matcher = config.tmdbApiKey
  ? new MetadataMatcher(createTmdbService({
      apiKey: config.tmdbApiKey,
      timeoutMs: config.lookupTimeoutMs,
      maxCandidates: config.maxCandidates,
      castSize: config.castSize,
    }))
  : null;

const deps: ToolDeps = { store, matcher, config, clock };

const server = new Server(
  { name: 'movielog-mcp', version: '0.1.0' },
  { capabilities: { tools: {} } }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: rawArgs } = request.params;
  return handleToolCall(name, rawArgs, deps);
});

// --- Startup ---
async function main() {
  const configLabel = origin.source === 'file' ? origin.path : origin.source;
  process.stderr.write(`[movielog] Config: ${configLabel}\n`);

  const { records, errors } = await store.init();
  process.stderr.write(`[movielog] Loaded ${records.length} record(s) from ${store.path} (${errors.length} error(s))\n`);
  for (const error of errors) {
    process.stderr.write(`[movielog]   ${describeError(error)}\n`);
  }
  if (!matcher) {
    process.stderr.write('[movielog] No TMDB API key — movie_log, movie_refresh and movie_import are disabled.\n');
  }

  const transport = new StdioServerTransport();

  transport.onerror = (error) => {
    process.stderr.write(`[movielog] Transport error: ${error}\n`);
  };

  server.onerror = (error) => {
    process.stderr.write(`[movielog] Server error: ${error}\n`);
  };

  // Handle stdin/stdout pipe breaks
  process.stdin.on('end', () => {
    process.stderr.write('[movielog] stdin closed — host disconnected. Exiting.\n');
    process.exit(0);
  });
  process.stdin.on('close', () => {
    process.stderr.write('[movielog] stdin closed. Exiting.\n');
    process.exit(0);
  });
  process.stdout.on('error', (error) => {
    process.stderr.write(`[movielog] stdout error (pipe broken?): ${error.message}\n`);
    process.exit(0);
  });

  await server.connect(transport);
  process.stderr.write(`[movielog] Server started with ${store.size} movie(s)\n`);

  const shutdown = () => {
    process.stderr.write('[movielog] Shutting down gracefully.\n');
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  process.stderr.write(`[movielog] Fatal startup error: ${error}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`[movielog] Stack: ${error.stack}\n`);
  }
  process.exit(1);
});
