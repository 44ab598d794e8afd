#!/usr/bin/env node
/**
 * pinecone-assistant-mcp - MCP Server Entry Point
 *
 * Exposes one tool, assistant_context, which retrieves context snippets
 * from a Pinecone Assistant knowledge base over stdio.
 */

import { AssistantClient } from './clients/assistant-client.js';
import { loadConfig } from './config.js';
import { AssistantRouter } from './router.js';
import { AssistantMcpServer, createServer } from './server.js';
import { logError, logInfo, setLogLevel } from './utils/logger.js';

// stdout carries the protocol; keep stray console output off it
console.log = (): void => {};
console.info = (): void => {};
console.debug = (): void => {};

let server: AssistantMcpServer | null = null;

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logging.level);
  logInfo('Configuration loaded', { host: config.pinecone.assistantHost });

  const shutdown = async (): Promise<void> => {
    if (server) {
      await server.stop();
    }
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown().catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
    });
  }

  const client = new AssistantClient({
    apiKey: config.pinecone.apiKey,
    baseUrl: config.pinecone.assistantHost,
    timeoutMs: config.pinecone.timeoutMs,
  });
  logInfo('Pinecone client initialized', { host: client.host });

  server = await createServer(AssistantRouter.withClient(client));
}

main().catch((error: unknown) => {
  logError('Failed to start MCP server', error);
  console.error('Failed to start MCP server:', error instanceof Error ? error.message : error);
  process.exit(1);
});
