#!/usr/bin/env tsx
/**
 * Agent Bridge MCP server entry point (stdio).
 *
 * stdout carries the protocol; every log line goes to stderr.
 */
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createBridgeContext, loadConfig } from '@agent-bridge/core';
import { ToolHandler } from './mcp/tools.js';
import { createMcpServer } from './server.js';

async function run(): Promise<void> {
  const config = loadConfig();
  const ctx = createBridgeContext(config);
  const server = createMcpServer(new ToolHandler(ctx));

  const shutdown = () => {
    ctx.logger.info('Shutting down');
    server.close()
      .catch((error: unknown) => ctx.logger.error('Error closing server', error))
      .finally(() => {
        ctx.close();
        process.exit(0);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.connect(new StdioServerTransport());
  ctx.logger.info(`Connected via stdio (database: ${config.dbPath})`);
}

run().catch((error: unknown) => {
  console.error('[agent-bridge-mcp] Fatal error:', error);
  process.exit(1);
});
