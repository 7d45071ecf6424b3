/**
 * MCP server wiring: tool listing and tool calls over any SDK transport.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { MCP_TOOL_DEFINITIONS } from '@agent-bridge/types';
import type { ToolHandler } from './mcp/tools.js';

export const SERVER_NAME = 'agent-bridge';
export const SERVER_VERSION = '0.1.0';

export function createMcpServer(tools: ToolHandler): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: MCP_TOOL_DEFINITIONS
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return tools.call(name, args);
  });

  return server;
}
