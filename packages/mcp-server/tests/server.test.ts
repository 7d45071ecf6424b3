/**
 * MCP Server Tests
 *
 * Drives the server through the SDK client over an in-process transport.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { TOOL_NAMES } from '@agent-bridge/types';
import { createMcpServer, SERVER_NAME } from '../src/server.js';
import { createToolHarness, type ToolHarness } from './harness.js';

function firstText(result: unknown): string {
  const parsed = CallToolResultSchema.parse(result);
  const block = parsed.content[0];
  if (block?.type !== 'text') {
    throw new Error('Expected a text block');
  }
  return block.text;
}

describe('MCP server', () => {
  let h: ToolHarness;
  let client: Client;

  beforeEach(async () => {
    h = createToolHarness();
    const server = createMcpServer(h.tools);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    h.ctx.close();
  });

  it('identifies itself', () => {
    expect(client.getServerVersion()?.name).toBe(SERVER_NAME);
  });

  it('lists every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map(t => t.name).sort()).toEqual([...TOOL_NAMES].sort());
  });

  it('runs a tool call end to end', async () => {
    await client.callTool({ name: 'register', arguments: { name: 'worker' } });
    const result = await client.callTool({ name: 'agents', arguments: {} });

    expect(result.isError).toBeFalsy();
    expect(JSON.parse(firstText(result))).toMatchObject([{ name: 'worker', status: 'active' }]);
  });

  it('returns failures as error results', async () => {
    const result = await client.callTool({
      name: 'lock',
      arguments: { path: 'src/app.ts', agent: 'worker', ttlSeconds: -5 }
    });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe('Error: [VALIDATION] Invalid arguments: ttlSeconds: Number must be greater than 0');
  });
});
