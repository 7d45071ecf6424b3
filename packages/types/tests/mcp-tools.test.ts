import { describe, it, expect } from 'vitest';
import { MCP_TOOL_DEFINITIONS } from '../src/mcp-tools.js';
import { TOOL_NAMES } from '../src/index.js';

describe('MCP_TOOL_DEFINITIONS', () => {
  it('defines exactly one tool per tool name', () => {
    const toolNames = MCP_TOOL_DEFINITIONS.map(t => t.name);
    expect([...toolNames].sort()).toEqual([...TOOL_NAMES].sort());
  });

  it('should have valid structure for each tool', () => {
    MCP_TOOL_DEFINITIONS.forEach(tool => {
      expect(tool.description.length).toBeGreaterThan(0);
      expect(tool.inputSchema.type).toBe('object');
      for (const field of tool.inputSchema.required ?? []) {
        expect(Object.keys(tool.inputSchema.properties)).toContain(field);
      }
    });
  });

  it('should define lock with path and agent required', () => {
    const lock = MCP_TOOL_DEFINITIONS.find(t => t.name === 'lock');
    expect(lock?.inputSchema.required).toEqual(['path', 'agent']);
    expect(lock?.inputSchema.properties.ttlSeconds.default).toBe(1800);
  });

  it('mentions the advisory subject tags on send', () => {
    const send = MCP_TOOL_DEFINITIONS.find(t => t.name === 'send');
    expect(send?.inputSchema.properties.subject.description).toContain('[HANDOFF]');
  });
});
