/**
 * Shared MCP Tool definitions - Single source of truth for tool schemas.
 * These are manually defined JSON schemas that match the Zod schemas in index.ts.
 */
import type { ToolName } from './index.js';

// Type aliases rather than interfaces: the MCP SDK's result types carry
// index signatures that interfaces don't satisfy.
type JsonSchemaProperty = {
  type: 'string' | 'integer' | 'boolean' | 'array';
  description?: string;
  default?: string | number | boolean;
  items?: { type: 'string' };
};

export type MCPToolDefinition = {
  name: ToolName;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
  };
};

export const MCP_TOOL_DEFINITIONS: MCPToolDefinition[] = [
  {
    name: 'register',
    description: 'Register this agent with the bridge (safe to call again to update it)',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: "Agent name (e.g., 'claude-1', 'opencode-1')" },
        program: { type: 'string', description: 'Agent program (claude-code, opencode)' },
        model: { type: 'string', description: 'Model being used' },
        task: { type: 'string', description: 'Current task description' },
        status: { type: 'string', description: 'Free-text status (default: active)' }
      },
      required: ['name']
    }
  },
  {
    name: 'agents',
    description: 'List all registered agents, most recently active first',
    inputSchema: { type: 'object', properties: {} }
  },
  {
    name: 'send',
    description: 'Send a message to another agent',
    inputSchema: {
      type: 'object',
      properties: {
        sender: { type: 'string', description: 'Your agent name' },
        recipient: { type: 'string', description: 'Target agent name (must be registered)' },
        subject: { type: 'string', description: 'Message subject (use prefixes: [TASK], [DONE], [BLOCKED], [QUESTION], [HANDOFF])' },
        body: { type: 'string', description: 'Message body' },
        threadId: { type: 'string', description: 'Thread ID for grouping' }
      },
      required: ['sender', 'recipient', 'subject']
    }
  },
  {
    name: 'inbox',
    description: 'Fetch messages addressed to an agent, oldest first',
    inputSchema: {
      type: 'object',
      properties: {
        agent: { type: 'string', description: 'Your agent name' },
        unreadOnly: { type: 'boolean', default: false, description: 'Only unread messages' },
        limit: { type: 'integer', description: 'Maximum number of messages' }
      },
      required: ['agent']
    }
  },
  {
    name: 'mark_read',
    description: 'Mark a message as read',
    inputSchema: {
      type: 'object',
      properties: {
        messageId: { type: 'integer', description: 'ID of the message' },
        agent: { type: 'string', description: 'Your agent name (must be the recipient)' }
      },
      required: ['messageId']
    }
  },
  {
    name: 'ack',
    description: 'Acknowledge a message (independent of marking it read)',
    inputSchema: {
      type: 'object',
      properties: {
        messageId: { type: 'integer', description: 'ID of the message' },
        agent: { type: 'string', description: 'Your agent name (must be the recipient)' }
      },
      required: ['messageId']
    }
  },
  {
    name: 'lock',
    description: 'Lock a file for exclusive editing; calling again renews your own lock',
    inputSchema: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'File path to lock' },
        agent: { type: 'string', description: 'Your agent name' },
        ttlSeconds: { type: 'integer', default: 1800, description: 'Lock lifetime in seconds' },
        reason: { type: 'string', description: 'Why you need the lock' }
      },
      required: ['path', 'agent']
    }
  },
  {
    name: 'unlock',
    description: 'Release a file lock you hold',
    inputSchema: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'File path to release' },
        agent: { type: 'string', description: 'Your agent name' }
      },
      required: ['path', 'agent']
    }
  },
  {
    name: 'locks',
    description: 'List file locks',
    inputSchema: {
      type: 'object',
      properties: {
        activeOnly: { type: 'boolean', default: true, description: 'Hide expired locks' },
        agent: { type: 'string', description: 'Filter by holder (optional)' }
      }
    }
  },
  {
    name: 'remember',
    description: 'Store a memory/note any agent can recall',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'What to remember' },
        tags: { type: 'array', items: { type: 'string' }, description: 'Tags/categories' }
      },
      required: ['content']
    }
  },
  {
    name: 'recall',
    description: 'Search memories (case-insensitive substring of content or tags)',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search term; empty returns the most recent memories' },
        limit: { type: 'integer', default: 5, description: 'Maximum number of results' }
      },
      required: ['query']
    }
  },
  {
    name: 'forget',
    description: 'Delete a memory',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Memory ID to delete' }
      },
      required: ['id']
    }
  }
];
