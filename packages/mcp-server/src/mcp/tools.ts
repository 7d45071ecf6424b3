/**
 * Dispatches MCP tool calls to the handler classes and renders their
 * results (or failures) as tool responses.
 */
import {
  BridgeError,
  isToolName,
  toBridgeError,
  toMCPError,
  type ToolName,
  type ToolResponse
} from '@agent-bridge/types';
import type { BridgeContext, Logger } from '@agent-bridge/core';
import {
  AgentHandlers,
  LockHandlers,
  MemoryHandlers,
  MessageHandlers
} from './handlers/index.js';

type ToolMethod = (args: unknown) => unknown;

/**
 * Handles incoming MCP tool requests against one bridge context.
 */
export class ToolHandler {
  private readonly methods: Record<ToolName, ToolMethod>;
  private readonly logger: Logger;

  constructor(ctx: Pick<BridgeContext, 'agents' | 'messages' | 'locks' | 'memories' | 'logger'>) {
    const agents = new AgentHandlers(ctx.agents);
    const messages = new MessageHandlers(ctx.messages);
    const locks = new LockHandlers(ctx.locks);
    const memories = new MemoryHandlers(ctx.memories);

    this.methods = {
      register: args => agents.register(args),
      agents: args => agents.list(args),
      send: args => messages.send(args),
      inbox: args => messages.inbox(args),
      mark_read: args => messages.markRead(args),
      ack: args => messages.ack(args),
      lock: args => locks.lock(args),
      unlock: args => locks.unlock(args),
      locks: args => locks.list(args),
      remember: args => memories.remember(args),
      recall: args => memories.recall(args),
      forget: args => memories.forget(args)
    };
    this.logger = ctx.logger.child('tools');
  }

  /**
   * Runs a tool by name. Never throws: failures come back as isError results.
   *
   * @param args - Raw arguments from the client; missing means none
   */
  call(name: string, args: unknown = {}): ToolResponse {
    this.logger.debug(`Call ${name}`);

    try {
      if (!isToolName(name)) {
        throw BridgeError.notFound('Tool', name);
      }
      const result = this.methods[name](args);
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }]
      };
    } catch (e) {
      return this.handleError(name, e);
    }
  }

  private handleError(name: string, error: unknown): ToolResponse {
    const bridgeError = toBridgeError(error);
    if (bridgeError.code === 'INTERNAL') {
      this.logger.error(`${name} failed`, error);
    } else {
      this.logger.warn(`${name} rejected: [${bridgeError.code}] ${bridgeError.message}`);
    }
    return toMCPError(bridgeError);
  }
}
