/**
 * Agent-related tool handlers
 */
import {
  registerSchema,
  listAgentsSchema,
  type Agent
} from '@agent-bridge/types';
import type { IAgentRepository } from '@agent-bridge/core';

export class AgentHandlers {
  constructor(private readonly agents: IAgentRepository) { }

  /**
   * Registers the calling agent, or updates it when the name is taken.
   */
  register(args: unknown): Agent {
    const params = registerSchema.parse(args);
    return this.agents.register(params);
  }

  /**
   * Lists every registered agent, most recently active first.
   */
  list(args: unknown): Agent[] {
    listAgentsSchema.parse(args);
    return this.agents.getAll();
  }
}
