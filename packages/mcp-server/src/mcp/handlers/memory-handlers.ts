/**
 * Shared memory tool handlers
 */
import {
  rememberSchema,
  recallSchema,
  forgetSchema,
  type ForgetResult,
  type Memory
} from '@agent-bridge/types';
import type { IMemoryRepository } from '@agent-bridge/core';

export class MemoryHandlers {
  constructor(private readonly memories: IMemoryRepository) { }

  remember(args: unknown): Memory {
    const { content, tags } = rememberSchema.parse(args);
    return this.memories.remember(content, tags);
  }

  recall(args: unknown): Memory[] {
    const { query, limit } = recallSchema.parse(args);
    return this.memories.recall(query, limit);
  }

  forget(args: unknown): ForgetResult {
    const { id } = forgetSchema.parse(args);
    return this.memories.forget(id);
  }
}
