/**
 * File lock tool handlers
 */
import {
  lockSchema,
  unlockSchema,
  listLocksSchema,
  type FileLock,
  type LockResult,
  type UnlockResult
} from '@agent-bridge/types';
import type { ILockRepository } from '@agent-bridge/core';

export class LockHandlers {
  constructor(private readonly locks: ILockRepository) { }

  /**
   * Acquires or renews a lock. A lock held by someone else surfaces as CONFLICT.
   */
  lock(args: unknown): LockResult {
    const params = lockSchema.parse(args);
    return this.locks.lock(params);
  }

  unlock(args: unknown): UnlockResult {
    const { path, agent } = unlockSchema.parse(args);
    return this.locks.unlock(path, agent);
  }

  list(args: unknown): FileLock[] {
    const params = listLocksSchema.parse(args);
    return this.locks.list(params);
  }
}
