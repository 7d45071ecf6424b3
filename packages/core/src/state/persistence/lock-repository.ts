/**
 * Lock Repository Implementation
 *
 * Exclusive, time-bounded file locks with lazy expiry: a row whose
 * expires_at has passed counts as absent. Nothing sweeps expired rows;
 * lock() overwrites them and unlock() removes them when it meets one.
 */
import type { Database } from 'better-sqlite3';
import {
  BridgeError,
  DEFAULT_LOCK_TTL_SECONDS,
  type FileLock,
  type LockResult,
  type UnlockResult
} from '@agent-bridge/types';
import type { Clock, IAgentRepository, ILockRepository, LockInput, LockQuery } from '../interfaces.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';

/** DB row type for file_locks table */
interface LockRow {
  path: string;
  agent: string;
  reason: string | null;
  acquired_at: number;
  expires_at: number;
}

export interface LockRepositoryOptions {
  /** TTL used when lock() is called without one */
  defaultTtlSeconds?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Whole seconds until expiresAt, never negative.
 */
export function remainingSeconds(expiresAt: number, now: number): number {
  return Math.max(0, Math.ceil((expiresAt - now) / 1000));
}

/**
 * SQLite implementation of ILockRepository.
 */
export class LockRepository implements ILockRepository {
  private readonly defaultTtlSeconds: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly agents: IAgentRepository,
    options: LockRepositoryOptions = {}
  ) {
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_LOCK_TTL_SECONDS;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Acquires or renews a lock. The check and the write share one
   * IMMEDIATE transaction so two processes cannot both win the same path.
   *
   * @throws BridgeError CONFLICT when another agent holds an active lock
   */
  lock(input: LockInput): LockResult {
    const ttlSeconds = input.ttlSeconds ?? this.defaultTtlSeconds;
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw BridgeError.validation(`ttlSeconds must be a positive integer, got ${ttlSeconds}`);
    }
    if (!input.path.trim() || !input.agent.trim()) {
      throw BridgeError.validation('path and agent are required');
    }

    const acquire = this.db.transaction((): LockResult => {
      const now = this.clock();
      const expiresAt = now + ttlSeconds * 1000;
      const existing = this.findRow(input.path);

      if (existing && existing.expires_at > now) {
        if (existing.agent !== input.agent) {
          const remaining = remainingSeconds(existing.expires_at, now);
          throw BridgeError.conflict(
            `${input.path} is locked by ${existing.agent} (${remaining}s remaining)`,
            {
              path: input.path,
              holder: existing.agent,
              expiresAt: existing.expires_at,
              remainingSeconds: remaining
            }
          );
        }

        const renewed = this.db.prepare<[number, string | null, string], LockRow>(`
          UPDATE file_locks SET expires_at = ?, reason = COALESCE(?, reason)
          WHERE path = ?
          RETURNING *
        `).get(expiresAt, input.reason ?? null, input.path);
        if (!renewed) {
          throw new BridgeError(`Failed to renew lock on ${input.path}`, 'INTERNAL');
        }

        this.agents.touch(input.agent);
        return { status: 'renewed', lock: this.mapRow(renewed, now) };
      }

      if (existing) {
        this.logger.info(`Reclaiming expired lock on ${input.path} (was held by ${existing.agent})`);
      }

      const acquired = this.db.prepare<[string, string, string | null, number, number], LockRow>(`
        INSERT INTO file_locks (path, agent, reason, acquired_at, expires_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(path) DO UPDATE SET
          agent = excluded.agent,
          reason = excluded.reason,
          acquired_at = excluded.acquired_at,
          expires_at = excluded.expires_at
        RETURNING *
      `).get(input.path, input.agent, input.reason ?? null, now, expiresAt);
      if (!acquired) {
        throw new BridgeError(`Failed to lock ${input.path}`, 'INTERNAL');
      }

      this.agents.touch(input.agent);
      return { status: 'acquired', lock: this.mapRow(acquired, now) };
    });

    const result = acquire.immediate();
    this.logger.debug(`Lock ${result.status}: ${input.path} by ${input.agent} for ${ttlSeconds}s`);
    return result;
  }

  /**
   * Releases a lock held by agent. Releasing a path nobody holds is a no-op.
   *
   * @throws BridgeError FORBIDDEN when another agent holds an active lock
   */
  unlock(path: string, agent: string): UnlockResult {
    const release = this.db.transaction((): UnlockResult => {
      const now = this.clock();
      const existing = this.findRow(path);
      this.agents.touch(agent);

      if (!existing) {
        return { path, released: false };
      }

      if (existing.expires_at <= now) {
        this.deleteRow(path);
        this.logger.debug(`Removed expired lock on ${path} (was held by ${existing.agent})`);
        return { path, released: false };
      }

      if (existing.agent !== agent) {
        throw BridgeError.forbidden(
          `${path} is locked by ${existing.agent}; only the holder can unlock it`,
          { path, holder: existing.agent }
        );
      }

      this.deleteRow(path);
      return { path, released: true };
    });

    const result = release.immediate();
    if (result.released) this.logger.debug(`Unlocked ${path} by ${agent}`);
    return result;
  }

  list(query: LockQuery = {}): FileLock[] {
    const now = this.clock();
    const conditions: string[] = [];
    const values: (string | number)[] = [];

    if (query.activeOnly ?? true) {
      conditions.push('expires_at > ?');
      values.push(now);
    }
    if (query.agent !== undefined) {
      conditions.push('agent = ?');
      values.push(query.agent);
    }

    const where = conditions.length ? ` WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db.prepare<(string | number)[], LockRow>(
      `SELECT * FROM file_locks${where} ORDER BY path ASC`
    ).all(...values);
    return rows.map(r => this.mapRow(r, now));
  }

  private findRow(path: string): LockRow | undefined {
    return this.db.prepare<[string], LockRow>('SELECT * FROM file_locks WHERE path = ?').get(path);
  }

  private deleteRow(path: string): void {
    this.db.prepare<[string]>('DELETE FROM file_locks WHERE path = ?').run(path);
  }

  private mapRow(row: LockRow, now: number): FileLock {
    return {
      path: row.path,
      agent: row.agent,
      reason: row.reason ?? undefined,
      acquiredAt: row.acquired_at,
      expiresAt: row.expires_at,
      expired: row.expires_at <= now,
      remainingSeconds: remainingSeconds(row.expires_at, now)
    };
  }
}
