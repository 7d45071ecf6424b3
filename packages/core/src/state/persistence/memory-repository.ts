/**
 * Memory Repository Implementation
 *
 * Shared notes keyed by a hash of their content, searched with a
 * case-insensitive substring match over content and tags.
 * Case folding is done in JS (registered as a SQL function) so it covers
 * non-ASCII letters, which SQLite's LIKE does not.
 */
import { createHash } from 'crypto';
import type { Database } from 'better-sqlite3';
import {
  BridgeError,
  DEFAULT_RECALL_LIMIT,
  type ForgetResult,
  type Memory
} from '@agent-bridge/types';
import type { Clock, IMemoryRepository } from '../interfaces.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';

/** DB row type for memories table */
interface MemoryRow {
  id: string;
  content: string;
  tags: string;
  created_at: number;
}

export interface MemoryRepositoryOptions {
  /** Cap used when recall() is called without one */
  defaultRecallLimit?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Stable 12-hex-character id for a piece of content.
 */
export function memoryId(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 12);
}

/**
 * Unicode-aware case fold used on both sides of a recall comparison.
 */
export function foldCase(text: string): string {
  return text.normalize('NFC').toLowerCase();
}

/** Name of the SQL function wrapping foldCase */
const FOLD_FUNCTION = 'bridge_fold';

function normalizeTags(tags: string[]): string[] {
  return [...new Set(tags.map(t => t.trim()).filter(t => t.length > 0))];
}

function parseTags(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
  } catch {
    // Written by another tool; treat as untagged
    return [];
  }
}

/**
 * SQLite implementation of IMemoryRepository.
 */
export class MemoryRepository implements IMemoryRepository {
  private readonly defaultRecallLimit: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    options: MemoryRepositoryOptions = {}
  ) {
    this.defaultRecallLimit = options.defaultRecallLimit ?? DEFAULT_RECALL_LIMIT;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createSilentLogger();

    this.db.function(FOLD_FUNCTION, { deterministic: true }, (value: unknown) =>
      typeof value === 'string' ? foldCase(value) : value
    );
  }

  /**
   * Stores content. Remembering the same text again keeps its id and
   * creation time; tags are replaced when given.
   */
  remember(content: string, tags?: string[]): Memory {
    if (!content.trim()) {
      throw BridgeError.validation('content must not be empty');
    }

    const id = memoryId(content);
    const upsert = this.db.transaction((): MemoryRow => {
      const existing = this.findRow(id);
      const finalTags = tags !== undefined
        ? normalizeTags(tags)
        : existing ? parseTags(existing.tags) : [];

      const row = this.db.prepare<[string, string, string, number], MemoryRow>(`
        INSERT INTO memories (id, content, tags, created_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET tags = excluded.tags
        RETURNING *
      `).get(id, content, JSON.stringify(finalTags), this.clock());
      if (!row) {
        throw new BridgeError('Failed to store memory', 'INTERNAL');
      }
      return row;
    });

    const row = upsert.immediate();
    this.logger.debug(`Stored memory ${id}`);
    return this.mapRow(row);
  }

  /**
   * Most recent memories whose content or any tag contains query,
   * ignoring case. An empty query matches everything.
   */
  recall(query: string, limit: number = this.defaultRecallLimit): Memory[] {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw BridgeError.validation(`limit must be a positive integer, got ${limit}`);
    }

    // instr() matches the folded query literally, so % and _ need no escaping
    const rows = this.db.prepare<{ query: string; limit: number }, MemoryRow>(`
      SELECT * FROM memories
      WHERE @query = ''
        OR instr(${FOLD_FUNCTION}(content), @query) > 0
        OR EXISTS (
          SELECT 1 FROM json_each(memories.tags)
          WHERE instr(${FOLD_FUNCTION}(json_each.value), @query) > 0
        )
      ORDER BY created_at DESC, rowid DESC
      LIMIT @limit
    `).all({ query: foldCase(query), limit });

    return rows.map(r => this.mapRow(r));
  }

  get(id: string): Memory | undefined {
    const row = this.findRow(id);
    return row ? this.mapRow(row) : undefined;
  }

  /**
   * @throws BridgeError NOT_FOUND when no memory has this id
   */
  forget(id: string): ForgetResult {
    const result = this.db.prepare<[string]>('DELETE FROM memories WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw BridgeError.notFound('Memory', id);
    }
    this.logger.debug(`Forgot memory ${id}`);
    return { id, forgotten: true };
  }

  private findRow(id: string): MemoryRow | undefined {
    return this.db.prepare<[string], MemoryRow>('SELECT * FROM memories WHERE id = ?').get(id);
  }

  private mapRow(row: MemoryRow): Memory {
    return {
      id: row.id,
      content: row.content,
      tags: parseTags(row.tags),
      createdAt: row.created_at
    };
  }
}
