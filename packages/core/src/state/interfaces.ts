/**
 * Core interfaces for database and repository patterns.
 * These interfaces enable dependency injection and test isolation.
 */
import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import type {
  Agent,
  FileLock,
  ForgetResult,
  LockResult,
  Memory,
  Message,
  UnlockResult
} from '@agent-bridge/types';

// ===== Database Interfaces =====

/**
 * Database configuration options.
 */
export type DatabaseOptions =
  | { type: 'memory' }
  | {
    type: 'file';
    path: string;
    /** Milliseconds to wait on a locked database before failing */
    busyTimeoutMs?: number;
  };

/**
 * Re-export the database type for consumers.
 */
export type Database = BetterSqlite3Database;

/**
 * Source of "now" in epoch milliseconds. Injected so lock expiry can be
 * tested without sleeping.
 */
export type Clock = () => number;

// ===== Agent Repository Interface =====

/**
 * Input for registering an agent. Omitted optional fields keep their
 * stored values on re-registration.
 */
export interface AgentInput {
  name: string;
  program?: string;
  model?: string;
  task?: string;
  status?: string;
}

export interface IAgentRepository {
  /** Insert or update an agent; never duplicates */
  register(agent: AgentInput): Agent;

  /** Get agent by name */
  get(name: string): Agent | undefined;

  /** Get agent by name, failing with NOT_FOUND */
  require(name: string): Agent;

  /** All agents, most recently seen first */
  getAll(): Agent[];

  /** Refresh last-seen for a registered agent; no-op otherwise */
  touch(name: string): void;
}

// ===== Message Repository Interface =====

export interface MessageInput {
  sender: string;
  recipient: string;
  subject: string;
  body?: string;
  threadId?: string;
}

export interface InboxQuery {
  unreadOnly?: boolean;
  limit?: number;
}

export interface IMessageRepository {
  send(message: MessageInput): Message;

  /** Messages addressed to agent, oldest first */
  inbox(agent: string, query?: InboxQuery): Message[];

  get(id: number): Message | undefined;

  markRead(id: number, agent?: string): Message;

  ack(id: number, agent?: string): Message;
}

// ===== Lock Repository Interface =====

export interface LockInput {
  path: string;
  agent: string;
  ttlSeconds?: number;
  reason?: string;
}

export interface LockQuery {
  activeOnly?: boolean;
  agent?: string;
}

export interface ILockRepository {
  lock(input: LockInput): LockResult;

  unlock(path: string, agent: string): UnlockResult;

  list(query?: LockQuery): FileLock[];
}

// ===== Memory Repository Interface =====

export interface IMemoryRepository {
  remember(content: string, tags?: string[]): Memory;

  recall(query: string, limit?: number): Memory[];

  get(id: string): Memory | undefined;

  forget(id: string): ForgetResult;
}
