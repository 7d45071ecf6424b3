/**
 * Database Factory
 *
 * Provides explicit database creation. The path always arrives through
 * configuration; tests use createTestDatabase().
 */
import Database from 'better-sqlite3';
import type { DatabaseOptions } from '../interfaces.js';
import path from 'path';
import fs from 'fs';

/**
 * Creates a database instance based on options.
 *
 * @param options - Database configuration
 * @returns Database instance
 * @throws Error if file type specified without path
 */
export function createDatabase(options: DatabaseOptions): Database.Database {
  if (options.type === 'memory') {
    return new Database(':memory:');
  }

  if (!options.path) {
    throw new Error(
      'FATAL: Database path required for file-based DB. ' +
      'Set BRIDGE_DB_PATH or pass --db.'
    );
  }

  // Ensure directory exists
  const dataDir = path.dirname(options.path);
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  const db = options.busyTimeoutMs !== undefined
    ? new Database(options.path, { timeout: options.busyTimeoutMs })
    : new Database(options.path);
  // Readers don't block the writer; each CLI call is its own process.
  db.pragma('journal_mode = WAL');
  return db;
}

/**
 * Creates an in-memory database for testing.
 * ALWAYS safe - never touches a real bridge file.
 */
export function createTestDatabase(): Database.Database {
  return createDatabase({ type: 'memory' });
}

/**
 * Opens the database named by a configured path; ':memory:' selects an
 * in-memory database.
 */
export function openDatabase(dbPath: string, busyTimeoutMs?: number): Database.Database {
  if (dbPath === ':memory:') return createTestDatabase();
  return createDatabase({ type: 'file', path: dbPath, busyTimeoutMs });
}

/**
 * Initializes the database schema. Idempotent: safe on every open.
 *
 * @param db - Database instance to initialize
 */
export function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS agents (
      name TEXT PRIMARY KEY,
      program TEXT,
      model TEXT,
      task TEXT,
      status TEXT NOT NULL DEFAULT 'active',
      registered_at INTEGER NOT NULL,
      last_seen INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sender TEXT NOT NULL,
      recipient TEXT NOT NULL,
      subject TEXT NOT NULL,
      body TEXT NOT NULL DEFAULT '',
      thread_id TEXT,
      created_at INTEGER NOT NULL,
      read_at INTEGER,      -- null = unread
      ack_at INTEGER        -- null = not acknowledged
    );

    CREATE TABLE IF NOT EXISTS file_locks (
      path TEXT PRIMARY KEY,
      agent TEXT NOT NULL,
      reason TEXT,
      acquired_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS memories (
      id TEXT PRIMARY KEY,  -- content hash
      content TEXT NOT NULL,
      tags TEXT NOT NULL DEFAULT '[]', -- JSON array of strings
      created_at INTEGER NOT NULL
    );

    -- Indexes
    CREATE INDEX IF NOT EXISTS idx_agents_last_seen ON agents(last_seen DESC);
    CREATE INDEX IF NOT EXISTS idx_messages_recipient ON messages(recipient, id);
    CREATE INDEX IF NOT EXISTS idx_messages_thread ON messages(thread_id) WHERE thread_id IS NOT NULL;
    CREATE INDEX IF NOT EXISTS idx_file_locks_agent ON file_locks(agent);
    CREATE INDEX IF NOT EXISTS idx_memories_created ON memories(created_at DESC);
  `);
}
