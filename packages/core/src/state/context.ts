/**
 * Bridge Context
 *
 * Dependency injection container for one bridge invocation.
 * The CLI builds one per command; the MCP server builds one per process.
 */
import type { Database } from 'better-sqlite3';
import { AgentRepository } from './persistence/agent-repository.js';
import { MessageRepository } from './persistence/message-repository.js';
import { LockRepository } from './persistence/lock-repository.js';
import { MemoryRepository } from './persistence/memory-repository.js';
import {
  createTestDatabase,
  initializeSchema,
  openDatabase
} from './persistence/database-factory.js';
import type {
  Clock,
  IAgentRepository,
  ILockRepository,
  IMemoryRepository,
  IMessageRepository
} from './interfaces.js';
import { loadConfig, logLevelOf, type BridgeConfig } from '../config.js';
import { Logger } from '../utils/logger.js';

/**
 * Bridge context containing all dependencies.
 */
export interface BridgeContext {
  /** Underlying database connection */
  db: Database;

  config: BridgeConfig;

  agents: IAgentRepository;
  messages: IMessageRepository;
  locks: ILockRepository;
  memories: IMemoryRepository;

  logger: Logger;

  /** Close all resources */
  close(): void;

  /** Check if context is healthy */
  isHealthy(): boolean;
}

export interface ContextOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Opens (creating if needed) the database at config.dbPath and builds a context.
 */
export function createBridgeContext(config: BridgeConfig, options: ContextOptions = {}): BridgeContext {
  const logger = options.logger ?? new Logger({
    level: logLevelOf(config),
    file: config.logFile,
    clock: options.clock
  });
  const db = openDatabase(config.dbPath, config.busyTimeoutMs);
  initializeSchema(db);
  logger.debug(`Opened database ${config.dbPath}`);
  return buildContext(db, config, { ...options, logger });
}

/**
 * Creates a test context with in-memory database.
 * ALWAYS safe - never touches the real bridge file.
 */
export function createTestContext(
  overrides: Partial<BridgeConfig> = {},
  options: ContextOptions = {}
): BridgeContext {
  const config = loadConfig({}, { logLevel: 'silent', ...overrides, dbPath: ':memory:' });
  const db = createTestDatabase();
  initializeSchema(db);
  return buildContext(db, config, options);
}

/**
 * Builds a context from a database instance.
 */
function buildContext(db: Database, config: BridgeConfig, options: ContextOptions): BridgeContext {
  const clock = options.clock ?? Date.now;
  const logger = options.logger ?? new Logger({ level: logLevelOf(config), clock });

  const agents = new AgentRepository(db, clock, logger.child('agents'));
  const messages = new MessageRepository(db, agents, {
    strictRecipients: config.strictRecipients,
    clock,
    logger: logger.child('messages')
  });
  const locks = new LockRepository(db, agents, {
    defaultTtlSeconds: config.defaultLockTtlSeconds,
    clock,
    logger: logger.child('locks')
  });
  const memories = new MemoryRepository(db, {
    defaultRecallLimit: config.defaultRecallLimit,
    clock,
    logger: logger.child('memory')
  });

  return {
    db,
    config,
    agents,
    messages,
    locks,
    memories,
    logger,

    close() {
      if (db.open) db.close();
    },

    isHealthy() {
      try {
        db.prepare('SELECT 1').get();
        return true;
      } catch {
        return false;
      }
    }
  };
}
