export * from './config.js';
export * from './utils/logger.js';
export * from './state/interfaces.js';
export * from './state/context.js';
export * from './state/persistence/database-factory.js';
export * from './state/persistence/agent-repository.js';
export * from './state/persistence/message-repository.js';
export * from './state/persistence/lock-repository.js';
export * from './state/persistence/memory-repository.js';
