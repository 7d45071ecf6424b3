/**
 * Handler modules index
 * Re-exports all handler classes
 */
export { AgentHandlers } from './agent-handlers.js';
export { MessageHandlers } from './message-handlers.js';
export { LockHandlers } from './lock-handlers.js';
export { MemoryHandlers } from './memory-handlers.js';
