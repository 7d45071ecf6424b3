/**
 * Handler Tests
 *
 * Each handler validates its arguments and forwards them to a repository.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import type {
  IAgentRepository,
  ILockRepository,
  IMemoryRepository,
  IMessageRepository
} from '@agent-bridge/core';
import {
  AgentHandlers,
  LockHandlers,
  MemoryHandlers,
  MessageHandlers
} from '../src/mcp/handlers/index.js';

const agent = { name: 'worker', status: 'active', registeredAt: 1, lastSeen: 1 };
const message = {
  id: 7, sender: 'coordinator', recipient: 'worker', subject: '[TASK] build x', body: '',
  createdAt: 1, read: false, acknowledged: false
};

describe('AgentHandlers', () => {
  let agents: IAgentRepository;
  let handlers: AgentHandlers;

  beforeEach(() => {
    agents = {
      register: vi.fn().mockReturnValue(agent),
      get: vi.fn(),
      require: vi.fn(),
      getAll: vi.fn().mockReturnValue([agent]),
      touch: vi.fn()
    };
    handlers = new AgentHandlers(agents);
  });

  it('registers with only the fields given', () => {
    expect(handlers.register({ name: 'worker', model: 'm1' })).toEqual(agent);
    expect(agents.register).toHaveBeenCalledWith({ name: 'worker', model: 'm1' });
  });

  it('trims the agent name', () => {
    handlers.register({ name: '  worker ' });
    expect(agents.register).toHaveBeenCalledWith({ name: 'worker' });
  });

  it('rejects a missing name before touching the repository', () => {
    expect(() => handlers.register({})).toThrow(ZodError);
    expect(agents.register).not.toHaveBeenCalled();
  });

  it('lists agents', () => {
    expect(handlers.list({})).toEqual([agent]);
  });
});

describe('MessageHandlers', () => {
  let messages: IMessageRepository;
  let handlers: MessageHandlers;

  beforeEach(() => {
    messages = {
      send: vi.fn().mockReturnValue(message),
      inbox: vi.fn().mockReturnValue([message]),
      get: vi.fn(),
      markRead: vi.fn().mockReturnValue({ ...message, read: true }),
      ack: vi.fn().mockReturnValue({ ...message, acknowledged: true })
    };
    handlers = new MessageHandlers(messages);
  });

  it('defaults the body to an empty string', () => {
    handlers.send({ sender: 'coordinator', recipient: 'worker', subject: '[TASK] build x' });
    expect(messages.send).toHaveBeenCalledWith({
      sender: 'coordinator',
      recipient: 'worker',
      subject: '[TASK] build x',
      body: ''
    });
  });

  it('passes inbox filters through', () => {
    handlers.inbox({ agent: 'worker', unreadOnly: true, limit: 3 });
    expect(messages.inbox).toHaveBeenCalledWith('worker', { unreadOnly: true, limit: 3 });
  });

  it('reads the whole inbox by default', () => {
    handlers.inbox({ agent: 'worker' });
    expect(messages.inbox).toHaveBeenCalledWith('worker', { unreadOnly: false, limit: undefined });
  });

  it('accepts a numeric string message id', () => {
    handlers.markRead({ messageId: '7', agent: 'worker' });
    expect(messages.markRead).toHaveBeenCalledWith(7, 'worker');
  });

  it('acks without an agent', () => {
    expect(handlers.ack({ messageId: 7 }).acknowledged).toBe(true);
    expect(messages.ack).toHaveBeenCalledWith(7, undefined);
  });

  it('rejects a non-positive message id', () => {
    expect(() => handlers.ack({ messageId: 0 })).toThrow(ZodError);
  });
});

describe('LockHandlers', () => {
  let locks: ILockRepository;
  let handlers: LockHandlers;

  beforeEach(() => {
    locks = {
      lock: vi.fn(),
      unlock: vi.fn().mockReturnValue({ path: 'src/a.ts', released: true }),
      list: vi.fn().mockReturnValue([])
    };
    handlers = new LockHandlers(locks);
  });

  it('forwards ttl and reason', () => {
    handlers.lock({ path: 'src/a.ts', agent: 'worker', ttlSeconds: 60, reason: 'refactor' });
    expect(locks.lock).toHaveBeenCalledWith({
      path: 'src/a.ts', agent: 'worker', ttlSeconds: 60, reason: 'refactor'
    });
  });

  it('rejects a fractional ttl', () => {
    expect(() => handlers.lock({ path: 'src/a.ts', agent: 'worker', ttlSeconds: 1.5 })).toThrow(ZodError);
  });

  it('unlocks by path and agent', () => {
    expect(handlers.unlock({ path: 'src/a.ts', agent: 'worker' })).toEqual({ path: 'src/a.ts', released: true });
    expect(locks.unlock).toHaveBeenCalledWith('src/a.ts', 'worker');
  });

  it('lists only active locks by default', () => {
    handlers.list({});
    expect(locks.list).toHaveBeenCalledWith({ activeOnly: true });
  });
});

describe('MemoryHandlers', () => {
  let memories: IMemoryRepository;
  let handlers: MemoryHandlers;

  beforeEach(() => {
    memories = {
      remember: vi.fn(),
      recall: vi.fn().mockReturnValue([]),
      get: vi.fn(),
      forget: vi.fn().mockReturnValue({ id: 'abc123abc123', forgotten: true })
    };
    handlers = new MemoryHandlers(memories);
  });

  it('keeps memory content exactly as given', () => {
    handlers.remember({ content: '  indented note', tags: ['db'] });
    expect(memories.remember).toHaveBeenCalledWith('  indented note', ['db']);
  });

  it('rejects blank content', () => {
    expect(() => handlers.remember({ content: '   ' })).toThrow(ZodError);
  });

  it('leaves the limit to the repository default', () => {
    handlers.recall({ query: 'sqlite' });
    expect(memories.recall).toHaveBeenCalledWith('sqlite', undefined);
  });

  it('forgets by id', () => {
    expect(handlers.forget({ id: 'abc123abc123' })).toEqual({ id: 'abc123abc123', forgotten: true });
  });
});
