/**
 * Agent Repository Tests
 *
 * Integration tests for agent registration against an in-memory database.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { AgentRepository } from '../src/state/persistence/agent-repository.js';
import { initializeSchema } from '../src/state/persistence/database-factory.js';
import { createTestClock, T0, type TestClock } from './harness.js';

describe('AgentRepository', () => {
  let db: Database.Database;
  let clock: TestClock;
  let repo: AgentRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    initializeSchema(db);
    clock = createTestClock();
    repo = new AgentRepository(db, clock);
  });

  afterEach(() => {
    db.close();
  });

  describe('register', () => {
    it('registers new agent', () => {
      const agent = repo.register({ name: 'worker', program: 'opencode', model: 'test-model' });

      expect(agent).toEqual({
        name: 'worker',
        program: 'opencode',
        model: 'test-model',
        task: undefined,
        status: 'active',
        registeredAt: T0,
        lastSeen: T0
      });
    });

    it('never creates two rows for the same name', () => {
      repo.register({ name: 'worker' });
      clock.advance(1000);
      repo.register({ name: 'worker' });

      const { count } = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM agents').get() ?? { count: -1 };
      expect(count).toBe(1);
    });

    it('updates given fields and last seen, keeps omitted ones', () => {
      repo.register({ name: 'worker', program: 'opencode', model: 'model-a', task: 'auth' });
      clock.advance(5000);

      const agent = repo.register({ name: 'worker', model: 'model-b' });

      expect(agent.program).toBe('opencode');
      expect(agent.model).toBe('model-b');
      expect(agent.task).toBe('auth');
      expect(agent.registeredAt).toBe(T0);
      expect(agent.lastSeen).toBe(T0 + 5000);
    });

    it('stores a custom status', () => {
      expect(repo.register({ name: 'worker', status: 'busy' }).status).toBe('busy');
    });
  });

  describe('get', () => {
    it('returns undefined for non-existent agent', () => {
      expect(repo.get('nobody')).toBeUndefined();
    });

    it('require() fails with NOT_FOUND for non-existent agent', () => {
      expect(() => repo.require('nobody')).toThrow("Agent 'nobody' not found");
    });

    it('require() returns a registered agent', () => {
      repo.register({ name: 'worker', program: 'opencode' });
      expect(repo.require('worker')).toMatchObject({ name: 'worker', program: 'opencode' });
    });
  });

  describe('getAll', () => {
    it('orders by last seen, most recent first', () => {
      repo.register({ name: 'alpha' });
      clock.advance(1000);
      repo.register({ name: 'beta' });
      clock.advance(1000);
      repo.touch('alpha');

      expect(repo.getAll().map(a => a.name)).toEqual(['alpha', 'beta']);
    });

    it('breaks ties by name', () => {
      repo.register({ name: 'zed' });
      repo.register({ name: 'amy' });

      expect(repo.getAll().map(a => a.name)).toEqual(['amy', 'zed']);
    });
  });

  describe('touch', () => {
    it('refreshes last seen and keeps the registered status', () => {
      repo.register({ name: 'worker', status: 'blocked' });
      clock.advance(2000);

      repo.touch('worker');

      const agent = repo.get('worker');
      expect(agent?.lastSeen).toBe(T0 + 2000);
      expect(agent?.status).toBe('blocked');
    });

    it('does nothing for unknown agents', () => {
      repo.touch('ghost');
      expect(repo.get('ghost')).toBeUndefined();
    });
  });
});
