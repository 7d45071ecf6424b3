/**
 * Agent Repository Implementation
 *
 * Implements IAgentRepository for database-backed agent registration.
 * An agent's name is its identity: registering it again updates the row.
 */
import type { Database } from 'better-sqlite3';
import { BridgeError, type Agent } from '@agent-bridge/types';
import type { IAgentRepository, AgentInput, Clock } from '../interfaces.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';

/** DB row type for agents table */
interface AgentRow {
  name: string;
  program: string | null;
  model: string | null;
  task: string | null;
  status: string;
  registered_at: number;
  last_seen: number;
}

interface AgentParams {
  name: string;
  program: string | null;
  model: string | null;
  task: string | null;
  status: string;
  now: number;
}

export const DEFAULT_AGENT_STATUS = 'active';

/**
 * SQLite implementation of IAgentRepository.
 */
export class AgentRepository implements IAgentRepository {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = Date.now,
    private readonly logger: Logger = createSilentLogger()
  ) { }

  register(agent: AgentInput): Agent {
    const upsert = this.db.transaction((input: AgentInput): AgentRow => {
      const existed = this.get(input.name) !== undefined;

      // Omitted fields arrive as NULL and keep the stored value
      const row = this.db.prepare<AgentParams, AgentRow>(`
        INSERT INTO agents (name, program, model, task, status, registered_at, last_seen)
        VALUES (@name, @program, @model, @task, @status, @now, @now)
        ON CONFLICT(name) DO UPDATE SET
          program = COALESCE(excluded.program, agents.program),
          model = COALESCE(excluded.model, agents.model),
          task = COALESCE(excluded.task, agents.task),
          status = excluded.status,
          last_seen = MAX(excluded.last_seen, agents.last_seen)
        RETURNING *
      `).get({
        name: input.name,
        program: input.program ?? null,
        model: input.model ?? null,
        task: input.task ?? null,
        status: input.status ?? DEFAULT_AGENT_STATUS,
        now: this.clock()
      });

      if (!row) {
        throw new BridgeError(`Failed to register agent '${input.name}'`, 'INTERNAL');
      }

      this.logger.debug(existed ? `Re-registered agent ${input.name}` : `Registered agent ${input.name}`);
      return row;
    });

    return this.mapRow(upsert.immediate(agent));
  }

  get(name: string): Agent | undefined {
    const row = this.db.prepare<[string], AgentRow>('SELECT * FROM agents WHERE name = ?').get(name);
    return row ? this.mapRow(row) : undefined;
  }

  /**
   * @throws BridgeError NOT_FOUND when no agent has this name
   */
  require(name: string): Agent {
    const agent = this.get(name);
    if (!agent) {
      throw BridgeError.notFound('Agent', name);
    }
    return agent;
  }

  getAll(): Agent[] {
    const rows = this.db.prepare<[], AgentRow>('SELECT * FROM agents ORDER BY last_seen DESC, name ASC').all();
    return rows.map(r => this.mapRow(r));
  }

  /**
   * Refreshes last_seen only; status changes through register().
   */
  touch(name: string): void {
    this.db.prepare<[number, string]>(
      'UPDATE agents SET last_seen = MAX(last_seen, ?) WHERE name = ?'
    ).run(this.clock(), name);
  }

  private mapRow(row: AgentRow): Agent {
    return {
      name: row.name,
      program: row.program ?? undefined,
      model: row.model ?? undefined,
      task: row.task ?? undefined,
      status: row.status,
      registeredAt: row.registered_at,
      lastSeen: row.last_seen
    };
  }
}
