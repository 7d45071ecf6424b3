/**
 * Message Repository Implementation
 *
 * Agent-to-agent mailbox. Messages are never deleted; read and
 * acknowledged are independent timestamps.
 */
import type { Database } from 'better-sqlite3';
import { BridgeError, type Message } from '@agent-bridge/types';
import type {
  Clock,
  IAgentRepository,
  IMessageRepository,
  InboxQuery,
  MessageInput
} from '../interfaces.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';

/** DB row type for messages table */
interface MessageRow {
  id: number;
  sender: string;
  recipient: string;
  subject: string;
  body: string;
  thread_id: string | null;
  created_at: number;
  read_at: number | null;
  ack_at: number | null;
}

export interface MessageRepositoryOptions {
  /** Reject messages to agents that never registered (default: true) */
  strictRecipients?: boolean;
  clock?: Clock;
  logger?: Logger;
}

type FlagColumn = 'read_at' | 'ack_at';

/**
 * SQLite implementation of IMessageRepository.
 */
export class MessageRepository implements IMessageRepository {
  private readonly strictRecipients: boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database,
    private readonly agents: IAgentRepository,
    options: MessageRepositoryOptions = {}
  ) {
    this.strictRecipients = options.strictRecipients ?? true;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createSilentLogger();
  }

  send(message: MessageInput): Message {
    if (!message.sender.trim() || !message.recipient.trim() || !message.subject.trim()) {
      throw BridgeError.validation('sender, recipient and subject are required');
    }

    const insert = this.db.transaction((input: MessageInput): MessageRow => {
      if (this.strictRecipients && !this.agents.get(input.recipient)) {
        throw BridgeError.notFound('Agent', input.recipient);
      }

      const row = this.db.prepare<[string, string, string, string, string | null, number], MessageRow>(`
        INSERT INTO messages (sender, recipient, subject, body, thread_id, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
        RETURNING *
      `).get(input.sender, input.recipient, input.subject, input.body ?? '', input.threadId ?? null, this.clock());

      if (!row) {
        throw new BridgeError(`Failed to store message for '${input.recipient}'`, 'INTERNAL');
      }

      this.agents.touch(input.sender);
      return row;
    });

    const row = insert.immediate(message);
    this.logger.debug(`Message ${row.id} ${row.sender} -> ${row.recipient}: ${row.subject}`);
    return this.mapRow(row);
  }

  inbox(agent: string, query: InboxQuery = {}): Message[] {
    const read = this.db.transaction((): MessageRow[] => {
      this.agents.touch(agent);
      const unread = query.unreadOnly ? ' AND read_at IS NULL' : '';
      // LIMIT -1 means no limit in SQLite
      return this.db.prepare<[string, number], MessageRow>(
        `SELECT * FROM messages WHERE recipient = ?${unread} ORDER BY id ASC LIMIT ?`
      ).all(agent, query.limit ?? -1);
    });

    return read.immediate().map(r => this.mapRow(r));
  }

  get(id: number): Message | undefined {
    const row = this.findRow(id);
    return row ? this.mapRow(row) : undefined;
  }

  markRead(id: number, agent?: string): Message {
    return this.setFlag('read_at', id, agent);
  }

  ack(id: number, agent?: string): Message {
    return this.setFlag('ack_at', id, agent);
  }

  /**
   * Stamps read_at/ack_at once; later calls leave the first timestamp.
   */
  private setFlag(column: FlagColumn, id: number, agent?: string): Message {
    const update = this.db.transaction((): MessageRow => {
      const existing = this.findRow(id);
      if (!existing) {
        throw BridgeError.notFound('Message', id);
      }
      if (agent !== undefined && existing.recipient !== agent) {
        throw BridgeError.forbidden(
          `Message ${id} is addressed to ${existing.recipient}, not ${agent}`,
          { messageId: id, recipient: existing.recipient }
        );
      }

      const row = this.db.prepare<[number, number], MessageRow>(
        `UPDATE messages SET ${column} = COALESCE(${column}, ?) WHERE id = ? RETURNING *`
      ).get(this.clock(), id);
      if (!row) {
        throw BridgeError.notFound('Message', id);
      }

      if (agent !== undefined) this.agents.touch(agent);
      return row;
    });

    return this.mapRow(update.immediate());
  }

  private findRow(id: number): MessageRow | undefined {
    return this.db.prepare<[number], MessageRow>('SELECT * FROM messages WHERE id = ?').get(id);
  }

  private mapRow(row: MessageRow): Message {
    return {
      id: row.id,
      sender: row.sender,
      recipient: row.recipient,
      subject: row.subject,
      body: row.body,
      threadId: row.thread_id ?? undefined,
      createdAt: row.created_at,
      read: row.read_at !== null,
      acknowledged: row.ack_at !== null,
      readAt: row.read_at ?? undefined,
      ackAt: row.ack_at ?? undefined
    };
  }
}
