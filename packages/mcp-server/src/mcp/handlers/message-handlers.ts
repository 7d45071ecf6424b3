/**
 * Message tool handlers
 */
import {
  sendSchema,
  inboxSchema,
  messageActionSchema,
  type Message
} from '@agent-bridge/types';
import type { IMessageRepository } from '@agent-bridge/core';

export class MessageHandlers {
  constructor(private readonly messages: IMessageRepository) { }

  send(args: unknown): Message {
    const params = sendSchema.parse(args);
    return this.messages.send(params);
  }

  /**
   * Messages addressed to the agent, oldest first.
   */
  inbox(args: unknown): Message[] {
    const { agent, unreadOnly, limit } = inboxSchema.parse(args);
    return this.messages.inbox(agent, { unreadOnly, limit });
  }

  markRead(args: unknown): Message {
    const { messageId, agent } = messageActionSchema.parse(args);
    return this.messages.markRead(messageId, agent);
  }

  ack(args: unknown): Message {
    const { messageId, agent } = messageActionSchema.parse(args);
    return this.messages.ack(messageId, agent);
  }
}
