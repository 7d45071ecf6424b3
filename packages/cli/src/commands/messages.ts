import { Command } from 'commander';
import { inboxSchema, messageActionSchema, sendSchema } from '@agent-bridge/types';
import { runCommand, type CliIO } from '../runtime.js';
import { formatList, formatMessage } from '../utils/format.js';

export function createSendCommand(io: CliIO): Command {
  return new Command('send')
    .description('Send a message to another agent')
    .argument('<sender>', 'Your agent name')
    .argument('<recipient>', 'Target agent name')
    .argument('<subject>', 'Subject, e.g. "[TASK] build x"')
    .argument('[body]', 'Message body')
    .option('--thread <threadId>', 'Thread ID for grouping')
    .action((sender: string, recipient: string, subject: string, body: string | undefined,
      options: { thread?: string }, command: Command) => {
      runCommand(
        io,
        command,
        ctx => ctx.messages.send(sendSchema.parse({ sender, recipient, subject, body, threadId: options.thread })),
        message => `✅ Sent message #${message.id} to ${message.recipient}`
      );
    });
}

export function createInboxCommand(io: CliIO): Command {
  return new Command('inbox')
    .description('Show messages addressed to an agent, oldest first')
    .argument('<agent>', 'Your agent name')
    .option('--unread', 'Only unread messages', false)
    .option('--limit <n>', 'Maximum number of messages')
    .action((agent: string, options: { unread: boolean; limit?: string }, command: Command) => {
      runCommand(
        io,
        command,
        ctx => {
          const params = inboxSchema.parse({ agent, unreadOnly: options.unread, limit: options.limit });
          return ctx.messages.inbox(params.agent, { unreadOnly: params.unreadOnly, limit: params.limit });
        },
        messages => formatList(messages, 'No messages.', formatMessage)
      );
    });
}

function createFlagCommand(io: CliIO, name: 'mark_read' | 'ack', description: string, done: string): Command {
  return new Command(name)
    .description(description)
    .argument('<id>', 'Message ID')
    .option('--agent <agent>', 'Your agent name (must be the recipient)')
    .action((id: string, options: { agent?: string }, command: Command) => {
      runCommand(
        io,
        command,
        ctx => {
          const { messageId, agent } = messageActionSchema.parse({ messageId: id, agent: options.agent });
          return name === 'ack' ? ctx.messages.ack(messageId, agent) : ctx.messages.markRead(messageId, agent);
        },
        message => `✅ Message #${message.id} ${done}`
      );
    });
}

export function createMarkReadCommand(io: CliIO): Command {
  return createFlagCommand(io, 'mark_read', 'Mark a message as read', 'marked read');
}

export function createAckCommand(io: CliIO): Command {
  return createFlagCommand(io, 'ack', 'Acknowledge a message', 'acknowledged');
}
