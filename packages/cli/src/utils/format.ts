/**
 * CLI formatting utilities - Shared display formatting
 */
import type { Agent, FileLock, Memory, Message } from '@agent-bridge/types';

/**
 * Get status icon for an agent's free-text status
 */
export function getStatusIcon(status: string): string {
  switch (status) {
    case 'active': return '🟢';
    case 'blocked': return '🔴';
    default: return '⚪';
  }
}

/**
 * Format a single agent for display (list view)
 */
export function formatAgent(agent: Agent): string {
  const details = [agent.program, agent.model].filter((d): d is string => Boolean(d));
  const meta = details.length ? ` (${details.join(', ')})` : '';
  const task = agent.task ? ` | ${agent.task}` : '';
  return `${getStatusIcon(agent.status)} ${agent.name}${meta}: ${agent.status}${task} [last seen ${new Date(agent.lastSeen).toISOString()}]`;
}

/**
 * Format a message for an inbox listing; unread messages are marked with ●
 */
export function formatMessage(message: Message): string[] {
  const marker = message.read ? ' ' : '●';
  const flags = message.acknowledged ? ' [acked]' : '';
  const thread = message.threadId ? ` (thread ${message.threadId})` : '';
  const lines = [`${marker} #${message.id} from ${message.sender}: ${message.subject}${thread}${flags}`];
  if (message.body) {
    lines.push(...message.body.split('\n').map(line => `    ${line}`));
  }
  return lines;
}

export function formatLock(lock: FileLock): string {
  const state = lock.expired ? 'expired' : `${lock.remainingSeconds}s remaining`;
  const reason = lock.reason ? ` | ${lock.reason}` : '';
  return `${lock.expired ? '⌛' : '🔒'} ${lock.path} held by ${lock.agent} (${state})${reason}`;
}

export function formatMemory(memory: Memory): string {
  const tags = memory.tags.length ? ` [${memory.tags.join(', ')}]` : '';
  return `${memory.id}  ${memory.content}${tags}`;
}

/**
 * Formats each item, or prints a placeholder for an empty list.
 */
export function formatList<T>(items: T[], empty: string, format: (item: T) => string | string[]): string[] {
  if (items.length === 0) return [empty];
  return items.flatMap(item => format(item));
}
