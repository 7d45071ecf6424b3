import { z } from 'zod';

// ===== Constants =====

/**
 * Default lock lifetime in seconds (30 minutes).
 * Can be overridden by BRIDGE_LOCK_TTL env var.
 */
export const DEFAULT_LOCK_TTL_SECONDS = 1800;

/**
 * Default number of memories returned by recall.
 */
export const DEFAULT_RECALL_LIMIT = 5;

/**
 * Advisory subject prefixes. Never parsed by the store.
 */
export const SUBJECT_TAGS = ['[TASK]', '[DONE]', '[BLOCKED]', '[QUESTION]', '[HANDOFF]'] as const;
export type SubjectTag = typeof SUBJECT_TAGS[number];

// ===== Shared field schemas =====

const agentName = z.string().trim().min(1);

/** Accepts numbers and numeric strings so the CLI can reuse the schemas. */
const positiveInt = z.coerce.number().int().positive();

// ===== Tool Schemas =====

/**
 * Schema for register tool arguments.
 */
export const registerSchema = z.object({
  name: agentName.describe("Agent name (e.g. 'claude-1', 'worker')"),
  program: z.string().optional().describe("Client program (e.g. claude-code, opencode)"),
  model: z.string().optional().describe("Model the agent runs on"),
  task: z.string().optional().describe("What the agent is currently working on"),
  status: z.string().min(1).optional().describe("Free-text status (default: active)")
});
export type RegisterArgs = z.infer<typeof registerSchema>;

/**
 * Schema for agents tool arguments (takes none).
 */
export const listAgentsSchema = z.object({});
export type ListAgentsArgs = z.infer<typeof listAgentsSchema>;

/**
 * Schema for send tool arguments.
 */
export const sendSchema = z.object({
  sender: agentName.describe("Your agent name"),
  recipient: agentName.describe("Target agent name"),
  subject: z.string().trim().min(1).describe("Subject, conventionally prefixed with [TASK], [DONE], [BLOCKED], [QUESTION] or [HANDOFF]"),
  body: z.string().optional().default('').describe("Message body"),
  threadId: z.string().min(1).optional().describe("Thread ID for grouping related messages")
});
export type SendArgs = z.infer<typeof sendSchema>;

/**
 * Schema for inbox tool arguments.
 */
export const inboxSchema = z.object({
  agent: agentName.describe("Your agent name"),
  unreadOnly: z.boolean().optional().default(false).describe("Only return unread messages"),
  limit: positiveInt.optional().describe("Maximum number of messages (oldest first)")
});
export type InboxArgs = z.infer<typeof inboxSchema>;

/**
 * Schema shared by mark_read and ack.
 */
export const messageActionSchema = z.object({
  messageId: positiveInt.describe("ID of the message"),
  agent: agentName.optional().describe("Your agent name; must be the recipient when given")
});
export type MessageActionArgs = z.infer<typeof messageActionSchema>;

/**
 * Schema for lock tool arguments.
 */
export const lockSchema = z.object({
  path: z.string().trim().min(1).describe("File path to lock"),
  agent: agentName.describe("Your agent name"),
  ttlSeconds: positiveInt.optional().describe(`Lock lifetime in seconds (default: ${DEFAULT_LOCK_TTL_SECONDS})`),
  reason: z.string().optional().describe("Why you need the lock")
});
export type LockArgs = z.infer<typeof lockSchema>;

/**
 * Schema for unlock tool arguments.
 */
export const unlockSchema = z.object({
  path: z.string().trim().min(1).describe("File path to release"),
  agent: agentName.describe("Your agent name")
});
export type UnlockArgs = z.infer<typeof unlockSchema>;

/**
 * Schema for locks tool arguments.
 */
export const listLocksSchema = z.object({
  activeOnly: z.boolean().optional().default(true).describe("Hide expired locks"),
  agent: agentName.optional().describe("Only locks held by this agent")
});
export type ListLocksArgs = z.infer<typeof listLocksSchema>;

/**
 * Schema for remember tool arguments.
 */
export const rememberSchema = z.object({
  content: z.string().refine(value => value.trim().length > 0, 'Content must not be empty').describe("What to remember"),
  tags: z.array(z.string().trim().min(1)).optional().describe("Tags/categories for the memory")
});
export type RememberArgs = z.infer<typeof rememberSchema>;

/**
 * Schema for recall tool arguments.
 */
export const recallSchema = z.object({
  query: z.string().describe("Case-insensitive substring to look for in content and tags; empty matches all"),
  limit: positiveInt.optional().describe(`Maximum number of results (default: ${DEFAULT_RECALL_LIMIT})`)
});
export type RecallArgs = z.infer<typeof recallSchema>;

/**
 * Schema for forget tool arguments.
 */
export const forgetSchema = z.object({
  id: z.string().trim().min(1).describe("Memory ID to delete")
});
export type ForgetArgs = z.infer<typeof forgetSchema>;

// ===== Entity Interfaces =====

/**
 * A registered agent.
 */
export interface Agent {
  /** Unique name (e.g. "worker") */
  name: string;
  program?: string;
  model?: string;
  task?: string;
  status: string;
  registeredAt: number;
  lastSeen: number;
}

/**
 * A message between two agents.
 */
export interface Message {
  id: number;
  sender: string;
  recipient: string;
  subject: string;
  body: string;
  threadId?: string;
  createdAt: number;
  read: boolean;
  acknowledged: boolean;
  readAt?: number;
  ackAt?: number;
}

/**
 * An exclusive, time-bounded lock on a file path.
 */
export interface FileLock {
  path: string;
  agent: string;
  reason?: string;
  acquiredAt: number;
  expiresAt: number;
  /** Derived at read time */
  expired: boolean;
  /** Whole seconds until expiry, 0 once expired */
  remainingSeconds: number;
}

/**
 * A shared note any agent can recall.
 */
export interface Memory {
  id: string;
  content: string;
  tags: string[];
  createdAt: number;
}

// ===== Operation Results =====

export interface LockResult {
  status: 'acquired' | 'renewed';
  lock: FileLock;
}

export interface UnlockResult {
  path: string;
  released: boolean;
}

export interface ForgetResult {
  id: string;
  forgotten: true;
}

// ===== Tool Names =====
export const TOOL_NAMES = [
  'register',
  'agents',
  'send',
  'inbox',
  'mark_read',
  'ack',
  'lock',
  'unlock',
  'locks',
  'remember',
  'recall',
  'forget'
] as const;
export type ToolName = typeof TOOL_NAMES[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(tool => tool === name);
}

export * from './errors.js';
export * from './mcp-tools.js';
