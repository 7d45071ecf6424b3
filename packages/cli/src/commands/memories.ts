import { Command } from 'commander';
import { forgetSchema, recallSchema, rememberSchema } from '@agent-bridge/types';
import { runCommand, type CliIO } from '../runtime.js';
import { formatList, formatMemory } from '../utils/format.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createRememberCommand(io: CliIO): Command {
  return new Command('remember')
    .description('Store a note any agent can recall')
    .argument('<text>', 'What to remember')
    .option('-t, --tag <tag>', 'Tag the memory (repeatable)', collect, [])
    .action((text: string, options: { tag: string[] }, command: Command) => {
      runCommand(
        io,
        command,
        ctx => {
          // No --tag keeps the tags of an existing identical memory
          const params = rememberSchema.parse({ content: text, tags: options.tag.length ? options.tag : undefined });
          return ctx.memories.remember(params.content, params.tags);
        },
        memory => `🧠 Remembered ${memory.id}`
      );
    });
}

export function createRecallCommand(io: CliIO): Command {
  return new Command('recall')
    .description('Search memories by content or tag, newest first')
    .argument('<query>', 'Case-insensitive search term ("" lists the newest)')
    .option('--limit <n>', 'Maximum number of results')
    .action((query: string, options: { limit?: string }, command: Command) => {
      runCommand(
        io,
        command,
        ctx => {
          const params = recallSchema.parse({ query, limit: options.limit });
          return ctx.memories.recall(params.query, params.limit);
        },
        memories => formatList(memories, 'No memories found.', formatMemory)
      );
    });
}

export function createForgetCommand(io: CliIO): Command {
  return new Command('forget')
    .description('Delete a memory')
    .argument('<id>', 'Memory ID')
    .action((id: string, _options: object, command: Command) => {
      runCommand(
        io,
        command,
        ctx => ctx.memories.forget(forgetSchema.parse({ id }).id),
        result => `🗑️ Forgot ${result.id}`
      );
    });
}
