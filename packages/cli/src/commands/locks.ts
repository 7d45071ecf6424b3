import { Command } from 'commander';
import { listLocksSchema, lockSchema, unlockSchema } from '@agent-bridge/types';
import { runCommand, type CliIO } from '../runtime.js';
import { formatList, formatLock } from '../utils/format.js';

export function createLockCommand(io: CliIO): Command {
  return new Command('lock')
    .description('Lock a file for exclusive editing (renews a lock you already hold)')
    .argument('<path>', 'File path')
    .argument('<agent>', 'Your agent name')
    .option('--ttl <seconds>', 'Lock lifetime in seconds')
    .option('--reason <reason>', 'Why you need the lock')
    .action((path: string, agent: string, options: { ttl?: string; reason?: string }, command: Command) => {
      runCommand(
        io,
        command,
        ctx => ctx.locks.lock(lockSchema.parse({ path, agent, ttlSeconds: options.ttl, reason: options.reason })),
        ({ status, lock }) =>
          `🔒 ${status === 'acquired' ? 'Locked' : 'Renewed'} ${lock.path} for ${lock.agent} (${lock.remainingSeconds}s remaining)`
      );
    });
}

export function createUnlockCommand(io: CliIO): Command {
  return new Command('unlock')
    .description('Release a file lock you hold')
    .argument('<path>', 'File path')
    .argument('<agent>', 'Your agent name')
    .action((path: string, agent: string, _options: object, command: Command) => {
      runCommand(
        io,
        command,
        ctx => {
          const params = unlockSchema.parse({ path, agent });
          return ctx.locks.unlock(params.path, params.agent);
        },
        result => result.released ? `🔓 Unlocked ${result.path}` : `ℹ️ ${result.path} was not locked`
      );
    });
}

export function createLocksCommand(io: CliIO): Command {
  return new Command('locks')
    .description('List file locks')
    .option('--all', 'Include expired locks', false)
    .option('--agent <agent>', 'Only locks held by this agent')
    .action((options: { all: boolean; agent?: string }, command: Command) => {
      runCommand(
        io,
        command,
        ctx => ctx.locks.list(listLocksSchema.parse({ activeOnly: !options.all, agent: options.agent })),
        locks => formatList(locks, 'No locks.', formatLock)
      );
    });
}
