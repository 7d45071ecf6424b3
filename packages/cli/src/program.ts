/**
 * Builds the `agent-bridge` command tree.
 */
import { Command } from 'commander';
import { processIO, type CliIO } from './runtime.js';
import { createAgentsCommand, createRegisterCommand } from './commands/agents.js';
import {
  createAckCommand,
  createInboxCommand,
  createMarkReadCommand,
  createSendCommand
} from './commands/messages.js';
import { createLockCommand, createLocksCommand, createUnlockCommand } from './commands/locks.js';
import { createForgetCommand, createRecallCommand, createRememberCommand } from './commands/memories.js';
import { createMcpConfigCommand } from './commands/mcp-config.js';

export const CLI_VERSION = '0.1.0';

/**
 * Commander errors (bad usage, --help, --version) throw CommanderError
 * instead of exiting so callers decide what to do with them.
 */
export function createProgram(io: CliIO = processIO): Command {
  // commander's help and errors end in a newline; io.out/io.err add their own
  const output = {
    writeOut: (text: string) => io.out(text.replace(/\n$/, '')),
    writeErr: (text: string) => io.err(text.replace(/\n$/, ''))
  };

  const program = new Command()
    .name('agent-bridge')
    .description('Coordinate coding agents: registry, messages, file locks and shared memory')
    .version(CLI_VERSION)
    .option('--db <path>', 'Database file (default: $BRIDGE_DB_PATH or ~/.agent-bridge/bridge.db)')
    .option('--json', 'Print results as JSON', false)
    .exitOverride()
    .configureOutput(output);

  const commands = [
    createRegisterCommand(io),
    createAgentsCommand(io),
    createSendCommand(io),
    createInboxCommand(io),
    createMarkReadCommand(io),
    createAckCommand(io),
    createLockCommand(io),
    createUnlockCommand(io),
    createLocksCommand(io),
    createRememberCommand(io),
    createRecallCommand(io),
    createForgetCommand(io),
    createMcpConfigCommand(io)
  ];
  for (const command of commands) {
    program.addCommand(command.exitOverride().configureOutput(output));
  }

  return program;
}
