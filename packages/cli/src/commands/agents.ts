import { Command } from 'commander';
import { registerSchema } from '@agent-bridge/types';
import { runCommand, type CliIO } from '../runtime.js';
import { formatAgent, formatList } from '../utils/format.js';

interface RegisterOptions {
  program?: string;
  model?: string;
  task?: string;
  status?: string;
}

export function createRegisterCommand(io: CliIO): Command {
  return new Command('register')
    .description('Register an agent, or update one already registered')
    .argument('<name>', 'Agent name')
    .option('--program <program>', 'Client program (claude-code, opencode)')
    .option('--model <model>', 'Model the agent runs on')
    .option('--task <task>', 'Current task description')
    .option('--status <status>', 'Free-text status (default: active)')
    .action((name: string, options: RegisterOptions, command: Command) => {
      runCommand(
        io,
        command,
        ctx => ctx.agents.register(registerSchema.parse({ name, ...options })),
        agent => `✅ Registered ${agent.name}`
      );
    });
}

export function createAgentsCommand(io: CliIO): Command {
  return new Command('agents')
    .description('List registered agents, most recently active first, or show one')
    .argument('[name]', 'Only this agent (fails if it is not registered)')
    .action((name: string | undefined, _options: object, command: Command) => {
      runCommand(
        io,
        command,
        ctx => name === undefined ? ctx.agents.getAll() : [ctx.agents.require(name)],
        agents => formatList(agents, 'No agents registered.', formatAgent)
      );
    });
}
