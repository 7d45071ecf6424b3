import path from 'path';
import { fileURLToPath } from 'url';
import { Command, Option } from 'commander';
import { handleError, type CliIO, type GlobalOptions } from '../runtime.js';

export const MCP_HOSTS = ['claude', 'opencode'] as const;
export type McpHost = typeof MCP_HOSTS[number];

/** Name the server is registered under in host configs. */
export const MCP_SERVER_KEY = 'agent-bridge';

/** The MCP server's stdio entry point, run through tsx. */
export const MCP_SERVER_ENTRY = fileURLToPath(new URL('../../../mcp-server/src/index.ts', import.meta.url));

/**
 * Host configuration that launches the MCP server. Claude Code reads
 * `mcpServers`; OpenCode reads `mcp` with a local command array.
 */
export function buildMcpConfig(host: McpHost, dbPath?: string): Record<string, unknown> {
  const env: Record<string, string> = dbPath ? { BRIDGE_DB_PATH: path.resolve(dbPath) } : {};

  if (host === 'opencode') {
    return {
      mcp: {
        [MCP_SERVER_KEY]: {
          type: 'local',
          command: ['npx', 'tsx', MCP_SERVER_ENTRY],
          enabled: true,
          ...(dbPath ? { environment: env } : {})
        }
      }
    };
  }

  return {
    mcpServers: {
      [MCP_SERVER_KEY]: {
        command: 'npx',
        args: ['tsx', MCP_SERVER_ENTRY],
        ...(dbPath ? { env } : {})
      }
    }
  };
}

export function createMcpConfigCommand(io: CliIO): Command {
  return new Command('mcp-config')
    .description('Print the config snippet that registers the MCP server with a host')
    .addOption(new Option('--host <host>', 'Host program').choices(MCP_HOSTS).default('claude'))
    .action((options: { host: McpHost }, command: Command) => {
      try {
        const { db } = command.optsWithGlobals<GlobalOptions>();
        io.out(JSON.stringify(buildMcpConfig(options.host, db), null, 2));
      } catch (error) {
        handleError(io, error);
      }
    });
}
