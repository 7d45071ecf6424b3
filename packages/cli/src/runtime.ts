/**
 * Shared plumbing for CLI commands: where output goes, how a command
 * opens the bridge, and how failures are reported.
 */
import type { Command } from 'commander';
import {
  createBridgeContext,
  loadConfig,
  type BridgeConfig,
  type BridgeContext,
  type Clock
} from '@agent-bridge/core';
import { toBridgeError } from '@agent-bridge/types';

/**
 * Everything a command touches outside the bridge itself.
 */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  exit(code: number): void;
  env: Record<string, string | undefined>;
  /** Overrides Date.now for the bridge */
  clock?: Clock;
}

export const processIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  exit: code => { process.exitCode = code; },
  env: process.env
};

/** Options every command inherits from the program. */
export type GlobalOptions = {
  db?: string;
  json?: boolean;
};

/**
 * Resolves config from the environment plus the global --db flag.
 */
export function configFor(io: CliIO, globals: GlobalOptions): BridgeConfig {
  return loadConfig(io.env, globals.db ? { dbPath: globals.db } : {});
}

/**
 * Runs one bridge operation and prints its result: JSON under --json,
 * otherwise the lines render() returns.
 */
export function runCommand<T>(
  io: CliIO,
  command: Command,
  action: (ctx: BridgeContext) => T,
  render: (result: T) => string | string[]
): void {
  const globals = command.optsWithGlobals<GlobalOptions>();
  let ctx: BridgeContext | undefined;

  try {
    ctx = createBridgeContext(configFor(io, globals), { clock: io.clock });
    const result = action(ctx);
    printResult(io, globals, result, render);
  } catch (error) {
    handleError(io, error);
  } finally {
    ctx?.close();
  }
}

export function printResult<T>(
  io: CliIO,
  globals: GlobalOptions,
  result: T,
  render: (result: T) => string | string[]
): void {
  if (globals.json) {
    io.out(JSON.stringify(result, null, 2));
    return;
  }
  const lines = render(result);
  for (const line of Array.isArray(lines) ? lines : [lines]) {
    io.out(line);
  }
}

/**
 * Prints `❌ [CODE] message` and sets exit status 1.
 */
export function handleError(io: CliIO, error: unknown): void {
  const bridgeError = toBridgeError(error);
  io.err(`❌ [${bridgeError.code}] ${bridgeError.message}`);
  io.exit(1);
}
