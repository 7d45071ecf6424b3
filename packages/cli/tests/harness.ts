/**
 * Test harness: runs the CLI against a throwaway database file with
 * captured output and a manual clock.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createProgram } from '../src/program.js';
import type { CliIO } from '../src/runtime.js';

export const T0 = Date.UTC(2025, 0, 15, 9, 0, 0);

export interface RunResult {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

export interface CliHarness {
  dbPath: string;
  run(...args: string[]): RunResult;
  advance(ms: number): void;
  cleanup(): void;
}

export function createCliHarness(): CliHarness {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-bridge-cli-'));
  const dbPath = path.join(dir, 'bridge.db');
  let now = T0;

  return {
    dbPath,

    run(...args: string[]): RunResult {
      const result: RunResult = { stdout: [], stderr: [], exitCode: 0 };
      const io: CliIO = {
        out: line => result.stdout.push(line),
        err: line => result.stderr.push(line),
        exit: code => { result.exitCode = code; },
        env: { BRIDGE_DB_PATH: dbPath, BRIDGE_LOG_LEVEL: 'silent' },
        clock: () => now
      };
      createProgram(io).parse(args, { from: 'user' });
      return result;
    },

    advance(ms: number) {
      now += ms;
    },

    cleanup() {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  };
}
