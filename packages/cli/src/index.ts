#!/usr/bin/env tsx
/**
 * Agent Bridge CLI entry point.
 */
import 'dotenv/config';
import { CommanderError } from 'commander';
import { createProgram } from './program.js';

try {
  createProgram().parse(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
  } else {
    console.error('❌ [INTERNAL]', error);
    process.exitCode = 1;
  }
}
