#!/usr/bin/env tsx
// ============================================================================
// @ranktok/cli — Executable entry point
// ============================================================================

import process from 'node:process';
import { run } from './cli.js';

run(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`error: ${error instanceof Error ? error.message : 'Unknown error'}`);
    process.exitCode = 1;
  },
);
