#!/usr/bin/env node

import { CommanderError } from 'commander';
import { createProgram } from './program.js';

const program = createProgram({
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  fetch,
  env: process.env,
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }
  process.stderr.write(`omp-sign failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
