#!/usr/bin/env node
/**
 * kqlrun CLI entry point
 */

import { AzCliBackend } from '@kqlrun/executor';
import { createProgram } from './program.js';

const program = createProgram({
  cwd: process.cwd(),
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
  createBackend: () => new AzCliBackend(),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

await program.parseAsync(process.argv);
