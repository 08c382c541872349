#!/usr/bin/env node
/**
 * youtrack CLI entry point.
 */

import { createProgram } from './program.js';
import { loadIntegrationFromConfig } from './context.js';

const program = createProgram({
  loadIntegration: loadIntegrationFromConfig,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = 1;
});
