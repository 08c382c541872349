/**
 * YouTrack command-line program.
 */

import { Command } from 'commander';
import chalk, { Chalk } from 'chalk';
import { CliContext, createRunner } from './context.js';
import { registerIssueCommands } from './commands/issues.js';
import { registerTimeTrackingCommands } from './commands/time-tracking.js';
import { registerAdminCommands } from './commands/admin.js';
import { registerAgileCommands } from './commands/agile.js';
import { registerLinkCommands } from './commands/links.js';
import { registerQueryCommands } from './commands/queries.js';

export const VERSION = '1.0.0';

export function createProgram(context: CliContext): Command {
  const style = context.colors === false ? new Chalk({ level: 0 }) : chalk;
  const run = createRunner(context, style);

  const program = new Command('youtrack')
    .description('YouTrack CLI - interact with YouTrack from the command line')
    .version(VERSION)
    .option('--config <path>', 'Path to the TOML configuration file (default: ~/.youtrack.toml)')
    .option('--verbose', 'Log requests to stderr')
    .configureOutput({
      writeOut: (text) => context.stdout(text),
      writeErr: (text) => context.stderr(text),
      outputError: (text, write) => write(style.red(text)),
    });

  registerIssueCommands(program, run);
  registerTimeTrackingCommands(program, run);
  registerAdminCommands(program, run);
  registerAgileCommands(program, run);
  registerLinkCommands(program, run);
  registerQueryCommands(program, run);

  return program;
}
