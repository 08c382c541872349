/**
 * Query and command-language commands.
 */

import { Command } from 'commander';
import { ActionRunner, parseInteger } from '../context.js';
import { json } from '../format.js';

export function registerQueryCommands(program: Command, run: ActionRunner): void {
  program
    .command('run-query')
    .description('Run a YouTrack query and print the requested fields')
    .requiredOption('--query <query>', 'YouTrack query string')
    .option('--fields <fields>', 'Comma-separated fields to return for each issue', 'id,summary,description')
    .option('--limit <n>', 'Max results to return', parseInteger, 20)
    .option('--skip <n>', 'Results to skip', parseInteger, 0)
    .action(
      run<{ query: string; fields: string; limit: number; skip: number }>(
        async (youtrack, options) =>
          json(
            await youtrack.queries.runQuery(options.query, {
              fields: options.fields,
              limit: options.limit,
              skip: options.skip,
            })
          )
      )
    );

  program
    .command('run-command')
    .description('Apply a YouTrack command to an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .requiredOption('--command <command>', "Command to apply (e.g. 'State Fixed')")
    .option('--comment <text>', 'Comment to add with the command')
    .action(
      run<{ issueId: string; command: string; comment?: string }>(async (youtrack, options) =>
        json(await youtrack.queries.runCommand(options.issueId, options.command, options.comment))
      )
    );
}
