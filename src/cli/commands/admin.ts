/**
 * Administration commands.
 */

import { Command } from 'commander';
import { ActionRunner, parseInteger } from '../context.js';
import { json } from '../format.js';

export function registerAdminCommands(program: Command, run: ActionRunner): void {
  program
    .command('list-projects')
    .description('List all projects')
    .action(run(async (youtrack) => json(await youtrack.admin.listProjects())));

  program
    .command('list-users')
    .description('List users')
    .option('--query <query>', 'Query string to filter users', '')
    .option('--limit <n>', 'Max results to return', parseInteger, 20)
    .option('--skip <n>', 'Results to skip', parseInteger, 0)
    .action(
      run<{ query: string; limit: number; skip: number }>(async (youtrack, options) =>
        json(await youtrack.admin.listUsers(options))
      )
    );

  program
    .command('list-custom-fields')
    .description('List custom fields of a project')
    .requiredOption('--project-id <id>', 'Project ID')
    .action(
      run<{ projectId: string }>(async (youtrack, options) =>
        json(await youtrack.admin.listCustomFields(options.projectId))
      )
    );

  program
    .command('list-workflows')
    .description('List workflows')
    .action(run(async (youtrack) => json(await youtrack.admin.listWorkflows())));

  program
    .command('get-deadline-calendars')
    .description('List deadline calendars')
    .action(run(async (youtrack) => json(await youtrack.admin.getDeadlineCalendars())));

  program
    .command('run-report')
    .description('Execute a saved report')
    .requiredOption('--report-id <id>', 'Report ID')
    .action(
      run<{ reportId: string }>(async (youtrack, options) =>
        json(await youtrack.admin.runReport(options.reportId))
      )
    );

  program
    .command('whoami')
    .description('Show the user the token belongs to')
    .action(run(async (youtrack) => json(await youtrack.admin.authenticate())));
}
