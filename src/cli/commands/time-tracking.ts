/**
 * Time tracking commands.
 */

import { Command } from 'commander';
import { ActionRunner, parseInteger } from '../context.js';
import { confirmation, json } from '../format.js';

export function registerTimeTrackingCommands(program: Command, run: ActionRunner): void {
  program
    .command('list-workitems')
    .description('List work items (time tracking entries) in a project')
    .requiredOption('--project-id <id>', 'Project ID')
    .option('--limit <n>', 'Max results to return', parseInteger, 20)
    .option('--skip <n>', 'Results to skip', parseInteger, 0)
    .action(
      run<{ projectId: string; limit: number; skip: number }>(async (youtrack, options) =>
        json(
          await youtrack.timeTracking.listWorkItems(options.projectId, {
            limit: options.limit,
            skip: options.skip,
          })
        )
      )
    );

  program
    .command('calculate-time-spent')
    .description('Calculate total time spent on an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .action(
      run<{ issueId: string }>(async (youtrack, options) => {
        const total = await youtrack.timeTracking.calculateTimeSpent(options.issueId);
        return `Total time spent: ${total} minutes`;
      })
    );

  program
    .command('list-workitem-types')
    .description('List work item types allowed in a project')
    .requiredOption('--project-id <id>', 'Project ID')
    .action(
      run<{ projectId: string }>(async (youtrack, options) =>
        json(await youtrack.timeTracking.listWorkItemTypes(options.projectId))
      )
    );

  program
    .command('add-spent-time')
    .description('Add spent time (a work item) to an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .requiredOption('--duration <minutes>', 'Time spent in minutes', parseInteger)
    .requiredOption('--workitem-type-id <id>', 'Work item type ID')
    .option('--description <text>', 'Description for the work item', '')
    .action(
      run<{ issueId: string; duration: number; workitemTypeId: string; description: string }>(
        async (youtrack, options, style) => {
          const workItem = await youtrack.timeTracking.addSpentTime(
            options.issueId,
            options.duration,
            options.workitemTypeId,
            options.description
          );
          return confirmation(style, 'Added workitem', workItem.id);
        }
      )
    );
}
