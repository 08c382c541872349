/**
 * Issue and comment commands.
 */

import { Command } from 'commander';
import { ActionRunner, parseInteger } from '../context.js';
import { confirmation, issueLines, json } from '../format.js';

type PageFlags = { limit: number; skip: number };

export function registerIssueCommands(program: Command, run: ActionRunner): void {
  program
    .command('list-issues')
    .description('List issues in a project')
    .requiredOption('--project-id <id>', 'Project ID')
    .option('--query <query>', 'YouTrack query string', '')
    .option('--limit <n>', 'Max results to return', parseInteger, 20)
    .option('--skip <n>', 'Results to skip', parseInteger, 0)
    .action(
      run<PageFlags & { projectId: string; query: string }>(async (youtrack, options) =>
        issueLines(
          await youtrack.issues.list(options.projectId, {
            query: options.query,
            limit: options.limit,
            skip: options.skip,
          })
        )
      )
    );

  program
    .command('create-issue')
    .description('Create a new issue')
    .requiredOption('--project-id <id>', 'Project ID')
    .requiredOption('--summary <text>', 'Issue summary/title')
    .option('--description <text>', 'Issue description', '')
    .option('--story-points <n>', 'Story points value', parseInteger)
    .action(
      run<{ projectId: string; summary: string; description: string; storyPoints?: number }>(
        async (youtrack, options, style) => {
          const issue = await youtrack.issues.create(options.projectId, options.summary, {
            description: options.description,
            storyPoints: options.storyPoints,
          });
          return confirmation(style, 'Created issue', issue.id);
        }
      )
    );

  program
    .command('get-issue')
    .description('Get issue details')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .action(
      run<{ issueId: string }>(async (youtrack, options) =>
        json(await youtrack.issues.get(options.issueId))
      )
    );

  program
    .command('search-issues')
    .description('Search for issues using a YouTrack query')
    .requiredOption('--query <query>', 'YouTrack query string')
    .option('--limit <n>', 'Max results to return', parseInteger, 20)
    .option('--skip <n>', 'Results to skip', parseInteger, 0)
    .action(
      run<PageFlags & { query: string }>(async (youtrack, options) =>
        issueLines(
          await youtrack.issues.search(options.query, {
            limit: options.limit,
            skip: options.skip,
          })
        )
      )
    );

  program
    .command('update-issue')
    .description('Update an existing issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .option('--summary <text>', 'New summary')
    .option('--description <text>', 'New description')
    .option('--story-points <n>', 'Story points value', parseInteger)
    .action(
      run<{ issueId: string; summary?: string; description?: string; storyPoints?: number }>(
        async (youtrack, options, style) => {
          const issue = await youtrack.issues.update(options.issueId, {
            summary: options.summary,
            description: options.description,
            storyPoints: options.storyPoints,
          });
          return confirmation(style, 'Updated issue', issue.id);
        }
      )
    );

  program
    .command('transition-issue')
    .description('Move an issue to a new state by updating a custom field')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .requiredOption('--field-name <name>', "Custom field name (e.g. 'State')")
    .requiredOption('--new-state <value>', 'New state value')
    .action(
      run<{ issueId: string; fieldName: string; newState: string }>(
        async (youtrack, options, style) => {
          await youtrack.issues.transition(options.issueId, options.fieldName, options.newState);
          return confirmation(style, 'Transitioned issue', options.issueId);
        }
      )
    );

  program
    .command('attach-file')
    .description('Attach a file to an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .requiredOption('--file-path <path>', 'Path to file to attach')
    .action(
      run<{ issueId: string; filePath: string }>(async (youtrack, options, style) => {
        const attachments = await youtrack.issues.attachFile(options.issueId, options.filePath);
        return attachments.map((attachment) =>
          confirmation(style, 'Attached file', attachment.id)
        );
      })
    );

  program
    .command('get-issue-history')
    .description('Show the activity history of an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .action(
      run<{ issueId: string }>(async (youtrack, options) =>
        json(await youtrack.issues.getHistory(options.issueId))
      )
    );

  program
    .command('add-comment')
    .description('Add a comment to an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .requiredOption('--text <text>', 'Comment text')
    .action(
      run<{ issueId: string; text: string }>(async (youtrack, options, style) => {
        const comment = await youtrack.comments.add(options.issueId, options.text);
        return confirmation(style, 'Added comment', comment.id);
      })
    );

  program
    .command('list-comments')
    .description('List comments on an issue')
    .requiredOption('--issue-id <id>', 'Issue ID')
    .option('--limit <n>', 'Max results to return', parseInteger, 20)
    .option('--skip <n>', 'Results to skip', parseInteger, 0)
    .action(
      run<PageFlags & { issueId: string }>(async (youtrack, options) =>
        json(
          await youtrack.comments.list(options.issueId, {
            limit: options.limit,
            skip: options.skip,
          })
        )
      )
    );
}
